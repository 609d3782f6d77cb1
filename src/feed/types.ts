export interface FeedItem {
  title: string;
  link: string;        // 항목 식별 키 (중복 판정 기준)
  publishedAt: Date;
  summary?: string;    // 없으면 제목을 description으로 사용
}

export interface FeedMeta {
  title: string;
  link: string;
  description: string;
  language: string;
  selfUrl?: string;
}

/** 최신 항목이 앞에 오는 피드 */
export interface Feed {
  meta: FeedMeta;
  items: FeedItem[];
}
