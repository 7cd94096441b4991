
/** 订阅源中的一条原始条目；字段缺失保持 undefined */
export type FeedItem = { title?: string; link?: string; description?: string; pubDate?: string; isoDate?: string };

export type FeedChannel = { feedUrl: string; title?: string; link: string; items: FeedItem[] };
