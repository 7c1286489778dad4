// 播客 RSS 2.0 输出结构（含 iTunes 命名空间字段）

export interface RssChannel {
  title: string;
  link: string;
  description?: string;
  language?: string;
  author?: string;
  imageUrl?: string;
}

export interface RssEntry {
  title: string;
  link: string;
  description: string;
  guid: string;
  published: Date;
  author: string;
  /** 秒 */
  durationSec: number;
  /** 无 MP3 时不输出 enclosure */
  enclosureUrl?: string;
  imageUrl?: string;
}

export interface BuildOptions {
  /** 默认当前时刻 */
  lastBuildDate?: Date;
}
