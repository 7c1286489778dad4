/**
 * 曲目记录：Metadata Source → Feed Assembler → RSS Serializer
 * 核心逻辑只读，不落库
 */

export interface TrackRecord {
    /** 稳定唯一标识（SoundCloud 数字 id 的字符串形式） */
    id: string;
    /** 原始发布时间（UTC） */
    publishedAt: Date;
    /** 标题 */
    title: string;
    /** 上传者显示名 */
    author: string;
    /** 描述（纯文本，可能含换行） */
    description?: string;
    /** SoundCloud 页面链接 */
    link: string;
    /** 封面图 */
    artworkUrl?: string;
    /** 时长（秒） */
    durationSec: number;
    /** 是否存在 progressive MP3，决定 RSS 是否输出 enclosure */
    hasProgressiveStream: boolean;
  }


/** 带有效时间的曲目：effectiveAt 即 RSS pubDate */
export interface AnnotatedTrack extends TrackRecord {
    effectiveAt: Date;
  }
