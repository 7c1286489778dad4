// 将频道 + 条目构建为播客 RSS 2.0 XML（纯函数，不做任何 IO）

import type { BuildOptions, RssChannel, RssEntry } from "./types.js";


const ITUNES_NS = "http://www.itunes.com/dtds/podcast-1.0.dtd";
const DEFAULT_DESCRIPTION = "SoundCloud podcast feed";


/** XML 1.0 不允许的字符（除 \t \n \r 外的 C0 控制符与 U+FFFE/U+FFFF） */
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;


export function stripInvalidXmlChars(s: string): string {
  return s.replace(INVALID_XML_CHARS, "");
}


export function escapeXml(s: string): string {
  return stripInvalidXmlChars(s)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}


/** 含标签的描述走 CDATA，其余转义 */
function description(raw: string): string {
  const text = stripInvalidXmlChars(raw);
  return text.includes("<") || text.includes(">")
    ? `<![CDATA[${text.replace(/\]\]>/g, "]]]]><![CDATA[>")}]]>`
    : escapeXml(text);
}


function buildItem(entry: RssEntry): string {
  let buf = `    <item>\n      <title>${escapeXml(entry.title)}</title>\n      <link>${escapeXml(entry.link)}</link>\n      <description>${description(entry.description)}</description>\n`;
  buf += `      <pubDate>${entry.published.toUTCString()}</pubDate>\n`;
  buf += `      <guid isPermaLink="false">${escapeXml(entry.guid)}</guid>\n`;
  buf += `      <itunes:author>${escapeXml(entry.author)}</itunes:author>\n`;
  buf += `      <itunes:duration>${entry.durationSec}</itunes:duration>\n`;
  if (entry.imageUrl) buf += `      <itunes:image href="${escapeXml(entry.imageUrl)}"/>\n`;
  if (entry.enclosureUrl) buf += `      <enclosure url="${escapeXml(entry.enclosureUrl)}" length="0" type="audio/mpeg"/>\n`;
  buf += `    </item>\n`;
  return buf;
}


export function buildRssXml(channel: RssChannel, entries: RssEntry[], options: BuildOptions = {}): string {
  const title = escapeXml(channel.title);
  const link = escapeXml(channel.link);
  const desc = escapeXml(channel.description || DEFAULT_DESCRIPTION);
  const lang = escapeXml(channel.language ?? "en-us");
  const author = escapeXml(channel.author ?? channel.title);
  const image = channel.imageUrl ? `    <itunes:image href="${escapeXml(channel.imageUrl)}"/>\n` : "";
  const lastBuildDate = (options.lastBuildDate ?? new Date()).toUTCString();
  const items = entries.map(buildItem).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:itunes="${ITUNES_NS}">
  <channel>
    <title>${title}</title>
    <link>${link}</link>
    <description>${desc}</description>
    <language>${lang}</language>
    <itunes:author>${author}</itunes:author>
${image}    <lastBuildDate>${lastBuildDate}</lastBuildDate>

${items}  </channel>
</rss>`;
}
