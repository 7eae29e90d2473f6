// src/core/feeds/xml.ts
import { XMLParser } from 'fast-xml-parser';
import { parseFailed } from '../errors.js';

export interface FeedAuthor {
  name?: string;
  uri?: string;
}

export interface FeedEntry {
  id?: string;
  title?: string;
  link?: string;
  summary?: string;
  published?: Date;
  updated?: Date;
  author?: FeedAuthor;
  /** The entry element as parsed, for suite-specific extensions. */
  raw: Record<string, unknown>;
}

export interface FeedDocument {
  title?: string;
  subtitle?: string;
  link?: string;
  id?: string;
  updated?: Date;
  /** Atom `rel="next"` link of a paged feed. */
  next?: string;
  /** ETag of the HTTP response the document came from. */
  etag?: string;
  entries: FeedEntry[];
}

const REPEATED = new Set(['entry', 'item', 'link', 'category']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: name => REPEATED.has(name),
});

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return undefined;
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** Text content of an element, whether it parsed as a string or as `{ '#text' }`. */
export function textOf(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  const record = asRecord(value);
  return record ? textOf(record['#text']) : undefined;
}

export function attrOf(value: unknown, name: string): string | undefined {
  const record = asRecord(Array.isArray(value) ? value[0] : value);
  return record ? textOf(record[`@_${name}`]) : undefined;
}

export function parseDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function parseFeedXml(xml: string): FeedDocument {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch (error) {
    throw parseFailed('Feed XML is malformed', error);
  }

  const root = asRecord(parsed);
  const atom = asRecord(root?.feed);
  if (atom) {
    return parseAtom(atom);
  }
  const channel = asRecord(asRecord(root?.rss)?.channel);
  if (channel) {
    return parseRss(channel);
  }
  throw parseFailed('Document is neither an RSS nor an Atom feed');
}

function atomLinks(value: unknown): Record<string, unknown>[] {
  return asArray(value).map(asRecord).filter((link): link is Record<string, unknown> => !!link);
}

function atomLink(value: unknown): string | undefined {
  const links = atomLinks(value);
  const alternate = links.find(link => {
    const rel = textOf(link['@_rel']);
    return rel === undefined || rel === 'alternate';
  });
  return textOf((alternate ?? links[0])?.['@_href']);
}

function atomRelLink(value: unknown, rel: string): string | undefined {
  const link = atomLinks(value).find(l => textOf(l['@_rel']) === rel);
  return link ? textOf(link['@_href']) : undefined;
}

function parseAtom(feed: Record<string, unknown>): FeedDocument {
  return {
    title: textOf(feed.title),
    subtitle: textOf(feed.subtitle),
    link: atomLink(feed.link),
    id: textOf(feed.id),
    updated: parseDate(textOf(feed.updated)),
    next: atomRelLink(feed.link, 'next'),
    entries: asArray(feed.entry).map(asRecord).filter((e): e is Record<string, unknown> => !!e).map(entry => {
      const author = asRecord(asArray(entry.author)[0]);
      return {
        id: textOf(entry.id),
        title: textOf(entry.title),
        link: atomLink(entry.link),
        summary: textOf(entry.summary) ?? textOf(entry.content),
        published: parseDate(textOf(entry.published)),
        updated: parseDate(textOf(entry.updated)),
        author: author ? { name: textOf(author.name), uri: textOf(author.uri) } : undefined,
        raw: entry,
      };
    }),
  };
}

function parseRss(channel: Record<string, unknown>): FeedDocument {
  return {
    title: textOf(channel.title),
    subtitle: textOf(channel.description),
    link: textOf(channel.link),
    id: textOf(channel.link),
    updated: parseDate(textOf(channel.lastBuildDate) ?? textOf(channel.pubDate)),
    entries: asArray(channel.item).map(asRecord).filter((i): i is Record<string, unknown> => !!i).map(item => {
      const creator = textOf(item['dc:creator']) ?? textOf(item.author);
      return {
        id: textOf(item.guid),
        title: textOf(item.title),
        link: textOf(item.link),
        summary: textOf(item.description),
        published: parseDate(textOf(item.pubDate)),
        updated: undefined,
        author: creator ? { name: creator } : undefined,
        raw: item,
      };
    }),
  };
}

/** Stand-in for a feed the server reported as unchanged. */
export function emptyFeedDocument(etag?: string, updated?: Date): FeedDocument {
  return { etag, updated, entries: [] };
}
