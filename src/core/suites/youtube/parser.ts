// src/core/suites/youtube/parser.ts
import * as cheerio from 'cheerio';
import type { VideoData } from '../../types/index.js';
import { asRecord, attrOf, parseDate, textOf, type FeedEntry } from '../../feeds/xml.js';
import type { Snippet, SearchListItem, VideoListItem } from './types.js';

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function embedCode(videoId: string): string {
  return `<iframe width="560" height="315" src="https://www.youtube.com/embed/${videoId}" frameborder="0" allowfullscreen></iframe>`;
}

/** Extracts the 11-character video id from a watch or short link. */
export function videoIdFromUrl(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }

  const id = parsed.hostname === 'youtu.be'
    ? parsed.pathname.slice(1).split('/')[0]
    : parsed.searchParams.get('v');

  return id && /^[\w-]{11}$/.test(id) ? id : undefined;
}

function bestThumbnail(snippet: Snippet): string | undefined {
  const thumbnails = snippet.thumbnails ?? {};
  return (thumbnails.high ?? thumbnails.medium ?? thumbnails.default)?.url;
}

function snippetData(snippet: Snippet | undefined): VideoData {
  if (!snippet) {
    return {};
  }
  return {
    title: snippet.title,
    description: snippet.description,
    publishedAt: parseDate(snippet.publishedAt),
    thumbnailUrl: bestThumbnail(snippet),
    user: snippet.channelTitle,
    userUrl: snippet.channelId ? `https://www.youtube.com/channel/${snippet.channelId}` : undefined,
    tags: snippet.tags,
  };
}

export class YouTubeParser {
  parseWatchPage($: cheerio.CheerioAPI): VideoData {
    const meta = (selector: string): string | undefined => {
      const value = $(selector).first().attr('content')?.trim();
      return value || undefined;
    };

    const keywords = meta('meta[name="keywords"]');
    const author = $('[itemprop="author"]').first();

    return {
      title: meta('meta[property="og:title"]') ?? meta('meta[name="title"]'),
      description: meta('meta[property="og:description"]') ?? meta('meta[name="description"]'),
      thumbnailUrl: meta('meta[property="og:image"]'),
      publishedAt: parseDate(meta('meta[itemprop="datePublished"]') ?? meta('meta[itemprop="uploadDate"]')),
      user: author.find('[itemprop="name"]').attr('content') || undefined,
      userUrl: author.find('[itemprop="url"]').attr('href') || undefined,
      tags: keywords
        ? keywords.split(',').map(tag => tag.trim()).filter(tag => tag.length > 0)
        : undefined,
      link: $('link[rel="canonical"]').attr('href') || undefined,
    };
  }

  parseFeedEntry(entry: FeedEntry): VideoData {
    const videoId = textOf(entry.raw['yt:videoId']);
    const group = asRecord(entry.raw['media:group']);

    return {
      title: entry.title ?? textOf(group?.['media:title']),
      description: textOf(group?.['media:description']) ?? entry.summary,
      publishedAt: entry.published ?? entry.updated,
      thumbnailUrl: attrOf(group?.['media:thumbnail'], 'url'),
      user: entry.author?.name,
      userUrl: entry.author?.uri,
      link: videoId ? watchUrl(videoId) : entry.link,
      embedCode: videoId ? embedCode(videoId) : undefined,
    };
  }

  parseApiVideo(item: VideoListItem): VideoData {
    return {
      ...snippetData(item.snippet),
      embedCode: item.player?.embedHtml ?? embedCode(item.id),
      isEmbeddable: item.status?.embeddable,
      link: watchUrl(item.id),
    };
  }

  parseSearchItem(item: SearchListItem): VideoData {
    const videoId = item.id.videoId;
    return {
      ...snippetData(item.snippet),
      link: videoId ? watchUrl(videoId) : undefined,
      embedCode: videoId ? embedCode(videoId) : undefined,
    };
  }
}
