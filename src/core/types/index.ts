// src/core/types/index.ts
export const VIDEO_FIELDS = [
  'title',
  'description',
  'publishedAt',
  'fileUrl',
  'fileUrlIsFlaky',
  'flashEnclosureUrl',
  'isEmbeddable',
  'embedCode',
  'thumbnailUrl',
  'user',
  'userUrl',
  'tags',
  'link',
] as const;

export type VideoField = (typeof VIDEO_FIELDS)[number];

export interface VideoFields {
  /** The video's title. */
  title: string;
  /** A text or HTML description. */
  description: string;
  publishedAt: Date;
  /** URL of the actual video file. */
  fileUrl: string;
  /** Whether `fileUrl` is temporary (tied to a session, signed, ...). */
  fileUrlIsFlaky: boolean;
  /** Enclosure link that points at a flash player rather than a file. */
  flashEnclosureUrl: string;
  isEmbeddable: boolean;
  /** Markup that embeds the video in a page. */
  embedCode: string;
  thumbnailUrl: string;
  /** Name of the uploading user or channel. */
  user: string;
  userUrl: string;
  tags: string[];
  /** Canonical link to the video; may differ from the URL it was requested by. */
  link: string;
}

/**
 * Field data produced by a strategy or a feed/search item. Values that are
 * `null` or `undefined` carry no information and are never merged.
 */
export type VideoData = { [K in VideoField]?: VideoFields[K] | null };

export type Strategy = 'oembed' | 'api' | 'scrape';

const FIELD_NAMES: readonly string[] = VIDEO_FIELDS;

export function isVideoField(name: string): name is VideoField {
  return FIELD_NAMES.includes(name);
}
