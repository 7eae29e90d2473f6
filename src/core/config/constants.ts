// src/core/config/constants.ts
export const DEFAULT_TIMEOUT = 5000; // 5 seconds per remote call
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const YOUTUBE_OEMBED_ENDPOINT = 'https://www.youtube.com/oembed';
export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';
export const YOUTUBE_SEARCH_PAGE_SIZE = 50;

export const YOUTUBE_API_KEY_ENV = 'YOUTUBE_API_KEY';
