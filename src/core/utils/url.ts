// src/core/utils/url.ts
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function normalizeUrl(urlString: string): string {
  const url = new URL(urlString);
  url.hash = '';
  return url.toString();
}
