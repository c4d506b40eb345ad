import type { Link } from "@shortly/shared";

/**
 * Wire shape of a Link
 */
export interface LinkJson {
  id: string;
  original_url: string;
  short_code: string;
  shortened_url: string;
  created_at: string;
}

export function shortenedUrl(shortCode: string, shortUrlBase: string): string {
  return `${shortUrlBase}/${shortCode}`;
}

export function serializeLink(link: Link, shortUrlBase: string): LinkJson {
  return {
    id: link.id,
    original_url: link.originalUrl,
    short_code: link.shortCode,
    shortened_url: shortenedUrl(link.shortCode, shortUrlBase),
    created_at: link.createdAt.toISOString(),
  };
}
