export const SUPPORTED_CULTURES = ['en-US', 'hi-IN'] as const;

export type Culture = (typeof SUPPORTED_CULTURES)[number];

export const DEFAULT_CULTURE: Culture = 'en-US';

export const CULTURE_COOKIE = 'culture';

export function isCulture(value: unknown): value is Culture {
  return typeof value === 'string' && SUPPORTED_CULTURES.some((c) => c === value);
}

/**
 * Maps a language tag onto a supported culture: exact match first
 * (case-insensitive), then the primary language subtag.
 */
export function matchCulture(tag: string): Culture | null {
  const normalized = tag.trim().toLowerCase();
  if (!normalized || normalized === '*') return null;

  const exact = SUPPORTED_CULTURES.find((c) => c.toLowerCase() === normalized);
  if (exact) return exact;

  const language = normalized.split('-')[0];
  return SUPPORTED_CULTURES.find((c) => c.toLowerCase().split('-')[0] === language) ?? null;
}

/**
 * Language tags from an Accept-Language header, highest quality first.
 * Tags with q=0 are dropped; ties keep header order.
 */
export function parseAcceptLanguage(header: string | undefined): string[] {
  if (!header) return [];

  return header
    .split(',')
    .map((part, index) => {
      const [tag, ...params] = part.trim().split(';');
      const qParam = params.map((p) => p.trim()).find((p) => p.startsWith('q='));
      const quality = qParam ? Number.parseFloat(qParam.slice(2)) : 1;
      return { tag: tag.trim(), quality: Number.isNaN(quality) ? 0 : quality, index };
    })
    .filter((entry) => entry.tag.length > 0 && entry.quality > 0)
    .sort((a, b) => b.quality - a.quality || a.index - b.index)
    .map((entry) => entry.tag);
}

export interface CultureSources {
  query?: string;
  cookie?: string;
  acceptLanguage?: string;
}

/**
 * Negotiation order: explicit query value, cookie, Accept-Language.
 */
export function negotiateCulture(sources: CultureSources): Culture {
  for (const candidate of [sources.query, sources.cookie]) {
    if (candidate) {
      const match = matchCulture(candidate);
      if (match) return match;
    }
  }

  for (const tag of parseAcceptLanguage(sources.acceptLanguage)) {
    const match = matchCulture(tag);
    if (match) return match;
  }

  return DEFAULT_CULTURE;
}

export function formatNumber(value: number, culture: Culture, fractionDigits = 2): string {
  return new Intl.NumberFormat(culture, {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  }).format(value);
}

/** Formats a 'YYYY-MM-DD' date without shifting it through the local time zone. */
export function formatDate(isoDate: string, culture: Culture): string {
  return new Intl.DateTimeFormat(culture, { dateStyle: 'medium', timeZone: 'UTC' }).format(
    new Date(`${isoDate}T00:00:00Z`)
  );
}
