const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;
const THINK_RE = /<think>[\s\S]*?<\/think>/gi;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (match) => ENTITY_MAP[match] ?? match)
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(Number(code)));
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/i, '$1');
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  const decoded = decodeHtmlEntities(stripCdata(value));
  return decoded.replace(TAG_RE, ' ').replace(WS_RE, ' ').trim();
}

/** Like cleanText but keeps line breaks, for model output. */
export function cleanMultiline(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Drops the reasoning block some local models emit before the answer. */
export function stripThinkSection(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(THINK_RE, '').trim();
}

export function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxChars - 1)).trimEnd()}…`;
}

export function trimTitleNoise(title: string, sourceName?: string): string {
  const normalizedTitle = cleanText(title);
  if (!normalizedTitle || !sourceName) {
    return normalizedTitle;
  }
  const escaped = sourceName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return (
    normalizedTitle
      .replace(new RegExp(`\\s*[|\\-–—·:]\\s*${escaped}\\s*$`, 'i'), '')
      .trim() || normalizedTitle
  );
}

export function slugify(value: string): string {
  return cleanText(value)
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

const THOUSANDS_RE = /^[+-]?\d{1,3}(,\d{3})+(\.\d+)?$/;
const MINUTES_RE = /^(\d{1,3}):([0-5]\d)$/;
const RATIO_RE =
  /^(\d+)\s*\/\s*(\d+)(?:\s*\(\s*(\d+(?:[.,]\d+)?)\s*%\s*\))?$/;
const PLAIN_NUMBER_RE = /^[+-]?\d+([.,]\d+)?$/;

/**
 * Reads a stat value as written by scoreboards: comma or dot decimals,
 * `1,234` thousands, `54%`, `90'`, `34:30` minutes (34.5) and `17/19 (89%)`
 * made/attempted (the percentage, or the computed one when absent).
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();

  const minutes = MINUTES_RE.exec(text);
  if (minutes) {
    return Number(minutes[1]) + Number(minutes[2]) / 60;
  }

  const ratio = RATIO_RE.exec(text);
  if (ratio) {
    if (ratio[3]) {
      return toFiniteNumber(ratio[3].replace(',', '.'));
    }
    const attempts = Number(ratio[2]);
    return attempts > 0
      ? Math.round((Number(ratio[1]) / attempts) * 1000) / 10
      : null;
  }

  const bare = text.replace(/\s*(%|'|′)$/, '');
  if (THOUSANDS_RE.test(bare)) {
    return toFiniteNumber(bare.replace(/,/g, ''));
  }
  return toFiniteNumber(bare.replace(',', '.'));
}

/** True for values that parseNumber reads without reinterpretation. */
export function isPlainNumber(value: string): boolean {
  const text = value.trim();
  return PLAIN_NUMBER_RE.test(text) && !THOUSANDS_RE.test(text);
}

function toFiniteNumber(value: string): number | null {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
