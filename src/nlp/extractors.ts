/**
 * Entity extractors for chat messages.
 *
 * Every extractor takes normalized text (trimmed, lower-cased) except
 * extractPersonName, which needs the original casing. Dates are calendar
 * dates in UTC; "today" is whatever the caller's clock says.
 */

import type { IsoDate, RelativeTime, VolunteerRole } from '../core/types.js';

// =============================================================================
// Dates
// =============================================================================

const WEEKDAYS: Array<[name: string, daysFromMonday: number]> = [
  ['monday', 0], ['mon', 0],
  ['tuesday', 1], ['tues', 1], ['tue', 1],
  ['wednesday', 2], ['wed', 2],
  ['thursday', 3], ['thurs', 3], ['thu', 3],
  ['friday', 4], ['fri', 4],
  ['saturday', 5], ['sat', 5],
  ['sunday', 6], ['sun', 6],
];

const WEEKDAY_PATTERNS = WEEKDAYS.map(([name, day]) => ({
  name,
  day,
  pattern: new RegExp(`\\b${name}\\b`),
}));

export const WEEKDAY_NAMES: ReadonlySet<string> = new Set(WEEKDAYS.map(([name]) => name));

/**
 * Explicit date formats, tried in order. Group indices point at
 * year/month/day; a year index of 0 means "current year".
 */
const DATE_FORMATS: Array<{ label: string; pattern: RegExp; y: number; m: number; d: number }> = [
  { label: 'YYYY-MM-DD', pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, y: 1, m: 2, d: 3 },
  { label: 'MM/DD/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, y: 3, m: 1, d: 2 },
  { label: 'MM-DD-YYYY', pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, y: 3, m: 1, d: 2 },
  { label: 'DD/MM/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, y: 3, m: 2, d: 1 },
  { label: 'YYYY/MM/DD', pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, y: 1, m: 2, d: 3 },
  { label: 'MM/DD', pattern: /^(\d{1,2})\/(\d{1,2})$/, y: 0, m: 1, d: 2 },
  { label: 'MM-DD', pattern: /^(\d{1,2})-(\d{1,2})$/, y: 0, m: 1, d: 2 },
];

const TRAILING_PUNCTUATION = /[.,!?;:]+$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format the UTC calendar date of a timestamp
 */
export function toIsoDate(date: Date): IsoDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + days));
}

/**
 * Build a calendar date, rejecting impossible ones (2025-02-30, month 13...)
 */
export function calendarDate(year: number, month: number, day: number): IsoDate | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 to 1900-1999
  date.setUTCFullYear(year);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined;
  return toIsoDate(date);
}

function parseDateToken(token: string, currentYear: number): IsoDate | undefined {
  for (const format of DATE_FORMATS) {
    const match = format.pattern.exec(token);
    if (!match) continue;
    const year = format.y === 0 ? currentYear : Number(match[format.y]);
    const date = calendarDate(year, Number(match[format.m]), Number(match[format.d]));
    if (date) return date;
  }
  return undefined;
}

/**
 * Extract a calendar date: "today"/"tomorrow", a weekday name (next
 * occurrence after today, one more week with "next"), or an explicit
 * date token.
 */
export function extractDate(text: string, now: Date): IsoDate | undefined {
  if (text.includes('today')) {
    return toIsoDate(now);
  }
  if (text.includes('tomorrow')) {
    return toIsoDate(addDays(now, 1));
  }

  for (const { day, pattern } of WEEKDAY_PATTERNS) {
    if (!pattern.test(text)) continue;
    const currentDay = (now.getUTCDay() + 6) % 7;
    let daysAhead = day - currentDay;
    // Same weekday as today means next week's
    if (daysAhead <= 0) {
      daysAhead += 7;
    }
    if (text.includes('next')) {
      daysAhead += 7;
    }
    return toIsoDate(addDays(now, daysAhead));
  }

  const currentYear = now.getUTCFullYear();
  for (const raw of text.split(/\s+/)) {
    const token = raw.replace(TRAILING_PUNCTUATION, '');
    if (!token) continue;
    const date = parseDateToken(token, currentYear);
    if (date) return date;
  }

  return undefined;
}

// =============================================================================
// Relative game
// =============================================================================

/**
 * 0 = next game, 1 = the one after, 2 = the one after that
 */
export function extractRelativeGame(text: string): number | undefined {
  if (text.includes('next game') || (text.includes('next') && !text.includes('after'))) {
    return 0;
  }
  if (text.includes('game after next') || text.includes('after next')) {
    return 1;
  }
  if (text.includes('two games') || text.includes('2 games') || text.includes('second game')) {
    return 1;
  }
  if (text.includes('three games') || text.includes('3 games') || text.includes('third game')) {
    return 2;
  }
  return undefined;
}

// =============================================================================
// Roles
// =============================================================================

export const ROLE_FAMILIES: ReadonlyArray<{ role: VolunteerRole; keywords: readonly string[] }> = [
  { role: 'snacks', keywords: ['snacks', 'snack', 'food', 'treats'] },
  { role: 'livestream', keywords: ['livestream', 'stream', 'streaming', 'live'] },
  { role: 'scoreboard', keywords: ['scoreboard', 'score', 'scoring', 'gamechanger', 'game changer'] },
  { role: 'pitchcount', keywords: ['pitchcount', 'pitch count', 'pitch', 'pitches'] },
];

/**
 * Every canonical role mentioned, in family order
 */
export function extractRoles(text: string): VolunteerRole[] {
  return ROLE_FAMILIES
    .filter(({ keywords }) => keywords.some((keyword) => text.includes(keyword)))
    .map(({ role }) => role);
}

// =============================================================================
// Person names
// =============================================================================

const EXCLUDED_NAME_WORDS = new Set([
  'i', "i've", "i'll", "i'm",
  'we', "we've", "we'll", "we're",
  'you', "you've", "you'll",
  'he', 'she', 'they', 'it',
  ...WEEKDAY_NAMES,
]);

function isCapitalized(token: string): boolean {
  return /^\p{Lu}/u.test(token);
}

function isExcludedNameToken(token: string): boolean {
  if (token.startsWith('@') || token.length <= 1) return true;
  const normalized = token
    .toLowerCase()
    .replace(TRAILING_PUNCTUATION, '')
    .replace(/’/g, "'")
    .replace(/^'+|'+$/g, '');
  return EXCLUDED_NAME_WORDS.has(normalized);
}

/**
 * Capitalized run starting at `start`, with excluded tokens dropped
 */
function collectNameRun(tokens: string[], start: number): string | undefined {
  const parts: string[] = [];
  for (let i = start; i < tokens.length && isCapitalized(tokens[i]); i++) {
    if (!isExcludedNameToken(tokens[i])) {
      parts.push(tokens[i].replace(TRAILING_PUNCTUATION, ''));
    }
  }
  return parts.length > 0 ? parts.join(' ') : undefined;
}

/**
 * Find a person's name in original-cased text: after "for", after a
 * standalone "-", or the first capitalized run.
 */
export function extractPersonName(text: string): string | undefined {
  const tokens = text.split(/\s+/).filter(Boolean);

  const forIdx = tokens.findIndex((token) => token.toLowerCase() === 'for');
  if (forIdx !== -1) {
    const name = collectNameRun(tokens, forIdx + 1);
    if (name) return name;
  }

  const dashIdx = tokens.indexOf('-');
  if (dashIdx !== -1) {
    const name = collectNameRun(tokens, dashIdx + 1);
    if (name) return name;
  }

  const start = tokens.findIndex((token) => isCapitalized(token) && !isExcludedNameToken(token));
  return start === -1 ? undefined : collectNameRun(tokens, start);
}

// =============================================================================
// Game queries
// =============================================================================

export const GAME_CATEGORIES = [
  'time', 'location', 'where', 'home', 'snacks',
  'livestream', 'scoreboard', 'pitchcount', 'pitch count',
] as const;

export function extractGameCategory(text: string): string | undefined {
  return GAME_CATEGORIES.find((category) => text.includes(category));
}

const NUMBER_WORDS: Array<[word: string, value: number]> = [
  ['one', 1], ['two', 2], ['three', 3], ['four', 4], ['five', 5],
  ['six', 6], ['seven', 7], ['eight', 8], ['nine', 9], ['ten', 10],
];

/**
 * "next 3 games" -> 3, "next three games" -> 3
 */
export function extractGameCount(text: string): number | undefined {
  const tokens = text.split(/\s+/).filter(Boolean);
  for (let i = 0; i < tokens.length - 1; i++) {
    if (/^\d+$/.test(tokens[i]) && tokens[i + 1].includes('game')) {
      const count = Number(tokens[i]);
      if (Number.isSafeInteger(count)) return count;
    }
  }

  if (!text.includes('game')) return undefined;
  for (const [word, value] of NUMBER_WORDS) {
    if (new RegExp(`\\b${word}\\b`).test(text)) return value;
  }
  return undefined;
}

export function extractRelativeTime(text: string): RelativeTime | undefined {
  if (text.includes('next')) return 'next';
  if (text.includes('upcoming')) return 'upcoming';
  return undefined;
}
