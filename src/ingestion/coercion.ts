import type { MediaType } from "./types";

/*
 * Coercions shared by every adapter. Each substitutes a documented default
 * instead of failing, and none of them log: a malformed cell is common enough
 * in exports that per-cell logging would flood the output.
 */

export const DEFAULT_HASHTAGS = "#socialmedia #content";
export const MAX_HASHTAGS = 10;
export const FOLLOWER_EPOCH = new Date(Date.UTC(2019, 0, 1));

const DAY_MS = 24 * 60 * 60 * 1000;
const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
];
const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

export const normalizeColumnName = (value: string): string => value.trim().toLowerCase();

/** Number-ish cell → finite number; anything else → `fallback`. Thousands separators and units are stripped. */
export const safeNumber = (value: unknown, fallback = 0): number => {
  if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
  if (typeof value !== "string") return fallback;

  const digits = value.replace(/[^0-9.-]/g, "");
  if (!digits) return fallback;
  const parsed = Number.parseFloat(digits);
  return Number.isFinite(parsed) ? parsed : fallback;
};

/** `safeNumber` truncated toward zero. `"1,234"` → 1234, `"n/a"` → 0. */
export const safeInt = (value: unknown, fallback = 0): number => Math.trunc(safeNumber(value, fallback));

export const nonNegativeInt = (value: unknown): number => Math.max(0, safeInt(value));

const buildUtcDate = (
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0
): Date | null => {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
  // Date.UTC rolls 02/30 over into March; reject instead.
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
};

const STRICT_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2})$/;
const ISO_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?\s*(AM|PM)?)?$/i;

/** Export timestamps in `MM/DD/YYYY HH:mm`, read as UTC. */
export const parseStrictTimestamp = (value: string): Date | null => {
  const match = STRICT_PATTERN.exec(value.trim());
  if (!match) return null;
  const [, month, day, year, hour, minute] = match;
  return buildUtcDate(Number(year), Number(month), Number(day), Number(hour), Number(minute));
};

const toHour24 = (hour: number, meridiem: string | undefined): number => {
  if (!meridiem) return hour;
  const pm = meridiem.toUpperCase() === "PM";
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
};

/** ISO dates, US dates with optional time and AM/PM, then whatever `Date.parse` accepts. Naive values are UTC. */
export const parseLenientTimestamp = (value: string): Date | null => {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = ISO_PATTERN.exec(trimmed);
  if (iso) {
    const [, year, month, day, hour, minute, second, millis, zone] = iso;
    const local = buildUtcDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hour ?? 0),
      Number(minute ?? 0),
      Number(second ?? 0),
      Number((millis ?? "0").padEnd(3, "0"))
    );
    if (!local || !zone || zone.toUpperCase() === "Z") return local;

    const sign = zone.startsWith("-") ? -1 : 1;
    const digits = zone.slice(1).replace(":", "");
    const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
    return new Date(local.getTime() - sign * offsetMinutes * 60 * 1000);
  }

  const us = US_PATTERN.exec(trimmed);
  if (us) {
    const [, month, day, year, hour, minute, second, meridiem] = us;
    return buildUtcDate(
      Number(year),
      Number(month),
      Number(day),
      toHour24(Number(hour ?? 0), meridiem),
      Number(minute ?? 0),
      Number(second ?? 0)
    );
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : new Date(parsed);
};

/** Strict format first, then lenient parsing. `null` means the row has no usable timestamp. */
export const safeTimestamp = (value: unknown): Date | null => {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === "number") return Number.isFinite(value) ? new Date(value) : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === "nan") return null;
  return parseStrictTimestamp(trimmed) ?? parseLenientTimestamp(trimmed);
};

export const daysSince = (date: Date, origin: Date = FOLLOWER_EPOCH): number =>
  Math.floor((date.getTime() - origin.getTime()) / DAY_MS);

export const extractHashtags = (text: string | null | undefined): string => {
  if (!text) return DEFAULT_HASHTAGS;
  const matches = text.match(HASHTAG_PATTERN) ?? [];
  if (matches.length === 0) return DEFAULT_HASHTAGS;
  return matches.slice(0, MAX_HASHTAGS).join(" ");
};

/** Hashtag cell values such as `"fun, campus"` or `"#fun #campus"` → `"#fun #campus"`. */
export const normalizeHashtagList = (value: string | null | undefined): string | null => {
  if (!value) return null;
  const tokens = value
    .split(/[,\s;|]+/g)
    .map((token) => token.trim().replace(/^#+/, ""))
    .filter((token) => token.length > 0)
    .slice(0, MAX_HASHTAGS);
  return tokens.length > 0 ? tokens.map((token) => `#${token}`).join(" ") : null;
};

export const mediaTypeFromPostType = (postType: string | null | undefined): MediaType => {
  const normalized = (postType ?? "").trim().toLowerCase();
  if (normalized.includes("reel") || normalized.includes("video")) return "Video";
  if (normalized.includes("carousel") || normalized.includes("album")) return "Carousel";
  return "Image";
};

export const monthName = (date: Date): string => MONTH_NAMES[date.getUTCMonth()] ?? "";

/** Tags for exports that carry no caption: base set, media-type set, then the month. */
export const generateHashtags = (mediaType: MediaType, timestamp: Date): string => {
  const tags = ["#socialmedia", "#digital", "#content"];
  if (mediaType === "Video") tags.push("#video", "#reel", "#viral");
  else if (mediaType === "Carousel") tags.push("#carousel", "#gallery");
  else tags.push("#photo", "#instagram");
  tags.push(`#${monthName(timestamp).toLowerCase()}`);
  return tags.slice(0, 8).join(" ");
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** `January 05, 2025` */
export const formatLongDate = (date: Date): string =>
  `${monthName(date)} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()}`;

/** `January 05, 2025 at 03:30 PM` */
export const formatLongDateTime = (date: Date): string => {
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? "AM" : "PM";
  return `${formatLongDate(date)} at ${pad2(hour12)}:${pad2(date.getUTCMinutes())} ${meridiem}`;
};

export const isBlank = (value: string | null | undefined): boolean => {
  if (value === null || value === undefined) return true;
  const trimmed = value.trim();
  return trimmed.length === 0 || trimmed.toLowerCase() === "nan";
};
