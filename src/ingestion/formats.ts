import { normalizeColumnName } from "./coercion";
import { UnrecognizedFormatError } from "./errors";
import type { FormatVariant, KnownFormatVariant } from "./types";

export type FormatRule = {
  variant: KnownFormatVariant;
  description: string;
  matches: (columns: readonly string[]) => boolean;
};

const INSTAGRAM_MARKERS = ["post id", "account username", "permalink"];
const FACEBOOK_VIDEO_MARKER = "3-second video views";

/**
 * Evaluated top to bottom, first match wins. The order is part of the
 * contract: an Instagram export that also carries a `timestamp` column must
 * still classify as Instagram.
 */
export const FORMAT_RULES: readonly FormatRule[] = [
  {
    variant: "instagram_post_export",
    description: `any of ${INSTAGRAM_MARKERS.join(", ")}`,
    matches: (columns) => INSTAGRAM_MARKERS.some((marker) => columns.includes(marker))
  },
  {
    variant: "facebook_video_export",
    description: `a column containing "${FACEBOOK_VIDEO_MARKER}"`,
    matches: (columns) => columns.some((column) => column.includes(FACEBOOK_VIDEO_MARKER))
  },
  {
    variant: "standard",
    description: "both post_id and timestamp",
    matches: (columns) => columns.includes("post_id") && columns.includes("timestamp")
  }
];

export const classifyFormat = (columns: readonly string[]): FormatVariant => {
  const normalized = columns.map(normalizeColumnName);
  const rule = FORMAT_RULES.find((candidate) => candidate.matches(normalized));
  return rule?.variant ?? "unknown";
};

export const requireKnownFormat = (columns: readonly string[]): KnownFormatVariant => {
  const variant = classifyFormat(columns);
  if (variant === "unknown") {
    throw new UnrecognizedFormatError([...columns]);
  }
  return variant;
};
