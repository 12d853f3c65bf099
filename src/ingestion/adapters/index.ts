import { EmptyResultError } from "../errors";
import { requireKnownFormat } from "../formats";
import type { AdaptResult, KnownFormatVariant, RawImport } from "../types";
import { facebookVideoAdapter } from "./facebookVideo";
import { instagramAdapter } from "./instagram";
import type { SchemaAdapter } from "./shared";
import { standardAdapter } from "./standard";

export const SCHEMA_ADAPTERS: Record<KnownFormatVariant, SchemaAdapter> = {
  instagram_post_export: instagramAdapter,
  facebook_video_export: facebookVideoAdapter,
  standard: standardAdapter
};

export type AdaptedImport = AdaptResult & { format: KnownFormatVariant };

/** Classifies `raw` by its header and runs the matching adapter. */
export const adaptRawImport = (raw: RawImport): AdaptedImport => {
  if (raw.columns.length === 0 && raw.rows.length === 0) {
    throw new EmptyResultError("unknown", 0);
  }

  const format = requireKnownFormat(raw.columns);
  if (raw.rows.length === 0) {
    throw new EmptyResultError(format, 0);
  }

  return { format, ...SCHEMA_ADAPTERS[format].adapt(raw) };
};

export type { SchemaAdapter } from "./shared";
