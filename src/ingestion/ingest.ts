import type { PostStore, SaveReport } from "../data/postStore";
import { adaptRawImport } from "./adapters";
import { readCsv } from "./csv";
import type { CanonicalPost, KnownFormatVariant } from "./types";

export type IngestionReport = {
  format: KnownFormatVariant;
  columns: string[];
  rowsTotal: number;
  rowsSkipped: number;
  records: number;
  store: SaveReport | null;
};

type IngestOptions = {
  store: Pick<PostStore, "save"> | null;
  fileName?: string;
};

export type ParsedExport = {
  format: KnownFormatVariant;
  columns: string[];
  rowsTotal: number;
  rowsSkipped: number;
  posts: CanonicalPost[];
};

/** Decodes, classifies and adapts an export file without touching storage. */
export const parseExport = (content: string): ParsedExport => {
  const raw = readCsv(content);
  const adapted = adaptRawImport(raw);
  return {
    format: adapted.format,
    columns: raw.columns,
    rowsTotal: adapted.rowsTotal,
    rowsSkipped: adapted.rowsSkipped,
    posts: adapted.posts
  };
};

export const ingestCsv = async (content: string, options: IngestOptions): Promise<IngestionReport> => {
  const startedAt = Date.now();
  const parsed = parseExport(content);
  const store = options.store ? await options.store.save(parsed.posts) : null;

  const report: IngestionReport = {
    format: parsed.format,
    columns: parsed.columns,
    rowsTotal: parsed.rowsTotal,
    rowsSkipped: parsed.rowsSkipped,
    records: parsed.posts.length,
    store
  };

  console.log(
    JSON.stringify({
      level: "info",
      message: "ingestion_completed",
      file_name: options.fileName ?? null,
      format: report.format,
      rows_total: report.rowsTotal,
      rows_skipped: report.rowsSkipped,
      records: report.records,
      inserted: store?.inserted ?? null,
      already_stored: store?.alreadyStored ?? null,
      failed: store?.failed ?? null,
      persisted: Boolean(store),
      duration_ms: Date.now() - startedAt
    })
  );

  return report;
};
