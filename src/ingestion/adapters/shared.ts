import { normalizeColumnName } from "../coercion";
import { EmptyResultError, RowExtractionError } from "../errors";
import type { AdaptResult, CanonicalPost, KnownFormatVariant, RawImport } from "../types";

const MAX_LOGGED_ROW_ERRORS = 5;

export const DEFAULT_AUDIENCE_GENDER = "Mixed";
export const DEFAULT_AUDIENCE_AGE = "18-24";
export const DEFAULT_LOCATION = "India";

export type RowAccessor = {
  index: number;
  cells: string[];
  /** Value of the first listed column present in the header (names compared trimmed and lower-cased). */
  get: (...names: string[]) => string | undefined;
  /** `[column, value]` for every header column accepted by `predicate`, in header order. */
  pick: (predicate: (normalizedColumn: string) => boolean) => Array<[string, string]>;
};

export type SchemaAdapter = {
  variant: KnownFormatVariant;
  adapt: (raw: RawImport) => AdaptResult;
};

export const createRowAccessorFactory = (columns: readonly string[]) => {
  const normalized = columns.map(normalizeColumnName);
  const positions = new Map<string, number>();
  normalized.forEach((name, position) => {
    if (!positions.has(name)) positions.set(name, position);
  });

  return (cells: string[], index: number): RowAccessor => ({
    index,
    cells,
    get: (...names) => {
      for (const name of names) {
        const position = positions.get(normalizeColumnName(name));
        if (position !== undefined) return cells[position];
      }
      return undefined;
    },
    pick: (predicate) =>
      normalized.flatMap((name, position): Array<[string, string]> =>
        predicate(name) ? [[name, cells[position] ?? ""]] : []
      )
  });
};

export const syntheticPostId = (prefix: string, index: number): string => `${prefix}_${String(index).padStart(4, "0")}`;

export const requireTimestamp = (value: Date | null, index: number, source: string): Date => {
  if (!value) {
    throw new RowExtractionError(index, `unparseable ${source}`);
  }
  return value;
};

/**
 * Runs `extract` over every row with a partial-success policy: a row that
 * throws is logged and skipped, and only an empty result is fatal.
 */
export const adaptRows = (
  variant: KnownFormatVariant,
  columns: readonly string[],
  rows: string[][],
  extract: (row: RowAccessor) => CanonicalPost
): AdaptResult => {
  const accessorFor = createRowAccessorFactory(columns);
  const posts: CanonicalPost[] = [];
  let rowsSkipped = 0;

  rows.forEach((cells, index) => {
    try {
      posts.push(extract(accessorFor(cells, index)));
    } catch (error) {
      rowsSkipped += 1;
      if (rowsSkipped <= MAX_LOGGED_ROW_ERRORS) {
        console.log(
          JSON.stringify({
            level: "warn",
            message: "ingestion_row_skipped",
            format: variant,
            row_index: index,
            error: (error as Error).message
          })
        );
      }
    }
  });

  if (rowsSkipped > 0) {
    console.log(
      JSON.stringify({
        level: "warn",
        message: "ingestion_rows_skipped_total",
        format: variant,
        rows_total: rows.length,
        rows_skipped: rowsSkipped,
        rows_adapted: posts.length
      })
    );
  }

  if (posts.length === 0) {
    throw new EmptyResultError(variant, rows.length);
  }

  return { posts, rowsTotal: rows.length, rowsSkipped };
};
