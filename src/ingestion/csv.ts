import { classifyFormat } from "./formats";
import type { RawImport } from "./types";

const HEADER_SCAN_LINES = 15;
const CANDIDATE_DELIMITERS = [",", ";", "\t"] as const;

type Delimiter = (typeof CANDIDATE_DELIMITERS)[number];

const countOutsideQuotes = (line: string, delimiter: string): number => {
  let count = 0;
  let inQuotes = false;
  for (const char of line) {
    if (char === '"') inQuotes = !inQuotes;
    else if (char === delimiter && !inQuotes) count += 1;
  }
  return count;
};

export const detectDelimiter = (content: string): Delimiter => {
  const sample = content.split("\n").slice(0, HEADER_SCAN_LINES);
  let best: Delimiter = ",";
  let bestScore = 0;

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const score = Math.max(0, ...sample.map((line) => countOutsideQuotes(line, delimiter)));
    if (score > bestScore) {
      best = delimiter;
      bestScore = score;
    }
  }

  return best;
};

export const parseDelimited = (content: string, delimiter: string = ","): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i] ?? "";
    const next = content[i + 1] ?? "";

    if (char === '"') {
      if (inQuotes && next === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      row.push(field);
      field = "";
      continue;
    }

    if (char === "\n" && !inQuotes) {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      continue;
    }

    if (char === "\r") {
      continue;
    }

    field += char;
  }

  row.push(field);
  rows.push(row);

  return rows.filter((cells) => cells.some((cell) => cell.trim().length > 0));
};

/**
 * Exports from some tools carry title or summary lines above the real
 * header. Returns the first scanned row that names a known format, or 0.
 * Data rows are never scored, so cell text cannot pass for a header.
 */
export const locateHeaderRow = (rows: string[][]): number => {
  const limit = Math.min(HEADER_SCAN_LINES, rows.length);

  for (let i = 0; i < limit; i += 1) {
    const cells = (rows[i] ?? []).map((cell) => cell.trim());
    if (classifyFormat(cells) !== "unknown") return i;
  }

  return 0;
};

export const readCsv = (content: string): RawImport => {
  const text = content.startsWith("\uFEFF") ? content.slice(1) : content;
  const rows = parseDelimited(text, detectDelimiter(text));
  if (rows.length === 0) return { columns: [], rows: [] };

  const headerIndex = locateHeaderRow(rows);
  const columns = (rows[headerIndex] ?? []).map((item, index) => item.trim() || `column_${index}`);

  return {
    columns,
    rows: rows.slice(headerIndex + 1)
  };
};
