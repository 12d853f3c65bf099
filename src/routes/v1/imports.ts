import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { getRequestId, isRecord, json, jsonError, parseBody } from "../../core/http";
import { createPostStore, type PostStore } from "../../data/postStore";
import { EmptyResultError, UnrecognizedFormatError } from "../../ingestion/errors";
import { ingestCsv, type IngestionReport } from "../../ingestion/ingest";

const MAX_FILE_NAME_LENGTH = 255;

export type ImportDeps = {
  store: Pick<PostStore, "save"> | null;
};

const toPayload = (report: IngestionReport) => ({
  format: report.format,
  columns: report.columns,
  rows_total: report.rowsTotal,
  records: report.records,
  rows_skipped: report.rowsSkipped,
  store: report.store
    ? {
        received: report.store.received,
        duplicates_in_batch: report.store.duplicatesInBatch,
        already_stored: report.store.alreadyStored,
        inserted: report.store.inserted,
        failed: report.store.failed
      }
    : null
});

export const createImport = async (event: APIGatewayProxyEventV2, deps?: ImportDeps) => {
  const body = parseBody(event);
  if (!isRecord(body)) {
    return jsonError(400, "invalid_json", "Body must be a JSON object");
  }

  const content = body.content;
  if (typeof content !== "string" || !content.trim()) {
    return jsonError(422, "validation_error", "content must be a non-empty CSV string");
  }

  const rawFileName = body.file_name;
  if (rawFileName !== undefined && (typeof rawFileName !== "string" || rawFileName.length > MAX_FILE_NAME_LENGTH)) {
    return jsonError(422, "validation_error", `file_name must be a string of at most ${MAX_FILE_NAME_LENGTH} characters`);
  }
  const fileName = typeof rawFileName === "string" ? rawFileName.trim() : undefined;

  const dryRun = body.dry_run === true;
  const store = dryRun ? null : (deps ?? { store: createPostStore() }).store;
  if (!dryRun && !store) {
    return jsonError(500, "misconfigured", "Database runtime is not configured");
  }

  try {
    const report = await ingestCsv(content, { store, fileName });
    return json(dryRun ? 200 : 201, toPayload(report));
  } catch (error) {
    if (error instanceof UnrecognizedFormatError) {
      return jsonError(422, "unrecognized_format", error.message, { columns: error.columns });
    }
    if (error instanceof EmptyResultError) {
      return jsonError(422, "no_valid_records", error.message, { format: error.format, rows_total: error.rowsTotal });
    }

    console.error(
      JSON.stringify({
        level: "error",
        message: "import_failed",
        request_id: getRequestId(event),
        file_name: fileName ?? null,
        error: (error as Error).message
      })
    );
    return jsonError(500, "import_failed", "Import could not be completed");
  }
};
