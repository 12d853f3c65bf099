import { randomUUID } from "crypto";
import type { JsonRecord, ModuleOutcome, ModuleStatus, PipelineStatus } from "../pipeline/types";
import {
  RdsDataClient,
  fieldBoolean,
  fieldDate,
  fieldJson,
  fieldLong,
  fieldString,
  sqlBoolean,
  sqlJson,
  sqlLong,
  sqlString,
  sqlTimestamp,
  sqlUuid,
  type SqlExecutor,
  type SqlParameter,
  type SqlRow
} from "./rdsData";

const RESULT_INSERT_CHUNK = 20;

const RUN_COLUMNS = `
  "id"::text,
  "status",
  "sourceKind",
  "triggerType",
  "requestId",
  "modulesExecuted",
  "successful",
  "failed",
  "skipped",
  "recoveryAttempts",
  "recordsProcessed",
  "durationMs",
  "error",
  "startedAt",
  "finishedAt",
  "createdAt"
`;
const MAX_LIST_LIMIT = 200;

const RUN_STATUSES = ["completed", "failed"] as const;
const MODULE_STATUSES = ["completed", "failed", "skipped"] as const;

export type PipelineRunInput = {
  id: string;
  status: PipelineStatus;
  sourceKind: string;
  triggerType: string;
  requestId: string | null;
  modulesExecuted: number;
  successful: number;
  failed: number;
  skipped: number;
  recoveryAttempts: number;
  recordsProcessed: number;
  durationMs: number;
  error: string | null;
  startedAt: Date;
  finishedAt: Date;
};

export type PipelineRunRecord = PipelineRunInput & { createdAt: Date };

export type PipelineResultRecord = {
  id: string;
  runId: string;
  moduleName: string;
  status: ModuleStatus;
  attempts: number;
  fallbackUsed: boolean;
  reason: string | null;
  error: string | null;
  metrics: unknown;
  timestamp: Date;
};

export type PredictionInput = {
  runId: string | null;
  moduleName: string;
  predictionType: string;
  payload: JsonRecord;
};

export type PredictionRecord = Omit<PredictionInput, "payload"> & {
  id: string;
  payload: unknown;
  createdAt: Date;
};

export type PredictionFilter = {
  module?: string;
  predictionType?: string;
  limit?: number;
};

const clampLimit = (limit: number | undefined, fallback: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) return fallback;
  return Math.min(MAX_LIST_LIMIT, Math.max(1, Math.floor(limit)));
};

const runStatusOf = (value: string | null): PipelineStatus => RUN_STATUSES.find((status) => status === value) ?? "failed";

const moduleStatusOf = (value: string | null): ModuleStatus =>
  MODULE_STATUSES.find((status) => status === value) ?? "failed";

const parseRunRow = (row: SqlRow): PipelineRunRecord | null => {
  const id = fieldString(row, 0);
  const startedAt = fieldDate(row, 13);
  const finishedAt = fieldDate(row, 14);
  const createdAt = fieldDate(row, 15);
  if (!id || !startedAt || !finishedAt || !createdAt) return null;

  return {
    id,
    status: runStatusOf(fieldString(row, 1)),
    sourceKind: fieldString(row, 2) ?? "store",
    triggerType: fieldString(row, 3) ?? "manual",
    requestId: fieldString(row, 4),
    modulesExecuted: fieldLong(row, 5) ?? 0,
    successful: fieldLong(row, 6) ?? 0,
    failed: fieldLong(row, 7) ?? 0,
    skipped: fieldLong(row, 8) ?? 0,
    recoveryAttempts: fieldLong(row, 9) ?? 0,
    recordsProcessed: fieldLong(row, 10) ?? 0,
    durationMs: fieldLong(row, 11) ?? 0,
    error: fieldString(row, 12),
    startedAt,
    finishedAt,
    createdAt
  };
};

const parseResultRow = (row: SqlRow): PipelineResultRecord | null => {
  const id = fieldString(row, 0);
  const runId = fieldString(row, 1);
  const moduleName = fieldString(row, 2);
  const timestamp = fieldDate(row, 9);
  if (!id || !runId || !moduleName || !timestamp) return null;

  return {
    id,
    runId,
    moduleName,
    status: moduleStatusOf(fieldString(row, 3)),
    attempts: fieldLong(row, 4) ?? 0,
    fallbackUsed: fieldBoolean(row, 5) ?? false,
    reason: fieldString(row, 6),
    error: fieldString(row, 7),
    metrics: fieldJson(row, 8),
    timestamp
  };
};

const parsePredictionRow = (row: SqlRow): PredictionRecord | null => {
  const id = fieldString(row, 0);
  const moduleName = fieldString(row, 2);
  const predictionType = fieldString(row, 3);
  const createdAt = fieldDate(row, 5);
  if (!id || !moduleName || !predictionType || !createdAt) return null;

  return {
    id,
    runId: fieldString(row, 1),
    moduleName,
    predictionType,
    payload: fieldJson(row, 4),
    createdAt
  };
};

const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
};

const notNull = <T>(value: T | null): value is T => value !== null;

export class PipelineStore {
  constructor(private readonly rds: SqlExecutor) {}

  /** Writes the run row, then one result row per module outcome. */
  async savePipelineRun(run: PipelineRunInput, outcomes: readonly ModuleOutcome[]): Promise<void> {
    await this.rds.execute(
      `
        INSERT INTO "public"."PipelineRun"
          ("id", "status", "sourceKind", "triggerType", "requestId", "modulesExecuted", "successful", "failed", "skipped", "recoveryAttempts", "recordsProcessed", "durationMs", "error", "startedAt", "finishedAt", "createdAt")
        VALUES
          (CAST(:id AS UUID), :status, :source_kind, :trigger_type, :request_id, :modules_executed, :successful, :failed, :skipped, :recovery_attempts, :records_processed, :duration_ms, :error, :started_at, :finished_at, NOW())
      `,
      [
        sqlUuid("id", run.id),
        sqlString("status", run.status),
        sqlString("source_kind", run.sourceKind),
        sqlString("trigger_type", run.triggerType),
        sqlString("request_id", run.requestId),
        sqlLong("modules_executed", run.modulesExecuted),
        sqlLong("successful", run.successful),
        sqlLong("failed", run.failed),
        sqlLong("skipped", run.skipped),
        sqlLong("recovery_attempts", run.recoveryAttempts),
        sqlLong("records_processed", run.recordsProcessed),
        sqlLong("duration_ms", run.durationMs),
        sqlString("error", run.error),
        sqlTimestamp("started_at", run.startedAt),
        sqlTimestamp("finished_at", run.finishedAt)
      ]
    );

    const parameterSets = outcomes.map((outcome): SqlParameter[] => [
      sqlUuid("id", randomUUID()),
      sqlUuid("run_id", run.id),
      sqlString("module_name", outcome.moduleName),
      sqlString("status", outcome.status),
      sqlLong("attempts", outcome.attempts),
      sqlBoolean("fallback_used", outcome.fallbackUsed),
      sqlString("reason", outcome.reason),
      sqlString("error", outcome.error),
      sqlJson("metrics", outcome.metrics),
      sqlTimestamp("timestamp", outcome.finishedAt)
    ]);

    for (const batch of chunk(parameterSets, RESULT_INSERT_CHUNK)) {
      await this.rds.batchExecute(
        `
          INSERT INTO "public"."PipelineResult"
            ("id", "runId", "moduleName", "status", "attempts", "fallbackUsed", "reason", "error", "metrics", "timestamp")
          VALUES
            (CAST(:id AS UUID), CAST(:run_id AS UUID), :module_name, :status, :attempts, :fallback_used, :reason, :error, CAST(:metrics AS JSONB), :timestamp)
        `,
        batch
      );
    }
  }

  async savePredictions(predictions: readonly PredictionInput[]): Promise<number> {
    const parameterSets = predictions.map((prediction): SqlParameter[] => [
      sqlUuid("id", randomUUID()),
      sqlUuid("run_id", prediction.runId),
      sqlString("module_name", prediction.moduleName),
      sqlString("prediction_type", prediction.predictionType),
      sqlJson("payload", prediction.payload)
    ]);

    let saved = 0;
    for (const batch of chunk(parameterSets, RESULT_INSERT_CHUNK)) {
      await this.rds.batchExecute(
        `
          INSERT INTO "public"."Prediction"
            ("id", "runId", "moduleName", "predictionType", "payload", "createdAt")
          VALUES
            (CAST(:id AS UUID), CAST(:run_id AS UUID), :module_name, :prediction_type, CAST(:payload AS JSONB), NOW())
        `,
        batch
      );
      saved += batch.length;
    }
    return saved;
  }

  async listPipelineRuns(limit?: number): Promise<PipelineRunRecord[]> {
    const response = await this.rds.execute(
      `
        SELECT ${RUN_COLUMNS}
        FROM "public"."PipelineRun"
        ORDER BY "startedAt" DESC
        LIMIT :limit
      `,
      [sqlLong("limit", clampLimit(limit, 20))]
    );

    return (response.records ?? []).map(parseRunRow).filter(notNull);
  }

  async getPipelineRun(runId: string): Promise<PipelineRunRecord | null> {
    const response = await this.rds.execute(
      `
        SELECT ${RUN_COLUMNS}
        FROM "public"."PipelineRun"
        WHERE "id" = CAST(:id AS UUID)
      `,
      [sqlUuid("id", runId)]
    );

    const row = response.records?.[0];
    return row ? parseRunRow(row) : null;
  }

  async listPipelineResults(runId: string): Promise<PipelineResultRecord[]> {
    const response = await this.rds.execute(
      `
        SELECT
          "id"::text,
          "runId"::text,
          "moduleName",
          "status",
          "attempts",
          "fallbackUsed",
          "reason",
          "error",
          "metrics"::text,
          "timestamp"
        FROM "public"."PipelineResult"
        WHERE "runId" = CAST(:run_id AS UUID)
        ORDER BY "timestamp" ASC
      `,
      [sqlUuid("run_id", runId)]
    );

    return (response.records ?? []).map(parseResultRow).filter(notNull);
  }

  async listRecentPredictions(filter: PredictionFilter = {}): Promise<PredictionRecord[]> {
    const conditions: string[] = [];
    const parameters: SqlParameter[] = [sqlLong("limit", clampLimit(filter.limit, 10))];

    if (filter.module) {
      conditions.push(`"moduleName" = :module_name`);
      parameters.push(sqlString("module_name", filter.module));
    }
    if (filter.predictionType) {
      conditions.push(`"predictionType" = :prediction_type`);
      parameters.push(sqlString("prediction_type", filter.predictionType));
    }

    const response = await this.rds.execute(
      `
        SELECT
          "id"::text,
          "runId"::text,
          "moduleName",
          "predictionType",
          "payload"::text,
          "createdAt"
        FROM "public"."Prediction"
        ${conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : ""}
        ORDER BY "createdAt" DESC
        LIMIT :limit
      `,
      parameters
    );

    return (response.records ?? []).map(parsePredictionRow).filter(notNull);
  }
}

export const createPipelineStore = (): PipelineStore | null => {
  const client = RdsDataClient.fromEnv();
  if (!client) return null;
  return new PipelineStore(client);
};
