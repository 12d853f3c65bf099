import AWS from "aws-sdk";
import { env } from "../config/env";

export type SqlParameter = AWS.RDSDataService.SqlParameter;
export type SqlField = AWS.RDSDataService.Field;
export type SqlRow = AWS.RDSDataService.FieldList;
export type ExecuteResult = AWS.RDSDataService.ExecuteStatementResponse;
export type BatchExecuteResult = AWS.RDSDataService.BatchExecuteStatementResponse;

/**
 * The subset of the Data API the stores depend on. `RdsDataClient` is the
 * production implementation; tests swap in an in-process stand-in.
 */
export interface SqlExecutor {
  execute(sql: string, parameters?: SqlParameter[]): Promise<ExecuteResult>;
  batchExecute(sql: string, parameterSets: SqlParameter[][]): Promise<BatchExecuteResult>;
}

const toTimestamp = (value: Date): string => value.toISOString().replace("T", " ").replace("Z", "");

export const sqlString = (name: string, value: string | null | undefined): SqlParameter => ({
  name,
  value: value === null || value === undefined ? { isNull: true } : { stringValue: value }
});

export const sqlLong = (name: string, value: number): SqlParameter => ({
  name,
  value: { longValue: Math.floor(value) }
});

export const sqlBoolean = (name: string, value: boolean): SqlParameter => ({
  name,
  value: { booleanValue: value }
});

export const sqlTimestamp = (name: string, value: Date | null | undefined): SqlParameter => ({
  name,
  value: value ? { stringValue: toTimestamp(value) } : { isNull: true },
  typeHint: "TIMESTAMP"
});

export const sqlJson = (name: string, value: unknown): SqlParameter => ({
  name,
  value: { stringValue: JSON.stringify(value) },
  typeHint: "JSON"
});

export const sqlUuid = (name: string, value: string | null | undefined): SqlParameter => ({
  name,
  value: value ? { stringValue: value } : { isNull: true },
  typeHint: "UUID"
});

export const fieldString = (row: SqlRow | undefined, index: number): string | null => {
  const field: SqlField | undefined = row?.[index];
  if (!field) return null;
  if (field.isNull) return null;
  if (field.stringValue !== undefined) return field.stringValue;
  if (field.longValue !== undefined) return String(field.longValue);
  if (field.doubleValue !== undefined) return String(field.doubleValue);
  if (field.booleanValue !== undefined) return field.booleanValue ? "true" : "false";
  return null;
};

export const fieldLong = (row: SqlRow | undefined, index: number): number | null => {
  const field: SqlField | undefined = row?.[index];
  if (!field || field.isNull) return null;
  if (field.longValue !== undefined) return Number(field.longValue);
  if (field.stringValue !== undefined) {
    const parsed = Number(field.stringValue);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const fieldBoolean = (row: SqlRow | undefined, index: number): boolean | null => {
  const field: SqlField | undefined = row?.[index];
  if (!field || field.isNull) return null;
  if (field.booleanValue !== undefined) return field.booleanValue;
  if (field.stringValue !== undefined) return field.stringValue === "true" || field.stringValue === "t";
  return null;
};

export const fieldDate = (row: SqlRow | undefined, index: number): Date | null => {
  const raw = fieldString(row, index);
  if (!raw) return null;

  const normalized = raw.includes("T") ? raw : `${raw.replace(" ", "T")}Z`;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

export const fieldJson = (row: SqlRow | undefined, index: number): unknown => {
  const raw = fieldString(row, index);
  if (raw === null) return null;
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
};

export class RdsDataClient implements SqlExecutor {
  private readonly client: AWS.RDSDataService;

  constructor(
    private readonly resourceArn: string,
    private readonly secretArn: string,
    private readonly database: string,
    region: string
  ) {
    this.client = new AWS.RDSDataService({ region });
  }

  static fromEnv(): RdsDataClient | null {
    if (!env.dbResourceArn || !env.dbSecretArn || !env.dbName) return null;
    return new RdsDataClient(env.dbResourceArn, env.dbSecretArn, env.dbName, env.awsRegion);
  }

  async execute(sql: string, parameters: SqlParameter[] = []): Promise<ExecuteResult> {
    return this.client
      .executeStatement({
        resourceArn: this.resourceArn,
        secretArn: this.secretArn,
        database: this.database,
        sql,
        parameters,
        continueAfterTimeout: true
      })
      .promise();
  }

  // One Data API call per invocation; callers chunk so a failure stays scoped to its chunk.
  async batchExecute(sql: string, parameterSets: SqlParameter[][]): Promise<BatchExecuteResult> {
    if (parameterSets.length === 0) return { updateResults: [] };

    return this.client
      .batchExecuteStatement({
        resourceArn: this.resourceArn,
        secretArn: this.secretArn,
        database: this.database,
        sql,
        parameterSets
      })
      .promise();
  }
}
