import AWS from "aws-sdk";
import { env } from "../config/env";

export type ObjectReader = (bucket: string, key: string) => Promise<string>;

const s3 = new AWS.S3({ region: env.awsRegion });

export const decodeObjectBody = (body: AWS.S3.Body | undefined): string => {
  if (typeof body === "string") return body;
  if (Buffer.isBuffer(body)) return body.toString("utf8");
  if (body instanceof Uint8Array) return Buffer.from(body).toString("utf8");
  return "";
};

export const readObjectText: ObjectReader = async (bucket, key) => {
  const response = await s3.getObject({ Bucket: bucket, Key: key }).promise();
  return decodeObjectBody(response.Body);
};
