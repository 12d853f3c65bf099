import type { APIGatewayProxyEventV2, S3Event, SQSEvent } from "aws-lambda";

type ApiEventInput = {
  method?: string;
  path?: string;
  stage?: string;
  body?: unknown;
  rawBody?: string;
  query?: Record<string, string>;
};

export const apiEvent = (input: ApiEventInput = {}): APIGatewayProxyEventV2 => {
  const method = input.method ?? "GET";
  const path = input.path ?? "/";
  const event: APIGatewayProxyEventV2 = {
    version: "2.0",
    routeKey: "$default",
    rawPath: path,
    rawQueryString: new URLSearchParams(input.query ?? {}).toString(),
    headers: { "content-type": "application/json" },
    requestContext: {
      accountId: "123456789012",
      apiId: "test-api",
      domainName: "api.test",
      domainPrefix: "api",
      http: { method, path, protocol: "HTTP/1.1", sourceIp: "127.0.0.1", userAgent: "jest" },
      requestId: "req-1",
      routeKey: "$default",
      stage: input.stage ?? "$default",
      time: "01/Jan/2025:00:00:00 +0000",
      timeEpoch: 1735689600000
    },
    isBase64Encoded: false
  };
  if (input.query) event.queryStringParameters = input.query;
  if (input.rawBody !== undefined) event.body = input.rawBody;
  else if (input.body !== undefined) event.body = JSON.stringify(input.body);
  return event;
};

export const responseBody = (response: { body: string }): unknown => JSON.parse(response.body) as unknown;

export const sqsEvent = (...bodies: string[]): SQSEvent => ({
  Records: bodies.map((body, index) => ({
    messageId: `msg-${index + 1}`,
    receiptHandle: `receipt-${index + 1}`,
    body,
    attributes: {
      ApproximateReceiveCount: "1",
      SentTimestamp: "1735689600000",
      SenderId: "sender",
      ApproximateFirstReceiveTimestamp: "1735689600000"
    },
    messageAttributes: {},
    md5OfBody: "md5",
    eventSource: "aws:sqs",
    eventSourceARN: "arn:aws:sqs:us-east-1:123456789012:pipeline",
    awsRegion: "us-east-1"
  }))
});

export const s3Event = (bucket: string, ...keys: string[]): S3Event => ({
  Records: keys.map((key) => ({
    eventVersion: "2.1",
    eventSource: "aws:s3",
    awsRegion: "us-east-1",
    eventTime: "2025-01-01T00:00:00.000Z",
    eventName: "ObjectCreated:Put",
    userIdentity: { principalId: "tester" },
    requestParameters: { sourceIPAddress: "127.0.0.1" },
    responseElements: { "x-amz-request-id": "request", "x-amz-id-2": "id" },
    s3: {
      s3SchemaVersion: "1.0",
      configurationId: "imports",
      bucket: { name: bucket, ownerIdentity: { principalId: "tester" }, arn: `arn:aws:s3:::${bucket}` },
      object: { key, size: 1, eTag: "etag", sequencer: "0" }
    }
  }))
});
