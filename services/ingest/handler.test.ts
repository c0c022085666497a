import type { APIGatewayProxyEventV2 } from "aws-lambda";

type FakeCommand = { name: string; input: Record<string, unknown> };

const mockS3Send = jest.fn<Promise<unknown>, [FakeCommand]>();
const mockSqsSend = jest.fn<Promise<unknown>, [FakeCommand]>();
jest.mock("@aws-sdk/client-s3", () => ({
    S3Client: jest.fn(() => ({ send: (cmd: FakeCommand) => mockS3Send(cmd) })),
    PutObjectCommand: jest.fn((input: unknown) => ({ name: "PutObject", input })),
}));
jest.mock("@aws-sdk/client-sqs", () => ({
    SQSClient: jest.fn(() => ({ send: (cmd: FakeCommand) => mockSqsSend(cmd) })),
    SendMessageCommand: jest.fn((input: unknown) => ({ name: "SendMessage", input })),
}));
jest.mock("../../libs/obs/metrics", () => ({ metricCount: jest.fn(), metricMs: jest.fn() }));
jest.mock("../../libs/obs/audit", () => ({ auditFireAndForget: jest.fn() }));

import { main } from "./handler";

const CSV = "patient_id,full_name\n1,test patient\n";

function httpEvent(
    body: string | undefined,
    query: Record<string, string> = {},
    isBase64Encoded = false,
    headers: Record<string, string> = {},
): APIGatewayProxyEventV2 {
    return {
        version: "2.0",
        routeKey: "POST /ingest",
        rawPath: "/ingest",
        rawQueryString: new URLSearchParams(query).toString(),
        headers: { "content-type": "text/csv", ...headers },
        queryStringParameters: query,
        requestContext: {
            accountId: "000000000000",
            apiId: "api",
            domainName: "api.example.test",
            domainPrefix: "api",
            http: { method: "POST", path: "/ingest", protocol: "HTTP/1.1", sourceIp: "127.0.0.1", userAgent: "jest" },
            requestId: "req-1",
            routeKey: "POST /ingest",
            stage: "$default",
            time: "30/Sep/2025:10:00:00 +0000",
            timeEpoch: 1759226400000,
        },
        body,
        isBase64Encoded,
    };
}

beforeEach(() => {
    jest.clearAllMocks();
    process.env.RAW_BUCKET = "raw-bucket";
    process.env.INGEST_QUEUE_URL = "https://sqs.test/clinical-ingest-queue";
    mockS3Send.mockResolvedValue({});
    mockSqsSend.mockResolvedValue({});
});

test("stores the CSV and queues a clinical.ingest.v1 message", async () => {
    const res = await main(httpEvent(CSV, { tenantId: "demo", source: "ward-export" }));

    expect(res.statusCode).toBe(202);
    const put: FakeCommand = mockS3Send.mock.calls[0][0];
    expect(put.input.Bucket).toBe("raw-bucket");
    expect(put.input.Body).toBe(CSV);
    expect(put.input.Key).toMatch(/^raw\/demo\/\d{4}-\d{2}-\d{2}\/[0-9a-f-]{36}\.csv$/);

    const sent: FakeCommand = mockSqsSend.mock.calls[0][0];
    expect(sent.input.QueueUrl).toBe("https://sqs.test/clinical-ingest-queue");
    const message = JSON.parse(String(sent.input.MessageBody));
    expect(message.schema).toBe("clinical.ingest.v1");
    expect(message.metadata.tenantId).toBe("demo");
    expect(message.metadata.source).toBe("ward-export");
    expect(message.payload).toEqual({ contentType: "text/csv", s3: { bucket: "raw-bucket", key: put.input.Key } });
});

test("base64 bodies are decoded before storing", async () => {
    await main(httpEvent(Buffer.from(CSV).toString("base64"), { tenantId: "demo" }, true));
    expect(mockS3Send.mock.calls[0][0].input.Body).toBe(CSV);
});

test("empty body is a bad request", async () => {
    const res = await main(httpEvent("  \n"));
    expect(res.statusCode).toBe(400);
    expect(mockS3Send).not.toHaveBeenCalled();
});

test.each([
    ["empty tenant", { tenantId: "" }, {}, "/metadata/tenantId"],
    ["tenant with a slash", { tenantId: "demo/../other" }, {}, "/metadata/tenantId"],
    ["empty source", { tenantId: "demo", source: "" }, {}, "/metadata/source"],
    ["idempotency key with a slash", { tenantId: "demo" }, { "idempotency-key": "a/b" }, "/metadata/idempotencyKey"],
])("%s is rejected before anything is stored", async (_case, query, headers, path) => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    const res = await main(httpEvent(CSV, query, false, headers));

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body ?? "{}").error).toContain(path);
    expect(mockS3Send).not.toHaveBeenCalled();
    expect(mockSqsSend).not.toHaveBeenCalled();
    warnSpy.mockRestore();
});

test("idempotency-key header becomes the message key", async () => {
    await main(httpEvent(CSV, { tenantId: "demo" }, false, { "idempotency-key": "upload-42" }));
    const message = JSON.parse(String(mockSqsSend.mock.calls[0][0].input.MessageBody));
    expect(message.metadata.idempotencyKey).toBe("upload-42");
});

test("storage failures surface as 500", async () => {
    mockS3Send.mockRejectedValue(new Error("access denied"));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);

    const res = await main(httpEvent(CSV));

    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.body ?? "{}")).toEqual({ ok: false, error: "Internal Error" });
    expect(mockSqsSend).not.toHaveBeenCalled();
    errorSpy.mockRestore();
});
