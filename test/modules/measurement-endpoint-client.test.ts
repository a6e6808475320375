import assert from "node:assert/strict";
import test from "node:test";

import { MeasurementEndpointClient } from "../../src/connectors/measurement-endpoint/client.js";
import type { Logger } from "../../src/infrastructure/logging/logger.js";
import type { MeasurementRecord } from "../../src/modules/measurement/types.js";

type LogLine = [level: "info" | "warn" | "error", message: string, context?: Record<string, unknown>];

function recordingLogger(): Logger & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    info(message, context) {
      lines.push(context ? ["info", message, context] : ["info", message]);
    },
    warn(message, context) {
      lines.push(context ? ["warn", message, context] : ["warn", message]);
    },
    error(message, context) {
      lines.push(context ? ["error", message, context] : ["error", message]);
    }
  };
}

const sampleRecord: MeasurementRecord = {
  size: "2L",
  weight: 236,
  timestamp: "2026/10/18 09:15:00",
  device_id: 1
};

const samplePayload =
  '{"size":"2L","weight":236,"timestamp":"2026/10/18 09:15:00","device_id":1}';

test("posts the record as JSON and reports success on HTTP 200", async () => {
  const logger = recordingLogger();
  const requests: Array<{ url: string; init: RequestInit | undefined }> = [];

  const client = new MeasurementEndpointClient({
    endpointUrl: "https://grader.example.test/exec",
    requestTimeoutMs: 10_000,
    logger,
    fetchImpl: async (input, init) => {
      requests.push({ url: String(input), init });
      return new Response("ok", { status: 200 });
    }
  });

  const result = await client.send(sampleRecord);

  assert.equal(result, true);
  assert.equal(requests.length, 1);
  const request = requests[0];
  assert.ok(request);
  assert.equal(request.url, "https://grader.example.test/exec");
  assert.equal(request.init?.method, "POST");
  assert.deepEqual(request.init?.headers, { "content-type": "application/json" });
  assert.equal(request.init?.body, samplePayload);
  assert.ok(request.init?.signal instanceof AbortSignal);

  assert.deepEqual(logger.lines, [
    ["info", `Payload: ${samplePayload}`],
    ["info", "Response status: 200"],
    ["info", "Response body: ok"],
    ["info", "✅ Send succeeded"]
  ]);
});

test("returns false without throwing on HTTP 500", async () => {
  const logger = recordingLogger();
  const client = new MeasurementEndpointClient({
    endpointUrl: "https://grader.example.test/exec",
    requestTimeoutMs: 10_000,
    logger,
    fetchImpl: async () => new Response("error", { status: 500 })
  });

  const result = await client.send(sampleRecord);

  assert.equal(result, false);
  assert.deepEqual(logger.lines.slice(1), [
    ["info", "Response status: 500"],
    ["info", "Response body: error"],
    ["error", "❌ Send failed: HTTP 500", { failure: "http_status" }]
  ]);
});

test("treats any status other than 200 as a failure", async () => {
  for (const status of [201, 204, 302, 404]) {
    const client = new MeasurementEndpointClient({
      endpointUrl: "https://grader.example.test/exec",
      requestTimeoutMs: 10_000,
      fetchImpl: async () => new Response(null, { status })
    });

    assert.equal(await client.send(sampleRecord), false, `status ${status}`);
  }
});

test("reports a timeout when the request outlives requestTimeoutMs", async () => {
  const logger = recordingLogger();
  const client = new MeasurementEndpointClient({
    endpointUrl: "https://grader.example.test/exec",
    requestTimeoutMs: 20,
    logger,
    fetchImpl: (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        });
      })
  });

  const result = await client.send(sampleRecord);

  assert.equal(result, false);
  assert.deepEqual(logger.lines, [
    ["info", `Payload: ${samplePayload}`],
    ["error", "❌ Request timed out after 20ms", { failure: "timeout" }]
  ]);
});

test("reports connection failures with the socket error code", async () => {
  const logger = recordingLogger();
  const client = new MeasurementEndpointClient({
    endpointUrl: "http://127.0.0.1:8080/measurements",
    requestTimeoutMs: 10_000,
    logger,
    fetchImpl: async () => {
      const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8080"), {
        code: "ECONNREFUSED"
      });
      throw new TypeError("fetch failed", { cause });
    }
  });

  const result = await client.send(sampleRecord);

  assert.equal(result, false);
  assert.deepEqual(logger.lines.at(-1), [
    "error",
    "❌ Connection error: ECONNREFUSED connect ECONNREFUSED 127.0.0.1:8080",
    { failure: "connection" }
  ]);
});

test("reports any other transport error as a generic failure", async () => {
  const logger = recordingLogger();
  const client = new MeasurementEndpointClient({
    endpointUrl: "https://grader.example.test/exec",
    requestTimeoutMs: 10_000,
    logger,
    fetchImpl: async () => {
      throw new Error("unexpected end of stream");
    }
  });

  const result = await client.send(sampleRecord);

  assert.equal(result, false);
  assert.deepEqual(logger.lines.at(-1), [
    "error",
    "❌ Error: unexpected end of stream",
    { failure: "unexpected" }
  ]);
});

test("leaves non-ASCII characters unescaped in the payload", async () => {
  let body: unknown;
  const client = new MeasurementEndpointClient({
    endpointUrl: "https://grader.example.test/exec",
    requestTimeoutMs: 10_000,
    fetchImpl: async (_input, init) => {
      body = init?.body;
      return new Response("受信", { status: 200 });
    }
  });

  const record = { ...sampleRecord, timestamp: "2026/10/18 09:15:00 測定" };
  assert.equal(await client.send(record), true);
  assert.equal(
    body,
    '{"size":"2L","weight":236,"timestamp":"2026/10/18 09:15:00 測定","device_id":1}'
  );
});

test("rejects invalid constructor options", () => {
  assert.throws(() => {
    new MeasurementEndpointClient({ endpointUrl: " ", requestTimeoutMs: 10_000 });
  }, /requires a non-empty endpointUrl/);

  assert.throws(() => {
    new MeasurementEndpointClient({
      endpointUrl: "https://grader.example.test/exec",
      requestTimeoutMs: 0
    });
  }, /requestTimeoutMs must be a positive integer/);
});
