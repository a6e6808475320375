import {
  createNoopLogger,
  errorMessage,
  type Logger
} from "../../infrastructure/logging/logger.js";
import type { MeasurementRecord } from "../../modules/measurement/types.js";
import type {
  MeasurementEndpointClientOptions,
  MeasurementSender,
  SendFailureKind
} from "./types.js";

function assertPositiveInt(value: number, fieldName: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${fieldName} must be a positive integer`);
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// undici reports network failures as TypeError("fetch failed") with the socket error as cause.
function isConnectionError(error: unknown): error is TypeError {
  return error instanceof TypeError && error.message === "fetch failed";
}

function connectionErrorDetail(error: TypeError): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
    return code ? `${code} ${cause.message}` : cause.message;
  }
  return error.message;
}

/**
 * Posts one measurement per call and reports the outcome through the logger.
 * `send` never rejects: every failure is logged and resolves `false`.
 */
export class MeasurementEndpointClient implements MeasurementSender {
  readonly endpointUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: MeasurementEndpointClientOptions) {
    if (!options.endpointUrl || options.endpointUrl.trim() === "") {
      throw new Error("MeasurementEndpointClient requires a non-empty endpointUrl");
    }
    assertPositiveInt(options.requestTimeoutMs, "requestTimeoutMs");

    this.endpointUrl = options.endpointUrl.trim();
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createNoopLogger();
  }

  async send(record: MeasurementRecord): Promise<boolean> {
    const body = JSON.stringify(record);
    this.logger.info(`Payload: ${body}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(this.endpointUrl, {
        method: "POST",
        headers: {
          "content-type": "application/json"
        },
        body,
        signal: controller.signal
      });
      const text = await response.text();

      this.logger.info(`Response status: ${response.status}`);
      this.logger.info(`Response body: ${text}`);

      if (response.status === 200) {
        this.logger.info("✅ Send succeeded");
        return true;
      }
      this.reportFailure("http_status", `❌ Send failed: HTTP ${response.status}`);
      return false;
    } catch (error) {
      if (isAbortError(error)) {
        this.reportFailure(
          "timeout",
          `❌ Request timed out after ${this.requestTimeoutMs}ms`
        );
      } else if (isConnectionError(error)) {
        this.reportFailure("connection", `❌ Connection error: ${connectionErrorDetail(error)}`);
      } else {
        this.reportFailure("unexpected", `❌ Error: ${errorMessage(error)}`);
      }
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private reportFailure(kind: SendFailureKind, message: string): void {
    this.logger.error(message, { failure: kind });
  }
}
