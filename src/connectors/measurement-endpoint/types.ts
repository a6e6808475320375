import type { Logger } from "../../infrastructure/logging/logger.js";
import type { MeasurementRecord } from "../../modules/measurement/types.js";

export interface MeasurementEndpointClientOptions {
  endpointUrl: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export interface MeasurementSender {
  send(record: MeasurementRecord): Promise<boolean>;
}

export type SendFailureKind = "http_status" | "timeout" | "connection" | "unexpected";
