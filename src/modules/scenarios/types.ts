import type { MeasurementSender } from "../../connectors/measurement-endpoint/types.js";
import type { Logger } from "../../infrastructure/logging/logger.js";
import type { MeasurementFactory } from "../measurement/types.js";

export interface ScenarioOutcome {
  attempted: number;
  succeeded: number;
  ok: boolean;
}

export type PromptResult =
  | { kind: "answer"; value: string }
  | { kind: "interrupted" };

export interface Prompter {
  ask(question: string): Promise<PromptResult>;
}

export type CustomSendResult =
  | { status: "completed"; outcome: ScenarioOutcome }
  | { status: "rejected"; reason: string }
  | { status: "interrupted" };

export interface ScenarioRunnerOptions {
  sender: MeasurementSender;
  createRecord: MeasurementFactory;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  defaultDeviceId?: number;
}
