export {
  COUNT_RANGE_MESSAGE,
  INTERVAL_RANGE_MESSAGE,
  NOT_A_NUMBER_MESSAGE,
  SEND_COUNT_RANGE,
  SEND_INTERVAL_RANGE,
  parseSendCount,
  parseSendInterval
} from "./custom-input.js";
export type { ParseResult } from "./custom-input.js";
export {
  DEFAULT_REPEAT_COUNT,
  DEFAULT_REPEAT_INTERVAL_SECONDS,
  MULTI_DEVICE_IDS,
  MULTI_DEVICE_PAUSE_SECONDS,
  ScenarioRunner
} from "./service.js";
export type {
  CustomSendResult,
  PromptResult,
  Prompter,
  ScenarioOutcome,
  ScenarioRunnerOptions
} from "./types.js";
