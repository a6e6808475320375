import type { MeasurementSender } from "../../connectors/measurement-endpoint/types.js";
import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { MeasurementFactory } from "../measurement/types.js";
import { parseSendCount, parseSendInterval } from "./custom-input.js";
import type {
  CustomSendResult,
  Prompter,
  ScenarioOutcome,
  ScenarioRunnerOptions
} from "./types.js";

export const DEFAULT_REPEAT_COUNT = 5;
export const DEFAULT_REPEAT_INTERVAL_SECONDS = 2;
export const MULTI_DEVICE_IDS: readonly number[] = [1, 2, 3];
export const MULTI_DEVICE_PAUSE_SECONDS = 1;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function toOutcome(attempted: number, succeeded: number): ScenarioOutcome {
  return { attempted, succeeded, ok: succeeded === attempted };
}

export class ScenarioRunner {
  private readonly sender: MeasurementSender;
  private readonly createRecord: MeasurementFactory;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly defaultDeviceId: number;

  constructor({
    sender,
    createRecord,
    sleep: sleepImpl = sleep,
    logger = createNoopLogger(),
    defaultDeviceId = 1
  }: ScenarioRunnerOptions) {
    this.sender = sender;
    this.createRecord = createRecord;
    this.sleep = sleepImpl;
    this.logger = logger;
    this.defaultDeviceId = defaultDeviceId;
  }

  async singleSend(): Promise<ScenarioOutcome> {
    this.logger.info("=== Single send test ===");
    const succeeded = await this.sendOne(this.defaultDeviceId);
    this.logger.info("");
    return toOutcome(1, succeeded ? 1 : 0);
  }

  async repeatedSend(
    count = DEFAULT_REPEAT_COUNT,
    intervalSeconds = DEFAULT_REPEAT_INTERVAL_SECONDS
  ): Promise<ScenarioOutcome> {
    this.logger.info(`=== Repeated send test (${count} sends) ===`);
    let succeeded = 0;

    for (let index = 0; index < count; index += 1) {
      this.logger.info(`--- Send ${index + 1}/${count} ---`);
      if (await this.sendOne(this.defaultDeviceId)) {
        succeeded += 1;
      }

      if (index < count - 1) {
        this.logger.info(`Waiting ${intervalSeconds}s...`);
        await this.sleep(intervalSeconds * 1000);
      }
    }

    this.logger.info(`Result: ${succeeded}/${count} sends succeeded`);
    return toOutcome(count, succeeded);
  }

  async multiDeviceSend(
    deviceIds: readonly number[] = MULTI_DEVICE_IDS
  ): Promise<ScenarioOutcome> {
    this.logger.info("=== Multi-device send test ===");
    let succeeded = 0;

    for (const deviceId of deviceIds) {
      this.logger.info(`--- Device ID: ${deviceId} ---`);
      if (await this.sendOne(deviceId)) {
        succeeded += 1;
      }
      await this.sleep(MULTI_DEVICE_PAUSE_SECONDS * 1000);
    }

    this.logger.info(`Result: ${succeeded}/${deviceIds.length} devices succeeded`);
    return toOutcome(deviceIds.length, succeeded);
  }

  /** Count is validated before the interval is asked for; any rejection ends the scenario. */
  async customSend(prompter: Prompter): Promise<CustomSendResult> {
    const countAnswer = await prompter.ask("Send count (1-10): ");
    if (countAnswer.kind === "interrupted") {
      return { status: "interrupted" };
    }
    const count = parseSendCount(countAnswer.value);
    if (!count.ok) {
      this.logger.warn(count.message);
      return { status: "rejected", reason: count.message };
    }

    const intervalAnswer = await prompter.ask("Send interval in seconds (0.5-10): ");
    if (intervalAnswer.kind === "interrupted") {
      return { status: "interrupted" };
    }
    const interval = parseSendInterval(intervalAnswer.value);
    if (!interval.ok) {
      this.logger.warn(interval.message);
      return { status: "rejected", reason: interval.message };
    }

    const outcome = await this.repeatedSend(count.value, interval.value);
    return { status: "completed", outcome };
  }

  private async sendOne(deviceId: number): Promise<boolean> {
    return this.sender.send(this.createRecord(deviceId));
  }
}
