#!/usr/bin/env node
import { MenuLoop } from "../cli/menu-loop.js";
import { ReadlinePrompter } from "../cli/readline-prompter.js";
import { loadConfig } from "../config/env.js";
import { MeasurementEndpointClient } from "../connectors/measurement-endpoint/client.js";
import { createConsoleLogger } from "../infrastructure/logging/logger.js";
import { createMeasurementFactory } from "../modules/measurement/generator.js";
import { ScenarioRunner } from "../modules/scenarios/service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger();

  const client = new MeasurementEndpointClient({
    endpointUrl: config.endpointUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    logger
  });
  const scenarios = new ScenarioRunner({
    sender: client,
    createRecord: createMeasurementFactory(),
    logger,
    defaultDeviceId: config.defaultDeviceId
  });

  const prompter = new ReadlinePrompter();
  // Non-TTY stdin delivers Ctrl+C as a process signal instead of a readline event.
  const onSignal = (): void => {
    prompter.interrupt();
  };
  process.on("SIGINT", onSignal);

  try {
    await new MenuLoop({
      scenarios,
      prompter,
      endpointUrl: config.endpointUrl,
      logger
    }).run();
  } finally {
    process.off("SIGINT", onSignal);
    prompter.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
