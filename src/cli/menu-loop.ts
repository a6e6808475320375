import {
  createNoopLogger,
  errorMessage,
  type Logger
} from "../infrastructure/logging/logger.js";
import type { ScenarioRunner } from "../modules/scenarios/service.js";
import type { Prompter } from "../modules/scenarios/types.js";

export const MenuStates = Object.freeze({
  MENU_DISPLAYED: "MenuDisplayed",
  RUNNING: "Running",
  EXITED: "Exited"
});

export type MenuState = (typeof MenuStates)[keyof typeof MenuStates];

export type ScenarioCatalog = Pick<
  ScenarioRunner,
  "singleSend" | "repeatedSend" | "multiDeviceSend" | "customSend"
>;

export interface MenuLoopOptions {
  scenarios: ScenarioCatalog;
  prompter: Prompter;
  endpointUrl: string;
  logger?: Logger;
}

type ScenarioExit = "continue" | "interrupted";

const MENU_LINES = [
  "",
  "Select a test to run:",
  "1. Single send test",
  "2. Repeated send test (5 sends)",
  "3. Multi-device send test",
  "4. Custom test",
  "0. Exit"
];

export class MenuLoop {
  private readonly scenarios: ScenarioCatalog;
  private readonly prompter: Prompter;
  private readonly endpointUrl: string;
  private readonly logger: Logger;
  private current: MenuState = MenuStates.MENU_DISPLAYED;

  constructor(options: MenuLoopOptions) {
    this.scenarios = options.scenarios;
    this.prompter = options.prompter;
    this.endpointUrl = options.endpointUrl;
    this.logger = options.logger ?? createNoopLogger();
  }

  get state(): MenuState {
    return this.current;
  }

  async run(): Promise<void> {
    this.logger.info("Grader feed test harness");
    this.logger.info(`Target URL: ${this.endpointUrl}`);
    this.logger.info("=".repeat(50));

    while (this.current !== MenuStates.EXITED) {
      await this.step();
    }
  }

  async step(): Promise<MenuState> {
    if (this.current !== MenuStates.MENU_DISPLAYED) {
      return this.current;
    }

    for (const line of MENU_LINES) {
      this.logger.info(line);
    }

    const answer = await this.prompter.ask("Choice (0-4): ");
    if (answer.kind === "interrupted") {
      return this.interrupt();
    }

    const choice = answer.value.trim();
    if (choice === "0") {
      this.logger.info("Exiting");
      this.current = MenuStates.EXITED;
      return this.current;
    }
    if (!["1", "2", "3", "4"].includes(choice)) {
      this.logger.warn("Invalid choice");
      return this.current;
    }

    this.current = MenuStates.RUNNING;
    let exit: ScenarioExit = "continue";
    try {
      exit = await this.runScenario(choice);
    } catch (error) {
      this.logger.error(`Error: ${errorMessage(error)}`);
    }

    if (exit === "interrupted") {
      return this.interrupt();
    }
    this.current = MenuStates.MENU_DISPLAYED;
    return this.current;
  }

  private async runScenario(choice: string): Promise<ScenarioExit> {
    switch (choice) {
      case "1":
        await this.scenarios.singleSend();
        return "continue";
      case "2":
        await this.scenarios.repeatedSend();
        return "continue";
      case "3":
        await this.scenarios.multiDeviceSend();
        return "continue";
      default: {
        const result = await this.scenarios.customSend(this.prompter);
        return result.status === "interrupted" ? "interrupted" : "continue";
      }
    }
  }

  private interrupt(): MenuState {
    this.logger.info("");
    this.logger.info("Test interrupted");
    this.current = MenuStates.EXITED;
    return this.current;
  }
}
