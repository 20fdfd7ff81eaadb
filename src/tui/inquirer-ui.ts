import { confirm, input, select } from "@inquirer/prompts";
import { emitKeypressEvents } from "node:readline";
import { stdin } from "node:process";
import type { AppFeatureChoice, TuiUi } from "./ui-contract";

const COLOR = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  dim: "\x1b[2m",
};

function paint(text: string, color: string): string {
  return `${color}${text}${COLOR.reset}`;
}

function isPromptCancelled(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return (
    error.name === "ExitPromptError" ||
    error.name === "AbortPromptError" ||
    error.message.toLowerCase().includes("force closed")
  );
}

async function withEscAbort<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  if (!stdin.isTTY) {
    return run(controller.signal);
  }

  emitKeypressEvents(stdin);

  const onKeypress = (_character: string, key: { name?: string } | undefined) => {
    if (key?.name === "escape") {
      controller.abort();
    }
  };

  stdin.on("keypress", onKeypress);
  try {
    return await run(controller.signal);
  } finally {
    stdin.off("keypress", onKeypress);
  }
}

async function promptOrFallback<T>(run: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isPromptCancelled(error)) {
      return fallback;
    }

    throw error;
  }
}

export function createInquirerUi(): TuiUi {
  return {
    printHeader(title) {
      console.log("\n" + paint("=".repeat(64), COLOR.cyan));
      console.log(paint(` ${title}`, `${COLOR.bold}${COLOR.cyan}`));
      console.log(paint("=".repeat(64), COLOR.cyan));
      console.log(paint("esc goes back", COLOR.dim));
    },
    printInfo(message) {
      console.log(message);
    },
    printSuccess(message) {
      console.log(paint(message, COLOR.green));
    },
    printWarning(message) {
      console.log(paint(message, COLOR.yellow));
    },
    printError(message) {
      console.error(paint(message, COLOR.red));
    },

    async chooseAppFeature(): Promise<AppFeatureChoice> {
      return promptOrFallback(
        () =>
          withEscAbort(signal =>
            select<AppFeatureChoice>(
              {
                message: "What would you like to do?",
                choices: [
                  { name: "Measure the distance between two angles", value: "measure" },
                  { name: "Verify regression cases and invariants", value: "verify" },
                  {
                    name: "Record a regression case",
                    value: "record",
                    description: "Cases are append-only and never removed",
                  },
                  { name: "Exit", value: "exit" },
                ],
              },
              { signal },
            ),
          ),
        "exit",
      );
    },

    async askAngle(message): Promise<string | null> {
      return promptOrFallback<string | null>(
        () =>
          withEscAbort(signal =>
            input(
              {
                message,
              },
              { signal },
            ),
          ),
        null,
      );
    },

    async askNote(): Promise<string | null> {
      return promptOrFallback<string | null>(
        () =>
          withEscAbort(signal =>
            input(
              {
                message: "Note (optional)",
              },
              { signal },
            ),
          ),
        null,
      );
    },

    async confirmRecord(summary): Promise<boolean> {
      return promptOrFallback(
        () =>
          withEscAbort(signal =>
            confirm(
              {
                message: `Record: ${summary}?`,
                default: true,
              },
              { signal },
            ),
          ),
        false,
      );
    },
  };
}
