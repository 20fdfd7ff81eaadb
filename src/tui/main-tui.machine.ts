import { assign, fromPromise, setup } from "xstate";
import { summarizeReport, toErrorMessage } from "../lib/arc-distance";
import type { ArcDistanceService, CaseRunReport, PropertyViolation } from "../lib/arc-distance";
import { promptAngle } from "./angle-prompt";
import { caseRecordingMachine } from "./case-recording.machine";
import { emitMetric } from "./metrics";
import { formatMeasurement, formatOutcomeLine, formatViolationLine } from "./report-format";
import type { AppFeatureChoice, TuiUi } from "./ui-contract";

type TuiService = Pick<
  ArcDistanceService,
  "measure" | "signedDelta" | "verifyRegressionCases" | "verifyInvariants" | "recordRegressionCase"
>;

interface VerificationResult {
  report: CaseRunReport;
  violations: PropertyViolation[];
}

interface MainTuiContext {
  argv: string[];
  verbose: boolean;
  ui: TuiUi;
  service: TuiService;
  lastVerification: VerificationResult | null;
  fatalError: string | null;
}

interface MainTuiInput {
  argv: string[];
  verbose?: boolean;
  ui: TuiUi;
  service: TuiService;
}

type MainTuiEvent = { type: "APP.NOOP" };

function countFailures(result: VerificationResult): number {
  return result.report.mismatched + result.report.errored + result.violations.length;
}

export const mainTuiMachine = setup({
  types: {
    context: {} as MainTuiContext,
    events: {} as MainTuiEvent,
    input: {} as MainTuiInput,
    output: {} as { status: "completed" } | { status: "failed"; error: string },
  },
  guards: {
    verifyOnlyFromArg: ({ context }) => {
      const firstArg = context.argv[0]?.trim().toLowerCase();
      return firstArg === "verify";
    },
    featureIs: (_, params: { feature: AppFeatureChoice; expected: AppFeatureChoice }) =>
      params.feature === params.expected,
    verificationFailed: (_, params: { result: VerificationResult }) => countFailures(params.result) > 0,
    childFailed: (_, params: { status: "completed" | "failed" }) => params.status === "failed",
  },
  actions: {
    printExitSelected: ({ context }) => {
      context.ui.printInfo("Exiting arc distance.");
    },
    printAppComplete: ({ context }) => {
      context.ui.printSuccess("TUI session complete.");
    },
    storeVerification: assign({
      lastVerification: (_, params: { result: VerificationResult }) => params.result,
    }),
    setFatalError: assign({
      fatalError: (_, params: { error: unknown }) => toErrorMessage(params.error),
    }),
    setVerificationFailure: assign({
      fatalError: (_, params: { result: VerificationResult }) =>
        `${countFailures(params.result)} regression check(s) failed`,
    }),
    printFatalError: ({ context }) => {
      context.ui.printError(`TUI failed: ${context.fatalError ?? "Unknown error"}`);
    },
  },
  actors: {
    // Header rendering stays in the actor that opens the prompt so stdout does not interleave.
    promptFeatureMenu: fromPromise(async ({ input }: { input: { ui: TuiUi } }) => {
      input.ui.printHeader("Arc distance");
      input.ui.printInfo("Shortest separation between two angles, in degrees.");
      return input.ui.chooseAppFeature();
    }),
    measureFlow: fromPromise(async ({ input }: { input: { ui: TuiUi; service: TuiService; verbose: boolean } }) => {
      input.ui.printHeader("Measure");
      const a = await promptAngle(input.ui, { name: "a", message: "First angle a (degrees)" });
      if (a === null) {
        return;
      }

      const b = await promptAngle(input.ui, { name: "b", message: "Second angle b (degrees)" });
      if (b === null) {
        return;
      }

      const distance = input.service.measure(a, b);
      const delta = input.service.signedDelta(a, b);
      input.ui.printSuccess(formatMeasurement(a, b, distance, delta));
      emitMetric(input.verbose, "measure.completed", { a, b, distance });
    }),
    verifyFlow: fromPromise(
      async ({ input }: { input: { ui: TuiUi; service: TuiService; verbose: boolean } }): Promise<VerificationResult> => {
        input.ui.printHeader("Regression cases");
        const report = await input.service.verifyRegressionCases();
        for (const outcome of report.outcomes) {
          const line = formatOutcomeLine(outcome);
          if (outcome.kind === "pass") {
            input.ui.printInfo(line);
          } else {
            input.ui.printError(line);
          }
        }

        const violations = input.service.verifyInvariants();
        for (const violation of violations) {
          input.ui.printError(formatViolationLine(violation));
        }

        const summary = `${summarizeReport(report)}; ${violations.length} invariant violation(s)`;
        if (report.mismatched + report.errored + violations.length === 0) {
          input.ui.printSuccess(summary);
        } else {
          input.ui.printWarning(summary);
        }

        emitMetric(input.verbose, "verify.completed", {
          total: report.total,
          passed: report.passed,
          mismatched: report.mismatched,
          errored: report.errored,
          violations: violations.length,
        });

        return { report, violations };
      },
    ),
    recordingWorkflow: caseRecordingMachine,
  },
}).createMachine({
  id: "mainTui",
  context: ({ input }) => ({
    argv: input.argv,
    verbose: input.verbose ?? false,
    ui: input.ui,
    service: input.service,
    lastVerification: null,
    fatalError: null,
  }),
  output: ({ context }) =>
    context.fatalError === null
      ? { status: "completed" as const }
      : { status: "failed" as const, error: context.fatalError },
  initial: "entry",
  states: {
    entry: {
      always: [
        {
          guard: "verifyOnlyFromArg",
          target: "verifyOnly",
        },
        {
          target: "featureMenu",
        },
      ],
    },

    featureMenu: {
      invoke: {
        src: "promptFeatureMenu",
        input: ({ context }) => ({ ui: context.ui }),
        onDone: [
          {
            guard: {
              type: "featureIs",
              params: ({ event }) => ({ feature: event.output, expected: "exit" as const }),
            },
            actions: ["printExitSelected", "printAppComplete"],
            target: "done",
          },
          {
            guard: {
              type: "featureIs",
              params: ({ event }) => ({ feature: event.output, expected: "measure" as const }),
            },
            target: "measuring",
          },
          {
            guard: {
              type: "featureIs",
              params: ({ event }) => ({ feature: event.output, expected: "verify" as const }),
            },
            target: "verifying",
          },
          {
            guard: {
              type: "featureIs",
              params: ({ event }) => ({ feature: event.output, expected: "record" as const }),
            },
            target: "recording",
          },
        ],
        onError: {
          actions: {
            type: "setFatalError",
            params: ({ event }) => ({ error: event.error }),
          },
          target: "failed",
        },
      },
    },

    measuring: {
      invoke: {
        src: "measureFlow",
        input: ({ context }) => ({ ui: context.ui, service: context.service, verbose: context.verbose }),
        onDone: {
          target: "featureMenu",
        },
        onError: {
          actions: {
            type: "setFatalError",
            params: ({ event }) => ({ error: event.error }),
          },
          target: "failed",
        },
      },
    },

    verifying: {
      invoke: {
        src: "verifyFlow",
        input: ({ context }) => ({ ui: context.ui, service: context.service, verbose: context.verbose }),
        onDone: {
          actions: {
            type: "storeVerification",
            params: ({ event }) => ({ result: event.output }),
          },
          target: "featureMenu",
        },
        onError: {
          actions: {
            type: "setFatalError",
            params: ({ event }) => ({ error: event.error }),
          },
          target: "failed",
        },
      },
    },

    verifyOnly: {
      invoke: {
        src: "verifyFlow",
        input: ({ context }) => ({ ui: context.ui, service: context.service, verbose: context.verbose }),
        onDone: [
          {
            guard: {
              type: "verificationFailed",
              params: ({ event }) => ({ result: event.output }),
            },
            actions: [
              {
                type: "storeVerification",
                params: ({ event }) => ({ result: event.output }),
              },
              {
                type: "setVerificationFailure",
                params: ({ event }) => ({ result: event.output }),
              },
            ],
            target: "failed",
          },
          {
            actions: {
              type: "storeVerification",
              params: ({ event }) => ({ result: event.output }),
            },
            target: "done",
          },
        ],
        onError: {
          actions: {
            type: "setFatalError",
            params: ({ event }) => ({ error: event.error }),
          },
          target: "failed",
        },
      },
    },

    recording: {
      invoke: {
        src: "recordingWorkflow",
        input: ({ context }) => ({
          service: context.service,
          ui: context.ui,
          verbose: context.verbose,
        }),
        onDone: [
          {
            guard: {
              type: "childFailed",
              params: ({ event }) => ({ status: event.output.status }),
            },
            actions: {
              type: "setFatalError",
              params: ({ event }) => ({
                error: event.output.status === "failed" ? event.output.error : "Recording failed",
              }),
            },
            target: "failed",
          },
          {
            target: "featureMenu",
          },
        ],
        onError: {
          actions: {
            type: "setFatalError",
            params: ({ event }) => ({ error: event.error }),
          },
          target: "failed",
        },
      },
    },

    done: {
      type: "final",
    },

    failed: {
      entry: "printFatalError",
      type: "final",
    },
  },
});
