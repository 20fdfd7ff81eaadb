import { assign, fromPromise, setup } from "xstate";
import { ValidationError, toErrorMessage } from "../lib/arc-distance";
import type { ArcDistanceService, RecordedCaseResult, RegressionCaseInput } from "../lib/arc-distance";
import { promptAngle } from "./angle-prompt";
import { emitMetric } from "./metrics";
import { formatOutcomeLine } from "./report-format";
import type { TuiUi } from "./ui-contract";

type RecordingService = Pick<ArcDistanceService, "recordRegressionCase">;

interface CaseRecordingContext {
  service: RecordingService;
  ui: TuiUi;
  verbose: boolean;
  draft: RegressionCaseInput | null;
  recorded: RecordedCaseResult | null;
  fatalError: string | null;
}

interface CaseRecordingInput {
  service: RecordingService;
  ui: TuiUi;
  verbose?: boolean;
}

type CaseRecordingEvent = { type: "RECORD.NOOP" };

function describeDraft(draft: RegressionCaseInput): string {
  const note = draft.note ? ` (${draft.note})` : "";
  return `distance(${draft.a}, ${draft.b}) should be ${draft.expected}${note}`;
}

export const caseRecordingMachine = setup({
  types: {
    context: {} as CaseRecordingContext,
    events: {} as CaseRecordingEvent,
    input: {} as CaseRecordingInput,
    output: {} as { status: "completed" } | { status: "failed"; error: string },
  },
  guards: {
    draftCancelled: (_, params: { draft: RegressionCaseInput | null }) => params.draft === null,
    recordDeclined: (_, params: { confirmed: boolean }) => !params.confirmed,
    rejectedByValidation: (_, params: { error: unknown }) => params.error instanceof ValidationError,
  },
  actions: {
    printRecordCancelled: ({ context }) => {
      context.ui.printInfo("No case recorded.");
    },
    storeDraft: assign({
      draft: (_, params: { draft: RegressionCaseInput | null }) => params.draft,
    }),
    storeRecorded: assign({
      recorded: (_, params: { result: RecordedCaseResult }) => params.result,
    }),
    printRecorded: ({ context }) => {
      const recorded = context.recorded;
      if (!recorded) {
        return;
      }

      context.ui.printSuccess(`Recorded ${recorded.entry.id}: ${recorded.entry.label}`);
      const line = formatOutcomeLine(recorded.outcome);
      if (recorded.outcome.kind === "pass") {
        context.ui.printInfo(line);
      } else {
        context.ui.printWarning(`${line}. The implementation needs a fix before this case passes.`);
      }

      emitMetric(context.verbose, "case.recorded", {
        id: recorded.entry.id,
        outcome: recorded.outcome.kind,
      });
    },
    printRejected: ({ context }, params: { error: unknown }) => {
      context.ui.printWarning(`Case not recorded: ${toErrorMessage(params.error)}`);
    },
    setFatalError: assign({
      fatalError: (_, params: { error: unknown }) => toErrorMessage(params.error),
    }),
    printFatalError: ({ context }) => {
      context.ui.printError(`Recording failed: ${context.fatalError ?? "Unknown error"}`);
    },
  },
  actors: {
    collectDraft: fromPromise(async ({ input }: { input: { ui: TuiUi } }): Promise<RegressionCaseInput | null> => {
      input.ui.printHeader("Record a regression case");
      input.ui.printInfo("Cases are permanent: once recorded, a case is never removed.");

      const a = await promptAngle(input.ui, { name: "a", message: "First angle a (degrees)" });
      if (a === null) {
        return null;
      }

      const b = await promptAngle(input.ui, { name: "b", message: "Second angle b (degrees)" });
      if (b === null) {
        return null;
      }

      const expected = await promptAngle(input.ui, {
        name: "expected",
        message: "Expected distance (degrees, 0-180)",
        expectDistance: true,
      });
      if (expected === null) {
        return null;
      }

      const note = await input.ui.askNote();
      return { a, b, expected, note: note ?? undefined };
    }),
    confirmDraft: fromPromise(async ({ input }: { input: { ui: TuiUi; draft: RegressionCaseInput | null } }) => {
      if (!input.draft) {
        throw new Error("No case draft to confirm.");
      }

      return input.ui.confirmRecord(describeDraft(input.draft));
    }),
    saveDraft: fromPromise(
      async ({ input }: { input: { service: RecordingService; draft: RegressionCaseInput | null } }) => {
        if (!input.draft) {
          throw new Error("No case draft to save.");
        }

        return input.service.recordRegressionCase(input.draft);
      },
    ),
  },
}).createMachine({
  id: "caseRecording",
  context: ({ input }) => ({
    service: input.service,
    ui: input.ui,
    verbose: input.verbose ?? false,
    draft: null,
    recorded: null,
    fatalError: null,
  }),
  output: ({ context }) =>
    context.fatalError === null
      ? { status: "completed" as const }
      : { status: "failed" as const, error: context.fatalError },
  initial: "collecting",
  states: {
    collecting: {
      invoke: {
        src: "collectDraft",
        input: ({ context }) => ({ ui: context.ui }),
        onDone: [
          {
            guard: {
              type: "draftCancelled",
              params: ({ event }) => ({ draft: event.output }),
            },
            actions: "printRecordCancelled",
            target: "done",
          },
          {
            actions: {
              type: "storeDraft",
              params: ({ event }) => ({ draft: event.output }),
            },
            target: "confirming",
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

    confirming: {
      invoke: {
        src: "confirmDraft",
        input: ({ context }) => ({
          ui: context.ui,
          draft: context.draft,
        }),
        onDone: [
          {
            guard: {
              type: "recordDeclined",
              params: ({ event }) => ({ confirmed: event.output }),
            },
            actions: "printRecordCancelled",
            target: "done",
          },
          {
            target: "saving",
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

    saving: {
      invoke: {
        src: "saveDraft",
        input: ({ context }) => ({
          service: context.service,
          draft: context.draft,
        }),
        onDone: {
          actions: [
            {
              type: "storeRecorded",
              params: ({ event }) => ({ result: event.output }),
            },
            "printRecorded",
          ],
          target: "done",
        },
        onError: [
          {
            guard: {
              type: "rejectedByValidation",
              params: ({ event }) => ({ error: event.error }),
            },
            actions: {
              type: "printRejected",
              params: ({ event }) => ({ error: event.error }),
            },
            target: "done",
          },
          {
            actions: {
              type: "setFatalError",
              params: ({ event }) => ({ error: event.error }),
            },
            target: "failed",
          },
        ],
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
