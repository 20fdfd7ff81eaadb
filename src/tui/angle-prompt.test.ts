import { describe, expect, test } from "vitest";
import { promptAngle } from "./angle-prompt";
import type { TuiUi } from "./ui-contract";

function createScriptedUi(answers: Array<string | null>): { ui: TuiUi; warnings: string[] } {
  const queue = [...answers];
  const warnings: string[] = [];

  return {
    warnings,
    ui: {
      printHeader() {},
      printInfo() {},
      printSuccess() {},
      printWarning(message) {
        warnings.push(message);
      },
      printError() {},
      async chooseAppFeature() {
        return "exit";
      },
      async askAngle() {
        return queue.length > 0 ? (queue.shift() ?? null) : null;
      },
      async askNote() {
        return null;
      },
      async confirmRecord() {
        return false;
      },
    },
  };
}

describe("promptAngle", () => {
  test("re-asks until the answer parses", async () => {
    const { ui, warnings } = createScriptedUi(["abc", " 45 "]);

    expect(await promptAngle(ui, { name: "a", message: "a" })).toBe(45);
    expect(warnings).toEqual(['a must be a number of degrees, got "abc".']);
  });

  test("returns null when the prompt is cancelled", async () => {
    const { ui } = createScriptedUi([null]);

    expect(await promptAngle(ui, { name: "a", message: "a" })).toBeNull();
  });

  test("keeps expected distances within [0, 180]", async () => {
    const { ui, warnings } = createScriptedUi(["200", "20"]);

    expect(await promptAngle(ui, { name: "expected", message: "expected", expectDistance: true })).toBe(20);
    expect(warnings).toEqual(["expected must lie in [0, 180]."]);
  });
});
