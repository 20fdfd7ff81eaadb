import { HALF_TURN_DEGREES, ValidationError, parseAngleText } from "../lib/arc-distance";
import type { TuiUi } from "./ui-contract";

interface PromptAngleOptions {
  name: string;
  message: string;
  expectDistance?: boolean;
}

/** Re-asks until the text parses; null means the user backed out. */
export async function promptAngle(ui: TuiUi, options: PromptAngleOptions): Promise<number | null> {
  for (;;) {
    const text = await ui.askAngle(options.message);
    if (text === null) {
      return null;
    }

    let value: number;
    try {
      value = parseAngleText(text, options.name);
    } catch (error) {
      if (error instanceof ValidationError) {
        ui.printWarning(error.message);
        continue;
      }

      throw error;
    }

    if (options.expectDistance && (value < 0 || value > HALF_TURN_DEGREES)) {
      ui.printWarning(`${options.name} must lie in [0, ${HALF_TURN_DEGREES}].`);
      continue;
    }

    return value;
  }
}
