import path from "node:path";
import { fileURLToPath } from "node:url";
import { createActor, waitFor } from "xstate";
import { createArcDistanceService, readArcDistanceConfig } from "./lib/arc-distance";
import { createInquirerUi } from "./tui/inquirer-ui";
import { mainTuiMachine } from "./tui/main-tui.machine";

async function run(): Promise<void> {
  const config = readArcDistanceConfig();
  const actor = createActor(mainTuiMachine, {
    input: {
      argv: process.argv.slice(2),
      verbose: config.verbose,
      service: createArcDistanceService(),
      ui: createInquirerUi(),
    },
  });

  actor.start();

  await waitFor(actor, snapshot => snapshot.matches("done") || snapshot.matches("failed"));

  const snapshot = actor.getSnapshot();
  if (snapshot.matches("failed")) {
    process.exitCode = 1;
  }

  actor.stop();
}

const entryPath = process.argv[1];
if (entryPath && path.resolve(entryPath) === fileURLToPath(import.meta.url)) {
  run().catch(error => {
    console.error(`Fatal error: ${String(error)}`);
    process.exitCode = 1;
  });
}
