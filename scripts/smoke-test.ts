import { resolve } from "node:path";
import { readLayoutFromYaml, runSmoke } from "../packages/cli/src/index.js";

function main(): void {
  const summary = runSmoke(readLayoutFromYaml(resolve("fixtures/voxgrid.yaml")));
  console.log("[smoke] summary:");
  console.log(JSON.stringify(summary, null, 2));
  if (summary.failures.length > 0) {
    throw new Error(`${summary.failures.length} of ${summary.checks} checks failed: ${summary.failures.join("; ")}`);
  }
}

try {
  main();
} catch (error: unknown) {
  console.error(`[smoke] failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}
