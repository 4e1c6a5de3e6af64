#!/usr/bin/env node
import minimist from "minimist";
import { resolve } from "node:path";
import { setDebugChecks } from "@voxgrid/core";
import { DEFAULT_LAYOUT, describeLayout, readLayoutFromYaml, type LayoutConfig } from "./config.js";
import { isShellOrder, listShellPoints, summarizeShells } from "./shells.js";
import { runSmoke } from "./smoke.js";

function printHelp(): void {
  console.log(`voxgrid

Usage:
  voxgrid layout [--config voxgrid.yaml]
  voxgrid shells <size> [--order expand|shrink] [--points]
  voxgrid smoke [--config voxgrid.yaml]

Options:
  --config <file>          YAML chunk layout (default: 16x16x16, u8, debug checks on)
  --order <order>          expand | shrink (default: expand)
  --points                 Print every visited point as x,y,z instead of a summary
`);
}

function loadLayout(config: string | undefined): LayoutConfig {
  const layout = config ? readLayoutFromYaml(resolve(config)) : DEFAULT_LAYOUT;
  setDebugChecks(layout.debugChecks);
  return layout;
}

async function run(): Promise<void> {
  const argv = minimist(process.argv.slice(2), {
    boolean: ["points"],
    string: ["config", "order"],
    default: {
      order: "expand"
    }
  });

  const command = argv._[0];
  const config = typeof argv.config === "string" && argv.config ? argv.config : undefined;
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "layout") {
    console.log(JSON.stringify(describeLayout(loadLayout(config)), null, 2));
    return;
  }

  if (command === "shells") {
    const size = Number(argv._[1]);
    if (!Number.isInteger(size) || size < 1) {
      throw new Error("Missing or invalid size argument.");
    }
    if (!isShellOrder(argv.order)) {
      throw new Error(`Unknown order: ${String(argv.order)}`);
    }
    if (argv.points) {
      console.log(listShellPoints(size, argv.order).join("\n"));
    } else {
      console.log(JSON.stringify(summarizeShells(size, argv.order), null, 2));
    }
    return;
  }

  if (command === "smoke") {
    const summary = runSmoke(loadLayout(config));
    console.log(JSON.stringify(summary, null, 2));
    if (summary.failures.length > 0) {
      console.error(`[voxgrid] ${summary.failures.length} of ${summary.checks} smoke checks failed`);
      process.exitCode = 1;
    }
    return;
  }

  throw new Error(`Unknown command: ${String(command)}`);
}

run().catch((error: unknown) => {
  console.error(`[voxgrid] ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack?.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
