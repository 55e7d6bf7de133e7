#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import type { RunReport } from "./commander.js";
import { loadConfigFile } from "./config.js";
import { loadFlow, runFlow } from "./flow.js";
import { formatTree, snapshot } from "./tree/snapshot.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

type RunCommandOptions = {
  json?: boolean;
  timeout?: number;
  rejectOnFailure?: boolean;
  config?: string;
  name?: string;
};

type GlobalOptions = {
  debug?: boolean;
  quiet?: boolean;
};

function parseMs(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

const program = new Command();

program
  .name("task-commander")
  .description("Run a task tree defined by a flow module")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("-q, --quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts: GlobalOptions = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
});

// --- run ---
program
  .command("run")
  .description("Load a flow module and drive its tree to completion")
  .argument("<flow>", "Path to an ES module whose default export receives the commander")
  .option("--json", "Print a JSON snapshot instead of the tree")
  .option("-t, --timeout <ms>", "Terminate the run after this many milliseconds", parseMs)
  .option("--reject-on-failure", "Exit with code 1 when any node failed")
  .option("-c, --config <file>", "JSON file with config overrides")
  .option("-n, --name <name>", "Commander name")
  .action(async (flow: string, opts: RunCommandOptions) => {
    try {
      if (opts.config) await loadConfigFile(opts.config);
      const setup = await loadFlow(flow);
      const { commander, report } = await runFlow(setup, {
        name: opts.name,
        timeoutMs: opts.timeout,
      });

      if (opts.json) {
        console.log(JSON.stringify({ tree: snapshot(commander), report: summarize(report) }, null, 2));
      } else {
        console.log(formatTree(commander));
        const { totals } = report;
        console.log(
          `\nRun ${report.status} in ${report.durationMs}ms ` +
            `(${totals.completed} completed, ${totals.failed} failed, ${totals.terminated} terminated)`,
        );
        for (const f of report.failures) {
          console.error(`  ${f.kind} ${f.name}: ${f.error.message}`);
        }
        if (report.callbackErrors.length > 0) {
          console.error(`  ${report.callbackErrors.length} callback error(s)`);
        }
      }
      if (opts.rejectOnFailure && report.failures.length > 0) process.exitCode = 1;
    } catch (err) {
      console.error("Run failed:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

function summarize(report: RunReport): Record<string, unknown> {
  return {
    ...report,
    failures: report.failures.map((f) => ({ ...f, error: f.error.message })),
    callbackErrors: report.callbackErrors.map((f) => ({
      ...f,
      error: f.error instanceof Error ? f.error.message : String(f.error),
    })),
  };
}

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
