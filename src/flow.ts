import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { Commander, type CommanderOptions, type RunReport } from "./commander.js";
import { FlowModuleSchema, parseOrThrow, type FlowSetup } from "./schemas.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("flow");

export type FlowRunOptions = CommanderOptions & {
  /** Terminate the run after this many milliseconds. */
  timeoutMs?: number;
  rejectOnFailure?: boolean;
};

export type FlowRun = {
  commander: Commander;
  report: RunReport;
};

/** Import an ES module whose default export builds the tree on a commander. */
export async function loadFlow(path: string): Promise<FlowSetup> {
  const url = pathToFileURL(resolve(path)).href;
  const mod: unknown = await import(url);
  return parseOrThrow(FlowModuleSchema, mod, `flow module ${path}`).default;
}

export async function runFlow(setup: FlowSetup, opts: FlowRunOptions = {}): Promise<FlowRun> {
  const commander = new Commander({ name: opts.name, data: opts.data });
  await setup(commander);

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (opts.timeoutMs && opts.timeoutMs > 0) {
    const ms = opts.timeoutMs;
    timer = setTimeout(() => {
      log.warn(`Flow timed out after ${ms}ms`, { commander: commander.id });
      commander.terminate(`timed out after ${ms}ms`).catch((err: unknown) => {
        log.error("Termination failed", { error: String(err) });
      });
    }, ms);
  }
  try {
    const report = await commander.run({ rejectOnFailure: opts.rejectOnFailure });
    return { commander, report };
  } finally {
    clearTimeout(timer);
  }
}
