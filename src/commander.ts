import { randomUUID } from "node:crypto";
import { getConfig } from "./config.js";
import { InvalidEdgeError, RunFailedError, SchedulerError, TerminationSignal } from "./errors.js";
import {
  CallbackRegistry,
  type CallbackBinding,
  type CallbackFailure,
  type CallbackFn,
  type CallbackOptions,
} from "./tree/callbacks.js";
import { walk } from "./tree/snapshot.js";
import { submit } from "./tree/submit.js";
import { COMMANDER_STAGES, type NodeOwner, type NodeStatus, type TaskNode, type TaskNodeKind } from "./tree/types.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("commander");

export type CommanderState = "idle" | "running" | "resolved";

export type CommanderOptions = {
  name?: string;
  data?: Record<string, unknown>;
};

export type RunOptions = {
  /** Reject with `RunFailedError` when any node failed. Defaults to `faults.rejectOnFailure`. */
  rejectOnFailure?: boolean;
};

export type RunReport = {
  commanderId: string;
  status: "completed" | "failed" | "terminated";
  durationMs: number;
  totals: Record<NodeStatus, number>;
  failures: Array<{ id: string; name: string; kind: TaskNodeKind; error: Error }>;
  callbackErrors: Array<{ id: string; name: string; stage: string; error: unknown }>;
};

/**
 * Root of the task tree. Nodes submitted before `run()` wait; once running,
 * new roots start right away. `run()` settles after every root (and so every
 * node) has resolved.
 */
export class Commander implements NodeOwner {
  readonly id = randomUUID();
  readonly name: string;
  readonly data: Record<string, unknown>;
  readonly callbacks = new CallbackRegistry(COMMANDER_STAGES, "commander");
  readonly callbackErrors: CallbackFailure[] = [];
  startedAt?: number;
  resolvedAt?: number;

  private readonly rootList: TaskNode[] = [];
  private current: CommanderState = "idle";
  private terminating = false;

  constructor(options: CommanderOptions = {}) {
    this.name = options.name ?? "commander";
    this.data = options.data ?? {};
  }

  get state(): CommanderState {
    return this.current;
  }

  get children(): readonly TaskNode[] {
    return this.rootList;
  }

  get roots(): readonly TaskNode[] {
    return this.rootList;
  }

  submit<N extends TaskNode>(node: N): N {
    return submit(this, node);
  }

  adopt(node: TaskNode): void {
    if (this.current === "resolved") {
      throw new InvalidEdgeError("NODE_CLOSED", `commander ${this.name} has already resolved; cannot attach ${node.label}`);
    }
    if (this.terminating) {
      throw new TerminationSignal(`commander ${this.name} was terminated; cannot attach ${node.label}`);
    }
    this.rootList.push(node);
    node.bindParent(this);
    if (this.current === "running") node.schedule();
  }

  release(node: TaskNode): void {
    const idx = this.rootList.indexOf(node);
    if (idx !== -1) this.rootList.splice(idx, 1);
  }

  addCallback(stage: "commander:end", fn: CallbackFn, options: CallbackOptions = {}): CallbackBinding {
    return this.callbacks.register({ stage, fn, ...options });
  }

  async run(opts: RunOptions = {}): Promise<RunReport> {
    if (this.current !== "idle") {
      throw new SchedulerError("INVALID_STATE", `commander ${this.name} is ${this.current}; run() can only be called once`);
    }
    this.current = "running";
    this.startedAt = Date.now();
    log.debug("Run started", { id: this.id, roots: this.rootList.length });
    for (const root of this.rootList) root.schedule();

    for (;;) {
      const open = this.rootList.filter((root) => !root.isResolved);
      if (open.length === 0) break;
      await Promise.all(open.map((root) => root.settled()));
    }

    this.current = "resolved";
    this.resolvedAt = performance.now();
    const failures = await this.callbacks.fire("commander:end", this);
    this.callbackErrors.push(...failures);

    const report = this.buildReport();
    for (const f of report.failures) {
      log.warn(`${f.kind} "${f.name}" failed`, { id: f.id, error: f.error.message });
    }
    log.info(`Run ${report.status}`, { id: this.id, durationMs: report.durationMs, totals: report.totals });

    if ((opts.rejectOnFailure ?? getConfig().faults.rejectOnFailure) && report.failures.length > 0) {
      const names = report.failures.map((f) => f.name).join(", ");
      throw new RunFailedError(`${report.failures.length} node(s) failed: ${names}`, report);
    }
    return report;
  }

  /** Terminate every unresolved root. Later submissions are refused. */
  async terminate(reason = "terminated"): Promise<void> {
    this.terminating = true;
    log.info(`Terminating commander ${this.name}`, { id: this.id, reason });
    for (const root of [...this.rootList]) {
      if (!root.isResolved) await root.terminate(reason);
    }
  }

  private buildReport(): RunReport {
    const nodes = walk(this.rootList);
    const totals: Record<NodeStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0, terminated: 0 };
    const report: RunReport = {
      commanderId: this.id,
      status: "completed",
      durationMs: Date.now() - (this.startedAt ?? Date.now()),
      totals,
      failures: [],
      callbackErrors: this.callbackErrors.map((f) => ({ id: this.id, name: this.name, stage: f.stage, error: f.error })),
    };
    for (const node of nodes) {
      totals[node.status] += 1;
      if (node.error) report.failures.push({ id: node.id, name: node.name, kind: node.kind, error: node.error });
      for (const f of node.callbackErrors) {
        report.callbackErrors.push({ id: node.id, name: node.name, stage: f.stage, error: f.error });
      }
    }
    if (totals.failed > 0) report.status = "failed";
    else if (totals.terminated > 0) report.status = "terminated";
    return report;
  }
}
