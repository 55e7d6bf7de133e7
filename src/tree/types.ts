import type { ExecutionFault } from "../errors.js";
import type { CallbackSpec } from "./callbacks.js";
import type { Handler } from "./handler.js";
import type { Job } from "./job.js";

export type TaskNodeKind = "job" | "handler";

export type NodeStatus = "pending" | "running" | "completed" | "failed" | "terminated";

export const STAGES = [
  "job:start",
  "job:end",
  "handler:start",
  "handler:end",
  "exception",
  "terminate",
  "commander:end",
] as const;

export type Stage = (typeof STAGES)[number];

export const JOB_STAGES: readonly Stage[] = ["job:start", "job:end", "exception", "terminate"];
export const HANDLER_STAGES: readonly Stage[] = ["handler:start", "handler:end", "exception", "terminate"];
export const COMMANDER_STAGES: readonly Stage[] = ["commander:end"];

export const LIFECYCLE_STAGES = {
  job: { start: "job:start", end: "job:end" },
  handler: { start: "handler:start", end: "handler:end" },
} as const satisfies Record<TaskNodeKind, { start: Stage; end: Stage }>;

/** Closed sum of the schedulable node variants. Dispatch on `kind`. */
export type TaskNode = Job | Handler;

export type NodeOutcome<R = unknown> =
  | { status: "completed"; result: R }
  | { status: "failed"; error: ExecutionFault }
  | { status: "terminated"; reason: string };

/** Anything that can own children: a running Job or the Commander. */
export interface NodeOwner {
  readonly id: string;
  readonly name: string;
  readonly children: readonly TaskNode[];
  /** Attach `node` as the last child and schedule it if this owner is running. */
  adopt(node: TaskNode): void;
  /** Detach `node`; used when a reusable handler moves to a new invoker. */
  release(node: TaskNode): void;
}

export type NodeOptions = {
  name?: string;
  /** Caller-owned payload; pass the same object to several nodes to share it. */
  data?: Record<string, unknown>;
  callbacks?: CallbackSpec[];
  /** Fail the node when its body runs longer than this. 0 disables. */
  timeoutMs?: number;
  /** Fail this node when any of its children fails. */
  propagate?: boolean;
};

export type JobOptions = NodeOptions;

export type HandlerOptions = NodeOptions & {
  reusable?: boolean;
  /** Extra attempts after a failed call. */
  retries?: number;
  /** Outcomes kept in `cycles`. 0 keeps all of them. */
  historyLimit?: number;
};

export function isTerminal(status: NodeStatus): boolean {
  return status === "completed" || status === "failed" || status === "terminated";
}
