import type { RunReport } from "./commander.js";

export type ErrorCode =
  | "EXECUTION_FAULT"
  | "TIMEOUT"
  | "TERMINATED"
  | "INVALID_EDGE"
  | "NOT_REUSABLE"
  | "ALREADY_SUBMITTED"
  | "NODE_CLOSED"
  | "NODE_BUSY"
  | "VALIDATION_FAILED"
  | "INVALID_STAGE"
  | "CONFIG_INVALID"
  | "RUN_FAILED"
  | "INVALID_STATE";

/** Base class for every error raised by the scheduler. */
export class SchedulerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A node's body threw, or ran past its timeout. */
export class ExecutionFault extends SchedulerError {
  readonly nodeId: string;
  readonly nodeName: string;

  constructor(
    node: { id: string; name: string },
    message: string,
    options?: { cause?: unknown; code?: "EXECUTION_FAULT" | "TIMEOUT" },
  ) {
    super(options?.code ?? "EXECUTION_FAULT", message, { cause: options?.cause });
    this.nodeId = node.id;
    this.nodeName = node.name;
  }

  /** Wrap whatever a body threw. Faults already raised for this node are kept as-is. */
  static from(err: unknown, node: { id: string; name: string }): ExecutionFault {
    if (err instanceof ExecutionFault && err.nodeId === node.id) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ExecutionFault(node, message, { cause: err });
  }
}

/**
 * Cooperative interruption. Not an error for callback purposes. `nodeId` names
 * the node that was terminated; a signal without one terminates whichever
 * node's body raises it.
 */
export class TerminationSignal extends SchedulerError {
  readonly nodeId?: string;

  constructor(message = "terminated", nodeId?: string) {
    super("TERMINATED", message);
    this.nodeId = nodeId;
  }
}

export class InvalidEdgeError extends SchedulerError {
  constructor(
    code: "INVALID_EDGE" | "NOT_REUSABLE" | "ALREADY_SUBMITTED" | "NODE_CLOSED" | "NODE_BUSY",
    message: string,
  ) {
    super(code, message);
  }
}

export class ValidationError extends SchedulerError {
  constructor(code: "VALIDATION_FAILED" | "INVALID_STAGE", message: string) {
    super(code, message);
  }
}

export class ConfigError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

/** Raised by `Commander.run` when `rejectOnFailure` is set and a node failed. */
export class RunFailedError extends SchedulerError {
  readonly report: RunReport;

  constructor(message: string, report: RunReport) {
    super("RUN_FAILED", message);
    this.report = report;
  }
}
