import { getConfig } from "../config.js";
import { InvalidEdgeError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { BaseNode } from "./node.js";
import { HANDLER_STAGES, isTerminal, type HandlerOptions, type NodeOwner } from "./types.js";

const log = createLogger("tree");

export type HandlerFn<R = unknown, A extends unknown[] = unknown[]> = (...args: A) => R | Promise<R>;

/** Stored form of the callable; method syntax keeps `Handler<R, A>` assignable to `Handler`. */
type Callable<R> = { bivarianceHack(...args: unknown[]): R | Promise<R> }["bivarianceHack"];

/**
 * Wraps an async callable. Call it under the tree with `callHandler`, or
 * await it directly with `invoke`. A reusable handler can be called again
 * once it has resolved, possibly from a different parent.
 */
export class Handler<R = unknown, A extends unknown[] = unknown[]> extends BaseNode<R> {
  declare readonly kind: "handler";
  readonly reusable: boolean;
  readonly retries: number;
  private readonly callable: Callable<R>;
  private boundArgs: unknown[] = [];
  private requeued?: { parent: NodeOwner; args: unknown[] };

  constructor(callable: HandlerFn<R, A>, options: HandlerOptions & { args?: A } = {}) {
    super("handler", HANDLER_STAGES, callable.name, options, getConfig().timeouts.handler);
    this.callable = callable;
    this.reusable = options.reusable ?? getConfig().handlers.reusable;
    this.retries = options.retries ?? getConfig().handlers.retries;
    this.historyLimit = options.historyLimit ?? getConfig().handlers.historyLimit;
    if (options.args) this.boundArgs = [...options.args];
  }

  /** Run the callable directly: no status change, no callbacks, no parent. */
  async invoke(...args: A): Promise<R> {
    return this.callWithRetry(args);
  }

  /** Clear the last outcome, return to pending and detach from the previous parent. */
  reset(): void {
    if (!this.reusable) {
      throw new InvalidEdgeError("NOT_REUSABLE", `${this.label} is not reusable`);
    }
    if (!this.isResolved) {
      throw new InvalidEdgeError("NODE_BUSY", `${this.label} is ${this.status}; only a resolved handler can be reset`);
    }
    this.resetCycle();
    this.detach();
  }

  /** Move a handler that has not started yet to another parent. */
  reparent(parent: NodeOwner): void {
    if (this.status !== "pending") {
      throw new InvalidEdgeError("NODE_BUSY", `${this.label} is ${this.status}; only a pending handler can be moved`);
    }
    this.detach();
    parent.adopt(this);
  }

  /**
   * @internal Attach under `parent` for a new call. A reusable handler that is
   * still firing its end callbacks is queued and re-runs as soon as it resolves.
   */
  enqueue(parent: NodeOwner, args?: readonly unknown[]): void {
    if (this.status === "pending") {
      if (this.parent !== null) {
        throw new InvalidEdgeError("ALREADY_SUBMITTED", `${this.label} already belongs to ${this.parent.name}`);
      }
      if (args) this.boundArgs = [...args];
      parent.adopt(this);
      return;
    }
    if (!this.reusable) {
      throw new InvalidEdgeError("NOT_REUSABLE", `${this.label} is not reusable and has already been called`);
    }
    if (this.isResolved) {
      this.reset();
      if (args) this.boundArgs = [...args];
      parent.adopt(this);
      return;
    }
    if (isTerminal(this.status) && !this.requeued) {
      this.requeued = { parent, args: args ? [...args] : this.boundArgs };
      return;
    }
    throw new InvalidEdgeError("NODE_BUSY", `${this.label} is still ${this.status}; wait for it before calling it again`);
  }

  protected override afterSettle(): void {
    const next = this.requeued;
    if (!next) return;
    this.requeued = undefined;
    try {
      this.enqueue(next.parent, next.args);
    } catch (err) {
      log.warn(`Could not re-run ${this.label}`, { id: this.id, error: err instanceof Error ? err.message : String(err) });
      this.callbackErrors.push({ stage: "handler:end", error: err });
    }
  }

  protected async execute(): Promise<R> {
    return this.callWithRetry(this.boundArgs, this.signal);
  }

  private detach(): void {
    this.parent?.release(this);
    this.bindParent(null);
  }

  private async callWithRetry(args: readonly unknown[], signal?: AbortSignal): Promise<R> {
    if (this.retries <= 0) return this.callable(...args);
    const { baseDelayMs, maxDelayMs } = getConfig().retry;
    return withRetry(async () => this.callable(...args), {
      maxAttempts: this.retries + 1,
      baseDelayMs,
      maxDelayMs,
      signal,
      onRetry: (err, attempt, delayMs) => {
        log.debug(`Retrying ${this.label}`, { attempt, delayMs, error: err instanceof Error ? err.message : String(err) });
      },
    });
  }
}
