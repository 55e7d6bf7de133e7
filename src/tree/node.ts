import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { ExecutionFault, TerminationSignal } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import {
  CallbackRegistry,
  type CallbackBinding,
  type CallbackFailure,
  type CallbackFn,
  type CallbackOptions,
} from "./callbacks.js";
import {
  LIFECYCLE_STAGES,
  type NodeOptions,
  type NodeOutcome,
  type NodeOwner,
  type NodeStatus,
  type Stage,
  type TaskNode,
  type TaskNodeKind,
} from "./types.js";

const log = createLogger("tree");

type Cycle<R> = {
  promise: Promise<NodeOutcome<R>>;
  release: () => void;
};

type BodyOutcome<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * State shared by Jobs and Handlers: identity, tree links, status, the
 * callback registry and the lifecycle driver.
 *
 * A node runs its body, waits for every child to resolve, then makes its
 * terminal transition and fires the matching stage. Only after that does
 * `settled()` resolve, so parents always resolve after their children.
 */
export abstract class BaseNode<R = unknown> {
  readonly id = randomUUID();
  readonly kind: TaskNodeKind;
  readonly name: string;
  readonly data: Record<string, unknown>;
  readonly callbacks: CallbackRegistry;
  /** Faults thrown by this node's callbacks. They never change its status. */
  readonly callbackErrors: CallbackFailure[] = [];
  /**
   * One outcome per finished cycle, oldest first. Only reusable handlers have
   * more than one; `historyLimit` keeps the most recent ones.
   */
  readonly cycles: NodeOutcome<R>[] = [];

  startedAt?: number;
  endedAt?: number;
  /** `performance.now()` at resolution. */
  resolvedAt?: number;

  protected readonly propagate: boolean;
  protected readonly timeoutMs: number;
  /** Outcomes kept in `cycles`. 0 keeps all of them. */
  protected historyLimit = 0;
  protected childList: TaskNode[] = [];

  private owner: NodeOwner | null = null;
  private state: NodeStatus = "pending";
  private outcome?: NodeOutcome<R>;
  private resolved = false;
  private terminating = false;
  private scheduled = false;
  private controller = new AbortController();
  private cycle: Cycle<R> = this.openCycle();

  protected constructor(
    kind: TaskNodeKind,
    stages: readonly Stage[],
    fnName: string,
    options: NodeOptions,
    defaultTimeoutMs: number,
  ) {
    this.kind = kind;
    this.name = options.name ?? (fnName || kind);
    this.data = options.data ?? {};
    this.propagate = options.propagate ?? getConfig().faults.propagate;
    this.timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
    this.callbacks = new CallbackRegistry(stages, `${kind} "${this.name}"`);
    for (const spec of options.callbacks ?? []) {
      this.callbacks.register(spec);
    }
  }

  protected abstract execute(): Promise<R>;

  get label(): string {
    return `${this.kind} "${this.name}"`;
  }

  get parent(): NodeOwner | null {
    return this.owner;
  }

  get status(): NodeStatus {
    return this.state;
  }

  get children(): readonly TaskNode[] {
    return this.childList;
  }

  get result(): R | undefined {
    const outcome = this.outcome;
    return outcome?.status === "completed" ? outcome.result : undefined;
  }

  get error(): ExecutionFault | undefined {
    const outcome = this.outcome;
    return outcome?.status === "failed" ? outcome.error : undefined;
  }

  /** Terminal and every descendant resolved. */
  get isResolved(): boolean {
    return this.resolved;
  }

  /** Aborted when the node is terminated or times out. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  addCallback(stage: Stage, fn: CallbackFn, options: CallbackOptions = {}): CallbackBinding {
    return this.callbacks.register({ stage, fn, ...options });
  }

  /** Resolves with the outcome of the current cycle. Never rejects. */
  settled(): Promise<NodeOutcome<R>> {
    return this.cycle.promise;
  }

  /** Resolves with the result, or re-raises the fault (or a `TerminationSignal`). */
  async join(): Promise<R> {
    const outcome = await this.settled();
    switch (outcome.status) {
      case "completed":
        return outcome.result;
      case "failed":
        throw outcome.error;
      case "terminated":
        throw new TerminationSignal(`${this.label} was terminated (${outcome.reason})`, this.id);
    }
  }

  throwIfTerminated(): void {
    if (this.terminating || this.state === "terminated") {
      throw new TerminationSignal(`${this.label} was terminated`, this.id);
    }
  }

  /**
   * Cooperative termination. Unresolved children are terminated first, then
   * this node is marked terminated, fires `terminate` and resolves. Returns
   * false when the node had already reached a terminal state.
   */
  async terminate(reason = "terminated"): Promise<boolean> {
    if (this.terminating || this.outcome) return false;
    this.terminating = true;
    this.controller.abort(new TerminationSignal(`${this.label} was terminated (${reason})`, this.id));

    await this.terminateChildren(reason);

    this.state = "terminated";
    this.endedAt = Date.now();
    this.outcome = { status: "terminated", reason };
    log.info(`${this.label} terminated`, { id: this.id, reason });
    await this.fire("terminate");
    this.settle();
    return true;
  }

  /** @internal Set by the owner on adoption. */
  bindParent(owner: NodeOwner | null): void {
    this.owner = owner;
  }

  /** @internal Start this node on the next microtask, once per cycle. */
  schedule(): void {
    if (this.scheduled || this.state !== "pending") return;
    this.scheduled = true;
    queueMicrotask(() => {
      this.run().catch((err: unknown) => {
        log.error(`Unexpected error while running ${this.label}`, { id: this.id, error: String(err) });
      });
    });
  }

  /** Called when the node enters running, before its start stage fires. */
  protected onStart(): void {
    // no-op by default
  }

  /** Called right after the node resolves. */
  protected afterSettle(): void {
    // no-op by default
  }

  protected isCancelled(): boolean {
    return this.terminating;
  }

  /** Back to pending with a fresh cycle. Callers check reusability. */
  protected resetCycle(): void {
    this.state = "pending";
    this.outcome = undefined;
    this.resolved = false;
    this.terminating = false;
    this.scheduled = false;
    this.controller = new AbortController();
    this.cycle = this.openCycle();
    this.childList = [];
    this.startedAt = undefined;
    this.endedAt = undefined;
    this.resolvedAt = undefined;
  }

  /** Wait until every child, including ones attached meanwhile, has resolved. */
  protected async closeChildren(): Promise<void> {
    for (;;) {
      const open = this.childList.filter((child) => !child.isResolved);
      if (open.length === 0) return;
      await Promise.all(open.map((child) => child.settled()));
    }
  }

  /** Terminate every unresolved child, then wait for the subtree to close. */
  protected async terminateChildren(reason: string): Promise<void> {
    for (const child of [...this.childList]) {
      await child.terminate(reason);
    }
    await this.closeChildren();
  }

  protected async fire(stage: Stage, extra: readonly unknown[] = []): Promise<void> {
    const failures = await this.callbacks.fire(stage, this, extra);
    this.callbackErrors.push(...failures);
  }

  private async run(): Promise<void> {
    if (this.state !== "pending" || this.isCancelled()) return;
    this.state = "running";
    this.startedAt = Date.now();
    log.debug(`${this.label} started`, { id: this.id });
    this.onStart();
    await this.fire(LIFECYCLE_STAGES[this.kind].start);
    if (this.isCancelled()) return;

    let body: BodyOutcome<R>;
    try {
      body = { ok: true, value: await this.withTimeout(this.execute()) };
    } catch (err) {
      if (this.isCancelled()) return;
      // A child's signal re-raised through join() is a fault of this node.
      if (err instanceof TerminationSignal && (err.nodeId === undefined || err.nodeId === this.id)) {
        await this.terminate(err.message);
        return;
      }
      if (err instanceof ExecutionFault && err.code === "TIMEOUT" && err.nodeId === this.id) {
        await this.terminateChildren(err.message);
        if (this.isCancelled()) return;
      }
      body = { ok: false, error: err };
    }
    if (this.isCancelled()) return;

    await this.closeChildren();
    if (this.isCancelled()) return;

    if (body.ok && this.propagate) {
      const failed = this.childList.find((child) => child.status === "failed");
      if (failed) {
        body = {
          ok: false,
          error: new ExecutionFault(this, `child ${failed.label} failed: ${failed.error?.message ?? "unknown error"}`, {
            cause: failed.error,
          }),
        };
      }
    }

    this.endedAt = Date.now();
    if (body.ok) {
      this.state = "completed";
      this.outcome = { status: "completed", result: body.value };
      log.debug(`${this.label} completed`, { id: this.id });
      await this.fire(LIFECYCLE_STAGES[this.kind].end);
    } else {
      const fault = ExecutionFault.from(body.error, this);
      this.state = "failed";
      this.outcome = { status: "failed", error: fault };
      log.warn(`${this.label} failed`, { id: this.id, error: fault.message });
      await this.fire("exception", [fault]);
    }
    this.settle();
  }

  private async withTimeout(work: Promise<R>): Promise<R> {
    if (this.timeoutMs <= 0) return work;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const fault = new ExecutionFault(this, `${this.label} timed out after ${this.timeoutMs}ms`, { code: "TIMEOUT" });
        reject(fault);
        this.controller.abort(fault);
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private settle(): void {
    const outcome = this.outcome;
    if (!outcome) return;
    this.resolved = true;
    this.resolvedAt = performance.now();
    this.cycles.push(outcome);
    if (this.historyLimit > 0 && this.cycles.length > this.historyLimit) {
      this.cycles.splice(0, this.cycles.length - this.historyLimit);
    }
    log.debug(`${this.label} resolved`, { id: this.id, status: outcome.status });
    this.cycle.release();
    this.afterSettle();
  }

  private openCycle(): Cycle<R> {
    let release = (): void => undefined;
    const promise = new Promise<NodeOutcome<R>>((resolve) => {
      release = () => {
        if (this.outcome) resolve(this.outcome);
      };
    });
    return { promise, release };
  }
}
