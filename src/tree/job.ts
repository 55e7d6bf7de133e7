import { getConfig } from "../config.js";
import { InvalidEdgeError, TerminationSignal } from "../errors.js";
import { BaseNode } from "./node.js";
import { JOB_STAGES, isTerminal, type JobOptions, type NodeOwner, type TaskNode } from "./types.js";

/** Body of a job. `self` is the job itself: the parent for anything it submits. */
export type JobBody<R = unknown, A extends unknown[] = []> = (self: Job, ...args: A) => R | Promise<R>;

/**
 * A self-contained unit of work. Its body may submit child jobs and call
 * handlers under itself; the job resolves once all of them have.
 */
export class Job<R = unknown> extends BaseNode<R> implements NodeOwner {
  declare readonly kind: "job";
  private readonly body: (self: Job) => R | Promise<R>;

  constructor(body: (self: Job) => R | Promise<R>, options: JobOptions = {}) {
    super("job", JOB_STAGES, body.name, options, getConfig().timeouts.job);
    this.body = body;
  }

  adopt(node: TaskNode): void {
    if (this.isCancelled() || this.status === "terminated") {
      throw new TerminationSignal(`${this.label} was terminated; cannot attach ${node.label}`);
    }
    if (isTerminal(this.status)) {
      throw new InvalidEdgeError("NODE_CLOSED", `${this.label} has already finished; cannot attach ${node.label}`);
    }
    this.childList.push(node);
    node.bindParent(this);
    if (this.status === "running") node.schedule();
  }

  release(node: TaskNode): void {
    const idx = this.childList.indexOf(node);
    if (idx !== -1) this.childList.splice(idx, 1);
  }

  protected override onStart(): void {
    // children attached while this job was still pending
    for (const child of this.childList) child.schedule();
  }

  protected async execute(): Promise<R> {
    return this.body(this);
  }
}
