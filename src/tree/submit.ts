import { InvalidEdgeError, ValidationError } from "../errors.js";
import { Handler, type HandlerFn } from "./handler.js";
import { Job, type JobBody } from "./job.js";
import type { HandlerOptions, JobOptions, NodeOwner, TaskNode } from "./types.js";

export function isTaskNode(value: unknown): value is TaskNode {
  return value instanceof Job || value instanceof Handler;
}

/** Attach an already constructed node under `parent`. */
export function submit<N extends TaskNode>(parent: NodeOwner, node: N): N {
  if (!isTaskNode(node)) {
    throw new InvalidEdgeError("INVALID_EDGE", `Cannot submit ${describe(node)} to ${parent.name}: not a job or handler`);
  }
  const target: TaskNode = node;
  switch (target.kind) {
    case "handler":
      target.enqueue(parent);
      break;
    case "job":
      if (target.parent !== null) {
        throw new InvalidEdgeError("ALREADY_SUBMITTED", `${target.label} already belongs to ${target.parent.name}`);
      }
      parent.adopt(target);
      break;
  }
  return node;
}

/** Create a job running `body(self, ...args)` and submit it under `parent`. */
export function submitJob<R, A extends unknown[]>(
  parent: NodeOwner,
  body: JobBody<R, A>,
  args: [...A],
  options: JobOptions = {},
): Job<R> {
  const job = new Job<R>((self) => body(self, ...args), {
    ...options,
    name: options.name ?? (body.name || undefined),
  });
  return submit(parent, job);
}

/**
 * Call a handler under `parent`. A plain function is wrapped in a new
 * handler built from `options`; a Handler instance is re-used with the
 * options it was constructed with, which requires it to be reusable when it
 * has been called before.
 */
export function callHandler<R, A extends unknown[]>(parent: NodeOwner, target: Handler<R, A>, args: [...A]): Handler<R, A>;
export function callHandler<R, A extends unknown[]>(
  parent: NodeOwner,
  target: HandlerFn<R, A>,
  args: [...A],
  options?: HandlerOptions,
): Handler<R, A>;
export function callHandler<R, A extends unknown[]>(
  parent: NodeOwner,
  target: Handler<R, A> | HandlerFn<R, A>,
  args: [...A],
  options?: HandlerOptions,
): Handler<R, A> {
  let handler: Handler<R, A>;
  if (target instanceof Handler) {
    if (options !== undefined) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Options for ${target.label} are set when it is constructed, not when it is called`,
      );
    }
    handler = target;
  } else if (typeof target === "function") {
    handler = new Handler(target, options);
  } else {
    throw new InvalidEdgeError("INVALID_EDGE", `Cannot call ${describe(target)}: not a handler or function`);
  }
  handler.enqueue(parent, args);
  return handler;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}
