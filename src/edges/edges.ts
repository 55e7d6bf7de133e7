import { InvalidEdgeError } from "../errors.js";
import { Handler } from "../tree/handler.js";
import { callHandler, isTaskNode, submit } from "../tree/submit.js";
import { LIFECYCLE_STAGES, type NodeOwner, type TaskNode } from "../tree/types.js";
import type { CallbackBinding } from "../tree/callbacks.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("edges");

export type EdgeOptions = {
  /** Owner of the target. Defaults to the source's parent. */
  parent?: NodeOwner;
  /** Arguments for a handler target. Defaults to `[from.result]`. */
  args?: (from: TaskNode) => unknown[];
};

export type ConditionalEdgeOptions = EdgeOptions & {
  /** Route key for a completed source. Defaults to the stringified primitive result. */
  select?: (from: TaskNode) => string | undefined;
};

/** When `from` completes, schedule `to`. */
export function addEdge(from: TaskNode, to: TaskNode, options: EdgeOptions = {}): CallbackBinding {
  assertNode(from, "source");
  assertNode(to, "target");
  return from.addCallback(LIFECYCLE_STAGES[from.kind].end, (source: TaskNode) => push(source, to, options), {
    injectNode: true,
  });
}

/**
 * When `from` completes, schedule the route whose key matches its result.
 * A key with no route schedules nothing.
 */
export function addConditionalEdge(
  from: TaskNode,
  routes: Record<string, TaskNode>,
  options: ConditionalEdgeOptions = {},
): CallbackBinding {
  assertNode(from, "source");
  for (const [key, target] of Object.entries(routes)) {
    assertNode(target, `route "${key}"`);
  }
  const select = options.select ?? defaultSelect;
  return from.addCallback(
    LIFECYCLE_STAGES[from.kind].end,
    (source: TaskNode) => {
      const key = select(source);
      if (key === undefined || !Object.hasOwn(routes, key)) {
        log.debug(`No route for ${source.label}`, { key });
        return;
      }
      push(source, routes[key], options);
    },
    { injectNode: true },
  );
}

function defaultSelect(from: TaskNode): string | undefined {
  const result = from.result;
  if (typeof result === "string" || typeof result === "number" || typeof result === "boolean") {
    return String(result);
  }
  return undefined;
}

function push(source: TaskNode, target: TaskNode, options: EdgeOptions): void {
  const parent = options.parent ?? source.parent;
  if (!parent) {
    throw new InvalidEdgeError("INVALID_EDGE", `${source.label} has no parent to schedule ${target.label} under`);
  }
  log.debug(`Edge ${source.label} -> ${target.label}`);
  if (target instanceof Handler) {
    callHandler(parent, target, options.args?.(source) ?? [source.result]);
  } else {
    submit(parent, target);
  }
}

function assertNode(value: unknown, role: string): asserts value is TaskNode {
  if (!isTaskNode(value)) {
    throw new InvalidEdgeError("INVALID_EDGE", `Edge ${role} is not a job or handler`);
  }
}
