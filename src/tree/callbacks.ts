import { ValidationError } from "../errors.js";
import { CallbackSpecSchema, parseOrThrow } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { Stage } from "./types.js";

const log = createLogger("callbacks");

/**
 * Any function. Declared through a method signature so that callbacks with
 * narrower parameter types (e.g. `(node: Job) => void`) can be registered.
 */
export type CallbackFn = { bivarianceHack(...args: unknown[]): unknown }["bivarianceHack"];

export type CallbackOptions = {
  /** Positional arguments, passed first. */
  args?: unknown[];
  /** Passed as a single object after `args`, only when it has keys. */
  kwargs?: Record<string, unknown>;
  /** Append the node whose transition fired the stage. */
  injectNode?: boolean;
};

export type CallbackSpec = CallbackOptions & {
  stage: Stage;
  fn: CallbackFn;
};

export type CallbackBinding = {
  readonly stage: Stage;
  readonly fn: CallbackFn;
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;
  readonly injectNode: boolean;
};

export type CallbackFailure = {
  stage: Stage;
  error: unknown;
};

/** Per-node map from stage tag to its ordered callback bindings. */
export class CallbackRegistry {
  private readonly stages: readonly Stage[];
  private readonly owner: string;
  private readonly bindingsByStage = new Map<Stage, CallbackBinding[]>();

  constructor(stages: readonly Stage[], owner: string) {
    this.stages = stages;
    this.owner = owner;
  }

  /** Validate and append a binding. Throws `ValidationError` on malformed specs or foreign stages. */
  register(spec: CallbackSpec): CallbackBinding {
    const parsed = parseOrThrow(CallbackSpecSchema, spec, "callback");
    if (!this.stages.includes(parsed.stage)) {
      throw new ValidationError(
        "INVALID_STAGE",
        `Stage "${parsed.stage}" is not available on ${this.owner}; expected one of: ${this.stages.join(", ")}`,
      );
    }
    const binding: CallbackBinding = Object.freeze({ ...parsed });
    const list = this.bindingsByStage.get(binding.stage) ?? [];
    list.push(binding);
    this.bindingsByStage.set(binding.stage, list);
    return binding;
  }

  bindings(stage: Stage): readonly CallbackBinding[] {
    return this.bindingsByStage.get(stage) ?? [];
  }

  clear(stage?: Stage): void {
    if (stage) this.bindingsByStage.delete(stage);
    else this.bindingsByStage.clear();
  }

  /**
   * Run every binding of `stage` in registration order, awaiting returned
   * promises one at a time. A throwing callback is recorded and the rest still run.
   */
  async fire(stage: Stage, node: unknown, extra: readonly unknown[] = []): Promise<CallbackFailure[]> {
    const failures: CallbackFailure[] = [];
    for (const binding of [...this.bindings(stage)]) {
      const argv: unknown[] = [...binding.args];
      if (Object.keys(binding.kwargs).length > 0) argv.push(binding.kwargs);
      if (binding.injectNode) argv.push(node);
      argv.push(...extra);

      try {
        const out = binding.fn(...argv);
        if (isPromiseLike(out)) await out;
      } catch (err) {
        log.error(`Callback for "${stage}" on ${this.owner} threw`, {
          error: err instanceof Error ? err.message : String(err),
        });
        failures.push({ stage, error: err });
      }
    }
    return failures;
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}
