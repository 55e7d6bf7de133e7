import { z } from "zod";
import type { Commander } from "./commander.js";
import { SchedulerError, ValidationError } from "./errors.js";
import type { CallbackFn } from "./tree/callbacks.js";
import { STAGES } from "./tree/types.js";
import { LOG_LEVELS } from "./utils/logger.js";

/** Parse `value` or throw; the message lists every issue as `path: message`. */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label: string,
  toError: (message: string) => SchedulerError = (message) => new ValidationError("VALIDATION_FAILED", message),
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw toError(`Invalid ${label}: ${msg}`);
  }
  return result.data;
}

const isFunction = (v: unknown): boolean => typeof v === "function";

export const CallbackSpecSchema = z
  .object({
    stage: z.enum(STAGES),
    fn: z.custom<CallbackFn>(isFunction, "callback must be a function"),
    args: z.array(z.unknown()).default([]),
    kwargs: z.record(z.unknown()).default({}),
    injectNode: z.boolean().default(false),
  })
  .strict();

const durationMs = z.number().int().nonnegative();

export const ConfigOverridesSchema = z
  .object({
    faults: z.object({ propagate: z.boolean(), rejectOnFailure: z.boolean() }).partial().strict(),
    timeouts: z.object({ job: durationMs, handler: durationMs }).partial().strict(),
    handlers: z
      .object({
        reusable: z.boolean(),
        retries: z.number().int().nonnegative(),
        historyLimit: z.number().int().nonnegative(),
      })
      .partial()
      .strict(),
    retry: z.object({ baseDelayMs: durationMs, maxDelayMs: durationMs }).partial().strict(),
    logging: z.object({ level: z.enum(LOG_LEVELS) }).partial().strict(),
  })
  .partial()
  .strict();

export type FlowSetup = (commander: Commander) => void | Promise<void>;

export const FlowModuleSchema = z.object({
  default: z.custom<FlowSetup>(isFunction, "flow module must default-export a function"),
});
