// Config
export { getConfig, configure, resetConfig, loadConfigFile, defaults } from "./config.js";
export type { SchedulerConfig, DeepPartial } from "./config.js";

// Errors
export {
  SchedulerError,
  ExecutionFault,
  TerminationSignal,
  InvalidEdgeError,
  ValidationError,
  ConfigError,
  RunFailedError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, CallbackSpecSchema, ConfigOverridesSchema, FlowModuleSchema } from "./schemas.js";
export type { FlowSetup } from "./schemas.js";

// Tree
export { CallbackRegistry } from "./tree/callbacks.js";
export type { CallbackFn, CallbackOptions, CallbackSpec, CallbackBinding, CallbackFailure } from "./tree/callbacks.js";
export { BaseNode } from "./tree/node.js";
export { Job } from "./tree/job.js";
export type { JobBody } from "./tree/job.js";
export { Handler } from "./tree/handler.js";
export type { HandlerFn } from "./tree/handler.js";
export { submit, submitJob, callHandler, isTaskNode } from "./tree/submit.js";
export { walk, snapshot, snapshotNode, formatTree } from "./tree/snapshot.js";
export type { NodeSnapshot, TreeSnapshot } from "./tree/snapshot.js";
export { STAGES, JOB_STAGES, HANDLER_STAGES, COMMANDER_STAGES, isTerminal } from "./tree/types.js";
export type {
  Stage,
  TaskNode,
  TaskNodeKind,
  NodeStatus,
  NodeOutcome,
  NodeOwner,
  NodeOptions,
  JobOptions,
  HandlerOptions,
} from "./tree/types.js";

// Commander
export { Commander } from "./commander.js";
export type { CommanderOptions, CommanderState, RunOptions, RunReport } from "./commander.js";

// Edges
export { addEdge, addConditionalEdge } from "./edges/edges.js";
export type { EdgeOptions, ConditionalEdgeOptions } from "./edges/edges.js";

// Flow
export { loadFlow, runFlow } from "./flow.js";
export type { FlowRun, FlowRunOptions } from "./flow.js";

// Utils
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { log, createLogger, setLogLevel, getLogLevel, LOG_LEVELS } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
