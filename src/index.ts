export { config, loadConfig, type Config, type LogLevel } from './config';
export { SapiClient, resolveSessionOptions } from './client';
export { SapiSession, joinUrl, USER_AGENT, type SessionOptions } from './lib/session';
export { logger } from './lib/logger';
export * from './lib/errors';
export { classify, type BatchResult, type Variant } from './lib/batch';
export { coerceToJson, encodeProblemJob } from './lib/serialization';
export { exceptionChain, hasInstance, isCausedBy } from './lib/exceptions';
export { Resource, type ResourceConfig } from './services/resource';
export { Solvers } from './services/solvers';
export {
  Problems,
  MAX_PROBLEM_IDS,
  hasAnswer,
  type SubmitResult,
  type CancelResult,
} from './services/problems';
export * from './types/models';
export type { JsonValue, QueryParams, PostOptions, DeleteOptions, Transport } from './types/common';
