export * from './contracts.js';
export * from './errors.js';
export * from './labels.js';
export { createExecutor, validateChangePreExecution } from './executor.js';
export type { ApplyExecutorOptions } from './executor.js';
export { createDefaultRegistry } from './default-registry.js';
export type { DefaultRegistryOptions } from './default-registry.js';
export { AdapterRegistry, createAdapterRegistry } from './operation-registry.js';
export type { ChangeHandler, HandlerContext, HandlerResult, ResourceHandlers } from './operation-registry.js';
export { hasErrors, summarizeResult, totalChanges } from './result.js';
export { configFromEnv, executorConfigSchema, parseExecutorConfig } from './config.js';
export type { ExecutorConfig, ExecutorConfigInput } from './config.js';
export {
  MemoryTransport,
  StreamTransport,
  createLogger,
  createSilentLogger,
  formatLogEntry,
} from './logging/logger.js';
export type { LogEntry, LogLevel, LogLevelSetting, LogTransport, Logger } from './logging/logger.js';
export { ConsoleReporter } from './progress/console-reporter.js';
export type { ConsoleReporterOptions } from './progress/console-reporter.js';
export { BaseExecutor, dryRunId } from './executor/base-executor.js';
export { BaseCreateDeleteExecutor } from './executor/base-create-delete-executor.js';
export { BaseSingletonExecutor } from './executor/base-singleton-executor.js';
export { bindExecutor, buildExecutionContext } from './adapters/binding.js';
export type { BindOptions, BindableExecutor, ReferenceBinding } from './adapters/binding.js';
export {
  extractResourceName,
  mapOptionalBool,
  mapOptionalString,
  mapOptionalStringArray,
  validateRequiredFields,
} from './adapters/fields.js';
export { toResourceInfo } from './adapters/resource-info.js';
export { ReferenceResolver, ReferenceTable } from './resolver/reference-resolver.js';
export type { ReferenceLookup, ReferenceRequest } from './resolver/reference-resolver.js';
export { createClientLookup } from './resolver/client-lookup.js';
export { MemoryStateClient } from './client/memory-client.js';
export type { MemoryStateClientOptions } from './client/memory-client.js';
export type * from './client/types.js';
export { buildToolArgs, createExecaRunner, MODE_PLACEHOLDER } from './external-tool/runner.js';
export type { ExternalToolRunOptions, ExternalToolRunResult, ExternalToolRunner } from './external-tool/runner.js';
export { createGatewaySyncHandler, GatewaySyncStep } from './external-tool/gateway-sync-step.js';
export type { GatewaySyncOptions } from './external-tool/gateway-sync-step.js';
