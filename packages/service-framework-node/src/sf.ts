export * from './diagnostics/diagnostics.js';
export type * from './diagnostics/types.js';
export { createEnvContext } from './environment/environment.js';
export { DefaultEnvSchemaType, LogFormatSchema, LogSeveritySchema } from './environment/types.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  DefaultEnvSchema,
  EnvContext,
  EnvParserConfig,
  EnvSource,
} from './environment/types.js';
export { runProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessRunFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './processLifecycle/types.js';
