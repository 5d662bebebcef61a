import type { DiagnosticContext } from '../diagnostics/types.js';

export type ShutdownCallback = () => Promise<void> | void;

export interface ShutdownConfiguration {
  callbackTimeout: number;
  totalTimeout: number;
}

export interface ProcessLifecycleConfig {
  shutdownConfiguration?: ShutdownConfiguration;
}

export type ProcessRunFn = (
  context: ProcessLifecycleContext,
) => Promise<{ diagnosticContext: DiagnosticContext }>;

export interface ProcessLifecycleContext {
  onShutdown(callback: ShutdownCallback): void;
}
