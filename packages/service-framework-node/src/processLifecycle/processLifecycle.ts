import { stringifyJSONSafe } from '@loki-worker/utils';
import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import { createEnvContext } from '../environment/environment.js';
import { DefaultEnvSchemaType } from '../environment/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessRunFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 10000,
  totalTimeout: 30000,
};

/**
 * Runs one unit of work (a single dispatched trigger) inside the process
 * lifecycle: signal and crash handlers are installed for the duration of the
 * run and shutdown callbacks always execute afterwards.
 *
 * Resolves with the exit code the process should end with.
 */
export async function runProcessLifecycle(
  runFn: ProcessRunFn,
  config?: ProcessLifecycleConfig,
): Promise<number> {
  let diagnosticContext = createDiagnosticContext(createEnvContext(DefaultEnvSchemaType));

  const context = createProcessLifecycleContext(() => diagnosticContext, config);
  const unregisterSignalHandlers = context.registerSignalHandlers();

  let exitCode = 0;

  try {
    const result = await runFn({ onShutdown: context.onShutdown });
    diagnosticContext = result.diagnosticContext;
  } catch (error) {
    diagnosticContext.logger.fatal(error, 'Process run failed');
    exitCode = 1;
  } finally {
    await context.stopProcess('completed');
    unregisterSignalHandlers();
  }

  return exitCode;
}

function createProcessLifecycleContext(
  getDiagnosticContext: () => DiagnosticContext,
  { shutdownConfiguration }: ProcessLifecycleConfig = {},
): ProcessLifecycleContext & {
  registerSignalHandlers(): () => void;
  stopProcess(reason: string): Promise<void>;
} {
  const shutdownConfig = shutdownConfiguration ?? defaultShutdownConfiguration;

  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;

  const executeCallbackWithTimeout = async (
    callback: ShutdownCallback,
    timeout: number,
    logger: Logger,
  ): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Callback timeout')), timeout);
        }),
      ]);
    } catch (error) {
      logger.error(error, 'Shutdown callback failed or timed out', {
        timeout,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const stopProcess = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    const logger = getDiagnosticContext().logger;

    logger.debug('Shutdown initiated', { reason });

    const forceExitTimeout = setTimeout(() => {
      logger.fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfig.totalTimeout,
      });
      process.exit(1);
    }, shutdownConfig.totalTimeout);

    for (const callback of callbacks) {
      await executeCallbackWithTimeout(callback, shutdownConfig.callbackTimeout, logger);
    }

    clearTimeout(forceExitTimeout);

    logger.debug('Shutdown completed', { reason });
  };

  const initiateShutdown = async (reason: string, exitCode: number): Promise<void> => {
    await stopProcess(reason);
    process.exit(exitCode);
  };

  const handleUnhandledRejection = (reason: unknown, promise: Promise<unknown>): void => {
    getDiagnosticContext().logger.fatal(new Error('Unhandled promise rejection detected'), {
      reason: stringifyJSONSafe(reason),
      reasonString: String(reason),
      promise: promise.toString(),
    });

    void initiateShutdown('unhandledRejection', 1);
  };

  const handleUncaughtException = (error: Error): void => {
    getDiagnosticContext().logger.fatal(error, 'Uncaught exception detected');

    void initiateShutdown('uncaughtException', 1);
  };

  const handleWarning = (warning: Error): void => {
    getDiagnosticContext().logger.warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack,
    });
  };

  function registerSignalHandlers() {
    const sigTermHandler = () => void initiateShutdown('SIGTERM', 0);
    const sigIntHandler = () => void initiateShutdown('SIGINT', 0);

    process.on('SIGTERM', sigTermHandler);
    process.on('SIGINT', sigIntHandler);
    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('warning', handleWarning);

    return () => {
      process.removeListener('SIGTERM', sigTermHandler);
      process.removeListener('SIGINT', sigIntHandler);
      process.removeListener('unhandledRejection', handleUnhandledRejection);
      process.removeListener('uncaughtException', handleUncaughtException);
      process.removeListener('warning', handleWarning);
    };
  }

  return {
    onShutdown: (callback: ShutdownCallback): void => {
      callbacks.push(callback);
    },
    stopProcess,
    registerSignalHandlers,
  };
}
