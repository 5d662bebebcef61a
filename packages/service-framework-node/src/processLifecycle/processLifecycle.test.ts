import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import type { DefaultEnvContext } from '../environment/types.js';
import { runProcessLifecycle } from './processLifecycle.js';

function createTestDiagnosticContext() {
  const envContext: DefaultEnvContext = {
    config: { PROCESS_NAME: 'loki-worker-operator', LOG_FORMAT: 'json' },
    nodeEnv: 'test',
  };
  return createDiagnosticContext(envContext);
}

describe('runProcessLifecycle', () => {
  let processExitSpy: MockInstance<typeof process.exit>;
  let processOnSpy: MockInstance<typeof process.on>;
  let processRemoveListenerSpy: MockInstance<typeof process.removeListener>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    processOnSpy = vi.spyOn(process, 'on');
    processRemoveListenerSpy = vi.spyOn(process, 'removeListener');
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    processExitSpy.mockRestore();
    processOnSpy.mockRestore();
    processRemoveListenerSpy.mockRestore();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    vi.useRealTimers();
  });

  it('resolves with exit code 0 after a successful run', async () => {
    const exitCode = await runProcessLifecycle(async () => ({
      diagnosticContext: createTestDiagnosticContext(),
    }));

    expect(exitCode).toBe(0);
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('registers handlers for the duration of the run and removes them afterwards', async () => {
    let registeredDuringRun: string[] = [];

    await runProcessLifecycle(async () => {
      registeredDuringRun = processOnSpy.mock.calls.map(([event]) => String(event));
      return { diagnosticContext: createTestDiagnosticContext() };
    });

    const handledEvents = ['SIGTERM', 'SIGINT', 'unhandledRejection', 'uncaughtException', 'warning'];

    expect(registeredDuringRun).toEqual(expect.arrayContaining(handledEvents));
    expect(processRemoveListenerSpy.mock.calls.map(([event]) => String(event))).toEqual(
      expect.arrayContaining(handledEvents),
    );
  });

  it('executes shutdown callbacks in registration order after the run', async () => {
    const executionOrder: string[] = [];

    await runProcessLifecycle(async (context) => {
      context.onShutdown(() => {
        executionOrder.push('first');
      });
      context.onShutdown(async () => {
        executionOrder.push('second');
      });
      executionOrder.push('run');
      return { diagnosticContext: createTestDiagnosticContext() };
    });

    expect(executionOrder).toEqual(['run', 'first', 'second']);
  });

  it('passes the registered callbacks only to this run', async () => {
    const first = vi.fn();
    const second = vi.fn();

    await runProcessLifecycle(async (context) => {
      context.onShutdown(first);
      return { diagnosticContext: createTestDiagnosticContext() };
    });
    await runProcessLifecycle(async (context) => {
      context.onShutdown(second);
      return { diagnosticContext: createTestDiagnosticContext() };
    });

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('logs a fatal entry and resolves with exit code 1 when the run throws', async () => {
    const exitCode = await runProcessLifecycle(async () => {
      throw new Error('certificate secret not found');
    });

    expect(exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleErrorSpy.mock.calls[0]?.[0])).toContain('certificate secret not found');
  });

  it('still runs shutdown callbacks when the run throws', async () => {
    const callback = vi.fn();

    await runProcessLifecycle(async (context) => {
      context.onShutdown(callback);
      throw new Error('boom');
    });

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('continues with remaining callbacks when one of them fails', async () => {
    const second = vi.fn();

    await runProcessLifecycle(async (context) => {
      context.onShutdown(() => {
        throw new Error('cleanup failed');
      });
      context.onShutdown(second);
      return { diagnosticContext: createTestDiagnosticContext() };
    });

    expect(second).toHaveBeenCalledTimes(1);
    const errorLine: unknown = JSON.parse(String(consoleErrorSpy.mock.calls[0]?.[0]));
    expect(errorLine).toMatchObject({
      message: 'cleanup failed',
      fields: { additionalMessage: 'Shutdown callback failed or timed out' },
    });
  });

  it('gives up on a callback that exceeds its timeout', async () => {
    vi.useFakeTimers();
    const after = vi.fn();

    const run = runProcessLifecycle(
      async (context) => {
        context.onShutdown(() => new Promise<void>(() => {}));
        context.onShutdown(after);
        return { diagnosticContext: createTestDiagnosticContext() };
      },
      { shutdownConfiguration: { callbackTimeout: 100, totalTimeout: 1000 } },
    );

    await vi.advanceTimersByTimeAsync(150);

    await expect(run).resolves.toBe(0);
    expect(after).toHaveBeenCalledTimes(1);
    expect(processExitSpy).not.toHaveBeenCalled();
  });
});
