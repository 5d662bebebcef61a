import { createPebbleClient } from '@loki-worker/pebble-client-node';
import { SF } from '@loki-worker/service-framework-node';
import { operatorEnvSchema } from './environment.js';
import { createHookTools, type CommandRunner } from './lib/platform/hookTools.js';
import {
  createJujuRelationTransport,
  createJujuSecretStore,
  createJujuUnitPlatform,
} from './lib/platform/jujuPlatform.js';
import { createPebbleContainer } from './lib/platform/pebbleContainer.js';
import type { OperatorPlatform } from './lib/platform/types.js';
import { LOKI_SERVICE_NAME } from './lib/lokiWorkload.js';

export interface OperatorContextOptions {
  env?: SF.EnvSource;
  commandRunner?: CommandRunner;
}

export function createOperatorContext(
  processContext: SF.ProcessLifecycleContext,
  options: OperatorContextOptions = {},
) {
  const envContext = SF.createEnvContext(operatorEnvSchema, { source: options.env });
  const { config } = envContext;

  const diagnosticContext = SF.createDiagnosticContext(envContext, {
    defaultLoggerArgs: { unit: config.JUJU_UNIT_NAME },
  });

  const pebbleClient = createPebbleClient({ socketPath: config.PEBBLE_SOCKET_PATH });
  processContext.onShutdown(() => pebbleClient.close());

  const hookTools = createHookTools(options.commandRunner);
  const platform: OperatorPlatform = {
    container: createPebbleContainer(pebbleClient, LOKI_SERVICE_NAME),
    secrets: createJujuSecretStore(hookTools),
    relations: createJujuRelationTransport(hookTools),
    unit: createJujuUnitPlatform(hookTools, {
      unitName: config.JUJU_UNIT_NAME,
      modelName: config.JUJU_MODEL_NAME,
      modelUuid: config.JUJU_MODEL_UUID,
    }),
  };

  return {
    envContext,
    diagnosticContext,
    processContext,
    platform,
  };
}

export type OperatorContext = ReturnType<typeof createOperatorContext>;
