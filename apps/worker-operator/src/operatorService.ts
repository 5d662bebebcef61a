import { hostname } from 'os';
import type { OperatorContext } from './context.js';
import { LOKI_PORT, LOKI_SERVICE_NAME } from './lib/lokiWorkload.js';
import { resolveFqdn, systemResolver, type HostResolver } from './lib/platform/fqdn.js';
import { parseTrigger } from './lib/triggers.js';
import { createWorkerOperator, type TriggerOutcome } from './lib/workerOperator.js';

export interface OperatorServiceOptions {
  resolver?: HostResolver;
}

export async function runOperatorService(
  context: OperatorContext,
  options: OperatorServiceOptions = {},
): Promise<TriggerOutcome> {
  const { envContext, diagnosticContext, platform } = context;
  const { config } = envContext;
  const logger = diagnosticContext.logger;

  const trigger = parseTrigger(config.JUJU_DISPATCH_PATH, {
    containerName: LOKI_SERVICE_NAME,
    relationId: config.JUJU_RELATION_ID,
  });

  const fqdn =
    config.UNIT_FQDN ?? (await resolveFqdn(hostname(), options.resolver ?? systemResolver, logger));

  const operator = createWorkerOperator({
    platform,
    clusterEndpoint: config.CLUSTER_ENDPOINT,
    unitAddress: `http://${fqdn}:${LOKI_PORT}`,
    logger,
  });

  logger.debug('Dispatching trigger', { dispatchPath: config.JUJU_DISPATCH_PATH });
  return operator.dispatch(trigger);
}
