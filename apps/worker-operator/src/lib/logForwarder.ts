import type { LogTargetDefinition } from '@loki-worker/pebble-client-node';
import type { SF } from '@loki-worker/service-framework-node';
import type { WorkloadContainer } from './platform/types.js';

export const LOG_FORWARDING_LAYER = 'log-forwarding';
const CHARM_NAME = 'loki-worker-k8s';

export interface LogTopology {
  model: string;
  modelUuid: string;
  application: string;
  unit: string;
}

export interface LogForwarderContext {
  container: WorkloadContainer;
  topology: LogTopology;
  logger: SF.Logger;
}

/**
 * Forwards the standard output of the workload services to Loki push
 * endpoints through Pebble log targets.
 */
export const createLogForwarder = (context: LogForwarderContext) => {
  const { container, topology, logger } = context;

  const activeTarget = (location: string): LogTargetDefinition => ({
    override: 'replace',
    type: 'loki',
    location,
    services: ['all'],
    labels: {
      product: 'Juju',
      charm: CHARM_NAME,
      juju_model: topology.model,
      juju_model_uuid: topology.modelUuid,
      juju_unit: topology.unit,
      juju_application: topology.application,
    },
  });

  const disabledTarget = (): LogTargetDefinition => ({
    override: 'merge',
    services: ['-all'],
  });

  const apply = async (endpoints: Record<string, string>): Promise<void> => {
    if (!(await container.canConnect())) {
      logger.debug('Skipping log forwarding update: container is not reachable');
      return;
    }

    const plan = await container.getPlan();
    const targets: Record<string, LogTargetDefinition> = {};

    for (const name of Object.keys(plan['log-targets'])) {
      if (!(name in endpoints)) {
        targets[name] = disabledTarget();
      }
    }
    for (const [name, location] of Object.entries(endpoints)) {
      targets[name] = activeTarget(location);
    }

    if (Object.keys(targets).length === 0) {
      return;
    }

    await container.addLayer(LOG_FORWARDING_LAYER, { 'log-targets': targets }, { combine: true });
    logger.debug('Updated log forwarding', { targets: Object.keys(targets) });
  };

  return {
    async update(endpoints: Record<string, string>): Promise<void> {
      if (Object.keys(endpoints).length === 0) {
        logger.warn('No Loki endpoints available');
      }
      await apply(endpoints);
    },

    async disable(): Promise<void> {
      await apply({});
    },
  };
};

export type LogForwarder = ReturnType<typeof createLogForwarder>;
