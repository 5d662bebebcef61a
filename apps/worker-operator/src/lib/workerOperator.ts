import type { SF } from '@loki-worker/service-framework-node';
import {
  createClusterRequirer,
  loadClusterRelation,
  type ClusterEvent,
  type ClusterRequirer,
} from './clusterRequirer.js';
import { createLogForwarder, type LogForwarder } from './logForwarder.js';
import { LOKI_PORT, createLokiWorkload, type LokiWorkload } from './lokiWorkload.js';
import type { OperatorPlatform, UnitStatus } from './platform/types.js';
import { rolesFromConfig, type Role } from './roles.js';
import { aggregateStatus, collectStatuses } from './status.js';
import { describeTrigger, type Trigger } from './triggers.js';

export interface WorkerOperatorContext {
  platform: OperatorPlatform;
  clusterEndpoint: string;
  /** Address published to the coordinator, e.g. `http://<fqdn>:3100`. */
  unitAddress: string;
  logger: SF.Logger;
}

export interface TriggerOutcome {
  trigger: Trigger;
  events: ClusterEvent[];
  status: UnitStatus;
}

interface TriggerScope {
  roles: Role[];
  isLeader: boolean;
  cluster: ClusterRequirer;
  workload: LokiWorkload;
  logForwarder: LogForwarder;
  logger: SF.Logger;
}

export const createWorkerOperator = (context: WorkerOperatorContext) => {
  const { platform, clusterEndpoint, unitAddress } = context;
  const { container, unit } = platform;

  const createScope = async (trigger: Trigger): Promise<TriggerScope> => {
    const logger = context.logger.createChild('trigger', { trigger: describeTrigger(trigger) });
    const roles = rolesFromConfig(await unit.getConfig());
    const isLeader = await unit.isLeader();
    const identity = {
      unitName: unit.unitName,
      appName: unit.appName,
      modelName: unit.modelName,
      isLeader,
    };

    const isBreakingCluster =
      trigger.type === 'relation' && trigger.kind === 'broken' && trigger.endpoint === clusterEndpoint;
    const snapshot = await loadClusterRelation(platform.relations, identity, clusterEndpoint, {
      excludeRelationId: isBreakingCluster ? trigger.relationId : undefined,
      logger,
    });

    const cluster = createClusterRequirer({
      transport: platform.relations,
      identity,
      snapshot,
      logger: logger.createChild('cluster'),
    });

    return {
      roles,
      isLeader,
      cluster,
      workload: createLokiWorkload({
        container,
        secrets: platform.secrets,
        roles,
        tracingEndpoint: cluster.getTracingEndpoint(),
        logger: logger.createChild('workload'),
      }),
      logForwarder: createLogForwarder({
        container,
        topology: {
          model: unit.modelName,
          modelUuid: unit.modelUuid,
          application: unit.appName,
          unit: unit.unitName,
        },
        logger: logger.createChild('log-forwarder'),
      }),
      logger,
    };
  };

  const updateCluster = async (scope: TriggerScope): Promise<void> => {
    await scope.cluster.publishUnitAddress(unitAddress);
    if (scope.isLeader && scope.roles.length > 0) {
      scope.logger.info('Publishing Loki roles to relation databag', { roles: scope.roles });
      await scope.cluster.publishRoles(scope.roles);
    }
  };

  const updateWorkload = async (scope: TriggerScope, config: Record<string, unknown>): Promise<void> => {
    const { workload, cluster } = scope;
    const changes = [
      await workload.updateTlsCertificates(cluster.getCertSecretIds()),
      await workload.updateConfig(config),
      await workload.setPebbleLayer(),
    ];

    if (changes.some(Boolean)) {
      await workload.restart();
    }
  };

  const handleClusterEvents = async (scope: TriggerScope, events: ClusterEvent[]): Promise<void> => {
    for (const event of events) {
      switch (event.type) {
        case 'cluster-created':
          await updateCluster(scope);
          break;
        case 'config-received':
          await updateWorkload(scope, event.config);
          break;
        case 'cluster-removed':
          await scope.logForwarder.disable();
          break;
      }
    }
  };

  const handleTrigger = async (scope: TriggerScope, trigger: Trigger): Promise<ClusterEvent[]> => {
    switch (trigger.type) {
      case 'workload-ready': {
        const version = await scope.workload.version();
        await unit.setWorkloadVersion(version ?? '');
        await updateWorkload(scope, scope.cluster.getConfig());
        return [];
      }
      case 'config-changed': {
        await updateCluster(scope);
        const config = scope.cluster.getConfig();
        if (Object.keys(config).length > 0) {
          await updateWorkload(scope, config);
        }
        return [];
      }
      case 'upgrade':
        await updateCluster(scope);
        return [];
      case 'relation': {
        if (trigger.endpoint !== clusterEndpoint) {
          return [];
        }
        if (trigger.kind === 'joined' || trigger.kind === 'changed') {
          await scope.logForwarder.update(scope.cluster.getEndpoints());
        }
        if (trigger.kind === 'departed') {
          await scope.logForwarder.disable();
        }
        const events = scope.cluster.deriveEvents(trigger);
        await handleClusterEvents(scope, events);
        return events;
      }
      case 'collect-status':
      case 'other':
        return [];
    }
  };

  return {
    /** Processes one trigger to completion and reports the resulting unit status. */
    async dispatch(trigger: Trigger): Promise<TriggerOutcome> {
      const scope = await createScope(trigger);
      scope.logger.debug('Handling trigger', { roles: scope.roles, leader: scope.isLeader });

      const events = await handleTrigger(scope, trigger);

      await unit.openPort(LOKI_PORT);

      const status = aggregateStatus(
        collectStatuses({
          containerReachable: await container.canConnect(),
          relationPresent: scope.cluster.isRelationPresent(),
          relationReady: scope.cluster.isConnected(),
          hasConfig: Object.keys(scope.cluster.getConfig()).length > 0,
          hasRoles: scope.roles.length > 0,
        }),
      );
      await unit.setStatus(status);
      scope.logger.info('Trigger handled', {
        events: events.map(({ type }) => type),
        status: status.name,
        statusMessage: status.message,
      });

      return { trigger, events, status };
    },
  };
};

export type WorkerOperator = ReturnType<typeof createWorkerOperator>;
