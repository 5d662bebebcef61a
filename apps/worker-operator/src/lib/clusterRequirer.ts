import { DataValidationError, type Databag } from '@loki-worker/databag-node';
import type { SF } from '@loki-worker/service-framework-node';
import { sortedUnique } from '@loki-worker/utils';
import { DatabagAccessPermissionError, HookToolError, InvalidAddressError } from './errors.js';
import {
  CERT_SECRET_IDS_KEY,
  providerAppDataModel,
  requirerAppDataModel,
  requirerUnitDataModel,
  type ProviderAppData,
} from './models.js';
import type { RelationTransport } from './platform/types.js';
import type { Role } from './roles.js';
import type { Trigger } from './triggers.js';

export interface ClusterRelation {
  readonly id: string;
  readonly remoteApp: string;
  readonly unitData: Databag;
  /** Unset when this unit may not read its own application databag (non-leader). */
  readonly appData: Databag | undefined;
  readonly remoteAppData: Databag;
}

export interface ClusterRelationSnapshot {
  /** At least one relation exists on the endpoint. */
  readonly present: boolean;
  /** The single relation, when its remote side is known and readable. */
  readonly relation: ClusterRelation | undefined;
}

export interface LocalIdentity {
  readonly unitName: string;
  readonly appName: string;
  readonly modelName: string;
  readonly isLeader: boolean;
}

export type ClusterEvent =
  | { type: 'cluster-created' }
  | { type: 'config-received'; config: Record<string, unknown> }
  | { type: 'cluster-removed' };

export interface LoadClusterRelationOptions {
  /** Relation being broken by the current trigger; it no longer counts. */
  excludeRelationId?: string;
  logger: SF.Logger;
}

/** Reads every databag the requirer interprets, once per trigger. */
export async function loadClusterRelation(
  transport: RelationTransport,
  identity: LocalIdentity,
  endpoint: string,
  { excludeRelationId, logger }: LoadClusterRelationOptions,
): Promise<ClusterRelationSnapshot> {
  const relations = (await transport.listRelations(endpoint)).filter(
    (relation) => relation.id !== excludeRelationId,
  );

  const [relation, ...others] = relations;
  if (relation === undefined) {
    return { present: false, relation: undefined };
  }
  if (others.length > 0) {
    logger.warn('More than one cluster relation found', {
      endpoint,
      relationIds: relations.map(({ id }) => id),
    });
    return { present: true, relation: undefined };
  }
  if (relation.remoteApp === undefined) {
    return { present: true, relation: undefined };
  }

  let remoteAppData: Databag;
  try {
    remoteAppData = await transport.read(relation.id, { kind: 'app', name: relation.remoteApp });
  } catch (error) {
    if (error instanceof HookToolError) {
      logger.info('Cannot read coordinator databag', { relationId: relation.id, error: error.message });
      return { present: true, relation: undefined };
    }
    throw error;
  }

  const unitData = await transport.read(relation.id, { kind: 'unit', name: identity.unitName });
  const appData = identity.isLeader
    ? await transport.read(relation.id, { kind: 'app', name: identity.appName })
    : undefined;

  return {
    present: true,
    relation: {
      id: relation.id,
      remoteApp: relation.remoteApp,
      unitData,
      appData,
      remoteAppData,
    },
  };
}

export interface ClusterRequirerContext {
  transport: RelationTransport;
  identity: LocalIdentity;
  snapshot: ClusterRelationSnapshot;
  logger: SF.Logger;
}

export const createClusterRequirer = (context: ClusterRequirerContext) => {
  const { transport, identity, logger } = context;
  let relation = context.snapshot.relation;

  const logInvalidDatabag = (error: DataValidationError) => {
    logger.info('Invalid databag contents', {
      model: error.model,
      keys: error.keys,
      errors: error.errors,
    });
  };

  const loads = (load: (databag: Databag) => unknown, databag: Databag | undefined): boolean => {
    if (databag === undefined) {
      return false;
    }
    try {
      load(databag);
      return true;
    } catch (error) {
      if (error instanceof DataValidationError) {
        logInvalidDatabag(error);
        return false;
      }
      throw error;
    }
  };

  const getProviderData = (): ProviderAppData | undefined =>
    relation ? providerAppDataModel.tryLoad(relation.remoteAppData, logInvalidDatabag) : undefined;

  const getConfig = (): Record<string, unknown> => getProviderData()?.loki_config ?? {};

  const isPublished = (): boolean =>
    relation !== undefined &&
    loads(requirerUnitDataModel.load, relation.unitData) &&
    loads(requirerAppDataModel.load, relation.appData);

  return {
    isRelationPresent: (): boolean => context.snapshot.present,

    isConnected: (): boolean => relation !== undefined,

    async publishUnitAddress(address: string): Promise<void> {
      try {
        new URL(address);
      } catch {
        throw new InvalidAddressError(address);
      }

      if (!relation) {
        return;
      }

      const unitData = requirerUnitDataModel.dump({
        topology: { model: identity.modelName, unit: identity.unitName },
        address,
      });
      await transport.write(relation.id, { kind: 'unit', name: identity.unitName }, unitData);
      relation = { ...relation, unitData };
    },

    async publishRoles(roles: Iterable<Role>): Promise<void> {
      if (!identity.isLeader) {
        throw new DatabagAccessPermissionError('only the leader unit can publish roles.');
      }
      if (!relation) {
        return;
      }

      const appData = requirerAppDataModel.dump({ roles: sortedUnique(roles) });
      await transport.write(relation.id, { kind: 'app', name: identity.appName }, appData);
      relation = { ...relation, appData };
    },

    isPublished,
    getConfig,

    getEndpoints: (): Record<string, string> => getProviderData()?.loki_endpoints ?? {},

    getTracingEndpoint: (): string | undefined =>
      getProviderData()?.tracing_receivers?.['jaeger_thrift_http'],

    getCertSecretIds: (): string | undefined => relation?.remoteAppData[CERT_SECRET_IDS_KEY],

    /** Derived events for a trigger; only relation triggers on the cluster endpoint produce any. */
    deriveEvents(trigger: Trigger): ClusterEvent[] {
      if (trigger.type !== 'relation') {
        return [];
      }

      switch (trigger.kind) {
        case 'created':
          return [{ type: 'cluster-created' }];
        case 'changed': {
          if (!relation) {
            return [];
          }
          const config = getConfig();
          if (Object.keys(config).length > 0) {
            return [{ type: 'config-received', config }];
          }
          if (isPublished()) {
            return [{ type: 'cluster-removed' }];
          }
          return [];
        }
        case 'broken':
          return [{ type: 'cluster-removed' }];
        default:
          return [];
      }
    },
  };
};

export type ClusterRequirer = ReturnType<typeof createClusterRequirer>;
