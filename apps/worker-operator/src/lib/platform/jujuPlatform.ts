import { RESERVED_DATABAG_KEYS, type Databag } from '@loki-worker/databag-node';
import { Value } from '@sinclair/typebox/value';
import { WorkerOperatorError } from '../errors.js';
import { WorkerConfigSchema, type WorkerConfig } from '../roles.js';
import type { HookTools } from './hookTools.js';
import type {
  RelationInfo,
  RelationTransport,
  SecretStore,
  UnitPlatform,
  UnitStatus,
} from './types.js';

export function createJujuRelationTransport(tools: HookTools): RelationTransport {
  const read: RelationTransport['read'] = (relationId, participant) =>
    tools.relationGet(relationId, participant.name, participant.kind === 'app');

  return {
    async listRelations(endpoint: string): Promise<RelationInfo[]> {
      const relations: RelationInfo[] = [];
      for (const id of await tools.relationIds(endpoint)) {
        relations.push({ id, endpoint, remoteApp: await tools.relationRemoteApp(id) });
      }
      return relations;
    },

    read,

    async write(relationId, participant, databag): Promise<void> {
      const current = await read(relationId, participant);
      const update: Databag = {};
      for (const key of Object.keys(current)) {
        if (!(key in databag) && !RESERVED_DATABAG_KEYS.has(key)) {
          update[key] = '';
        }
      }
      Object.assign(update, databag);
      await tools.relationSet(relationId, update, participant.kind === 'app');
    },
  };
}

export function createJujuSecretStore(tools: HookTools): SecretStore {
  return {
    getSecret: (id) => tools.secretGet(id),
  };
}

export interface JujuUnitIdentity {
  unitName: string;
  modelName: string;
  modelUuid: string;
}

export function createJujuUnitPlatform(tools: HookTools, identity: JujuUnitIdentity): UnitPlatform {
  const appName = identity.unitName.split('/')[0] ?? identity.unitName;

  return {
    unitName: identity.unitName,
    appName,
    modelName: identity.modelName,
    modelUuid: identity.modelUuid,

    isLeader: () => tools.isLeader(),

    async getConfig(): Promise<WorkerConfig> {
      const raw = await tools.configGet();
      const config = Value.Default(WorkerConfigSchema, Value.Clean(WorkerConfigSchema, raw));
      if (!Value.Check(WorkerConfigSchema, config)) {
        const details = [...Value.Errors(WorkerConfigSchema, config)]
          .map((error) => `${error.path}: ${error.message}`)
          .join(', ');
        throw new WorkerOperatorError(`Invalid charm configuration: ${details}`);
      }
      return config;
    },

    async setStatus(status: UnitStatus): Promise<void> {
      await tools.statusSet(status.name, status.message);
    },

    async setWorkloadVersion(version: string): Promise<void> {
      await tools.applicationVersionSet(version);
    },

    async openPort(port: number): Promise<void> {
      await tools.openPort(port);
    },
  };
}
