import type { Databag } from '@loki-worker/databag-node';
import type { Layer, Plan, ServiceInfo } from '@loki-worker/pebble-client-node';
import type { WorkerConfig } from '../roles.js';

export type Participant = { kind: 'unit'; name: string } | { kind: 'app'; name: string };

export interface RelationInfo {
  readonly id: string;
  readonly endpoint: string;
  /** Unset while the remote application is not known yet. */
  readonly remoteApp?: string;
}

export interface RelationTransport {
  listRelations(endpoint: string): Promise<RelationInfo[]>;
  read(relationId: string, participant: Participant): Promise<Databag>;
  /** Replaces the whole databag of the participant. */
  write(relationId: string, participant: Participant, databag: Databag): Promise<void>;
}

export interface SecretStore {
  getSecret(id: string): Promise<Record<string, string>>;
}

export interface ExecOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

/**
 * The workload container as the operator sees it. File operations throw
 * WorkloadPathError or WorkloadConnectionError, service operations throw
 * SupervisionError.
 */
export interface WorkloadContainer {
  readonly name: string;
  canConnect(): Promise<boolean>;
  exec(command: string[]): Promise<ExecOutput>;
  pull(path: string): Promise<string>;
  push(path: string, content: string, options?: { makeDirs?: boolean }): Promise<void>;
  removePath(path: string, options?: { recursive?: boolean }): Promise<void>;
  exists(path: string): Promise<boolean>;
  getPlan(): Promise<Plan>;
  getService(name: string): Promise<ServiceInfo | undefined>;
  start(name: string): Promise<void>;
  stop(name: string): Promise<void>;
  restart(name: string): Promise<void>;
  addLayer(label: string, layer: Layer, options?: { combine?: boolean }): Promise<void>;
}

export type UnitStatusName = 'active' | 'blocked' | 'waiting' | 'maintenance';

export interface UnitStatus {
  readonly name: UnitStatusName;
  readonly message: string;
}

export interface UnitPlatform {
  readonly unitName: string;
  readonly appName: string;
  readonly modelName: string;
  readonly modelUuid: string;
  isLeader(): Promise<boolean>;
  getConfig(): Promise<WorkerConfig>;
  setStatus(status: UnitStatus): Promise<void>;
  setWorkloadVersion(version: string): Promise<void>;
  openPort(port: number): Promise<void>;
}

export interface OperatorPlatform {
  readonly container: WorkloadContainer;
  readonly secrets: SecretStore;
  readonly relations: RelationTransport;
  readonly unit: UnitPlatform;
}
