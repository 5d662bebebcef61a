import type { UnitStatus } from './platform/types.js';

export interface StatusInputs {
  containerReachable: boolean;
  /** At least one relation on the cluster endpoint exists. */
  relationPresent: boolean;
  /** The relation has a known remote application whose data could be read. */
  relationReady: boolean;
  hasConfig: boolean;
  hasRoles: boolean;
}

export const ACTIVE_STATUS: UnitStatus = { name: 'active', message: '' };

/** Every applicable status, most important first, always ending in active. */
export function collectStatuses(inputs: StatusInputs): UnitStatus[] {
  const statuses: UnitStatus[] = [];

  if (!inputs.containerReachable) {
    statuses.push({ name: 'waiting', message: 'Waiting for `loki` container' });
  }
  if (!inputs.relationPresent) {
    statuses.push({
      name: 'blocked',
      message: 'Missing loki-cluster relation to a loki-coordinator charm',
    });
  } else if (!inputs.relationReady) {
    statuses.push({ name: 'waiting', message: 'Loki-Cluster relation not ready' });
  }
  if (!inputs.hasConfig) {
    statuses.push({ name: 'waiting', message: 'Waiting for coordinator to publish a loki config' });
  }
  if (!inputs.hasRoles) {
    statuses.push({ name: 'blocked', message: 'No roles assigned: please configure some roles' });
  }
  statuses.push(ACTIVE_STATUS);

  return statuses;
}

/** Blocked outranks waiting; within a severity the earlier entry wins. */
export function aggregateStatus(statuses: readonly UnitStatus[]): UnitStatus {
  return (
    statuses.find((status) => status.name === 'blocked') ??
    statuses.find((status) => status.name === 'waiting') ??
    ACTIVE_STATUS
  );
}
