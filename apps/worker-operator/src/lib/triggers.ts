export type RelationTriggerKind = 'created' | 'joined' | 'changed' | 'departed' | 'broken';

export type Trigger =
  | { type: 'workload-ready' }
  | { type: 'config-changed' }
  | { type: 'upgrade' }
  | { type: 'relation'; kind: RelationTriggerKind; endpoint: string; relationId?: string }
  | { type: 'collect-status' }
  | { type: 'other'; name: string };

export interface TriggerSource {
  containerName: string;
  relationId?: string;
}

const RELATION_HOOK = /^(.+)-relation-(created|joined|changed|departed|broken)$/;

function isRelationTriggerKind(value: string): value is RelationTriggerKind {
  return ['created', 'joined', 'changed', 'departed', 'broken'].includes(value);
}

/** Maps the dispatch path of a hook invocation (`hooks/<name>`) to a trigger. */
export function parseTrigger(dispatchPath: string, source: TriggerSource): Trigger {
  const name = dispatchPath.split('/').pop() ?? dispatchPath;

  switch (name) {
    case `${source.containerName}-pebble-ready`:
      return { type: 'workload-ready' };
    case 'config-changed':
      return { type: 'config-changed' };
    case 'upgrade-charm':
      return { type: 'upgrade' };
    case 'update-status':
      return { type: 'collect-status' };
  }

  const match = RELATION_HOOK.exec(name);
  const endpoint = match?.[1];
  const kind = match?.[2];
  if (endpoint !== undefined && kind !== undefined && isRelationTriggerKind(kind)) {
    return { type: 'relation', kind, endpoint, relationId: source.relationId };
  }

  return { type: 'other', name };
}

export function describeTrigger(trigger: Trigger): string {
  switch (trigger.type) {
    case 'relation':
      return `${trigger.endpoint}-relation-${trigger.kind}`;
    case 'other':
      return trigger.name;
    default:
      return trigger.type;
  }
}
