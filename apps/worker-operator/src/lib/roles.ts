import { TB } from '@loki-worker/service-framework-node/typebox';

/** Meta roles of the simple scalable deployment mode. */
export const RoleSchema = TB.Union([
  TB.Literal('read'),
  TB.Literal('write'),
  TB.Literal('backend'),
  TB.Literal('all'),
]);
export type Role = TB.Static<typeof RoleSchema>;

export const WorkerConfigSchema = TB.Object({
  'role-read': TB.Boolean({ default: false }),
  'role-write': TB.Boolean({ default: false }),
  'role-backend': TB.Boolean({ default: false }),
  'role-all': TB.Boolean({ default: false }),
});
export type WorkerConfig = TB.Static<typeof WorkerConfigSchema>;

const ROLE_CONFIG_KEYS = {
  read: 'role-read',
  write: 'role-write',
  backend: 'role-backend',
  all: 'role-all',
} as const satisfies Record<Role, keyof WorkerConfig>;

const ROLES: readonly Role[] = ['read', 'write', 'backend', 'all'];

export function rolesFromConfig(config: WorkerConfig): Role[] {
  return ROLES.filter((role) => config[ROLE_CONFIG_KEYS[role]]);
}
