import { TB } from '@loki-worker/service-framework-node/typebox';

export const ResponseEnvelopeSchema = TB.Object({
  type: TB.Union([TB.Literal('sync'), TB.Literal('async'), TB.Literal('error')]),
  'status-code': TB.Integer(),
  status: TB.Optional(TB.String()),
  result: TB.Unknown(),
  change: TB.Optional(TB.String()),
});
export type ResponseEnvelope = TB.Static<typeof ResponseEnvelopeSchema>;

export const ErrorResultSchema = TB.Object({
  message: TB.String(),
  kind: TB.Optional(TB.String()),
});

export const SystemInfoSchema = TB.Object({
  version: TB.String(),
  'boot-id': TB.Optional(TB.String()),
});
export type SystemInfo = TB.Static<typeof SystemInfoSchema>;

export const ServiceInfoSchema = TB.Object({
  name: TB.String(),
  startup: TB.Union([TB.Literal('enabled'), TB.Literal('disabled'), TB.Literal('')]),
  current: TB.Union([
    TB.Literal('active'),
    TB.Literal('inactive'),
    TB.Literal('error'),
    TB.Literal('backoff'),
  ]),
});
export type ServiceInfo = TB.Static<typeof ServiceInfoSchema>;

export const TaskSchema = TB.Object({
  id: TB.String(),
  kind: TB.String(),
  summary: TB.String(),
  status: TB.String(),
  log: TB.Optional(TB.Array(TB.String())),
  data: TB.Optional(TB.Record(TB.String(), TB.Unknown())),
});

export const ChangeSchema = TB.Object({
  id: TB.String(),
  kind: TB.String(),
  summary: TB.String(),
  status: TB.String(),
  ready: TB.Boolean(),
  err: TB.Optional(TB.String()),
  tasks: TB.Optional(TB.Array(TaskSchema)),
});
export type Change = TB.Static<typeof ChangeSchema>;

export const AsyncExecResultSchema = TB.Object({
  'task-id': TB.String(),
});

export const FileResultSchema = TB.Array(
  TB.Object({
    path: TB.String(),
    error: TB.Optional(ErrorResultSchema),
  }),
);

export const FileInfoSchema = TB.Object({
  path: TB.String(),
  name: TB.String(),
  type: TB.String(),
  size: TB.Optional(TB.Integer()),
  permissions: TB.String(),
  'last-modified': TB.String(),
});
export type FileInfo = TB.Static<typeof FileInfoSchema>;

const OverrideSchema = TB.Union([TB.Literal('merge'), TB.Literal('replace')]);

export const ServiceDefinitionSchema = TB.Object({
  override: TB.Optional(OverrideSchema),
  summary: TB.Optional(TB.String()),
  description: TB.Optional(TB.String()),
  command: TB.Optional(TB.String()),
  startup: TB.Optional(TB.Union([TB.Literal('enabled'), TB.Literal('disabled')])),
  environment: TB.Optional(TB.Record(TB.String(), TB.String())),
  user: TB.Optional(TB.String()),
  group: TB.Optional(TB.String()),
  'working-dir': TB.Optional(TB.String()),
  after: TB.Optional(TB.Array(TB.String())),
  before: TB.Optional(TB.Array(TB.String())),
  requires: TB.Optional(TB.Array(TB.String())),
});
export type ServiceDefinition = TB.Static<typeof ServiceDefinitionSchema>;

export const LogTargetDefinitionSchema = TB.Object({
  override: TB.Optional(OverrideSchema),
  type: TB.Optional(TB.String()),
  location: TB.Optional(TB.String()),
  services: TB.Optional(TB.Array(TB.String())),
  labels: TB.Optional(TB.Record(TB.String(), TB.String())),
});
export type LogTargetDefinition = TB.Static<typeof LogTargetDefinitionSchema>;

export const LayerSchema = TB.Object({
  summary: TB.Optional(TB.String()),
  description: TB.Optional(TB.String()),
  services: TB.Optional(TB.Record(TB.String(), ServiceDefinitionSchema)),
  'log-targets': TB.Optional(TB.Record(TB.String(), LogTargetDefinitionSchema)),
  checks: TB.Optional(TB.Record(TB.String(), TB.Unknown())),
});
export type Layer = TB.Static<typeof LayerSchema>;

export interface Plan {
  services: Record<string, ServiceDefinition>;
  'log-targets': Record<string, LogTargetDefinition>;
  checks: Record<string, unknown>;
}

export interface PebbleClientConfig {
  /** Unix socket of the Pebble daemon. Without it requests go through undici's global dispatcher. */
  socketPath?: string;
  baseUrl?: string;
  changeTimeoutMs?: number;
}

export interface AddLayerOptions {
  combine?: boolean;
}

export interface PushOptions {
  makeDirs?: boolean;
  permissions?: string;
}

export interface RemovePathOptions {
  recursive?: boolean;
}

export interface ListFilesOptions {
  itself?: boolean;
}

export interface ExecOptions {
  environment?: Record<string, string>;
  workingDir?: string;
  timeoutMs?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}
