import { SF } from '@loki-worker/service-framework-node';
import { TB } from '@loki-worker/service-framework-node/typebox';

export const operatorEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ minLength: 1, default: 'loki-worker-operator' }),
  NODE_ENV: TB.String({ default: 'production' }),
  LOG_LEVEL: TB.Optional(SF.LogSeveritySchema),
  LOG_FORMAT: TB.Optional(SF.LogFormatSchema),

  // Set by the platform for every hook invocation
  JUJU_UNIT_NAME: TB.String({ minLength: 1 }),
  JUJU_MODEL_NAME: TB.String({ minLength: 1 }),
  JUJU_MODEL_UUID: TB.String({ minLength: 1 }),
  JUJU_DISPATCH_PATH: TB.String({ minLength: 1 }),
  JUJU_RELATION_ID: TB.Optional(TB.String()),

  PEBBLE_SOCKET_PATH: TB.String({ default: '/charm/containers/loki/pebble.socket' }),
  CLUSTER_ENDPOINT: TB.String({ default: 'loki-cluster' }),
  /** Defaults to the host name of the unit. */
  UNIT_FQDN: TB.Optional(TB.String({ minLength: 1 })),
});

export type OperatorEnv = TB.Static<typeof operatorEnvSchema>;
