import { defineDatabagModel } from '@loki-worker/databag-node';
import { TB } from '@loki-worker/service-framework-node/typebox';
import { RoleSchema } from './roles.js';

export const JujuTopologySchema = TB.Object({
  model: TB.String(),
  unit: TB.String(),
});
export type JujuTopology = TB.Static<typeof JujuTopologySchema>;

export const requirerUnitDataModel = defineDatabagModel({
  name: 'LokiClusterRequirerUnitData',
  schema: TB.Object({
    topology: JujuTopologySchema,
    address: TB.String(),
  }),
  aliases: { topology: 'juju_topology' },
});

export const requirerAppDataModel = defineDatabagModel({
  name: 'LokiClusterRequirerAppData',
  schema: TB.Object({
    roles: TB.Array(RoleSchema, { uniqueItems: true }),
  }),
});

const UrlMapSchema = TB.Union([TB.Record(TB.String(), TB.String()), TB.Null()]);

export const providerAppDataModel = defineDatabagModel({
  name: 'LokiClusterProviderAppData',
  schema: TB.Object({
    loki_config: TB.Record(TB.String(), TB.Unknown()),
    loki_endpoints: TB.Optional(UrlMapSchema),
    tracing_receivers: TB.Optional(UrlMapSchema),
  }),
});
export type ProviderAppData = TB.Static<typeof providerAppDataModel.schema>;

/** Raw value the coordinator publishes under `secrets`. */
export const CertSecretIdsSchema = TB.Object({
  private_key_secret_id: TB.String(),
  ca_server_cert_secret_id: TB.String(),
});
export type CertSecretIds = TB.Static<typeof CertSecretIdsSchema>;

export const CERT_SECRET_IDS_KEY = 'secrets';
