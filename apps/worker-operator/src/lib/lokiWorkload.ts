import type { Layer, ServiceDefinition } from '@loki-worker/pebble-client-node';
import type { SF } from '@loki-worker/service-framework-node';
import { sortedUnique } from '@loki-worker/utils';
import { Value } from '@sinclair/typebox/value';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  CertificateUnavailableError,
  SupervisionError,
  WorkloadConnectionError,
  WorkloadPathError,
} from './errors.js';
import { CertSecretIdsSchema, type CertSecretIds } from './models.js';
import type { SecretStore, WorkloadContainer } from './platform/types.js';
import type { Role } from './roles.js';

export const LOKI_SERVICE_NAME = 'loki';
export const LOKI_PORT = 3100;
export const LOKI_BINARY = '/bin/loki';
export const LOKI_CONFIG_FILE = '/etc/loki/loki-config.yaml';
export const LOKI_CERT_FILE = '/etc/loki/server.cert';
export const LOKI_KEY_FILE = '/etc/loki/private.key';
export const LOKI_CLIENT_CA_FILE = '/etc/loki/ca.cert';
export const TRUSTED_CA_FILE = '/usr/local/share/ca-certificates/ca.crt';

const CERTIFICATE_FILES = [LOKI_CERT_FILE, LOKI_KEY_FILE, LOKI_CLIENT_CA_FILE, TRUSTED_CA_FILE];
const VERSION_PATTERN = /version:?\s*(\S+)/i;

interface CertificateMaterial {
  privateKey: string;
  caCert: string;
  serverCert: string;
}

export interface LokiWorkloadContext {
  container: WorkloadContainer;
  secrets: SecretStore;
  roles: readonly Role[];
  /** Jaeger thrift-over-HTTP receiver of the coordinator, if tracing is enabled. */
  tracingEndpoint?: string;
  logger: SF.Logger;
}

export const createLokiWorkload = (context: LokiWorkloadContext) => {
  const { container, secrets, logger } = context;
  const roles = sortedUnique(context.roles);

  const pebbleLayer = (): Layer => {
    const service: ServiceDefinition = {
      override: 'replace',
      summary: 'loki worker daemon',
      command: `${LOKI_BINARY} --config.file=${LOKI_CONFIG_FILE} -target ${roles.join(',')} -auth.multitenancy-enabled=false`,
      startup: 'enabled',
    };

    if (context.tracingEndpoint) {
      service.environment = {
        JAEGER_ENDPOINT: `${context.tracingEndpoint}/api/traces?format=jaeger.thrift`,
        JAEGER_SAMPLER_PARAM: '1',
        JAEGER_SAMPLER_TYPE: 'const',
      };
    }

    return {
      summary: 'loki worker layer',
      description: 'pebble config layer for loki worker',
      services: { [LOKI_SERVICE_NAME]: service },
    };
  };

  const runningConfig = async (): Promise<unknown> => {
    let raw: string;
    try {
      raw = await container.pull(LOKI_CONFIG_FILE);
    } catch (error) {
      if (error instanceof WorkloadPathError || error instanceof WorkloadConnectionError) {
        logger.warn('Could not read the current Loki configuration', { error: error.message });
        return undefined;
      }
      throw error;
    }

    try {
      return parseYaml(raw);
    } catch (error) {
      logger.warn('Current Loki configuration is not valid YAML', {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  };

  const parseCertSecretIds = (raw: string): CertSecretIds => {
    let ids: unknown;
    try {
      ids = JSON.parse(raw);
    } catch (error) {
      throw new CertificateUnavailableError('certificate secret ids are not valid JSON', error);
    }
    if (!Value.Check(CertSecretIdsSchema, ids)) {
      throw new CertificateUnavailableError('certificate secret ids are incomplete');
    }
    return ids;
  };

  const getSecret = async (id: string): Promise<Record<string, string>> => {
    try {
      return await secrets.getSecret(id);
    } catch (error) {
      throw new CertificateUnavailableError(`cannot resolve certificate secret ${id}`, error);
    }
  };

  const resolveCertificates = async (rawIds: string): Promise<CertificateMaterial> => {
    const ids = parseCertSecretIds(rawIds);
    const privateKeySecret = await getSecret(ids.private_key_secret_id);
    const caServerSecret = await getSecret(ids.ca_server_cert_secret_id);

    return {
      privateKey: privateKeySecret['private-key'] ?? '',
      caCert: caServerSecret['ca-cert'] ?? '',
      serverCert: caServerSecret['server-cert'] ?? '',
    };
  };

  const refreshTrustStore = async (): Promise<void> => {
    const { exitCode, stderr } = await container.exec(['update-ca-certificates', '--fresh']);
    if (exitCode !== 0) {
      logger.warn('update-ca-certificates failed', { exitCode, stderr });
    }
  };

  return {
    roles,
    pebbleLayer,

    /** Pushes the coordinator's config when it differs from the running one. */
    async updateConfig(config: Record<string, unknown>): Promise<boolean> {
      if (!(await container.canConnect())) {
        return false;
      }
      if (Object.keys(config).length === 0) {
        logger.warn("Cannot update loki config: coordinator hasn't published one yet");
        return false;
      }

      const current = await runningConfig();
      if (current !== undefined && Value.Equal(current, config)) {
        return false;
      }

      await container.push(LOKI_CONFIG_FILE, stringifyYaml(config), { makeDirs: true });
      logger.info('Pushed new Loki configuration');
      return true;
    },

    /**
     * Writes or removes the TLS material. Removal always reports a change,
     * even when the files were already absent.
     */
    async updateTlsCertificates(certSecretIds: string | undefined): Promise<boolean> {
      if (!(await container.canConnect())) {
        return false;
      }

      if (certSecretIds) {
        const material = await resolveCertificates(certSecretIds);

        await container.push(LOKI_CERT_FILE, material.serverCert, { makeDirs: true });
        await container.push(LOKI_KEY_FILE, material.privateKey, { makeDirs: true });
        await container.push(LOKI_CLIENT_CA_FILE, material.caCert, { makeDirs: true });
        await container.push(TRUSTED_CA_FILE, material.caCert, { makeDirs: true });
        await refreshTrustStore();
        return true;
      }

      for (const path of CERTIFICATE_FILES) {
        await container.removePath(path, { recursive: true });
      }
      await refreshTrustStore();
      return true;
    },

    /** Installs the service layer when the planned services differ from it. */
    async setPebbleLayer(): Promise<boolean> {
      if (!(await container.canConnect()) || roles.length === 0) {
        return false;
      }

      const layer = pebbleLayer();
      const plan = await container.getPlan();
      if (Value.Equal(plan.services, layer.services)) {
        return false;
      }

      await container.addLayer(LOKI_SERVICE_NAME, layer, { combine: true });
      return true;
    },

    async restart(): Promise<void> {
      if (!(await container.canConnect())) {
        logger.debug('Cannot restart loki: container is not reachable');
        return;
      }
      if (!(await container.exists(LOKI_CONFIG_FILE))) {
        logger.error(
          new WorkloadPathError('not-found', LOKI_CONFIG_FILE, 'config file does not exist yet'),
          'Cannot restart loki',
        );
      }
      if (roles.length === 0) {
        logger.debug('Cannot restart loki: no roles have been configured');
        return;
      }

      try {
        const service = await container.getService(LOKI_SERVICE_NAME);
        if (service?.current === 'active') {
          await container.restart(LOKI_SERVICE_NAME);
        } else {
          await container.start(LOKI_SERVICE_NAME);
        }
      } catch (error) {
        if (error instanceof SupervisionError) {
          logger.error(error, 'Failed to (re)start loki');
          return;
        }
        throw error;
      }
    },

    async version(): Promise<string | undefined> {
      if (!(await container.canConnect())) {
        return undefined;
      }

      try {
        const { stdout, stderr, exitCode } = await container.exec([LOKI_BINARY, '-version']);
        if (exitCode !== 0) {
          logger.warn('Loki version command failed', { exitCode });
          return undefined;
        }
        // Loki, version 3.0.0 (branch: HEAD, revision 7c5ae9f)
        return VERSION_PATTERN.exec(`${stdout}\n${stderr}`)?.[1];
      } catch (error) {
        if (error instanceof WorkloadConnectionError) {
          logger.warn('Could not run the Loki version command', { error: error.message });
          return undefined;
        }
        throw error;
      }
    },
  };
};

export type LokiWorkload = ReturnType<typeof createLokiWorkload>;
