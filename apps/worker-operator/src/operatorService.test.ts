import {
  createMockDiagnosticsContext,
  createMockEnvContext,
  createMockProcessContext,
} from '@loki-worker/service-framework-node/test';
import { describe, expect, it, vi } from 'vitest';
import { createOperatorContext } from './context.js';
import type { OperatorEnv } from './environment.js';
import { LOKI_CONFIG_FILE } from './lib/lokiWorkload.js';
import { runOperatorService } from './operatorService.js';
import { createFakePlatform } from './test/fakePlatform.js';

const baseEnv: OperatorEnv = {
  PROCESS_NAME: 'loki-worker-operator',
  NODE_ENV: 'test',
  JUJU_UNIT_NAME: 'loki-worker/0',
  JUJU_MODEL_NAME: 'test-model',
  JUJU_MODEL_UUID: '3f2b8c4e-0000-4000-8000-000000000001',
  JUJU_DISPATCH_PATH: 'hooks/loki-cluster-relation-changed',
  JUJU_RELATION_ID: 'loki-cluster:1',
  PEBBLE_SOCKET_PATH: '/charm/containers/loki/pebble.socket',
  CLUSTER_ENDPOINT: 'loki-cluster',
  UNIT_FQDN: 'loki-worker-0.test',
};

function setup(env: Partial<OperatorEnv> = {}) {
  const fake = createFakePlatform({
    relations: [
      {
        id: 'loki-cluster:1',
        endpoint: 'loki-cluster',
        remoteApp: 'loki-coordinator',
        remoteAppData: { loki_config: JSON.stringify({ auth_enabled: false }) },
      },
    ],
    unit: { leader: true, config: { 'role-all': true } },
  });
  const context = {
    envContext: createMockEnvContext<OperatorEnv>({ ...baseEnv, ...env }),
    diagnosticContext: createMockDiagnosticsContext(),
    processContext: createMockProcessContext(),
    platform: fake.platform,
  };
  return { ...fake, context };
}

describe('runOperatorService', () => {
  it('dispatches the trigger named by the dispatch path', async () => {
    const { context, container } = setup();

    const outcome = await runOperatorService(context);

    expect(outcome.trigger).toEqual({
      type: 'relation',
      kind: 'changed',
      endpoint: 'loki-cluster',
      relationId: 'loki-cluster:1',
    });
    expect(outcome.events).toEqual([{ type: 'config-received', config: { auth_enabled: false } }]);
    expect(container.files.get(LOKI_CONFIG_FILE)).toBe('auth_enabled: false\n');
  });

  it('publishes the unit address from the configured FQDN', async () => {
    const { context, relations } = setup({ JUJU_DISPATCH_PATH: 'hooks/config-changed' });

    await runOperatorService(context);

    expect(relations.databag('loki-cluster:1', { kind: 'unit', name: 'loki-worker/0' })?.address).toBe(
      '"http://loki-worker-0.test:3100"',
    );
  });

  it('publishes the resolved FQDN when none is configured', async () => {
    const { context, relations } = setup({ JUJU_DISPATCH_PATH: 'hooks/config-changed', UNIT_FQDN: undefined });
    const resolver = {
      lookup: () => Promise.resolve({ address: '10.1.2.3' }),
      lookupService: () =>
        Promise.resolve({ hostname: 'loki-worker-0.loki-worker-endpoints.test-model.svc.cluster.local' }),
    };

    await runOperatorService(context, { resolver });

    expect(relations.databag('loki-cluster:1', { kind: 'unit', name: 'loki-worker/0' })?.address).toBe(
      '"http://loki-worker-0.loki-worker-endpoints.test-model.svc.cluster.local:3100"',
    );
  });
});

describe('createOperatorContext', () => {
  it('builds the platform from the hook environment', () => {
    const processContext = createMockProcessContext();
    const commandRunner = vi.fn();

    const context = createOperatorContext(processContext, {
      env: {
        JUJU_UNIT_NAME: 'loki-worker/2',
        JUJU_MODEL_NAME: 'test-model',
  JUJU_MODEL_UUID: '3f2b8c4e-0000-4000-8000-000000000001',
        JUJU_DISPATCH_PATH: 'hooks/update-status',
      },
      commandRunner,
    });

    expect(context.envContext.config).toMatchObject({
      PROCESS_NAME: 'loki-worker-operator',
      PEBBLE_SOCKET_PATH: '/charm/containers/loki/pebble.socket',
      CLUSTER_ENDPOINT: 'loki-cluster',
    });
    expect(context.platform.unit.appName).toBe('loki-worker');
    expect(context.platform.unit.modelUuid).toBe('3f2b8c4e-0000-4000-8000-000000000001');
    expect(context.platform.container.name).toBe('loki');
    expect(processContext.onShutdown).toHaveBeenCalledTimes(1);
    expect(commandRunner).not.toHaveBeenCalled();
  });

  it('rejects an environment without the unit name', () => {
    expect(() =>
      createOperatorContext(createMockProcessContext(), {
        env: {
          JUJU_MODEL_NAME: 'test-model',
          JUJU_MODEL_UUID: '3f2b8c4e-0000-4000-8000-000000000001',
          JUJU_DISPATCH_PATH: 'hooks/update-status',
        },
      }),
    ).toThrow('JUJU_UNIT_NAME');
  });
});
