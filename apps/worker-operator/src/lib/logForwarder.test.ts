import { createMockLogger } from '@loki-worker/service-framework-node/test';
import { describe, expect, it } from 'vitest';
import { createFakeContainer } from '../test/fakePlatform.js';
import { LOG_FORWARDING_LAYER, createLogForwarder } from './logForwarder.js';

const labels = {
  product: 'Juju',
  charm: 'loki-worker-k8s',
  juju_model: 'test-model',
  juju_model_uuid: '3f2b8c4e-0000-4000-8000-000000000001',
  juju_unit: 'loki-worker/0',
  juju_application: 'loki-worker',
};

function setup(reachable = true) {
  const logger = createMockLogger();
  const fake = createFakeContainer({ reachable });
  const forwarder = createLogForwarder({
    container: fake.container,
    topology: {
      model: 'test-model',
      modelUuid: '3f2b8c4e-0000-4000-8000-000000000001',
      application: 'loki-worker',
      unit: 'loki-worker/0',
    },
    logger,
  });
  return { logger, fake, forwarder };
}

describe('createLogForwarder', () => {
  it('adds a loki log target per endpoint', async () => {
    const { fake, forwarder } = setup();

    await forwarder.update({ 'loki-0': 'http://loki-0.test:3100/loki/api/v1/push' });

    expect(fake.layers).toEqual([
      {
        label: LOG_FORWARDING_LAYER,
        layer: {
          'log-targets': {
            'loki-0': {
              override: 'replace',
              type: 'loki',
              location: 'http://loki-0.test:3100/loki/api/v1/push',
              services: ['all'],
              labels,
            },
          },
        },
      },
    ]);
  });

  it('disables targets whose endpoint went away', async () => {
    const { fake, forwarder } = setup();
    await forwarder.update({ 'loki-0': 'http://loki-0.test:3100/loki/api/v1/push' });

    await forwarder.update({ 'loki-1': 'http://loki-1.test:3100/loki/api/v1/push' });

    expect(fake.layers[1]?.layer['log-targets']).toEqual({
      'loki-0': { override: 'merge', services: ['-all'] },
      'loki-1': {
        override: 'replace',
        type: 'loki',
        location: 'http://loki-1.test:3100/loki/api/v1/push',
        services: ['all'],
        labels,
      },
    });
    expect(fake.plan['log-targets']['loki-0']?.services).toEqual(['-all']);
  });

  it('disables every planned target', async () => {
    const { fake, forwarder } = setup();
    await forwarder.update({
      'loki-0': 'http://loki-0.test:3100/loki/api/v1/push',
      'loki-1': 'http://loki-1.test:3100/loki/api/v1/push',
    });

    await forwarder.disable();

    expect(fake.layers[1]?.layer['log-targets']).toEqual({
      'loki-0': { override: 'merge', services: ['-all'] },
      'loki-1': { override: 'merge', services: ['-all'] },
    });
  });

  it('warns and changes nothing without endpoints', async () => {
    const { fake, forwarder, logger } = setup();

    await forwarder.update({});

    expect(logger.warn).toHaveBeenCalledWith('No Loki endpoints available');
    expect(fake.layers).toEqual([]);
  });

  it('skips an unreachable container', async () => {
    const { fake, forwarder } = setup(false);

    await forwarder.update({ 'loki-0': 'http://loki-0.test:3100/loki/api/v1/push' });

    expect(fake.layers).toEqual([]);
  });
});
