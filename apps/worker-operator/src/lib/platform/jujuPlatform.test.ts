import { describe, expect, it, vi } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { createHookTools, type CommandRunner } from './hookTools.js';
import { createJujuRelationTransport, createJujuUnitPlatform } from './jujuPlatform.js';

function createRunner(outputs: Record<string, string>) {
  return vi.fn<CommandRunner>((tool) => Promise.resolve({ stdout: outputs[tool] ?? '', stderr: '' }));
}

describe('createJujuRelationTransport', () => {
  it('lists relations with their remote application', async () => {
    const run = createRunner({ 'relation-ids': '["loki-cluster:1"]', 'relation-list': 'loki-coordinator\n' });
    const transport = createJujuRelationTransport(createHookTools(run));

    await expect(transport.listRelations('loki-cluster')).resolves.toEqual([
      { id: 'loki-cluster:1', endpoint: 'loki-cluster', remoteApp: 'loki-coordinator' },
    ]);
  });

  it('replaces the databag, clearing stale keys but not platform keys', async () => {
    const run = createRunner({
      'relation-get': JSON.stringify({
        address: '"http://old.test:3100"',
        stale: '"1"',
        'ingress-address': '10.0.0.7',
      }),
    });
    const transport = createJujuRelationTransport(createHookTools(run));

    await transport.write('loki-cluster:1', { kind: 'unit', name: 'loki-worker/0' }, {
      address: '"http://new.test:3100"',
    });

    const setCall = run.mock.calls.find(([tool]) => tool === 'relation-set');
    expect(setCall?.[1]).toEqual(['-r', 'loki-cluster:1', '--file', '-']);
    expect(parseYaml(setCall?.[2] ?? '')).toEqual({ stale: '', address: '"http://new.test:3100"' });
  });
});

describe('createJujuUnitPlatform', () => {
  it('derives the application name from the unit name', () => {
    const unit = createJujuUnitPlatform(createHookTools(createRunner({})), {
      unitName: 'loki-worker/3',
      modelName: 'test-model',
      modelUuid: '3f2b8c4e-0000-4000-8000-000000000001',
    });

    expect(unit.appName).toBe('loki-worker');
  });

  it('fills config defaults and drops unknown options', async () => {
    const run = createRunner({ 'config-get': '{"role-read":true,"cpu-limit":"2"}' });
    const unit = createJujuUnitPlatform(createHookTools(run), {
      unitName: 'loki-worker/0',
      modelName: 'test-model',
      modelUuid: '3f2b8c4e-0000-4000-8000-000000000001',
    });

    await expect(unit.getConfig()).resolves.toEqual({
      'role-read': true,
      'role-write': false,
      'role-backend': false,
      'role-all': false,
    });
  });

  it('rejects invalid config values', async () => {
    const run = createRunner({ 'config-get': '{"role-read":"yes"}' });
    const unit = createJujuUnitPlatform(createHookTools(run), {
      unitName: 'loki-worker/0',
      modelName: 'test-model',
      modelUuid: '3f2b8c4e-0000-4000-8000-000000000001',
    });

    await expect(unit.getConfig()).rejects.toThrow('Invalid charm configuration: /role-read');
  });

  it('sets the unit status', async () => {
    const run = createRunner({});
    const unit = createJujuUnitPlatform(createHookTools(run), {
      unitName: 'loki-worker/0',
      modelName: 'test-model',
      modelUuid: '3f2b8c4e-0000-4000-8000-000000000001',
    });

    await unit.setStatus({ name: 'waiting', message: 'Loki-Cluster relation not ready' });

    expect(run).toHaveBeenCalledWith('status-set', ['waiting', 'Loki-Cluster relation not ready']);
  });
});
