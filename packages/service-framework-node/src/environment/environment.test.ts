import { Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';
import { createEnvContext, createEnvParser } from './environment.js';
import { DefaultEnvSchemaType } from './types.js';

describe('createEnvParser', () => {
  describe('parse', () => {
    it('parses valid env configuration', () => {
      const schema = Type.Object({
        WORKER_PORT: Type.Integer(),
        PEBBLE_SOCKET_PATH: Type.String(),
      });

      const config = createEnvParser().parse(schema, {
        source: {
          WORKER_PORT: '3100',
          PEBBLE_SOCKET_PATH: '/charm/containers/loki/pebble.socket',
        },
      });

      expect(config).toEqual({
        WORKER_PORT: 3100,
        PEBBLE_SOCKET_PATH: '/charm/containers/loki/pebble.socket',
      });
    });

    it('applies default values', () => {
      const schema = Type.Object({
        CLUSTER_ENDPOINT: Type.String({ default: 'loki-cluster' }),
        WORKER_PORT: Type.Integer({ default: 3100 }),
      });

      const config = createEnvParser().parse(schema, { source: {} });

      expect(config).toEqual({ CLUSTER_ENDPOINT: 'loki-cluster', WORKER_PORT: 3100 });
    });

    it('treats empty strings as unset', () => {
      const schema = Type.Object({
        CLUSTER_ENDPOINT: Type.String({ default: 'loki-cluster' }),
      });

      const config = createEnvParser().parse(schema, { source: { CLUSTER_ENDPOINT: '' } });

      expect(config.CLUSTER_ENDPOINT).toBe('loki-cluster');
    });

    it('coerces strings to booleans', () => {
      const schema = Type.Object({
        ENABLED: Type.Boolean(),
        DEBUG: Type.Boolean(),
      });

      const config = createEnvParser().parse(schema, {
        source: { ENABLED: 'yes', DEBUG: 'off' },
      });

      expect(config).toEqual({ ENABLED: true, DEBUG: false });
    });

    it('leaves optional values undefined', () => {
      const schema = Type.Object({
        JUJU_UNIT_NAME: Type.String(),
        JUJU_RELATION_ID: Type.Optional(Type.String()),
      });

      const config = createEnvParser().parse(schema, {
        source: { JUJU_UNIT_NAME: 'loki-worker/0' },
      });

      expect(config.JUJU_UNIT_NAME).toBe('loki-worker/0');
      expect(config.JUJU_RELATION_ID).toBeUndefined();
    });

    it('throws for a missing required variable', () => {
      const schema = Type.Object({
        JUJU_UNIT_NAME: Type.String(),
      });

      expect(() => createEnvParser().parse(schema, { source: {} })).toThrow(
        'Configuration validation failed',
      );
    });

    it('reports the variable that failed coercion', () => {
      const schema = Type.Object({
        WORKER_PORT: Type.Integer(),
      });

      expect(() =>
        createEnvParser().parse(schema, { source: { WORKER_PORT: 'not-a-port' } }),
      ).toThrow('WORKER_PORT');
    });

    it('rejects values outside a literal union', () => {
      const schema = Type.Object({
        LOG_FORMAT: Type.Union([Type.Literal('json'), Type.Literal('human')]),
      });

      expect(() =>
        createEnvParser().parse(schema, { source: { LOG_FORMAT: 'xml' } }),
      ).toThrow('Configuration validation failed');
    });

    it('redacts sensitive values in error messages', () => {
      const schema = Type.Object({
        API_TOKEN: Type.Integer(),
      });

      expect(() =>
        createEnvParser().parse(schema, { source: { API_TOKEN: 'test-secret' } }),
      ).toThrow('received "[REDACTED]"');
    });

    it('parses JSON strings for object types', () => {
      const schema = Type.Object({
        LABELS: Type.Object({ team: Type.String() }),
      });

      const config = createEnvParser().parse(schema, {
        source: { LABELS: '{"team":"observability"}' },
      });

      expect(config.LABELS).toEqual({ team: 'observability' });
    });
  });

  describe('validate', () => {
    it('returns validation errors without throwing', () => {
      const schema = Type.Object({
        WORKER_PORT: Type.Integer(),
        JUJU_UNIT_NAME: Type.String(),
      });

      const result = createEnvParser().validate(schema, { WORKER_PORT: 'invalid' });

      expect(result.errors?.map((error) => error.path)).toEqual(
        expect.arrayContaining(['WORKER_PORT', 'JUJU_UNIT_NAME']),
      );
    });

    it('returns no errors for a valid configuration', () => {
      const schema = Type.Object({
        WORKER_PORT: Type.Integer(),
      });

      const result = createEnvParser().validate(schema, { WORKER_PORT: 3100 });

      expect(result.errors).toBeUndefined();
      expect(result.config.WORKER_PORT).toBe(3100);
    });
  });
});

describe('createEnvContext', () => {
  it('creates env context with parsed config', () => {
    const schema = Type.Composite([
      DefaultEnvSchemaType,
      Type.Object({ WORKER_PORT: Type.Integer({ default: 3100 }) }),
    ]);

    const context = createEnvContext(schema, {
      source: {
        PROCESS_NAME: 'loki-worker-operator',
        NODE_ENV: 'production',
        LOG_LEVEL: 'debug',
      },
    });

    expect(context.config.PROCESS_NAME).toBe('loki-worker-operator');
    expect(context.config.LOG_LEVEL).toBe('debug');
    expect(context.config.WORKER_PORT).toBe(3100);
    expect(context.nodeEnv).toBe('production');
  });

  it('defaults the node environment to development', () => {
    const context = createEnvContext(DefaultEnvSchemaType, { source: {} });

    expect(context.config.PROCESS_NAME).toBe('operator');
    expect(context.nodeEnv).toBe('development');
  });

  it('takes the node environment default from the schema', () => {
    const schema = Type.Composite([
      DefaultEnvSchemaType,
      Type.Object({ NODE_ENV: Type.String({ default: 'production' }) }),
    ]);

    const context = createEnvContext(schema, { source: {} });

    expect(context.config.NODE_ENV).toBe('production');
    expect(context.nodeEnv).toBe('production');
  });

  it('requires a process name', () => {
    const schema = Type.Object({
      WORKER_PORT: Type.Integer({ default: 3100 }),
    });

    expect(() => createEnvContext(schema, { source: {} })).toThrow('PROCESS_NAME');
  });
});
