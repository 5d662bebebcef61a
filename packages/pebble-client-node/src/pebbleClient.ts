import { TB } from '@loki-worker/service-framework-node/typebox';
import { Value } from '@sinclair/typebox/value';
import { Agent, FormData, fetch, getGlobalDispatcher, request, type Dispatcher } from 'undici';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  PebbleAPIError,
  PebbleChangeError,
  PebbleConnectionError,
  PebblePathError,
  PebbleProtocolError,
} from './errors.js';
import { connectTaskWebSocket } from './taskWebSocket.js';
import {
  AsyncExecResultSchema,
  ChangeSchema,
  ErrorResultSchema,
  FileInfoSchema,
  FileResultSchema,
  LayerSchema,
  ResponseEnvelopeSchema,
  ServiceInfoSchema,
  SystemInfoSchema,
  type AddLayerOptions,
  type Change,
  type ExecOptions,
  type ExecResult,
  type FileInfo,
  type Layer,
  type ListFilesOptions,
  type PebbleClientConfig,
  type Plan,
  type PushOptions,
  type RemovePathOptions,
  type ResponseEnvelope,
  type ServiceInfo,
  type SystemInfo,
} from './types.js';

type HttpMethod = 'GET' | 'POST';
type ServiceAction = 'start' | 'stop' | 'restart';

interface SendOptions {
  query?: Record<string, string>;
  body?: unknown;
}

const DEFAULT_BASE_URL = 'http://localhost';
const DEFAULT_CHANGE_TIMEOUT_MS = 30_000;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function checkResult<T extends TB.TSchema>(schema: T, value: unknown, context: string): TB.Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const errors = [...Value.Errors(schema, value)].map((error) => ({
    path: error.path,
    message: error.message,
  }));
  throw new PebbleProtocolError(`Invalid ${context} result`, errors);
}

function parseEnvelope(statusCode: number, payload: unknown, context: string): ResponseEnvelope {
  if (!Value.Check(ResponseEnvelopeSchema, payload)) {
    if (statusCode < 200 || statusCode >= 300) {
      throw new PebbleAPIError(`${context} failed with status ${statusCode}`, statusCode);
    }
    throw new PebbleProtocolError(`Unexpected response to ${context}`, [
      ...Value.Errors(ResponseEnvelopeSchema, payload),
    ]);
  }

  if (payload.type === 'error' || statusCode < 200 || statusCode >= 300) {
    const result = payload.result;
    if (Value.Check(ErrorResultSchema, result)) {
      throw new PebbleAPIError(result.message, statusCode, payload.status, result.kind);
    }
    throw new PebbleAPIError(`${context} failed with status ${statusCode}`, statusCode, payload.status);
  }

  return payload;
}

function raiseOnPathError(result: unknown, path: string, context: string): void {
  const files = checkResult(FileResultSchema, result, context);
  const failed = files.find((file) => file.error !== undefined);
  if (failed?.error) {
    throw new PebblePathError(failed.error.kind ?? 'generic-file-error', failed.error.message, path);
  }
}

function requireChangeId(envelope: ResponseEnvelope, context: string): string {
  if (envelope.type !== 'async' || envelope.change === undefined) {
    throw new PebbleProtocolError(`Expected ${context} to start a change`);
  }
  return envelope.change;
}

const toGoDuration = (milliseconds: number): string => `${Math.ceil(milliseconds / 1000)}s`;

export const createPebbleClient = (config: PebbleClientConfig = {}) => {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const changeTimeoutMs = config.changeTimeoutMs ?? DEFAULT_CHANGE_TIMEOUT_MS;
  const agent = config.socketPath
    ? new Agent({ connect: { socketPath: config.socketPath } })
    : undefined;

  const dispatcher = (): Dispatcher => agent ?? getGlobalDispatcher();

  const buildUrl = (path: string, query?: Record<string, string>): string => {
    const search = query ? new URLSearchParams(query).toString() : '';
    return `${baseUrl}${path}${search ? `?${search}` : ''}`;
  };

  const webSocketUrl = (path: string): string =>
    config.socketPath
      ? `ws+unix://${config.socketPath}:${path}`
      : `${baseUrl.replace(/^http/, 'ws')}${path}`;

  async function send(method: HttpMethod, path: string, options: SendOptions = {}) {
    const context = `${method} ${path}`;
    let response: Dispatcher.ResponseData;
    try {
      response = await request(buildUrl(path, options.query), {
        method,
        headers: options.body === undefined ? {} : { 'Content-Type': 'application/json' },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        dispatcher: dispatcher(),
      });
    } catch (error) {
      throw new PebbleConnectionError(`Cannot reach Pebble: ${describeError(error)}`, error);
    }

    let payload: unknown;
    try {
      payload = await response.body.json();
    } catch (error) {
      throw new PebbleProtocolError(`Response to ${context} is not JSON: ${describeError(error)}`);
    }

    return parseEnvelope(response.statusCode, payload, context);
  }

  async function fetchFiles(init: { method: HttpMethod; query?: Record<string, string>; body?: FormData }) {
    try {
      return await fetch(buildUrl('/v1/files', init.query), {
        method: init.method,
        headers: { Accept: 'multipart/form-data' },
        body: init.body,
        dispatcher: dispatcher(),
      });
    } catch (error) {
      throw new PebbleConnectionError(`Cannot reach Pebble: ${describeError(error)}`, error);
    }
  }

  async function waitChange(changeId: string, timeoutMs: number = changeTimeoutMs): Promise<Change> {
    const envelope = await send('GET', `/v1/changes/${changeId}/wait`, {
      query: { timeout: toGoDuration(timeoutMs) },
    });
    return checkResult(ChangeSchema, envelope.result, 'change');
  }

  async function servicesAction(action: ServiceAction, services: string[]): Promise<Change> {
    const envelope = await send('POST', '/v1/services', { body: { action, services } });
    const change = await waitChange(requireChangeId(envelope, `${action} services`));
    if (change.err !== undefined) {
      throw new PebbleChangeError(change.err, change);
    }
    return change;
  }

  return {
    async getSystemInfo(): Promise<SystemInfo> {
      const envelope = await send('GET', '/v1/system-info');
      return checkResult(SystemInfoSchema, envelope.result, 'system-info');
    },

    async getPlan(): Promise<Plan> {
      const envelope = await send('GET', '/v1/plan', { query: { format: 'yaml' } });
      const yaml = checkResult(TB.String(), envelope.result, 'plan');
      let document: unknown;
      try {
        document = parseYaml(yaml);
      } catch (error) {
        throw new PebbleProtocolError(`Plan is not valid YAML: ${describeError(error)}`);
      }
      const layer = checkResult(LayerSchema, document ?? {}, 'plan');
      return {
        services: layer.services ?? {},
        'log-targets': layer['log-targets'] ?? {},
        checks: layer.checks ?? {},
      };
    },

    async addLayer(label: string, layer: Layer, options: AddLayerOptions = {}): Promise<void> {
      await send('POST', '/v1/layers', {
        body: {
          action: 'add',
          combine: options.combine ?? false,
          label,
          format: 'yaml',
          layer: stringifyYaml(layer),
        },
      });
    },

    async getServices(names?: string[]): Promise<ServiceInfo[]> {
      const envelope = await send('GET', '/v1/services', {
        query: names && names.length > 0 ? { names: names.join(',') } : undefined,
      });
      return checkResult(TB.Array(ServiceInfoSchema), envelope.result, 'services');
    },

    startServices: (services: string[]) => servicesAction('start', services),
    stopServices: (services: string[]) => servicesAction('stop', services),
    restartServices: (services: string[]) => servicesAction('restart', services),
    waitChange,

    async pull(path: string): Promise<string> {
      const response = await fetchFiles({ method: 'GET', query: { action: 'read', path } });
      const contentType = response.headers.get('content-type') ?? '';

      if (!contentType.startsWith('multipart/form-data')) {
        let payload: unknown;
        try {
          payload = await response.json();
        } catch (error) {
          throw new PebbleProtocolError(`Response to read ${path} is not JSON: ${describeError(error)}`);
        }
        parseEnvelope(response.status, payload, `read ${path}`);
        throw new PebbleProtocolError(`Expected a multipart response when reading ${path}`);
      }

      const form = await response.formData();
      const meta = form.get('response');
      if (typeof meta !== 'string') {
        throw new PebbleProtocolError(`Missing response part when reading ${path}`);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(meta);
      } catch (error) {
        throw new PebbleProtocolError(`Response part for ${path} is not JSON: ${describeError(error)}`);
      }
      const envelope = parseEnvelope(response.status, payload, `read ${path}`);
      raiseOnPathError(envelope.result, path, 'read');

      const file = form.get('files');
      if (file === null || typeof file === 'string') {
        throw new PebbleProtocolError(`Missing file content for ${path}`);
      }
      return file.text();
    },

    async push(path: string, content: string, options: PushOptions = {}): Promise<void> {
      const form = new FormData();
      form.append(
        'request',
        JSON.stringify({
          action: 'write',
          files: [
            {
              path,
              'make-dirs': options.makeDirs ?? false,
              ...(options.permissions ? { permissions: options.permissions } : {}),
            },
          ],
        }),
      );
      form.append('files', new Blob([content]), path);

      const response = await fetchFiles({ method: 'POST', body: form });
      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new PebbleProtocolError(`Response to write ${path} is not JSON: ${describeError(error)}`);
      }
      const envelope = parseEnvelope(response.status, payload, `write ${path}`);
      raiseOnPathError(envelope.result, path, 'write');
    },

    async removePath(path: string, options: RemovePathOptions = {}): Promise<void> {
      const envelope = await send('POST', '/v1/files', {
        body: { action: 'remove', paths: [{ path, recursive: options.recursive ?? false }] },
      });
      raiseOnPathError(envelope.result, path, 'remove');
    },

    async listFiles(path: string, options: ListFilesOptions = {}): Promise<FileInfo[]> {
      const envelope = await send('GET', '/v1/files', {
        query: { action: 'list', path, ...(options.itself ? { itself: 'true' } : {}) },
      });
      return checkResult(TB.Array(FileInfoSchema), envelope.result, 'list');
    },

    async exec(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
      const envelope = await send('POST', '/v1/exec', {
        body: {
          command,
          environment: options.environment,
          'working-dir': options.workingDir,
          timeout: options.timeoutMs === undefined ? undefined : toGoDuration(options.timeoutMs),
          'split-stderr': true,
        },
      });
      const changeId = requireChangeId(envelope, 'exec');
      const taskId = checkResult(AsyncExecResultSchema, envelope.result, 'exec')['task-id'];

      const taskPath = (name: string) => webSocketUrl(`/v1/tasks/${taskId}/websocket/${name}`);
      const sockets = {
        control: connectTaskWebSocket(taskPath('control')),
        stdio: connectTaskWebSocket(taskPath('stdio')),
        stderr: connectTaskWebSocket(taskPath('stderr')),
      };
      const all = Object.values(sockets);

      try {
        await Promise.all(all.map((socket) => socket.opened));
        sockets.stdio.endInput();
        const [stdout, stderr] = await Promise.all([sockets.stdio.output, sockets.stderr.output]);
        const change = await waitChange(changeId);
        const exitCode = change.tasks?.[0]?.data?.['exit-code'];

        return {
          stdout: stdout.toString('utf8'),
          stderr: stderr.toString('utf8'),
          exitCode: typeof exitCode === 'number' ? exitCode : -1,
        };
      } finally {
        for (const socket of all) {
          socket.close();
        }
      }
    },

    async close(): Promise<void> {
      await agent?.close();
    },
  };
};

export type PebbleClient = ReturnType<typeof createPebbleClient>;
