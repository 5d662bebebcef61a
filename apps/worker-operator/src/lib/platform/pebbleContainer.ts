import {
  PebbleAPIError,
  PebbleChangeError,
  PebbleConnectionError,
  PebbleError,
  PebblePathError,
  type PebbleClient,
} from '@loki-worker/pebble-client-node';
import { SupervisionError, WorkloadConnectionError, WorkloadPathError } from '../errors.js';
import type { WorkloadContainer } from './types.js';

function toFileError(error: unknown, path: string): unknown {
  if (error instanceof PebblePathError) {
    return new WorkloadPathError(error.kind, path, error.message);
  }
  if (error instanceof PebbleAPIError) {
    return new WorkloadPathError(error.kind ?? 'generic-file-error', path, error.message);
  }
  if (error instanceof PebbleError) {
    return new WorkloadConnectionError(error.message);
  }
  return error;
}

async function fileOperation<T>(path: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toFileError(error, path);
  }
}

async function serviceOperation(service: string, action: string, operation: () => Promise<unknown>) {
  try {
    await operation();
  } catch (error) {
    if (error instanceof PebbleChangeError || error instanceof PebbleAPIError) {
      throw new SupervisionError(service, action, error.message);
    }
    if (error instanceof PebbleError) {
      throw new WorkloadConnectionError(error.message);
    }
    throw error;
  }
}

async function connectionOperation<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof PebbleConnectionError) {
      throw new WorkloadConnectionError(error.message);
    }
    throw error;
  }
}

export function createPebbleContainer(client: PebbleClient, name: string): WorkloadContainer {
  return {
    name,

    async canConnect(): Promise<boolean> {
      try {
        await client.getSystemInfo();
        return true;
      } catch (error) {
        if (error instanceof PebbleError) {
          return false;
        }
        throw error;
      }
    },

    exec: (command) => connectionOperation(() => client.exec(command)),

    pull: (path) => fileOperation(path, () => client.pull(path)),

    push: (path, content, options = {}) =>
      fileOperation(path, () => client.push(path, content, { makeDirs: options.makeDirs })),

    removePath: (path, options = {}) =>
      fileOperation(path, () => client.removePath(path, { recursive: options.recursive })),

    async exists(path: string): Promise<boolean> {
      try {
        const files = await client.listFiles(path, { itself: true });
        return files.length > 0;
      } catch (error) {
        if (error instanceof PebbleAPIError && error.statusCode === 404) {
          return false;
        }
        throw toFileError(error, path);
      }
    },

    getPlan: () => connectionOperation(() => client.getPlan()),

    async getService(serviceName: string) {
      const services = await connectionOperation(() => client.getServices([serviceName]));
      return services.find((service) => service.name === serviceName);
    },

    start: (serviceName) => serviceOperation(serviceName, 'start', () => client.startServices([serviceName])),
    stop: (serviceName) => serviceOperation(serviceName, 'stop', () => client.stopServices([serviceName])),
    restart: (serviceName) =>
      serviceOperation(serviceName, 'restart', () => client.restartServices([serviceName])),

    addLayer: (label, layer, options = {}) =>
      connectionOperation(() => client.addLayer(label, layer, { combine: options.combine })),
  };
}
