export { createPebbleClient, type PebbleClient } from './pebbleClient.js';
export {
  PebbleAPIError,
  PebbleChangeError,
  PebbleConnectionError,
  PebbleError,
  PebblePathError,
  PebbleProtocolError,
} from './errors.js';
export type {
  AddLayerOptions,
  Change,
  ExecOptions,
  ExecResult,
  FileInfo,
  Layer,
  ListFilesOptions,
  LogTargetDefinition,
  PebbleClientConfig,
  Plan,
  PushOptions,
  RemovePathOptions,
  ServiceDefinition,
  ServiceInfo,
  SystemInfo,
} from './types.js';
