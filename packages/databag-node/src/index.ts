export { defineDatabagModel, RESERVED_DATABAG_KEYS } from './databagModel.js';
export { DatabagError, DataValidationError } from './errors.js';
export type { DatabagFieldError } from './errors.js';
export type {
  Databag,
  DatabagAliases,
  DatabagModel,
  DatabagModelDefinition,
  DumpOptions,
} from './types.js';
