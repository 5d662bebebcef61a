import type { Static, TObject } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Value } from '@sinclair/typebox/value';
import { DatabagError, DataValidationError, type DatabagFieldError } from './errors.js';
import type { Databag, DatabagModel, DatabagModelDefinition, DumpOptions } from './types.js';

/** Keys the platform writes into every unit databag; never part of a model. */
export const RESERVED_DATABAG_KEYS: ReadonlySet<string> = new Set([
  'ingress-address',
  'private-address',
  'egress-subnets',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function defineDatabagModel<T extends TObject>(
  definition: DatabagModelDefinition<T>,
): DatabagModel<T> {
  const { name, schema, nestUnder } = definition;
  const validator = TypeCompiler.Compile(schema);

  const aliases: Readonly<Record<string, string | undefined>> = definition.aliases ?? {};
  const wireKeys = new Map<string, string>();
  const propertyNames = new Map<string, string>();
  for (const property of Object.keys(schema.properties)) {
    const wireKey = aliases[property] ?? property;
    wireKeys.set(property, wireKey);
    propertyNames.set(wireKey, property);
  }

  function collectErrors(value: unknown): DatabagFieldError[] {
    return [...validator.Errors(value)].map((error) => ({
      path: error.path || '/',
      message: error.message,
    }));
  }

  function validate(data: unknown, databag: Readonly<Databag>): Static<T> {
    const cleaned = Value.Clean(schema, Value.Clone(data));

    if (validator.Check(cleaned)) {
      return cleaned;
    }

    throw new DataValidationError(
      name,
      'failed to validate databag',
      collectErrors(cleaned),
      Object.keys(databag),
    );
  }

  function parseValue(key: string, raw: string, databag: Readonly<Databag>): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      throw new DataValidationError(
        name,
        `invalid databag contents: expecting json under "${key}"`,
        [{ path: `/${key}`, message: 'Expected JSON' }],
        Object.keys(databag),
      );
    }
  }

  function load(databag: Readonly<Databag>): Static<T> {
    if (nestUnder) {
      const raw = databag[nestUnder];
      if (raw === undefined) {
        throw new DataValidationError(
          name,
          `missing nested key "${nestUnder}"`,
          [{ path: `/${nestUnder}`, message: 'Expected required property' }],
          Object.keys(databag),
        );
      }
      return validate(parseValue(nestUnder, raw, databag), databag);
    }

    const data: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(databag)) {
      if (RESERVED_DATABAG_KEYS.has(key)) {
        continue;
      }
      data[propertyNames.get(key) ?? key] = parseValue(key, raw, databag);
    }

    return validate(data, databag);
  }

  function tryLoad(
    databag: Readonly<Databag>,
    onError?: (error: DataValidationError) => void,
  ): Static<T> | undefined {
    try {
      return load(databag);
    } catch (error) {
      if (error instanceof DataValidationError) {
        onError?.(error);
        return undefined;
      }
      throw error;
    }
  }

  function dump(value: Static<T>, target: Databag = {}, { clear = true }: DumpOptions = {}): Databag {
    const fields: unknown = value;

    if (!validator.Check(fields) || !isRecord(fields)) {
      throw new DataValidationError(name, 'refusing to dump an invalid model', collectErrors(fields));
    }

    if (clear) {
      for (const key of Object.keys(target)) {
        delete target[key];
      }
    }

    if (nestUnder) {
      target[nestUnder] = JSON.stringify(fields);
      return target;
    }

    for (const [property, wireKey] of wireKeys) {
      const fieldValue = fields[property];
      if (fieldValue === undefined) {
        continue;
      }
      const encoded = JSON.stringify(fieldValue);
      if (encoded === undefined) {
        throw new DatabagError(`${name}: field "${property}" is not JSON serializable`);
      }
      target[wireKey] = encoded;
    }

    return target;
  }

  return {
    name,
    schema,
    load,
    tryLoad,
    dump,
  };
}
