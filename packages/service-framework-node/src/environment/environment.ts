import { Value } from '@sinclair/typebox/value';
import type { Static, TSchema } from '@sinclair/typebox';
import type {
  DefaultEnvSchema,
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
  ParsedEnv,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
    return '[REDACTED]';
  }
  return value;
}

function coerceEnvironmentValue(value: string, targetType: string): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Cannot convert "${value}" to number`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      throw new Error(`Cannot convert "${value}" to boolean`);
    }
    case 'object':
    case 'array':
      return JSON.parse(value);
    default:
      return value;
  }
}

function formatValidationErrors(errors: EnvValidationError[]): string {
  const lines = ['Configuration validation failed:'];

  for (const error of errors) {
    const valuePart = error.value !== undefined ? `, received ${JSON.stringify(error.value)}` : '';
    lines.push(`  - ${error.path}: ${error.message}${valuePart}`);
  }

  return lines.join('\n');
}

function extractSchemaType(schema: TSchema): string {
  if ('type' in schema && typeof schema.type === 'string') {
    return schema.type;
  }
  return 'unknown';
}

function getPropertySchemas(schema: TSchema): Record<string, TSchema> | undefined {
  if ('properties' in schema && typeof schema.properties === 'object' && schema.properties) {
    return schema.properties;
  }
  return undefined;
}

function coerceEnvValues(source: EnvSource, schema: TSchema): Record<string, unknown> {
  const properties = getPropertySchemas(schema);
  if (!properties) {
    return { ...source };
  }

  const coerced: Record<string, unknown> = {};

  for (const [key, propSchema] of Object.entries(properties)) {
    const value = source[key];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      coerced[key] = coerceEnvironmentValue(value, extractSchemaType(propSchema));
    } catch {
      // left as-is so validation reports it against the schema
      coerced[key] = value;
    }
  }

  return coerced;
}

function convertTypeBoxErrors(
  errors: ReturnType<typeof Value.Errors>,
  redactSensitive: boolean,
): EnvValidationError[] {
  const validationErrors: EnvValidationError[] = [];

  for (const error of errors) {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.');
    const value = redactSensitive ? redactValue(path, error.value) : error.value;

    validationErrors.push({
      path: path || 'root',
      message: error.message,
      value,
    });
  }

  return validationErrors;
}

export function createEnvParser(): EnvParser {
  const validate = <T extends TSchema>(
    schema: T,
    source: Record<string, unknown>,
    config: EnvParserConfig = {},
  ): ParsedEnv<Static<T>> => {
    const redactSensitive = config.redactSensitive ?? true;

    if (Value.Check(schema, source)) {
      return { config: source };
    }

    return {
      config: Value.Cast(schema, source),
      errors: convertTypeBoxErrors(Value.Errors(schema, source), redactSensitive),
    };
  };

  const parse = <T extends TSchema>(schema: T, config: EnvParserConfig = {}): Static<T> => {
    const source = config.source ?? process.env;
    const redactSensitive = config.redactSensitive ?? true;

    const coerced = coerceEnvValues(source, schema);
    const withDefaults = Value.Default(schema, coerced);

    const result = validate(
      schema,
      typeof withDefaults === 'object' && withDefaults !== null ? { ...withDefaults } : coerced,
      { redactSensitive },
    );

    if (result.errors && result.errors.length > 0) {
      throw new Error(formatValidationErrors(result.errors));
    }

    return result.config;
  };

  return {
    parse,
    validate,
  };
}

export function createEnvContext<T extends TSchema>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<Static<T> & DefaultEnvSchema> {
  const parser = createEnvParser();
  const parsedConfig: Static<T> = parser.parse(schema, config);

  if (!isDefaultEnv(parsedConfig)) {
    throw new Error('Configuration validation failed:\n  - PROCESS_NAME: Expected string');
  }

  const source = config?.source ?? process.env;

  return {
    config: parsedConfig,
    nodeEnv: configuredNodeEnv(parsedConfig) ?? source.NODE_ENV ?? 'development',
  };
}

function configuredNodeEnv(value: object): string | undefined {
  return 'NODE_ENV' in value && typeof value.NODE_ENV === 'string' ? value.NODE_ENV : undefined;
}

function isDefaultEnv<T>(value: T): value is T & DefaultEnvSchema {
  return (
    typeof value === 'object' &&
    value !== null &&
    'PROCESS_NAME' in value &&
    typeof value.PROCESS_NAME === 'string' &&
    value.PROCESS_NAME.length > 0
  );
}
