import { type TSchema, type Static, Type } from '@sinclair/typebox';

export interface ParsedEnv<T> {
  readonly config: T;
  readonly errors?: EnvValidationError[];
}

export interface EnvValidationError {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: EnvSource;
}

export interface EnvParser {
  parse<T extends TSchema>(schema: T, config?: EnvParserConfig): Static<T>;

  validate<T extends TSchema>(
    schema: T,
    source: Record<string, unknown>,
    config?: EnvParserConfig,
  ): ParsedEnv<Static<T>>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export type EnvSource = Record<string, string | undefined>;

export const LogSeveritySchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('fatal'),
]);

export const LogFormatSchema = Type.Union([
  Type.Literal('json'),
  Type.Literal('human'),
  Type.Literal('structured-text'),
]);

export const DefaultEnvSchemaType = Type.Object({
  PROCESS_NAME: Type.String({ minLength: 1, default: 'operator' }),
  LOG_LEVEL: Type.Optional(LogSeveritySchema),
  LOG_FORMAT: Type.Optional(LogFormatSchema),
});
export type DefaultEnvSchema = Static<typeof DefaultEnvSchemaType>;
export type DefaultEnvSchemaType = typeof DefaultEnvSchemaType;

export type DefaultEnv = DefaultEnvSchema;

export type DefaultEnvContext = EnvContext<DefaultEnv>;
