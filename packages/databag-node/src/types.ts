import type { Static, TObject } from '@sinclair/typebox';
import type { DataValidationError } from './errors.js';

/** One participant's side of a relation: string keys to JSON-encoded values. */
export type Databag = Record<string, string>;

export type DatabagAliases<T extends TObject> = {
  readonly [K in keyof T['properties'] & string]?: string;
};

export interface DatabagModelDefinition<T extends TObject> {
  readonly name: string;
  readonly schema: T;
  /** Wire keys for properties whose in-memory name differs. */
  readonly aliases?: DatabagAliases<T>;
  /** Serialize the whole model as one JSON value under this key instead of one key per field. */
  readonly nestUnder?: string;
}

export interface DumpOptions {
  /** Remove every pre-existing key of the target before writing. Defaults to true. */
  readonly clear?: boolean;
}

export interface DatabagModel<T extends TObject> {
  readonly name: string;
  readonly schema: T;
  load(databag: Readonly<Databag>): Static<T>;
  tryLoad(
    databag: Readonly<Databag>,
    onError?: (error: DataValidationError) => void,
  ): Static<T> | undefined;
  dump(value: Static<T>, target?: Databag, options?: DumpOptions): Databag;
}
