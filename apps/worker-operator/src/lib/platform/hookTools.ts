import { execFile } from 'child_process';
import type { Databag } from '@loki-worker/databag-node';
import { TB } from '@loki-worker/service-framework-node/typebox';
import { Value } from '@sinclair/typebox/value';
import { stringify as stringifyYaml } from 'yaml';
import { HookToolError } from '../errors.js';
import type { UnitStatusName } from './types.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  tool: string,
  args: readonly string[],
  input?: string,
) => Promise<CommandOutput>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export const runCommand: CommandRunner = (tool, args, input) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      tool,
      [...args],
      { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        if (error) {
          reject(new HookToolError(tool, args, stderr || error.message));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
    if (input === undefined) {
      child.stdin?.end();
    } else {
      child.stdin?.end(input);
    }
  });

const DatabagSchema = TB.Record(TB.String(), TB.String());

/** Thin typed wrappers over the hook tools available to the operator process. */
export const createHookTools = (run: CommandRunner = runCommand) => {
  const runJson = async <T extends TB.TSchema>(
    schema: T,
    tool: string,
    args: readonly string[],
  ): Promise<TB.Static<T>> => {
    const fullArgs = [...args, '--format=json'];
    const { stdout } = await run(tool, fullArgs);

    let value: unknown;
    try {
      value = JSON.parse(stdout);
    } catch {
      throw new HookToolError(tool, fullArgs, `unexpected output: ${stdout}`);
    }
    if (!Value.Check(schema, value)) {
      throw new HookToolError(tool, fullArgs, `unexpected output: ${stdout}`);
    }
    return value;
  };

  return {
    relationIds: (endpoint: string): Promise<string[]> =>
      runJson(TB.Array(TB.String()), 'relation-ids', [endpoint]),

    async relationRemoteApp(relationId: string): Promise<string | undefined> {
      const { stdout } = await run('relation-list', ['-r', relationId, '--app']);
      const name = stdout.trim();
      return name === '' ? undefined : name;
    },

    async relationGet(relationId: string, owner: string, app: boolean): Promise<Databag> {
      const args = ['-r', relationId, ...(app ? ['--app'] : []), '-', owner];
      const databag = await runJson(TB.Union([DatabagSchema, TB.Null()]), 'relation-get', args);
      return databag ?? {};
    },

    /** Keys set to the empty string are deleted. */
    async relationSet(relationId: string, databag: Databag, app: boolean): Promise<void> {
      const args = ['-r', relationId, ...(app ? ['--app'] : []), '--file', '-'];
      await run('relation-set', args, stringifyYaml(databag));
    },

    isLeader: (): Promise<boolean> => runJson(TB.Boolean(), 'is-leader', []),

    configGet: (): Promise<Record<string, unknown>> =>
      runJson(TB.Record(TB.String(), TB.Unknown()), 'config-get', []),

    secretGet: (id: string): Promise<Record<string, string>> =>
      runJson(DatabagSchema, 'secret-get', [id]),

    async statusSet(status: UnitStatusName, message: string): Promise<void> {
      await run('status-set', [status, message]);
    },

    async applicationVersionSet(version: string): Promise<void> {
      await run('application-version-set', [version]);
    },

    async openPort(port: number): Promise<void> {
      await run('open-port', [`${port}/tcp`]);
    },
  };
};

export type HookTools = ReturnType<typeof createHookTools>;
