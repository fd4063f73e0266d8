/**
 * Runtime-agnostic subprocess execution.
 * Wraps child_process.spawn. Children run in the foreground on the
 * parent's stdin, stdout and stderr.
 */

import { spawn as nodeSpawn, type ChildProcess as NodeChildProcess, type StdioOptions } from 'node:child_process';

export interface CommandOptions {
  args?: string[];
}

export type CommandStatus = {
  success: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * The subset of a spawned child that Command waits on.
 */
export interface SpawnedChild {
  once(event: 'error', listener: (error: Error) => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: { stdio: StdioOptions }
) => SpawnedChild;

const defaultSpawn: SpawnFn = (command, args, options): NodeChildProcess =>
  nodeSpawn(command, args, options);

export class Command {
  private _command: string;
  private _options: CommandOptions;
  private _spawn: SpawnFn;

  constructor(command: string, options: CommandOptions = {}, spawn: SpawnFn = defaultSpawn) {
    this._command = command;
    this._options = options;
    this._spawn = spawn;
  }

  /**
   * Spawn the command and wait for it to exit.
   * Rejects only when the process could not be started.
   */
  status(): Promise<CommandStatus> {
    return new Promise((resolve, reject) => {
      let child: SpawnedChild;
      try {
        child = this._spawn(this._command, this._options.args ?? [], {
          stdio: ['inherit', 'inherit', 'inherit'],
        });
      } catch (error) {
        reject(error);
        return;
      }

      child.once('error', reject);
      child.once('exit', (code, signal) => {
        resolve({ success: code === 0, code, signal });
      });
    });
  }
}
