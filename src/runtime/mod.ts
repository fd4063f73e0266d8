/**
 * Runtime abstraction layer.
 *
 * Thin wrappers around the Node.js host APIs the program touches, so the rest
 * of the code (and the tests) can swap streams, signals and spawning.
 */

export * from './process.ts';
export * from './terminal.ts';
export { Command } from './command.ts';
export type { CommandOptions, CommandStatus, SpawnFn, SpawnedChild } from './command.ts';
