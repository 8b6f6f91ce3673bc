import { spawn } from 'child_process';

/** The part of a child process the players and notifiers use. */
export interface SpawnedProcess {
  once(event: 'close', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(): boolean;
}

export type SpawnFn = (command: string, args: readonly string[]) => SpawnedProcess;

/** Detached from our stdio; output is never read. */
export const spawnQuiet: SpawnFn = (command, args) => spawn(command, args, { stdio: 'ignore' });
