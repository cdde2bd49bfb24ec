// producer.ts - Producer process launch
//
// The bridge only needs a readable stdout, a way to signal the process and
// its exit status. Tests substitute an in-process launcher.

import { spawn } from 'child_process';
import type { Readable } from 'stream';
import { SpawnError } from '@thermofuse/contracts';

export interface ProducerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProducerProcess {
  readonly pid: number | undefined;
  readonly stdout: Readable;
  /** Settles once the process has exited and its stdout is closed. Never rejects. */
  readonly exited: Promise<ProducerExit>;
  kill(signal: NodeJS.Signals): boolean;
}

/** Start `command` with `args`. Rejects with SpawnError if it cannot be started. */
export type ProducerLauncher = (command: string, args: readonly string[]) => Promise<ProducerProcess>;

/**
 * Spawn a real child. stdin and stderr are shared with this process; stdout
 * is piped to the bridge.
 */
export const spawnProducer: ProducerLauncher = async (command, args) => {
  const child = spawn(command, [...args], { stdio: ['inherit', 'pipe', 'inherit'] });

  const exited = new Promise<ProducerExit>((resolve) => {
    child.once('close', (code, signal) => resolve({ code, signal }));
  });

  try {
    await new Promise<void>((resolve, reject) => {
      child.once('spawn', resolve);
      child.once('error', reject);
    });
  } catch (err) {
    throw new SpawnError(command, { cause: err });
  }

  return {
    pid: child.pid,
    stdout: child.stdout,
    exited,
    kill: (signal) => child.kill(signal),
  };
};

/** Prefix that forces line-buffered stdio in the producer (coreutils stdbuf). */
export function lineBuffered(command: string, args: readonly string[]): { command: string; args: string[] } {
  return { command: 'stdbuf', args: ['-oL', '-eL', command, ...args] };
}

// Conventional shell status for a process killed by a signal
const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGABRT: 6,
  SIGKILL: 9,
  SIGPIPE: 13,
  SIGALRM: 14,
  SIGTERM: 15,
};

export function exitStatus(exit: ProducerExit): number {
  if (exit.code !== null) return exit.code;
  if (exit.signal !== null) return 128 + (SIGNAL_NUMBERS[exit.signal] ?? 0);
  return 1;
}
