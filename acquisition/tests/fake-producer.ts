// tests/fake-producer.ts - In-process stand-in for a producer child process

import { PassThrough } from 'stream';
import type { ProducerExit, ProducerLauncher, ProducerProcess } from '../src/producer';

export class FakeProducer implements ProducerProcess {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly exited: Promise<ProducerExit>;
  readonly signals: NodeJS.Signals[] = [];
  hasExited = false;

  private resolveExit: (exit: ProducerExit) => void = () => {};

  /** With `ignoreTerm`, SIGTERM is recorded but only SIGKILL ends the process. */
  constructor(private readonly ignoreTerm = false) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  writeLine(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  write(text: string | Buffer): void {
    this.stdout.write(text);
  }

  endOutput(): void {
    this.stdout.end();
  }

  finish(exit: ProducerExit): void {
    if (this.hasExited) return;
    this.hasExited = true;
    this.resolveExit(exit);
  }

  /** Close stdout and exit with `code` */
  exit(code: number): void {
    this.endOutput();
    this.finish({ code, signal: null });
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (this.ignoreTerm && signal !== 'SIGKILL') return true;
    this.endOutput();
    this.finish({ code: null, signal });
    return true;
  }
}

export interface FakeLauncher {
  launcher: ProducerLauncher;
  launches: Array<{ command: string; args: readonly string[] }>;
}

/** A launcher that hands out `producer`, or rejects with `error`. */
export function fakeLauncher(producer: FakeProducer | Error): FakeLauncher {
  const launches: FakeLauncher['launches'] = [];
  return {
    launches,
    launcher: async (command, args) => {
      launches.push({ command, args });
      if (producer instanceof Error) throw producer;
      return producer;
    },
  };
}
