import fs from 'fs';
import os from 'os';
import path from 'path';
import type { SetOptions } from '@serialport/bindings-interface';
import type { SerialChannel } from '../src/serialport/serialport-promise';
import { Logger, StdOut } from '../src/util/logger';
import type { RunCommand, RunOptions, RunResult } from '../src/util/exec';

// collects everything written to it
export class Sink implements StdOut {
  chunks: string[] = [];

  write(data: string) {
    this.chunks.push(data);
  }

  get text(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line.length);
  }
}

export const quietLogger = (sink = new Sink()) => new Logger({ stdout: sink, quiet: true });

// serial ports that exist on a pretend machine, each openable once at a time
export class FakePortRegistry {
  present = new Set<string>();
  locked = new Set<string>();

  constructor(...paths: string[]) {
    paths.forEach((p) => this.present.add(p));
  }

  acquire(port: string) {
    if (!this.present.has(port)) throw new Error(`Error: No such file or directory, cannot open ${port}`);
    if (this.locked.has(port)) throw new Error('Error Resource temporarily unavailable Cannot lock port');
    this.locked.add(port);
  }

  release(port: string) {
    this.locked.delete(port);
  }
}

export class FakeSerialPort implements SerialChannel {
  path: string;
  registry: FakePortRegistry;
  isOpen = false;
  // open, set and close calls in order, plus the first read
  calls: string[] = [];
  reads = 0;
  closeCount = 0;
  failClose = false;
  #queue: (Buffer | Error)[] = [];

  constructor(registry: FakePortRegistry, port: string) {
    this.registry = registry;
    this.path = port;
  }

  // bytes (or a failure) handed out one per read, in order
  feed(...items: (Buffer | string | Error)[]) {
    items.forEach((item) => this.#queue.push(typeof item === 'string' ? Buffer.from(item) : item));
  }

  async open() {
    this.registry.acquire(this.path);
    this.isOpen = true;
    this.calls.push('open');
  }

  async close() {
    if (!this.isOpen) throw new Error('Port is not open');
    this.closeCount += 1;
    this.calls.push('close');
    if (this.failClose) throw new Error('close failed');
    this.isOpen = false;
    this.registry.release(this.path);
  }

  async set(options: SetOptions) {
    this.calls.push(`set dtr=${options.dtr} rts=${options.rts}`);
  }

  async read(): Promise<Buffer | null> {
    if (!this.reads) this.calls.push('read');
    this.reads += 1;
    const next = this.#queue.shift();
    if (next instanceof Error) throw next;
    return next || null;
  }
}

export const tmpDir = (prefix = 'fwpipe-') => fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export const writeBin = (dir: string, name: string, bytes: number[]) => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, Buffer.from(bytes));
  return file;
};

export interface RecordedCall {
  file: string;
  args: string[];
  opts?: RunOptions;
}

// a RunCommand that records its calls and answers from a handler
export const fakeRun = (handler: (call: RecordedCall) => Partial<RunResult> | Promise<Partial<RunResult>> = () => ({})) => {
  const calls: RecordedCall[] = [];
  const run: RunCommand = async (file, args, opts) => {
    const call = { file, args, opts };
    calls.push(call);
    const result = await handler(call);
    return {
      exitCode: 0, stdout: '', stderr: '', ...result,
    };
  };
  return { run, calls };
};
