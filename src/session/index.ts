import { performance } from 'perf_hooks';
import { ChannelError, PortUnavailableError, errorMessage } from '../errors';
import { Logger, StdOut } from '../util/logger';
import asyncTimeout from '../util/async-timeout';
import { SerialChannel, SerialPortPromise } from '../serialport/serialport-promise';
import { LineDecoder } from './line-decoder';
import { DEFAULT_RESET_DELAY, ResetStrategy, resetDevice } from './reset';

export type SessionState = 'unopened' | 'open' | 'resetting' | 'streaming' | 'closed';

// timeout and interrupted are normal ends of a session, only error is a failure
export type SessionReason = 'timeout' | 'interrupted' | 'error';

export interface SessionOptions {
  port: string;
  baudRate?: number;
  // seconds of streaming before the session stops itself, <= 0 runs until interrupted
  timeout?: number;
  reset?: ResetStrategy;
  // ms between the two edges of the reset toggle
  resetDelay?: number;
  // ms to yield after an empty read
  pollInterval?: number;
  signal?: AbortSignal;
  // receives every device line, never silenced by a quiet logger
  output?: StdOut;
  logger?: Logger;
  openChannel?: (port: string, baudRate: number) => SerialChannel;
  // monotonic clock in ms
  now?: () => number;
  onStateChange?: (state: SessionState) => void;
}

export interface DeviceSession {
  port: string;
  baudRate: number;
  timeout: number;
  startedAt: Date;
}

export interface SessionOutcome {
  reason: SessionReason;
  ok: boolean;
  error?: PortUnavailableError | ChannelError;
  lines: number;
  durationMs: number;
  session: DeviceSession | null;
}

export const DEFAULT_BAUD_RATE = 115200;
export const DEFAULT_MONITOR_TIMEOUT = 60;
export const DEFAULT_POLL_INTERVAL = 10;

const defaultOpenChannel = (port: string, baudRate: number): SerialChannel => SerialPortPromise.create(port, baudRate);

/**
 * One open-to-close lifetime of a serial channel: open, reset the device,
 * stream lines until the timeout or an interruption, then release the
 * channel exactly once whichever way the session ended.
 */
export class SessionController {
  state: SessionState = 'unopened';
  opts: SessionOptions;
  logger: Logger;
  output: StdOut;
  baudRate: number;
  timeout: number;
  now: () => number;
  lines = 0;
  #decoder = new LineDecoder();
  #used = false;

  constructor(opts: SessionOptions) {
    this.opts = opts;
    this.logger = opts.logger || new Logger({ tag: 'MONITOR' });
    this.output = opts.output || process.stdout;
    this.baudRate = opts.baudRate || DEFAULT_BAUD_RATE;
    this.timeout = opts.timeout ?? DEFAULT_MONITOR_TIMEOUT;
    this.now = opts.now || (() => performance.now());
  }

  #transition(state: SessionState) {
    this.state = state;
    this.logger.debug(`Session ${state}`);
    this.opts.onStateChange?.(state);
  }

  #emit(line: string) {
    this.lines += 1;
    this.output.write(`${line}\n`);
  }

  // poll until the timeout elapses or the signal aborts; read failures propagate
  async #stream(channel: SerialChannel): Promise<'timeout' | 'interrupted'> {
    const { signal } = this.opts;
    const pollInterval = this.opts.pollInterval ?? DEFAULT_POLL_INTERVAL;
    const timeoutMs = this.timeout > 0 ? this.timeout * 1000 : null;
    const start = this.now();
    for (;;) {
      if (signal?.aborted) return 'interrupted';
      if (timeoutMs !== null && this.now() - start > timeoutMs) return 'timeout';
      const chunk = await channel.read();
      if (chunk && chunk.length) {
        this.#decoder.push(chunk).forEach((line) => this.#emit(line));
      } else {
        await asyncTimeout(pollInterval, signal);
      }
    }
  }

  async #release(channel: SerialChannel): Promise<ChannelError | null> {
    try {
      if (channel.isOpen) await channel.close();
      return null;
    } catch (err) {
      return new ChannelError(`Failed to release ${this.opts.port}: ${errorMessage(err)}`, err);
    }
  }

  async #open(openChannel: (port: string, baudRate: number) => SerialChannel): Promise<SerialChannel | PortUnavailableError> {
    try {
      const channel = openChannel(this.opts.port, this.baudRate);
      await channel.open();
      return channel;
    } catch (err) {
      return new PortUnavailableError(this.opts.port, err);
    }
  }

  async run(): Promise<SessionOutcome> {
    if (this.#used) throw new Error('A session cannot be reused, create a new one');
    this.#used = true;
    const { port } = this.opts;
    const openChannel = this.opts.openChannel || defaultOpenChannel;
    const t0 = this.now();
    const elapsed = () => Math.round(this.now() - t0);

    this.logger.log(`Port: ${port}, Baud: ${this.baudRate}`);
    this.logger.log(this.timeout > 0 ? `Timeout: ${this.timeout}s` : 'Timeout: none');

    // interrupted before the port was touched
    if (this.opts.signal?.aborted) {
      this.#transition('closed');
      this.logger.log('Monitor stopped by user');
      return {
        reason: 'interrupted', ok: true, lines: 0, durationMs: elapsed(), session: null,
      };
    }

    const channel = await this.#open(openChannel);
    if (channel instanceof PortUnavailableError) {
      const error = channel;
      this.logger.error(error.message);
      this.#transition('closed');
      return {
        reason: 'error', ok: false, error, lines: 0, durationMs: elapsed(), session: null,
      };
    }

    const session: DeviceSession = {
      port, baudRate: this.baudRate, timeout: this.timeout, startedAt: new Date(),
    };
    this.#transition('open');
    let reason: SessionReason = 'error';
    let error: ChannelError | undefined;
    try {
      this.#transition('resetting');
      await resetDevice(channel, this.opts.reset || 'dtr', this.opts.resetDelay ?? DEFAULT_RESET_DELAY);
      this.logger.log('Device reset, waiting for output...');
      this.#transition('streaming');
      reason = await this.#stream(channel);
    } catch (err) {
      error = new ChannelError(`Serial error on ${port}: ${errorMessage(err)}`, err);
    }

    const rest = this.#decoder.flush();
    if (rest) this.#emit(rest);
    const releaseError = await this.#release(channel);
    if (releaseError && !error) error = releaseError;
    if (error) reason = 'error';
    this.#transition('closed');

    if (error) this.logger.error(error.message);
    else if (reason === 'timeout') this.logger.log(`Monitor ended after ${this.timeout}s timeout`);
    else this.logger.log('Monitor stopped by user');

    return {
      reason,
      ok: !error,
      error,
      lines: this.lines,
      durationMs: elapsed(),
      session,
    };
  }
}

export const runSession = (opts: SessionOptions): Promise<SessionOutcome> => new SessionController(opts).run();
