import { SerialPort } from 'serialport';
import type { SetOptions } from '@serialport/bindings-interface';

/**
 * The subset of a serial port the device session drives. `read` polls: it
 * resolves with whatever bytes are buffered, or null when there are none,
 * and never waits for more to arrive.
 */
export interface SerialChannel {
  readonly isOpen: boolean;
  readonly path: string;
  open(): Promise<void>;
  close(): Promise<void>;
  set(options: SetOptions): Promise<void>;
  read(size?: number): Promise<Buffer | null>;
}

type ErrorCallback = (err: Error | null) => void;

// what the wrapper needs of a port, met by SerialPort and SerialPortMock alike
export interface SerialPortLike {
  readonly isOpen: boolean;
  readonly path: string;
  readonly baudRate: number;
  open(callback?: ErrorCallback): void;
  close(callback?: ErrorCallback): void;
  set(options: SetOptions, callback?: ErrorCallback): void;
  read(size?: number): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (err?: Error) => void): unknown;
}

// a class that wraps a serial port and provides a promise-based interface
export class SerialPortPromise implements SerialChannel {
  port: SerialPortLike;
  #error: Error | null = null;

  /**
   * Consumes a serial port (created with autoOpen: false) and returns a
   * similar promise-based interface. Errors and disconnects the port emits
   * are held and surface on the next `read`.
   */
  constructor(port: SerialPortLike) {
    this.port = port;
    this.port.on('error', (err: Error) => {
      this.#error = err;
    });
    this.port.on('close', (err?: Error) => {
      if (err) this.#error = err;
    });
  }

  static create(path: string, baudRate: number): SerialPortPromise {
    return new SerialPortPromise(new SerialPort({ path, baudRate, autoOpen: false }));
  }

  get isOpen(): boolean {
    return this.port.isOpen;
  }

  get path(): string {
    return this.port.path;
  }

  get baudRate(): number {
    return this.port.baudRate;
  }

  /**
   * Opens a connection to the given serial port.
   */
  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Closes an open connection.
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Returns bytes from the read buffer without waiting.
   * @param {number} [size] Optional number of bytes to return from the read buffer.
   * @returns {Buffer|null} null is returned when no data is available.
   */
  async read(size?: number): Promise<Buffer | null> {
    if (this.#error) {
      const err = this.#error;
      this.#error = null;
      throw err;
    }
    if (!this.port.isOpen) throw new Error(`Port ${this.path} is not open`);
    const data: unknown = this.port.read(size);
    if (data === null || data === undefined) return null;
    return Buffer.isBuffer(data) ? data : Buffer.from(String(data));
  }

  /**
   * Set control flags on an open port. Every flag is set on each call to
   * the provided or default values (dtr and rts default to asserted).
   */
  set(options: SetOptions): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.set(options, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
