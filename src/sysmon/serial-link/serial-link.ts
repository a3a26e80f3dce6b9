/**
 * Serial Link
 *
 * Write-only byte channel to the display. The scheduler is the only writer;
 * every write resolves once the bytes have drained to the device.
 *
 * No timeout is applied: a device that stops reading blocks the writer.
 */

import { SerialPort } from 'serialport';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { SerialLinkError } from '../errors.js';

export interface SerialLink {
  /** Device path, used in logs and errors */
  readonly path: string;
  write(bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/**
 * The parts of a `serialport` stream the link uses. `SerialPort` and
 * `SerialPortMock` both satisfy it.
 */
export interface SerialPortHandle {
  readonly path: string;
  readonly isOpen: boolean;
  /** A stream emits 'error' after a failed write; unhandled, it ends the process */
  on(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
  open(callback: (error: Error | null) => void): void;
  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean;
  drain(callback: (error: Error | null) => void): void;
  close(callback: (error: Error | null) => void): void;
}

export interface SerialLinkOptions {
  path: string;
  baudRate: number;
}

export type SerialPortFactory = (options: SerialLinkOptions) => SerialPortHandle;

const createSerialPort: SerialPortFactory = ({ path, baudRate }) =>
  new SerialPort({ path, baudRate, autoOpen: false });

export class SerialPortLink implements SerialLink {
  private readonly logger = createSubsystemLogger('sysmon/serial');
  private readonly port: SerialPortHandle;
  /** First error the stream emitted; every later write fails with it */
  private failure?: Error;
  /** Rejects the write or drain in progress */
  private pending?: (error: Error) => void;

  private readonly onPortError = (error: Error): void => {
    if (this.failure === undefined) {
      this.failure = error;
      this.logger.error('Serial port failed', { path: this.path, error: error.message });
    }
    this.pending?.(error);
  };

  private constructor(port: SerialPortHandle) {
    this.port = port;
    port.on('error', this.onPortError);
  }

  /**
   * Opens the device and resolves with a ready link.
   */
  static async open(
    options: SerialLinkOptions,
    factory: SerialPortFactory = createSerialPort,
  ): Promise<SerialPortLink> {
    const port = factory(options);
    const link = new SerialPortLink(port);

    try {
      await new Promise<void>((resolve, reject) => {
        port.open((error) => {
          if (error) {
            reject(new SerialLinkError(`Failed to open ${options.path}: ${error.message}`, options.path, error));
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      port.off('error', link.onPortError);
      throw error;
    }

    link.logger.info('Serial port opened', { path: options.path, baudRate: options.baudRate });
    return link;
  }

  get path(): string {
    return this.port.path;
  }

  get isOpen(): boolean {
    return this.port.isOpen;
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.failure !== undefined) {
      throw new SerialLinkError(`Write to ${this.path} failed: ${this.failure.message}`, this.path, this.failure);
    }

    await this.settle(`Write to ${this.path}`, (done) => this.port.write(Buffer.from(bytes), done));
    await this.settle(`Drain of ${this.path}`, (done) => this.port.drain(done));
  }

  /**
   * Wraps one callback operation. A stream error while it is pending
   * rejects it too, since the stream may never call back.
   */
  private settle(
    operation: string,
    start: (done: (error: Error | null | undefined) => void) => void,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const fail = (error: Error): void => {
        this.pending = undefined;
        reject(new SerialLinkError(`${operation} failed: ${error.message}`, this.path, error));
      };
      this.pending = fail;

      start((error) => {
        if (this.pending !== fail) {
          return;
        }
        this.pending = undefined;
        if (error) {
          fail(error);
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    if (!this.port.isOpen) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.port.close((error) => {
        if (error) {
          reject(new SerialLinkError(`Failed to close ${this.path}: ${error.message}`, this.path, error));
        } else {
          resolve();
        }
      });
    });
    this.port.off('error', this.onPortError);
    this.logger.info('Serial port closed', { path: this.path });
  }
}
