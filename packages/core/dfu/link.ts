import type { Logger } from "../logger.js";
import type { CoreError, DfuVerifyMode } from "../types.js";
import { createError, toCoreError } from "../types.js";

export interface DfuOptions {
  baudRate?: number;
  // Longest wait for any single response
  timeoutMs?: number;
  verify?: DfuVerifyMode;
  logger?: Logger;
}

/** Byte pipe to a device's UART, as seen by the DFU protocols. */
export interface SerialLink {
  write(data: Uint8Array): Promise<void>;
  onData(listener: (chunk: Uint8Array) => void): void;
  onError(listener: (error: CoreError) => void): void;
  close(): Promise<void>;
}

export async function openSerialLink(path: string, baudRate: number): Promise<SerialLink> {
  const { SerialPort } = await import("serialport");
  const port = new SerialPort({ path, baudRate, autoOpen: false });
  try {
    await new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(error) : resolve()));
    });
  } catch (e) {
    throw createError("SERIAL_PORT_ERROR", `Could not open serial port ${path}: ${toCoreError(e).message}`, {
      cause: e,
    });
  }

  const portError = (e: unknown): CoreError =>
    createError("SERIAL_PORT_ERROR", `Serial port ${path}: ${toCoreError(e).message}`, { cause: e });

  return {
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(data), (error) => {
          if (error) {
            reject(portError(error));
            return;
          }
          port.drain((drainError) => (drainError ? reject(portError(drainError)) : resolve()));
        });
      }),
    onData: (listener) => {
      port.on("data", (chunk: Buffer) => listener(chunk));
    },
    onError: (listener) => {
      port.on("error", (error: Error) => listener(portError(error)));
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close((error) => (error ? reject(portError(error)) : resolve()));
      }),
  };
}

interface Waiter {
  resolve(frame: Uint8Array): void;
  reject(error: CoreError): void;
}

/**
 * Splits the receive stream on a delimiter byte and hands out one frame per
 * `next()` call. Empty frames are dropped.
 */
export class FrameReader {
  private pending: number[] = [];
  private frames: Uint8Array[] = [];
  private waiter: Waiter | null = null;
  private failure: CoreError | null = null;

  constructor(
    link: SerialLink,
    private readonly delimiter: number,
  ) {
    link.onData((chunk) => this.push(chunk));
    link.onError((error) => this.fail(error));
  }

  private push(chunk: Uint8Array): void {
    for (const byte of chunk) {
      if (byte !== this.delimiter) {
        this.pending.push(byte);
        continue;
      }
      if (this.pending.length === 0) {
        continue;
      }
      const frame = Uint8Array.from(this.pending);
      this.pending = [];
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = null;
        waiter.resolve(frame);
      } else {
        this.frames.push(frame);
      }
    }
  }

  private fail(error: CoreError): void {
    this.failure = error;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(error);
  }

  next(timeoutMs: number, label: string): Promise<Uint8Array> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    const queued = this.frames.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.waiter) {
      return Promise.reject(createError("INVALID_OPERATION", "A serial read is already in progress"));
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(createError("TIMEOUT", `${label} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiter = {
        resolve: (frame) => {
          clearTimeout(timer);
          resolve(frame);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  // Forget anything received before the next request
  clear(): void {
    this.pending = [];
    this.frames = [];
  }
}
