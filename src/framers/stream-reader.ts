// src/framers/stream-reader.ts

import type { Readable } from 'node:stream';
import { concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';

interface PendingRead {
  length: number;
  resolve: (data: Uint8Array) => void;
  reject: (err: Error) => void;
}

/**
 * Pull-style exact-length reads over a push-style byte stream.
 *
 * `readExact(n)` resolves with exactly `n` bytes, or with fewer once the
 * stream has ended (an empty array means the stream ended with nothing
 * pending). Stream errors reject the pending and all later reads.
 */
export class StreamReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private ended: boolean = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk;
    this.buffer = concatUint8Arrays([this.buffer, new Uint8Array(bytes)]);
    this._settle();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this._settle();
  };

  private readonly onError = (err: Error): void => {
    this.failure = err;
    this._settle();
  };

  constructor(private readonly stream: Readable) {
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
  }

  /** Bytes received but not yet consumed */
  get buffered(): number {
    return this.buffer.length;
  }

  readExact(length: number): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(new Error('Concurrent readExact calls are not supported'));
    }
    return new Promise<Uint8Array>((resolve, reject) => {
      this.pending = { length, resolve, reject };
      this._settle();
    });
  }

  /** Detaches from the stream; a pending read resolves with what is buffered. */
  release(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
    this.ended = true;
    this._settle();
  }

  private _settle(): void {
    const request = this.pending;
    if (!request) return;

    if (this.buffer.length >= request.length) {
      this.pending = null;
      const data = Uint8Array.from(sliceUint8Array(this.buffer, 0, request.length));
      this.buffer = sliceUint8Array(this.buffer, request.length);
      request.resolve(data);
      return;
    }
    if (this.failure) {
      this.pending = null;
      request.reject(this.failure);
      return;
    }
    if (this.ended) {
      this.pending = null;
      const data = Uint8Array.from(this.buffer);
      this.buffer = new Uint8Array(0);
      request.resolve(data);
    }
  }
}
