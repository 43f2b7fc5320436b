/**
 * Sequential byte stream handles for the record decoder.
 *
 * A source reports its total length up front and is read forward only.
 */

import { closeSync, fstatSync, openSync, readSync } from 'node:fs';

export interface ByteSource {
  readonly byteLength: number;
  /** Copy up to `target.length` bytes into `target`; returns the count read, 0 at end. */
  read(target: Uint8Array): number;
}

export type ByteInput = ArrayBuffer | ArrayBufferView | ByteSource;

export class MemoryByteSource implements ByteSource {
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  read(target: Uint8Array): number {
    const n = Math.min(target.length, this.bytes.length - this.position);
    target.set(this.bytes.subarray(this.position, this.position + n));
    this.position += n;
    return n;
  }
}

/** Reads a bin file through a descriptor. Call `close()` when done. */
export class FileByteSource implements ByteSource {
  readonly byteLength: number;
  private fd: number | null;
  private position = 0;

  constructor(readonly path: string) {
    this.fd = openSync(path, 'r');
    this.byteLength = fstatSync(this.fd).size;
  }

  read(target: Uint8Array): number {
    if (this.fd === null) throw new Error(`Byte source already closed: ${this.path}`);
    const n = readSync(this.fd, target, 0, target.length, this.position);
    this.position += n;
    return n;
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}

export function toByteSource(input: ByteInput): ByteSource {
  if (input instanceof ArrayBuffer) return new MemoryByteSource(new Uint8Array(input));
  if (ArrayBuffer.isView(input)) {
    return new MemoryByteSource(new Uint8Array(input.buffer, input.byteOffset, input.byteLength));
  }
  return input;
}
