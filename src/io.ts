/** Types for reading PNG sources and writing PDF output on Node. */
import type { Writable as NodeWritable } from 'stream';
import fs from 'fs';

import log from './log.js';
import { concatBytes } from './util.js';
import { textEncoder } from './pdf/util.js';

/** Synchronous, sequential byte source as consumed by the PNG decoder.
 *
 * `read` returns at most `length` bytes and an empty array once the source
 * is exhausted. Implementations may return fewer bytes than requested
 * before the end, callers have to loop.
 */
export interface ByteSource {
  read(length: number): Uint8Array;
}

/** Base interface to be implemented by all readers.  */
export interface Reader {
  read(
    dst: Uint8Array,
    offset: number,
    position: number,
    length: number
  ): Promise<number>;
  size(): Promise<number>;
}

/** Base interface to be implemented by all writers. */
export interface Writer {
  /** Write a chunk to the writer */
  write(buffer: Uint8Array | string): Promise<void>;

  /** Close the writer */
  close(): Promise<void>;

  /** Wait for the next drainage/flush event */
  waitForDrain(): Promise<void>;
}

/** Byte source over an in-memory buffer. */
export class ArraySource implements ByteSource {
  private _buf: Uint8Array;
  private _pos = 0;

  constructor(buf: Uint8Array) {
    this._buf = buf;
  }

  read(length: number): Uint8Array {
    const chunk = this._buf.subarray(this._pos, this._pos + length);
    this._pos += chunk.length;
    return chunk;
  }

  /** Number of bytes consumed so far */
  get position(): number {
    return this._pos;
  }
}

/** Byte source reading from a file descriptor with blocking reads.
 *
 * The source owns the descriptor when opened through `FileSource.open`,
 * callers must `close()` it on every exit path.
 */
export class FileSource implements ByteSource {
  private _fd: number;
  private _closed = false;

  constructor(fd: number) {
    this._fd = fd;
  }

  static open(path: string): FileSource {
    return new FileSource(fs.openSync(path, 'r'));
  }

  read(length: number): Uint8Array {
    if (this._closed) {
      throw new Error('Cannot read from closed FileSource.');
    }
    const buf = new Uint8Array(length);
    // position `null` reads from the current file position
    const bytesRead = fs.readSync(this._fd, buf, 0, length, null);
    return buf.subarray(0, bytesRead);
  }

  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;
    fs.closeSync(this._fd);
  }
}

/** Wraps a writer and counts the bytes written to it. */
export class CountingWriter implements Writer {
  private _writer: Writer;
  bytesWritten = 0;

  constructor(writer: Writer) {
    this._writer = writer;
  }

  write(buffer: string | Uint8Array): Promise<void> {
    this.bytesWritten +=
      typeof buffer === 'string'
        ? textEncoder.encode(buffer).byteLength
        : buffer.byteLength;
    return this._writer.write(buffer);
  }

  close(): Promise<void> {
    return this._writer.close();
  }

  waitForDrain(): Promise<void> {
    return this._writer.waitForDrain();
  }
}

/** Writer that keeps everything in memory, for small documents and tests. */
export class MemoryWriter implements Writer {
  private _parts: Array<Uint8Array> = [];
  private _data?: Uint8Array;

  write(buffer: string | Uint8Array): Promise<void> {
    if (this._data) {
      return Promise.reject(new Error('Cannot write to closed MemoryWriter.'));
    }
    this._parts.push(
      typeof buffer === 'string' ? textEncoder.encode(buffer) : buffer
    );
    return Promise.resolve();
  }

  waitForDrain(): Promise<void> {
    if (this._data) {
      return Promise.reject(
        new Error('Cannot wait on a closed MemoryWriter.')
      );
    }
    return Promise.resolve();
  }

  close(): Promise<void> {
    if (this._data) {
      return Promise.reject(new Error('MemoryWriter is already closed'));
    }
    this._data = concatBytes(this._parts);
    this._parts = [];
    return Promise.resolve();
  }

  get closed(): boolean {
    return this._data !== undefined;
  }

  get data(): Uint8Array {
    if (!this._data) {
      throw new Error('MemoryWriter must be closed first!');
    }
    return this._data;
  }
}

/** Reader implentation using the node.js filesystem API. */
export class NodeReader implements Reader {
  private fileHandle: fs.promises.FileHandle;

  constructor(handle: fs.promises.FileHandle) {
    this.fileHandle = handle;
  }

  async read(
    dst: Uint8Array,
    offset: number,
    position: number,
    length: number
  ): Promise<number> {
    const { bytesRead } = await this.fileHandle.read(
      dst,
      offset,
      length,
      position
    );
    return bytesRead;
  }

  async size(): Promise<number> {
    const stat = await this.fileHandle.stat();
    return stat.size;
  }
}

/** Writer implementation using the node.js filesystem API.
 *
 * Once the underlying stream emitted an error, every further `write` and
 * `close` rejects with that error.
 */
export class NodeWriter implements Writer {
  _writable: NodeWritable;
  _drainWaiters: Array<() => void> = [];
  _error?: Error;

  constructor(writable: NodeWritable) {
    this._writable = writable;
    this._writable.on('drain', () => {
      log.debug('Drained writer.');
      this._wakeWaiters();
    });
    this._writable.on('error', (err) => {
      log.debug(`Output stream failed: ${err}`);
      this._error = err;
      this._wakeWaiters();
    });
    this._writable.on('close', () => this._wakeWaiters());
  }

  private _wakeWaiters(): void {
    for (const waiter of this._drainWaiters) {
      waiter();
    }
    this._drainWaiters = [];
  }

  async write(buffer: string | Uint8Array): Promise<void> {
    if (this._error) {
      throw this._error;
    }
    if (!this._writable.writable) {
      throw new Error('Cannot write to closed NodeWriter.');
    }
    let waitForDrain = false;
    const out = new Promise<void>((resolve, reject) => {
      waitForDrain = !this._writable.write(buffer, (err) =>
        err ? reject(this._error ?? err) : resolve()
      );
    });
    if (waitForDrain) {
      log.debug('Waiting for writer to drain');
      await Promise.all([out, this.waitForDrain()]);
    }
    return await out;
  }

  waitForDrain(): Promise<void> {
    if (this._error || this._writable.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this._drainWaiters.push(resolve));
  }

  close(): Promise<void> {
    if (this._error) {
      return Promise.reject(this._error);
    }
    return new Promise((resolve, reject) => {
      this._writable.once('error', reject);
      this._writable.end((err?: Error | null) =>
        err ? reject(this._error ?? err) : resolve()
      );
    });
  }
}

/** Very basic Reader implementation using an Array. */
export class ArrayReader implements Reader {
  _buf: Uint8Array;

  constructor(buf: Uint8Array) {
    this._buf = buf;
  }

  read(
    dst: Uint8Array,
    offset: number,
    position: number,
    length: number
  ): Promise<number> {
    const sub = this._buf.subarray(position, position + length);
    dst.set(sub, offset);
    return Promise.resolve(sub.length);
  }

  size(): Promise<number> {
    return Promise.resolve(this._buf.length);
  }
}

/** Read the complete contents of a reader into memory. */
export async function readFully(reader: Reader): Promise<Uint8Array> {
  const size = await reader.size();
  const buf = new Uint8Array(size);
  let pos = 0;
  while (pos < size) {
    const read = await reader.read(buf, pos, pos, size - pos);
    if (read === 0) {
      break;
    }
    pos += read;
  }
  return buf.subarray(0, pos);
}
