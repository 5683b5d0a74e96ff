/**
 * Node.js Transform stream that detects the format of the bytes piped
 * through it without altering them.
 *
 * ```ts
 * import { createDetectStream } from 'bytesniff/stream';
 * import { createReadStream, createWriteStream } from 'node:fs';
 *
 * const sniffer = createDetectStream();
 * sniffer.once('format', (format) => console.log(format.mime));
 * createReadStream('upload.bin').pipe(sniffer).pipe(createWriteStream('copy.bin'));
 * ```
 */

import { Transform, type TransformOptions } from 'node:stream';
import { detect, READ_LIMIT } from './detect.js';
import type { FileFormat } from './format.js';

/**
 * Pass-through stream that emits one `'format'` event.
 *
 * The event fires as soon as `READ_LIMIT` bytes have passed, or when the
 * input ends if it is shorter.
 */
export class DetectTransform extends Transform {
  private _chunks: Buffer[] = [];
  private _buffered = 0;
  private _format: FileFormat | undefined;

  constructor(streamOptions?: TransformOptions) {
    super(streamOptions);
  }

  /** The detected format, once the `'format'` event has fired */
  get format(): FileFormat | undefined {
    return this._format;
  }

  override _transform(
    chunk: Buffer | Uint8Array | string,
    encoding: BufferEncoding,
    callback: (err?: Error | null) => void
  ): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, encoding) : Buffer.from(chunk);
    if (this._format === undefined) {
      this._chunks.push(bytes);
      this._buffered += bytes.length;
      if (this._buffered >= READ_LIMIT) {
        this._emitFormat();
      }
    }
    this.push(bytes);
    callback();
  }

  override _flush(callback: (err?: Error | null) => void): void {
    if (this._format === undefined) {
      this._emitFormat();
    }
    callback();
  }

  private _emitFormat(): void {
    const combined = Buffer.concat(this._chunks);
    this._chunks = [];
    this._format = detect(new Uint8Array(combined.buffer, combined.byteOffset, combined.byteLength));
    this.emit('format', this._format);
  }
}

/**
 * Create a pass-through stream that reports the detected format via the
 * `'format'` event.
 */
export function createDetectStream(options?: TransformOptions): DetectTransform {
  return new DetectTransform(options);
}
