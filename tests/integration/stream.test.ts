import { describe, it, expect } from 'vitest';
import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { createDetectStream, DetectTransform } from '../../src/node-stream.js';
import type { FileFormat } from '../../src/format.js';
import { READ_LIMIT } from '../../src/detect.js';
import { png, utf8 } from '../helpers/fixtures.js';

interface PipeResult {
  output: Buffer;
  formats: FileFormat[];
}

async function pipeThrough(chunks: Uint8Array[], sniffer: DetectTransform): Promise<PipeResult> {
  const formats: FileFormat[] = [];
  sniffer.on('format', (format: FileFormat) => formats.push(format));

  const received: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      received.push(chunk);
      callback();
    },
  });

  await pipeline(Readable.from(chunks), sniffer, sink);
  return { output: Buffer.concat(received), formats };
}

describe('DetectTransform', () => {
  it('should pass bytes through unchanged', async () => {
    const input = [png(), utf8('trailing data')];

    const { output } = await pipeThrough(input, createDetectStream());
    expect(output.equals(Buffer.concat(input))).toBe(true);
  });

  it('should emit one format event for a short input', async () => {
    const sniffer = createDetectStream();

    const { formats } = await pipeThrough([png()], sniffer);
    expect(formats.map(String)).toEqual(['image/png']);
    expect(sniffer.format?.mime).toBe('image/png');
  });

  it('should detect once READ_LIMIT bytes have passed', async () => {
    const first = new Uint8Array(READ_LIMIT).fill(0x61);
    const second = new Uint8Array(100);

    const { formats, output } = await pipeThrough([first, second], createDetectStream());
    expect(formats.map(String)).toEqual(['text/plain; charset=utf-8']);
    expect(output.length).toBe(READ_LIMIT + 100);
  });

  it('should report empty input as octet-stream', async () => {
    const { formats } = await pipeThrough([], createDetectStream());

    expect(formats.map(String)).toEqual(['application/octet-stream']);
  });
});
