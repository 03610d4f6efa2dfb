/**
 * Unit tests for the command runner's output handling (in-process streams)
 */

import { describe, it, expect } from 'vitest';
import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import { createLineBuffer, readText } from '../command-runner.js';

describe('readText', () => {
  it('should keep a multibyte character split across chunks intact', async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    readText(stream, (text) => chunks.push(text));

    // 'é' is c3 a9; the first write ends after c3
    const bytes = Buffer.from('{"path":"/data/café.txt"}', 'utf8');
    const split = bytes.indexOf(0xc3) + 1;
    stream.write(bytes.subarray(0, split));
    stream.write(bytes.subarray(split));
    stream.end();
    await once(stream, 'end');

    expect(chunks.join('')).toBe('{"path":"/data/café.txt"}');
  });
});

describe('createLineBuffer', () => {
  it('should emit complete lines and hold back the partial tail', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));

    buffer.push('{"a":1}\n{"b"');
    expect(lines).toEqual(['{"a":1}']);

    buffer.push(':2}\n{"c":3}');
    expect(lines).toEqual(['{"a":1}', '{"b":2}']);

    buffer.flush();
    expect(lines).toEqual(['{"a":1}', '{"b":2}', '{"c":3}']);
  });

  it('should not emit anything on flush when the last line was complete', () => {
    const lines: string[] = [];
    const buffer = createLineBuffer((line) => lines.push(line));

    buffer.push('only\n');
    buffer.flush();

    expect(lines).toEqual(['only']);
  });
});
