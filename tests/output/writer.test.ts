import { Writable } from 'stream';
import { describe, expect, it } from 'vitest';

import { createSgrBuilder } from '../../src/output/builder.js';
import {
  createSgrWriter,
  createStreamWriter,
  createStringWriter,
} from '../../src/output/writer.js';

describe('createStringWriter', () => {
  it('accumulates written text', () => {
    const writer = createStringWriter();
    writer.write('a');
    writer.write('b');

    expect(writer.text).toBe('ab');
  });

  it('clears its buffer', () => {
    const writer = createStringWriter();
    writer.write('a');
    writer.clear();

    expect(writer.text).toBe('');
  });
});

describe('createStreamWriter', () => {
  it('writes text to the stream', () => {
    const chunks: string[] = [];
    const stream = new Writable({
      decodeStrings: false,
      write(chunk: string, _encoding, callback): void {
        chunks.push(chunk);
        callback();
      },
    });

    createStreamWriter(stream).write('\x1b[1mhi');

    expect(chunks).toEqual(['\x1b[1mhi']);
  });
});

describe('createSgrWriter', () => {
  it('writes codes as complete sequences around text', () => {
    const inner = createStringWriter();
    const writer = createSgrWriter(inner);

    writer.sgr([1, 31]);
    writer.write('alert');
    writer.sgr([0]);

    expect(inner.text).toBe('\x1b[1;31malert\x1b[0m');
  });

  it('writes nothing for an empty code list', () => {
    const inner = createStringWriter();
    createSgrWriter(inner).sgr([]);

    expect(inner.text).toBe('');
  });

  it('writes partial sequences without framing', () => {
    const inner = createStringWriter();
    const writer = createSgrWriter(inner);

    writer.write('\x1b[1;');
    writer.partialSgr([38, 5, 1]);
    writer.write('m');

    expect(inner.text).toBe('\x1b[1;38;5;1m');
  });

  it('places and clears a builder', () => {
    const inner = createStringWriter();
    const writer = createSgrWriter(inner);
    const builder = writer.builder().chainCode(3);

    writer.place(builder);

    expect(inner.text).toBe('\x1b[3m');
    expect(builder.length).toBe(0);
  });

  it('hands out independent builders', () => {
    const writer = createSgrWriter(createStringWriter());
    writer.builder().chainCode(1);

    expect(writer.builder().length).toBe(0);
  });

  it('builds the same text as a builder flush', () => {
    const inner = createStringWriter();
    createSgrWriter(inner).sgr([48, 2, 1, 2, 3]);

    expect(inner.text).toBe(createSgrBuilder([48, 2, 1, 2, 3]).flush());
  });
});
