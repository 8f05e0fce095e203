import { describe, expect, it } from 'vitest';
import {
  SEGMENT_DELIMITER,
  findChunkBoundary,
  joinDelimited,
  removeXmlIllegalCharacters,
  splitDelimited,
  splitIntoChunks,
} from './segmentation.service';

describe('splitIntoChunks', () => {
  it('returns no chunks for empty text', () => {
    expect(splitIntoChunks('', 5000, 200)).toEqual([]);
  });

  it('returns the whole text as one chunk when it fits', () => {
    expect(splitIntoChunks('Hello world.', 5000, 200)).toEqual([{ index: 0, start: 0, end: 12, text: 'Hello world.' }]);
  });

  it('keeps text of exactly maxLength in one chunk', () => {
    const text = 'x'.repeat(100);
    expect(splitIntoChunks(text, 100, 20)).toHaveLength(1);
  });

  it('cuts a 12,000 character paragraph into three chunks ending on periods', () => {
    const sentence = `${'A'.repeat(98)}. `;
    const text = sentence.repeat(120);
    expect(text).toHaveLength(12_000);

    const chunks = splitIntoChunks(text, 5000, 200);

    expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
      [0, 5199],
      [5199, 10_399],
      [10_399, 12_000],
    ]);
    expect(chunks[0].text.endsWith('.')).toBe(true);
    expect(chunks[1].text.endsWith('.')).toBe(true);
    expect(chunks.map((chunk) => chunk.text).join('')).toBe(text);
  });

  it('hard cuts at the end of the overlap window when no period is found', () => {
    const chunks = splitIntoChunks('x'.repeat(250), 100, 20);
    expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
      [0, 120],
      [120, 240],
      [240, 250],
    ]);
  });

  it('cuts exactly at maxLength without an overlap window', () => {
    expect(splitIntoChunks('abcdefghij', 3, 0).map((chunk) => chunk.text)).toEqual(['abc', 'def', 'ghi', 'j']);
  });

  it('reproduces the input when the chunks are concatenated', () => {
    const samples = [
      'One. Two. Three. Four. '.repeat(50),
      'No periods at all in this rather long line of text '.repeat(20),
      '...'.repeat(40),
    ];
    for (const text of samples) {
      for (const [maxLength, overlap] of [
        [37, 5],
        [10, 0],
        [64, 64],
      ]) {
        const chunks = splitIntoChunks(text, maxLength, overlap);
        expect(chunks.map((chunk) => chunk.text).join('')).toBe(text);
        expect(chunks.every((chunk) => chunk.start < chunk.end)).toBe(true);
        chunks.slice(1).forEach((chunk, position) => expect(chunk.start).toBe(chunks[position].end));
      }
    }
  });

  it('rejects invalid bounds', () => {
    expect(() => splitIntoChunks('text', 0, 10)).toThrow(RangeError);
    expect(() => splitIntoChunks('text', 10, -1)).toThrow(RangeError);
  });
});

describe('findChunkBoundary', () => {
  it('prefers the period furthest into the window', () => {
    const text = 'Aa. Bb. Cc. Dd';
    // window [4, 12): periods at 6 and 10
    expect(findChunkBoundary(text, 0, 8, 4)).toBe(11);
  });
});

describe('delimited units', () => {
  it('joins and splits with the unit separator', () => {
    const joined = joinDelimited(['Hello ', 'world.']);
    expect(joined).toBe(`Hello ${SEGMENT_DELIMITER}world.`);
    expect(splitDelimited(joined, 2)).toEqual({ parts: ['Hello ', 'world.'], receivedCount: 2, mismatch: false });
  });

  it('pads missing parts with empty strings', () => {
    expect(splitDelimited('Hallo', 3)).toEqual({ parts: ['Hallo', '', ''], receivedCount: 1, mismatch: true });
  });

  it('drops surplus parts', () => {
    const text = ['a', 'b', 'c'].join(SEGMENT_DELIMITER);
    expect(splitDelimited(text, 2)).toEqual({ parts: ['a', 'b'], receivedCount: 3, mismatch: true });
  });
});

describe('removeXmlIllegalCharacters', () => {
  it('drops control characters but keeps tabs and line breaks', () => {
    expect(removeXmlIllegalCharacters('a\u0000b\u0008c\td\ne\rf\uFFFF')).toBe('abc\td\ne\rf');
  });

  it('drops the delimiter unless asked to keep it', () => {
    const text = `Hallo${SEGMENT_DELIMITER}Welt.`;
    expect(removeXmlIllegalCharacters(text)).toBe('HalloWelt.');
    expect(removeXmlIllegalCharacters(text, true)).toBe(text);
  });

  it('keeps paired surrogates and drops lone ones', () => {
    expect(removeXmlIllegalCharacters('ok \u{1F600}\uD800')).toBe('ok \u{1F600}');
  });
});
