import { describe, expect, it } from 'vitest';
import { TranslationContext, truncateContext } from './translationContext';

describe('truncateContext', () => {
  it('returns short text unchanged', () => {
    expect(truncateContext('Hallo Welt.', 1000)).toBe('Hallo Welt.');
  });

  it('starts the kept tail at a sentence boundary', () => {
    expect(truncateContext('First sentence. Second sentence. Third one.', 30)).toBe('Second sentence. Third one.');
  });

  it('keeps the raw tail when it holds no sentence boundary', () => {
    expect(truncateContext('abcdefghij', 4)).toBe('ghij');
  });

  it('recognises exclamation marks, question marks and line breaks as boundaries', () => {
    expect(truncateContext('Wait! Really?\nYes indeed.', 18)).toBe('Yes indeed.');
  });

  it('never exceeds the bound', () => {
    const inputs = ['', 'a', 'Short. Text.', 'x. '.repeat(500), 'No boundary here at all '.repeat(30)];
    for (const text of inputs) {
      for (const maxLength of [0, 1, 7, 50, 1000]) {
        expect(truncateContext(text, maxLength).length).toBeLessThanOrEqual(maxLength);
      }
    }
  });
});

describe('TranslationContext', () => {
  it('accumulates translations separated by a space', () => {
    const context = new TranslationContext(1000);
    context.update('Hallo Welt.');
    context.update('Wie geht es?');
    expect(context.value).toBe('Hallo Welt. Wie geht es?');
  });

  it('drops the oldest text once the bound is reached', () => {
    const context = new TranslationContext(20);
    context.update('Hallo Welt.');
    context.update('Wie geht es dir heute?');
    expect(context.value).toBe('e geht es dir heute?');
  });

  it('ignores whitespace-only updates', () => {
    const context = new TranslationContext(100, 'Vorher.');
    context.update('  \r\n');
    expect(context.value).toBe('Vorher.');
  });

  it('truncates the initial context and can be reset', () => {
    const context = new TranslationContext(10, 'Erster Satz. Zweiter.');
    expect(context.value).toBe('Zweiter.');
    context.reset();
    expect(context.value).toBe('');
  });
});
