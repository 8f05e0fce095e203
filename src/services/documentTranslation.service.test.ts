import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { translateBuffer, translateDocument, translateText } from './documentTranslation.service';
import {
  EmptyTranslationResultError,
  MalformedPackageError,
  UnsupportedFormatError,
} from '../utils/pipelineError';
import {
  buildDocx,
  paragraph,
  readMemberText,
  readMembers,
  run,
  textLeaves,
  wordPart,
} from '../test-utils/docxFixture';
import { FakeTranslator, dictionaryTranslator, wrapTranslation } from '../test-utils/fakes';
import { SEGMENT_DELIMITER } from './segmentation.service';

describe('translateDocument', () => {
  let dir: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-translate-'));
    input = path.join(dir, 'input.docx');
    output = path.join(dir, 'output.docx');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('replaces the text of a single paragraph and leaves every other member untouched', async () => {
    const source = await buildDocx({ body: paragraph(run('Hello world.')), stored: ['word/styles.xml'] });
    await fs.writeFile(input, source);
    const translator = dictionaryTranslator({ 'Hello world.': 'Hallo Welt.' });

    const report = await translateDocument(input, output, { sourceLanguage: 'en', targetLanguage: 'German' }, { translator });

    expect(report).toMatchObject({ unitsTotal: 1, translated: 1, failed: 0, warnings: [] });
    expect(translator.requests.map((request) => [request.text, request.targetLanguage])).toEqual([
      ['Hello world.', 'German'],
    ]);

    const translated = await fs.readFile(output);
    expect(textLeaves(await readMemberText(translated, 'word/document.xml'))).toEqual(['Hallo Welt.']);

    const before = await readMembers(source);
    const after = await readMembers(translated);
    expect([...after.keys()]).toEqual([...before.keys()]);
    for (const [name, bytes] of before) {
      if (name !== 'word/document.xml') {
        expect(after.get(name)).toEqual(bytes);
      }
    }
    expect((await fs.readdir(dir)).sort()).toEqual(['input.docx', 'output.docx']);
  });

  it('translates differently formatted runs separately and keeps their formatting', async () => {
    await fs.writeFile(input, await buildDocx({ body: paragraph(run('Hello ', '<w:b/>'), run('world.')) }));
    const translator = dictionaryTranslator({ Hello: 'Hallo', 'world.': 'Welt.' });

    await translateDocument(input, output, { sourceLanguage: 'en' }, { translator });

    expect(translator.texts).toEqual(['Hello ', 'world.']);
    const xml = await readMemberText(await fs.readFile(output), 'word/document.xml');
    expect(xml).toContain('<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Hallo </w:t></w:r>');
    expect(xml).toContain('<w:r><w:t xml:space="preserve">Welt.</w:t></w:r>');
  });

  it('sends a 12,000 character paragraph as three chunks', async () => {
    const text = `${'A'.repeat(98)}. `.repeat(120);
    await fs.writeFile(input, await buildDocx({ body: paragraph(run(text)) }));
    const translator = new FakeTranslator((request) => wrapTranslation(request.text.toLowerCase()));

    const report = await translateDocument(
      input,
      output,
      { sourceLanguage: 'en', maxChunkLength: 5000, overlap: 200 },
      { translator },
    );

    expect(translator.requests.map((request) => request.text.length)).toEqual([5199, 5200, 1601]);
    expect(report.translated).toBe(3);
    const [leaf] = textLeaves(await readMemberText(await fs.readFile(output), 'word/document.xml'));
    expect(leaf).toBe(text.toLowerCase());
  });

  it('writes no output and removes its working directory when every unit fails', async () => {
    await fs.writeFile(input, await buildDocx({ body: paragraph(run('Hello world.')) }));
    const translator = new FakeTranslator(() => {
      throw new Error('service down');
    });

    await expect(translateDocument(input, output, { sourceLanguage: 'en' }, { translator })).rejects.toBeInstanceOf(
      EmptyTranslationResultError,
    );
    expect(await fs.readdir(dir)).toEqual(['input.docx']);
  });

  it('rejects an input that is not a document package', async () => {
    await fs.writeFile(input, 'plain bytes');

    await expect(
      translateDocument(input, output, {}, { translator: dictionaryTranslator() }),
    ).rejects.toBeInstanceOf(MalformedPackageError);
    expect(await fs.readdir(dir)).toEqual(['input.docx']);
  });

  it('rejects a missing input file', async () => {
    await expect(
      translateDocument(path.join(dir, 'nope.docx'), output, {}, { translator: dictionaryTranslator() }),
    ).rejects.toBeInstanceOf(MalformedPackageError);
  });
});

describe('translateBuffer', () => {
  it('rejects formats without a handler', async () => {
    await expect(
      translateBuffer(Buffer.from('%PDF'), 'scan.pdf', {}, { translator: dictionaryTranslator() }),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('translates header parts alongside the body', async () => {
    const docx = await buildDocx({
      body: paragraph(run('Body text.')),
      parts: { 'word/header1.xml': wordPart('hdr', paragraph(run('Header text.'))) },
    });
    const translator = dictionaryTranslator({ 'Body text.': 'Haupttext.', 'Header text.': 'Kopfzeile.' });

    const { output } = await translateBuffer(docx, 'report.docx', { sourceLanguage: 'en' }, { translator });

    expect(textLeaves(await readMemberText(output, 'word/header1.xml'))).toEqual(['Kopfzeile.']);
    expect(translator.requests[1].context).toBe('Haupttext.');
  });

  it('writes no separator or control character a model sends back', async () => {
    const docx = await buildDocx({ body: paragraph(run('Hello world.')) });
    const translator = new FakeTranslator(() => wrapTranslation(`Hallo${SEGMENT_DELIMITER} Welt.\u000B`));

    const { output } = await translateBuffer(docx, 'letter.docx', { sourceLanguage: 'en' }, { translator });
    const xml = await readMemberText(output, 'word/document.xml');

    expect(textLeaves(xml)).toEqual(['Hallo Welt.']);
    expect(xml).not.toMatch(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/);
  });
});

describe('translateText', () => {
  it('translates chunk by chunk and keeps a failed chunk in the source language', async () => {
    const translator = new FakeTranslator((request, call) =>
      call === 1 ? null : wrapTranslation(request.text.replace('one', 'eins').replace('3', 'drei')),
    );

    const { text, report } = await translateText(
      'Alpha one. Bravo two. Charlie 3.',
      { sourceLanguage: 'en', maxChunkLength: 11, overlap: 2 },
      { translator },
    );

    expect(text).toBe('Alpha eins. Bravo two. Charlie drei.');
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatchObject({ kind: 'TranslationUnitFailed', unitIndex: 1 });
  });

  it('returns empty text unchanged', async () => {
    const translator = dictionaryTranslator();
    const { text, report } = await translateText('', {}, { translator });

    expect(text).toBe('');
    expect(report.unitsTotal).toBe(0);
    expect(translator.requests).toHaveLength(0);
  });
});
