import JSZip from 'jszip';

export const WORD_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const ROOT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const DOCUMENT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
</Relationships>`;

const STYLES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:styles xmlns:w="${WORD_NS}">
  <w:style w:type="paragraph" w:default="1" w:styleId="Normal">
    <w:name w:val="Normal"/>
  </w:style>
</w:styles>`;

export const escapeXml = (text: string) =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/** `<w:r>` with one text leaf; `properties` is the inner markup of `w:rPr`. */
export const run = (text: string, properties?: string) =>
  `<w:r>${properties === undefined ? '' : `<w:rPr>${properties}</w:rPr>`}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;

export const paragraph = (...runs: string[]) => `<w:p>${runs.join('')}</w:p>`;

export const wordPart = (root: 'document' | 'hdr' | 'ftr', content: string) => {
  const inner = root === 'document' ? `<w:body>${content}</w:body>` : content;
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\r\n<w:${root} xmlns:w="${WORD_NS}">${inner}</w:${root}>`;
};

export type DocxFixture = {
  /** Inner markup of `w:body` */
  body: string;
  /** Extra members, e.g. `{ 'word/header1.xml': wordPart('hdr', ...) }` */
  parts?: Record<string, string | Uint8Array>;
  /** Members written without compression */
  stored?: string[];
  /** Leave out `word/document.xml` */
  omitDocument?: boolean;
};

export const buildDocx = async (fixture: DocxFixture): Promise<Buffer> => {
  const zip = new JSZip();
  const stored = new Set(fixture.stored ?? []);
  const add = (name: string, content: string | Uint8Array) => {
    zip.file(name, content, { compression: stored.has(name) ? 'STORE' : 'DEFLATE', createFolders: false });
  };

  add('[Content_Types].xml', CONTENT_TYPES);
  add('_rels/.rels', ROOT_RELS);
  if (!fixture.omitDocument) {
    add('word/document.xml', wordPart('document', fixture.body));
  }
  add('word/_rels/document.xml.rels', DOCUMENT_RELS);
  add('word/styles.xml', STYLES);
  for (const [name, content] of Object.entries(fixture.parts ?? {})) {
    add(name, content);
  }

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
};

export const readMembers = async (archive: Uint8Array): Promise<Map<string, Uint8Array>> => {
  const zip = await JSZip.loadAsync(archive);
  const members = new Map<string, Uint8Array>();
  for (const file of Object.values(zip.files)) {
    members.set(file.name, await file.async('uint8array'));
  }
  return members;
};

export const readMemberText = async (archive: Uint8Array, name: string): Promise<string> => {
  const file = (await JSZip.loadAsync(archive)).file(name);
  if (!file) {
    throw new Error(`${name} not found in archive`);
  }
  return file.async('string');
};

/** Text of every `w:t` in a serialised part, in document order. */
export const textLeaves = (xml: string): string[] =>
  Array.from(xml.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>|<w:t(?:\s[^>]*)?\/>/g), (match) => match[1] ?? '');
