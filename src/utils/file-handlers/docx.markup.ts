import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { removeXmlIllegalCharacters } from '../../services/segmentation.service';

export const WORD_NAMESPACE = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

const ELEMENT_NODE = 1;

/** Run content that ends a merged segment: text on either side cannot be joined. */
const BREAKING_ELEMENTS = new Set([
  'br',
  'cr',
  'tab',
  'ptab',
  'sym',
  'drawing',
  'pict',
  'object',
  'fldChar',
  'footnoteReference',
  'endnoteReference',
  'commentReference',
  'noBreakHyphen',
  'softHyphen',
]);

const isElement = (node: Node | null): node is Element => node !== null && node.nodeType === ELEMENT_NODE;

const isWordElement = (node: Node, localName: string): node is Element =>
  isElement(node) && node.namespaceURI === WORD_NAMESPACE && node.localName === localName;

const childElements = (element: Element): Element[] => {
  const children: Element[] = [];
  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (isElement(child)) {
      children.push(child);
    }
  }
  return children;
};

/**
 * Order-independent serialisation of a formatting element: name, sorted attributes
 * and sorted children, so two equivalent `w:rPr` always produce the same key.
 */
export const canonicalFormatKey = (element: Element): string => {
  const attributes: string[] = [];
  for (let i = 0; i < element.attributes.length; i++) {
    const attribute = element.attributes.item(i);
    if (attribute) {
      attributes.push(`${attribute.name}=${attribute.value}`);
    }
  }
  attributes.sort();
  const children = childElements(element).map(canonicalFormatKey).sort();
  return `${element.nodeName}[${attributes.join(',')}](${children.join('')})`;
};

export type FormatDescriptor = {
  key: string;
  /** The enclosing run's `w:rPr`, or `null` for an unformatted run */
  properties: Element | null;
};

export class TextLeaf {
  constructor(
    readonly element: Element,
    readonly index: number,
    readonly paragraphIndex: number,
    readonly format: FormatDescriptor,
    /** Element holding the leaf's run (paragraph, hyperlink, content control, ...) */
    readonly container: Node | null,
  ) {}

  get text(): string {
    return this.element.textContent ?? '';
  }

  set text(raw: string) {
    const { element } = this;
    const value = removeXmlIllegalCharacters(raw);
    while (element.firstChild) {
      element.removeChild(element.firstChild);
    }
    if (value) {
      element.appendChild(element.ownerDocument.createTextNode(value));
    }
    if (value !== value.trim()) {
      element.setAttributeNS(XML_NAMESPACE, 'xml:space', 'preserve');
    }
  }
}

export type MergedSegment = {
  index: number;
  /** First leaf of the segment; receives the whole text */
  anchor: TextLeaf;
  leaves: TextLeaf[];
  text: string;
  formatKey: string;
  paragraphIndex: number;
};

type RunToken = { kind: 'leaf'; leaf: TextLeaf } | { kind: 'break' };

export class MarkupParseError extends Error {}

export class MarkupTree {
  private constructor(
    readonly document: Document,
    private readonly declaration: string | null,
  ) {}

  static parse(source: string | Uint8Array): MarkupTree {
    const xml = typeof source === 'string' ? source : new TextDecoder('utf-8').decode(source);
    const errors: string[] = [];
    const parser = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: (message: string) => {
          errors.push(message);
        },
        fatalError: (message: string) => {
          errors.push(message);
        },
      },
    });

    let document: Document;
    try {
      document = parser.parseFromString(xml, 'text/xml');
    } catch (error) {
      throw new MarkupParseError(`Failed to parse markup: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
    if (errors.length > 0 || !document.documentElement) {
      throw new MarkupParseError(`Failed to parse markup: ${errors[0] ?? 'missing root element'}`);
    }

    const declaration = /^\s*(<\?xml[^>]*\?>)/.exec(xml)?.[1] ?? null;
    return new MarkupTree(document, declaration);
  }

  /** Text and break tokens in document order. */
  private tokens(): RunToken[] {
    const tokens: RunToken[] = [];
    let leafIndex = 0;
    let paragraphCount = 0;

    const visit = (element: Element, paragraphIndex: number, run: Element | null) => {
      for (const child of childElements(element)) {
        if (child.namespaceURI === WORD_NAMESPACE) {
          if (child.localName === 't') {
            const properties = run ? (childElements(run).find((node) => isWordElement(node, 'rPr')) ?? null) : null;
            const format = { key: properties ? canonicalFormatKey(properties) : '', properties };
            const container = run ? run.parentNode : child.parentNode;
            tokens.push({ kind: 'leaf', leaf: new TextLeaf(child, leafIndex++, paragraphIndex, format, container) });
            continue;
          }
          if (BREAKING_ELEMENTS.has(child.localName ?? '')) {
            tokens.push({ kind: 'break' });
            // Drawings and objects may hold text boxes with paragraphs of their own
          }
          if (child.localName === 'p') {
            visit(child, paragraphCount++, null);
            tokens.push({ kind: 'break' });
            continue;
          }
          if (child.localName === 'r') {
            visit(child, paragraphIndex, child);
            continue;
          }
        }
        visit(child, paragraphIndex, run);
      }
    };

    visit(this.document.documentElement, -1, null);
    return tokens;
  }

  /** Every `w:t` leaf in document order; each call walks the tree again. */
  leaves(): TextLeaf[] {
    const leaves: TextLeaf[] = [];
    for (const token of this.tokens()) {
      if (token.kind === 'leaf') {
        leaves.push(token.leaf);
      }
    }
    return leaves;
  }

  /**
   * Group adjacent non-empty leaves that share paragraph, run container and format key.
   * The anchor of each group takes the concatenated text and the other leaves are emptied.
   */
  mergeAdjacent(): MergedSegment[] {
    const segments: MergedSegment[] = [];
    let current: TextLeaf[] = [];

    const close = () => {
      const [anchor] = current;
      if (!anchor) return;
      const text = current.map((leaf) => leaf.text).join('');
      const segment: MergedSegment = {
        index: segments.length,
        anchor,
        leaves: current,
        text,
        formatKey: anchor.format.key,
        paragraphIndex: anchor.paragraphIndex,
      };
      this.writeBack(segment, text);
      segments.push(segment);
      current = [];
    };

    for (const token of this.tokens()) {
      if (token.kind === 'break') {
        close();
        continue;
      }
      const { leaf } = token;
      if (!leaf.text) continue;
      const previous = current[current.length - 1];
      const continues =
        previous !== undefined &&
        previous.paragraphIndex === leaf.paragraphIndex &&
        previous.container === leaf.container &&
        previous.format.key === leaf.format.key;
      if (!continues) {
        close();
      }
      current.push(leaf);
    }
    close();
    return segments;
  }

  /** The anchor receives `text`; every other leaf of the segment is left empty. */
  writeBack(segment: MergedSegment, text: string): void {
    segment.leaves.forEach((leaf, position) => {
      const value = position === 0 ? text : '';
      if (leaf.text !== value) {
        leaf.text = value;
      }
    });
  }

  /**
   * Write one part per segment. Missing parts leave their segment empty and surplus
   * parts are ignored. Returns whether the part count differed from the segment count.
   */
  writeBackParts(segments: MergedSegment[], parts: string[]): boolean {
    segments.forEach((segment, position) => this.writeBack(segment, parts[position] ?? ''));
    return parts.length !== segments.length;
  }

  serialize(): string {
    const xml = new XMLSerializer().serializeToString(this.document);
    if (this.declaration && !xml.startsWith('<?xml')) {
      return `${this.declaration}\r\n${xml}`;
    }
    return xml;
  }
}
