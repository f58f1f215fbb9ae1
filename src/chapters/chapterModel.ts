import { DOMParser } from '@xmldom/xmldom';
import { MalformedChapterStructureError, NoSuchEditionError } from '../utils/errors';
import { formatTimecode, parseTimecode, Timecode } from '../timeline/timecode';
import type { SegmentUidFormat } from './types';
import { normalizeSegmentUid } from './segmentUid';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;
const COMMENT_NODE = 8;

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Element, tagName?: string): Element[] {
  const children: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (node && isElement(node) && (!tagName || node.nodeName === tagName)) {
      children.push(node);
    }
  }
  return children;
}

function firstChildElement(parent: Element, tagName: string): Element | undefined {
  return childElements(parent, tagName)[0];
}

function setElementText(element: Element, text: string): void {
  while (element.firstChild) {
    element.removeChild(element.firstChild);
  }
  const document = element.ownerDocument;
  element.appendChild(document.createTextNode(text));
}

/**
 * One top-level ChapterAtom of an edition. Setting the bounds rewrites the
 * underlying XML so the serialized tree follows every change.
 */
export class ChapterEntry {
  readonly enabled: boolean;
  readonly segmentUid?: string;
  readonly uidFormat: SegmentUidFormat;

  private element: Element;
  private startElement: Element;
  private endElement: Element;

  constructor(element: Element, startElement: Element, endElement: Element) {
    this.element = element;
    this.startElement = startElement;
    this.endElement = endElement;

    const flag = firstChildElement(element, 'ChapterFlagEnabled');
    this.enabled = flag ? parseInt(flag.textContent ?? '1', 10) !== 0 : true;

    const uid = firstChildElement(element, 'ChapterSegmentUID');
    const format = uid?.getAttribute('format');
    this.uidFormat = format === 'ascii' ? 'ascii' : 'hex';
    if (uid) {
      const normalized = normalizeSegmentUid(uid.textContent ?? '', this.uidFormat);
      this.segmentUid = normalized || undefined;
    }
  }

  get startTime(): Timecode {
    return parseTimecode(this.startElement.textContent ?? '');
  }

  set startTime(value: Timecode) {
    setElementText(this.startElement, formatTimecode(value));
  }

  get endTime(): Timecode {
    return parseTimecode(this.endElement.textContent ?? '');
  }

  set endTime(value: Timecode) {
    setElementText(this.endElement, formatTimecode(value));
  }

  hasSegmentUidElement(): boolean {
    return firstChildElement(this.element, 'ChapterSegmentUID') !== undefined;
  }

  /**
   * Drops the cross-file reference (and its edition UID companion) from the atom
   */
  removeSegmentUid(): void {
    for (const tag of ['ChapterSegmentUID', 'ChapterSegmentEditionUID']) {
      for (const child of childElements(this.element, tag)) {
        this.element.removeChild(child);
      }
    }
  }
}

export interface ChapterEdition {
  element: Element;
  isDefault: boolean;
  entries: ChapterEntry[];
}

/**
 * In-memory Matroska chapter tree (Chapters > EditionEntry > ChapterAtom)
 */
export class ChapterModel {
  private document: Document;
  private root: Element;

  private constructor(document: Document, root: Element) {
    this.document = document;
    this.root = root;
  }

  static parse(xml: string): ChapterModel {
    const errors: string[] = [];
    let document: Document;

    try {
      document = new DOMParser({
        errorHandler: (level: string, message: unknown) => {
          if (level !== 'warning') errors.push(String(message));
        },
      }).parseFromString(xml, 'text/xml');
    } catch (error) {
      throw new MalformedChapterStructureError(
        error instanceof Error ? error.message : String(error)
      );
    }

    if (errors.length > 0) {
      throw new MalformedChapterStructureError(errors[0] ?? 'parse error');
    }

    const root = document.documentElement;
    if (!root || root.nodeName !== 'Chapters') {
      throw new MalformedChapterStructureError('missing <Chapters> root element');
    }

    return new ChapterModel(document, root);
  }

  /**
   * True when any chapter references another file's segment
   */
  static isLinked(xml: string): boolean {
    return xml.includes('<ChapterSegmentUID');
  }

  get editions(): ChapterEdition[] {
    return childElements(this.root, 'EditionEntry').map((element) => {
      const flag = firstChildElement(element, 'EditionFlagDefault');
      const isDefault = flag ? (flag.textContent ?? '').trim() !== '0' : true;

      const entries: ChapterEntry[] = [];
      for (const atom of childElements(element, 'ChapterAtom')) {
        const start = firstChildElement(atom, 'ChapterTimeStart');
        const end = firstChildElement(atom, 'ChapterTimeEnd');
        // Atoms without both bounds cannot be placed on the timeline
        if (!start || !end) continue;
        entries.push(new ChapterEntry(atom, start, end));
      }

      return { element, isDefault, entries };
    });
  }

  /**
   * Returns the 1-based edition
   */
  edition(index: number): ChapterEdition {
    const editions = this.editions;
    const edition = Number.isInteger(index) && index >= 1 ? editions[index - 1] : undefined;
    if (!edition) {
      throw new NoSuchEditionError(index, editions.length);
    }
    return edition;
  }

  /**
   * Keeps only the 1-based edition, discarding every other one
   */
  selectEdition(index: number): void {
    const selected = this.edition(index);
    for (const edition of this.editions) {
      if (edition.element !== selected.element) {
        this.root.removeChild(edition.element);
      }
    }
  }

  /**
   * Removes editions flagged EditionFlagDefault=0 and returns how many were dropped
   */
  dropNonDefaultEditions(): number {
    let dropped = 0;
    for (const edition of this.editions) {
      if (!edition.isDefault) {
        this.root.removeChild(edition.element);
        dropped++;
      }
    }
    return dropped;
  }

  /**
   * The flattened tree is no longer an ordered timeline
   */
  clearOrderedFlag(): void {
    for (const edition of childElements(this.root, 'EditionEntry')) {
      for (const flag of childElements(edition, 'EditionFlagOrdered')) {
        edition.removeChild(flag);
      }
    }
  }

  serialize(): string {
    const lines: string[] = [XML_DECLARATION];

    const doctype = this.document.doctype;
    if (doctype) {
      let declaration = `<!DOCTYPE ${doctype.name}`;
      if (doctype.publicId) {
        declaration += ` PUBLIC "${doctype.publicId}" "${doctype.systemId}"`;
      } else if (doctype.systemId) {
        declaration += ` SYSTEM "${doctype.systemId}"`;
      }
      lines.push(`${declaration}>`);
    }

    writeElement(this.root, 0, lines);
    return `${lines.join('\n')}\n`;
  }
}

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(text: string): string {
  return escapeText(text).replace(/"/g, '&quot;');
}

function writeElement(element: Element, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);

  let open = `<${element.nodeName}`;
  for (let i = 0; i < element.attributes.length; i++) {
    const attribute = element.attributes.item(i);
    if (attribute) {
      open += ` ${attribute.name}="${escapeAttribute(attribute.value)}"`;
    }
  }

  const children: Node[] = [];
  for (let i = 0; i < element.childNodes.length; i++) {
    const node = element.childNodes.item(i);
    if (node) children.push(node);
  }

  const hasStructure = children.some(
    (node) => node.nodeType === ELEMENT_NODE || node.nodeType === COMMENT_NODE
  );

  if (!hasStructure) {
    const text = children
      .filter((node) => node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE)
      .map((node) => node.nodeValue ?? '')
      .join('');
    lines.push(
      text.length > 0
        ? `${indent}${open}>${escapeText(text)}</${element.nodeName}>`
        : `${indent}${open}/>`
    );
    return;
  }

  lines.push(`${indent}${open}>`);
  for (const node of children) {
    if (isElement(node)) {
      writeElement(node, depth + 1, lines);
    } else if (node.nodeType === COMMENT_NODE) {
      lines.push(`${'  '.repeat(depth + 1)}<!--${node.nodeValue ?? ''}-->`);
    } else if ((node.nodeValue ?? '').trim()) {
      lines.push(`${'  '.repeat(depth + 1)}${escapeText((node.nodeValue ?? '').trim())}`);
    }
  }
  lines.push(`${indent}</${element.nodeName}>`);
}
