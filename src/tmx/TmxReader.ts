/**
 * TMX Reader
 * Parses a translation memory with xmldom and hands out its translation units
 * one at a time.
 */

import * as fs from 'node:fs';
import { DOMParser } from '@xmldom/xmldom';
import { TmxFormatError } from '../bridge/errors';
import { TmxSource, TranslationUnit } from '../bridge/types';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

// Inline elements whose content is native markup, not translatable text
const NATIVE_CODE_ELEMENTS = new Set(['bpt', 'ept', 'it', 'ph', 'ut']);

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function languageOf(tuv: Element): string | null {
  return tuv.getAttribute('xml:lang') || tuv.getAttribute('lang') || null;
}

function childElements(parent: Element, tagName: string): Element[] {
  const found: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes[i];
    if (isElement(child) && child.tagName === tagName) found.push(child);
  }
  return found;
}

/**
 * Text of a <seg>, leaving out the native codes of inline elements
 */
function segmentText(node: Node): string {
  let text = '';
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes[i];
    if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
      text += child.nodeValue ?? '';
    } else if (isElement(child) && !NATIVE_CODE_ELEMENTS.has(child.tagName)) {
      text += segmentText(child);
    }
  }
  return text;
}

export class TmxReader implements TmxSource {
  private units: Element[];

  constructor(xml: string) {
    const errors: string[] = [];
    const doc = new DOMParser({
      errorHandler: {
        // xmldom reports some well-formedness errors, such as a mismatched end tag, as warnings
        warning: (msg: string) => errors.push(msg),
        error: (msg: string) => errors.push(msg),
        fatalError: (msg: string) => errors.push(msg),
      },
    }).parseFromString(xml, 'text/xml');

    if (errors.length > 0) {
      throw new TmxFormatError(`Invalid TMX document: ${errors[0]}`);
    }

    const root = doc.documentElement;
    if (!root || root.tagName !== 'tmx') {
      throw new TmxFormatError('Invalid TMX document: missing <tmx> root element');
    }

    const body = childElements(root, 'body')[0];
    this.units = body ? childElements(body, 'tu') : [];
  }

  static fromFile(filePath: string): TmxReader {
    if (!fs.existsSync(filePath)) {
      throw new TmxFormatError(`Can't open [${filePath}] file for reading`);
    }
    return new TmxReader(fs.readFileSync(filePath, 'utf8'));
  }

  /**
   * Language codes used by the document's <tuv> elements, in first-seen order
   */
  languages(): string[] {
    const seen = new Set<string>();
    for (const tu of this.units) {
      for (const tuv of childElements(tu, 'tuv')) {
        const lang = languageOf(tuv);
        if (lang) seen.add(lang);
      }
    }
    return [...seen];
  }

  /**
   * Every call starts again from the first unit
   */
  *translationUnits(): Generator<TranslationUnit> {
    for (const tu of this.units) {
      const unit: Record<string, string> = {};
      for (const tuv of childElements(tu, 'tuv')) {
        const lang = languageOf(tuv);
        const seg = childElements(tuv, 'seg')[0];
        if (lang && seg && !(lang in unit)) unit[lang] = segmentText(seg);
      }
      yield unit;
    }
  }
}
