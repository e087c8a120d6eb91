/**
 * TMX Writer
 * Emits a TMX 1.4 document incrementally: every translation unit is
 * serialized and written as soon as it is added.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { TextSink, TmxSink, TranslationUnit } from '../bridge/types';
import { BufferSink, FileSink } from '../utils/text-sink';

export interface TmxWriterOptions {
  /** Output file; the document is kept in memory when absent */
  output?: string;
  sourceLanguage?: string;
  adminLanguage?: string;
}

export class TmxWriter implements TmxSink {
  private file: FileSink | null = null;
  private buffer: BufferSink | null = null;
  private scratch: Document;
  private serializer = new XMLSerializer();
  private state: 'idle' | 'open' | 'closed' = 'idle';
  private count = 0;

  constructor(private options: TmxWriterOptions = {}) {
    this.scratch = new DOMParser().parseFromString('<tmx/>', 'text/xml');
  }

  begin(toolName: string, toolVersion: string): void {
    if (this.state !== 'idle') throw new Error('TMX document already started');
    this.state = 'open';

    // The output file is only created once there is a document to write
    if (this.options.output) {
      this.file = new FileSink(this.options.output);
    } else {
      this.buffer = new BufferSink();
    }

    const header = this.scratch.createElement('header');
    header.setAttribute('creationtool', toolName);
    header.setAttribute('creationtoolversion', toolVersion);
    header.setAttribute('segtype', 'sentence');
    header.setAttribute('o-tmf', 'plain text');
    header.setAttribute('adminlang', this.options.adminLanguage ?? 'en');
    header.setAttribute('srclang', this.options.sourceLanguage ?? '*all*');
    header.setAttribute('datatype', 'plaintext');

    this.write('<?xml version="1.0" encoding="UTF-8"?>\n');
    this.write('<tmx version="1.4">\n');
    this.write(`${this.serializer.serializeToString(header)}\n`);
    this.write('<body>\n');
  }

  addTU(unit: TranslationUnit): void {
    if (this.state !== 'open') throw new Error('addTU() called outside begin()/end()');

    const tu = this.scratch.createElement('tu');
    for (const [lang, text] of Object.entries(unit)) {
      if (text === undefined) continue;
      const tuv = this.scratch.createElement('tuv');
      tuv.setAttribute('xml:lang', lang);
      const seg = this.scratch.createElement('seg');
      seg.appendChild(this.scratch.createTextNode(text));
      tuv.appendChild(seg);
      tu.appendChild(tuv);
    }

    this.write(`${this.serializer.serializeToString(tu)}\n`);
    this.count++;
  }

  end(): void {
    if (this.state !== 'open') throw new Error('end() called before begin()');
    this.state = 'closed';
    this.write('</body>\n</tmx>\n');
    this.file?.close();
  }

  private write(chunk: string): void {
    const sink: TextSink | null = this.file ?? this.buffer;
    if (!sink) throw new Error('TMX output is not open');
    sink.write(chunk);
  }

  /**
   * Release the output file after a failed export; the partial file is left as is
   */
  abort(): void {
    this.state = 'closed';
    this.file?.close();
  }

  get written(): number {
    return this.count;
  }

  /**
   * The serialized document, when writing to memory
   */
  toString(): string {
    return this.buffer ? this.buffer.toString() : '';
  }
}
