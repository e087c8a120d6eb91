/**
 * In-process corpus engine.
 * Indexes staging files and alignment maps the way the external tools do,
 * without touching a registry. Used for dry runs and tests.
 */

import * as fs from 'node:fs';
import { alignmentKey, parseAlignmentMap, parseStaging } from '../bridge/staging';
import {
  AlignmentAttribute,
  AlignmentBlock,
  AlignmentImportRequest,
  Corpus,
  CorpusBuilder,
  CorpusEngine,
  EncodeRequest,
  StepResult,
} from '../bridge/types';

type Span = [start: number, end: number];

export class MemoryCorpus implements Corpus {
  private regions = new Map<string, Span>();
  private alignments = new Map<string, AlignmentBlock[]>();
  indexed = false;

  constructor(
    public readonly name: string,
    private tokens: string[] = []
  ) {}

  words(start: number, end: number): string[] {
    return this.tokens.slice(Math.max(0, start), end + 1);
  }

  alignment(attributeName: string): AlignmentAttribute | null {
    const blocks = this.alignments.get(attributeName.toLowerCase());
    if (!blocks) return null;
    return {
      blockCount: blocks.length,
      block: (index: number) => {
        const block = blocks[index];
        if (!block) throw new RangeError(`No alignment block ${index} in ${this.name}`);
        return block;
      },
    };
  }

  /**
   * Append a region of tokens keyed by its `tu` identifier
   */
  addRegion(id: number, tokens: readonly string[]): Span {
    const start = this.tokens.length;
    this.tokens.push(...tokens);
    const span: Span = [start, this.tokens.length - 1];
    this.regions.set(alignmentKey(id), span);
    return span;
  }

  region(key: string): Span | undefined {
    return this.regions.get(key);
  }

  setAlignment(attributeName: string, blocks: AlignmentBlock[]): void {
    this.alignments.set(attributeName.toLowerCase(), blocks);
  }

  get size(): number {
    return this.tokens.length;
  }
}

export class MemoryCorpusEngine implements CorpusEngine {
  private corpora = new Map<string, MemoryCorpus>();

  open(name: string): Corpus | null {
    return this.corpora.get(name.toUpperCase()) ?? null;
  }

  get(name: string): MemoryCorpus | undefined {
    return this.corpora.get(name.toUpperCase());
  }

  register(corpus: MemoryCorpus): MemoryCorpus {
    this.corpora.set(corpus.name.toUpperCase(), corpus);
    return corpus;
  }
}

export class MemoryCorpusBuilder implements CorpusBuilder {
  constructor(public readonly engine: MemoryCorpusEngine = new MemoryCorpusEngine()) {}

  encode(request: EncodeRequest): StepResult {
    let text: string;
    try {
      text = fs.readFileSync(request.stagingFile, 'utf8');
    } catch (error) {
      return failure('encode', error);
    }

    const corpus = new MemoryCorpus(request.corpusName.toUpperCase());
    for (const region of parseStaging(text)) {
      if (region.tokens.length > 0) corpus.addRegion(region.id, region.tokens);
    }
    this.engine.register(corpus);
    return { ok: true };
  }

  makeIndex(corpusId: string): StepResult {
    const corpus = this.engine.get(corpusId);
    if (!corpus) return failure('make', `corpus ${corpusId} was never encoded`);
    corpus.indexed = true;
    return { ok: true };
  }

  importAlignment(request: AlignmentImportRequest): StepResult {
    let text: string;
    try {
      text = fs.readFileSync(request.alignmentFile, 'utf8');
    } catch (error) {
      return failure('align-import', error);
    }

    const map = parseAlignmentMap(text);
    const source = this.engine.get(map.sourceCorpus);
    const target = this.engine.get(map.targetCorpus);
    if (!source?.indexed || !target?.indexed) {
      return failure(
        'align-import',
        `corpora ${map.sourceCorpus} and ${map.targetCorpus} must be indexed first`
      );
    }

    const blocks: AlignmentBlock[] = [];
    for (const [sourceKey, targetKey] of map.pairs) {
      const sourceSpan = source.region(sourceKey);
      const targetSpan = target.region(targetKey);
      if (!sourceSpan || !targetSpan) {
        return failure('align-import', `unknown region ${sourceKey} / ${targetKey}`);
      }

      const [sourceStart, sourceEnd] = sourceSpan;
      const [targetStart, targetEnd] = targetSpan;
      blocks.push(
        request.inverse
          ? { sourceStart: targetStart, sourceEnd: targetEnd, targetStart: sourceStart, targetEnd: sourceEnd }
          : { sourceStart, sourceEnd, targetStart, targetEnd }
      );
    }

    if (request.inverse) target.setAlignment(source.name, blocks);
    else source.setAlignment(target.name, blocks);
    return { ok: true };
  }
}

function failure(step: string, cause: unknown): StepResult {
  const message = cause instanceof Error ? cause.message : String(cause);
  return { ok: false, step, message, exitCode: null };
}
