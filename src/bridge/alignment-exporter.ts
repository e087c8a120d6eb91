/**
 * Alignment Exporter
 * Walks an alignment attribute block by block and turns every block back
 * into a translation unit.
 */

import { CorpusNotFoundError, NoAlignmentDataError } from './errors';
import {
  AlignmentAttribute,
  Corpus,
  CorpusEngine,
  LanguagePair,
  TmxSink,
  TranslationUnit,
} from './types';

export const TOOL_NAME = 'tmx-corpus-bridge';
export const TOOL_VERSION = '0.3.0';

export interface AlignmentExportRequest {
  sourceCorpus: string;
  targetCorpus: string;
  pair: LanguagePair;
}

/**
 * Translation units in block order. Block order, not any original TMX order,
 * decides the order of the output.
 */
export function* alignedUnits(
  source: Corpus,
  target: Corpus,
  pair: LanguagePair
): Generator<TranslationUnit> {
  const alignment = resolveAlignment(source, target);

  for (let i = 0; i < alignment.blockCount; i++) {
    const block = alignment.block(i);
    yield {
      [pair.source]: spanText(source, block.sourceStart, block.sourceEnd),
      [pair.target]: spanText(target, block.targetStart, block.targetEnd),
    };
  }
}

function resolveAlignment(source: Corpus, target: Corpus): AlignmentAttribute {
  const alignment = source.alignment(target.name.toLowerCase());
  if (!alignment || alignment.blockCount === 0) {
    throw new NoAlignmentDataError(source.name, target.name);
  }
  return alignment;
}

/**
 * Degenerate spans (end before start, or unaligned negative positions) read as ''
 */
function spanText(corpus: Corpus, start: number, end: number): string {
  if (start < 0 || end < start) return '';
  return corpus.words(start, end).join(' ');
}

/**
 * Open both corpora and write every aligned block to the sink.
 * Returns the number of translation units written.
 */
export function exportAlignment(
  engine: CorpusEngine,
  request: AlignmentExportRequest,
  sink: TmxSink
): number {
  const source = openCorpus(engine, request.sourceCorpus);
  const target = openCorpus(engine, request.targetCorpus);

  // Resolve before begin() so a missing alignment leaves no half-written TMX
  resolveAlignment(source, target);

  let count = 0;
  sink.begin(TOOL_NAME, TOOL_VERSION);
  for (const unit of alignedUnits(source, target, request.pair)) {
    sink.addTU(unit);
    count++;
  }
  sink.end();

  return count;
}

function openCorpus(engine: CorpusEngine, name: string): Corpus {
  const corpus = engine.open(name.toUpperCase());
  if (!corpus) throw new CorpusNotFoundError(name);
  return corpus;
}
