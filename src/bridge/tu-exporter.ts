/**
 * TU Exporter
 * Streams translation units into two staging files and an alignment map that
 * share one contiguous identifier sequence.
 */

import { Tokenizer, WordTokenizer } from '../utils/tokenizer';
import { FileSink } from '../utils/text-sink';
import { StagingIOError } from './errors';
import {
  alignmentHeader,
  alignmentLine,
  corpusId,
  escapeMarkup,
  splitOnWhitespace,
  stagingBlock,
} from './staging';
import { LanguagePair, TextSink, TranslationUnit } from './types';

export const DEFAULT_PROGRESS_INTERVAL = 1000;

export interface StagingSinks {
  source: TextSink;
  target: TextSink;
  alignment: TextSink;
}

export interface StagingPaths {
  source: string;
  target: string;
  alignment: string;
}

export interface TuExportOptions {
  pair: LanguagePair;
  /** Base name the two corpus names are derived from */
  baseName: string;
  tokenizeSource?: boolean;
  tokenizeTarget?: boolean;
  tokenizer?: Tokenizer;
  /** Called with the retained TU count every `progressInterval` TUs and once at the end */
  onProgress?: (retained: number) => void;
  progressInterval?: number;
}

export interface TuExportResult {
  retained: number;
  skipped: number;
}

export function exportTranslationUnits(
  units: Iterable<TranslationUnit>,
  sinks: StagingSinks,
  options: TuExportOptions
): TuExportResult {
  const { pair, baseName, onProgress } = options;
  const interval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);

  const tokenizer = options.tokenizer ?? new WordTokenizer();
  const tokenize = (text: string) => tokenizer.tokenize(text);
  const splitSource = options.tokenizeSource ? tokenize : splitOnWhitespace;
  const splitTarget = options.tokenizeTarget ? tokenize : splitOnWhitespace;

  sinks.alignment.write(
    alignmentHeader(corpusId(baseName, pair.source), corpusId(baseName, pair.target))
  );

  let id = 0;
  let skipped = 0;

  for (const unit of units) {
    const sourceText = unit[pair.source];
    const targetText = unit[pair.target];
    if (sourceText === undefined || targetText === undefined) {
      skipped++;
      continue;
    }

    const sourceTokens = splitSource(sourceText).map(escapeMarkup);
    const targetTokens = splitTarget(targetText).map(escapeMarkup);

    // An empty region would be dropped by the indexer and shift every later pair
    if (sourceTokens.length === 0 || targetTokens.length === 0) {
      skipped++;
      continue;
    }

    id++;
    sinks.alignment.write(alignmentLine(id));
    sinks.source.write(stagingBlock(id, sourceTokens));
    sinks.target.write(stagingBlock(id, targetTokens));

    if (id % interval === 0) reportProgress(onProgress, id);
  }

  if (id === 0 || id % interval !== 0) reportProgress(onProgress, id);
  return { retained: id, skipped };
}

function reportProgress(onProgress: ((retained: number) => void) | undefined, retained: number) {
  if (!onProgress) return;
  try {
    onProgress(retained);
  } catch (error) {
    console.warn('Progress callback failed:', error);
  }
}

/**
 * Same as exportTranslationUnits, onto three files. All of them are flushed
 * and closed before this returns; on failure the partial files stay behind
 * and must be discarded by the caller.
 */
export function writeStagingFiles(
  units: Iterable<TranslationUnit>,
  paths: StagingPaths,
  options: TuExportOptions
): TuExportResult {
  const opened: FileSink[] = [];

  try {
    const source = openStagingFile(paths.source, opened);
    const target = openStagingFile(paths.target, opened);
    const alignment = openStagingFile(paths.alignment, opened);

    const result = exportTranslationUnits(units, { source, target, alignment }, options);

    for (const sink of opened) {
      try {
        sink.close();
      } catch (error) {
        throw new StagingIOError(sink.filePath, error);
      }
    }
    return result;
  } catch (error) {
    for (const sink of opened) {
      try {
        sink.close();
      } catch (closeError) {
        console.warn(`Failed to close ${sink.filePath}:`, closeError);
      }
    }
    throw error;
  }
}

function openStagingFile(filePath: string, opened: FileSink[]): TextSink {
  let sink: FileSink;
  try {
    sink = new FileSink(filePath);
  } catch (error) {
    throw new StagingIOError(filePath, error);
  }
  opened.push(sink);

  return {
    write(chunk: string) {
      try {
        sink.write(chunk);
      } catch (error) {
        throw new StagingIOError(filePath, error);
      }
    },
  };
}
