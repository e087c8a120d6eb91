/**
 * TMX <-> parallel corpus conversions
 * Wires the reader, exporters, builders and engines together.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { detectRegistry, isDirectory, loadConfig } from '../config';
import { CommandRunner, createSpawnRunner } from '../cwb/command-runner';
import { CwbCorpusBuilder } from '../cwb/CwbCorpusBuilder';
import { CwbCorpusEngine } from '../cwb/CwbCorpusEngine';
import { TmxReader } from '../tmx/TmxReader';
import { TmxWriter } from '../tmx/TmxWriter';
import { Tokenizer, WordTokenizer } from '../utils/tokenizer';
import { exportAlignment } from './alignment-exporter';
import { buildParallelCorpus, ParallelCorpusNames } from './corpus-builder';
import { ConfigurationError } from './errors';
import { resolveLanguagePair } from './language-detector';
import { sanitizeBaseName, STAGING_FILES } from './staging';
import { StagingPaths, TuExportResult, writeStagingFiles } from './tu-exporter';
import { CorpusBuilder, CorpusEngine, LanguagePair } from './types';

export interface TmxToCorpusOptions {
  tmx: string;
  from?: string;
  to?: string;
  /** Parent folder of the corpus data folders */
  corpora?: string;
  corpusName?: string;
  tokenizeSource?: boolean;
  tokenizeTarget?: boolean;
  registry?: string;
  /** Where the staging files are written (current directory by default) */
  workDir?: string;
  keepStaging?: boolean;
  verbose?: boolean;
  locale?: string;
  maxBufferMB?: number;
  builder?: CorpusBuilder;
  tokenizer?: Tokenizer;
  runner?: CommandRunner;
}

export interface TmxToCorpusResult extends TuExportResult {
  pair: LanguagePair;
  corpora: ParallelCorpusNames;
  staging: StagingPaths;
}

export function tmxToCorpus(options: TmxToCorpusOptions): TmxToCorpusResult {
  const config = loadConfig({
    corpora: options.corpora,
    registry: options.registry,
    locale: options.locale,
    maxBufferMB: options.maxBufferMB,
  });
  const verbose = options.verbose ?? false;
  const runner =
    options.runner ??
    createSpawnRunner({ binDir: config.cwbBinDir, maxBufferMB: config.maxBufferMB, verbose });

  if (!options.tmx) throw new ConfigurationError('tmx file not specified');
  if (!fs.existsSync(options.tmx)) {
    throw new ConfigurationError(`Can't open [${options.tmx}] file for reading`);
  }

  let builder = options.builder;
  if (!builder) {
    const corpora = config.corpora;
    if (!isDirectory(corpora)) throw new ConfigurationError(`Need a corpora folder [${corpora}]`);
    builder = new CwbCorpusBuilder({
      registry: detectRegistry(config.registry, runner),
      corpora,
      runner,
    });
  }

  const reader = TmxReader.fromFile(options.tmx);
  const pair = resolveLanguagePair(reader.languages(), options.from, options.to);
  const baseName = options.corpusName
    ? options.corpusName.replace(/[.-]/g, '_')
    : sanitizeBaseName(options.tmx);

  const workDir = options.workDir ?? process.cwd();
  const staging: StagingPaths = {
    source: path.join(workDir, STAGING_FILES.source),
    target: path.join(workDir, STAGING_FILES.target),
    alignment: path.join(workDir, STAGING_FILES.alignment),
  };

  if (verbose) {
    console.log(`📖 Reading ${options.tmx}`);
    console.log(`🌍 Language pair: ${pair.source} -> ${pair.target}`);
  }

  const exported = writeStagingFiles(reader.translationUnits(), staging, {
    pair,
    baseName,
    tokenizeSource: options.tokenizeSource,
    tokenizeTarget: options.tokenizeTarget,
    tokenizer: options.tokenizer ?? new WordTokenizer(config.locale),
    onProgress: verbose
      ? (retained) => process.stderr.write(`\rProcessing... ${retained} translation units`)
      : undefined,
  });
  if (verbose) process.stderr.write('\n');

  const corpora = buildParallelCorpus(builder, {
    baseName,
    pair,
    staging,
    onStep: verbose ? (step) => console.log(`🔧 ${step}`) : undefined,
  });

  if (!options.keepStaging) {
    for (const file of Object.values(staging)) fs.rmSync(file, { force: true });
  }

  if (verbose) {
    console.log(`✅ ${exported.retained} translation units in ${corpora.source} / ${corpora.target}`);
  }

  return { ...exported, pair, corpora, staging };
}

export interface CorpusToTmxOptions {
  source: string;
  target: string;
  sourceLang: string;
  targetLang: string;
  /** Output file; the TMX document is returned as a string when absent */
  output?: string;
  registry?: string;
  /** Output cap for cwb-decode, which prints the whole word attribute of a corpus */
  maxBufferMB?: number;
  verbose?: boolean;
  engine?: CorpusEngine;
  runner?: CommandRunner;
}

export interface CorpusToTmxResult {
  units: number;
  tmx: string;
}

export function corpusToTmx(options: CorpusToTmxOptions): CorpusToTmxResult {
  if (!options.source || !options.target) {
    throw new ConfigurationError('Source and target corpora names are required');
  }
  if (!options.sourceLang || !options.targetLang) {
    throw new ConfigurationError('Source and target languages are required');
  }

  const verbose = options.verbose ?? false;
  let engine = options.engine;
  if (!engine) {
    const config = loadConfig({ registry: options.registry, maxBufferMB: options.maxBufferMB });
    const runner =
      options.runner ??
      createSpawnRunner({ binDir: config.cwbBinDir, maxBufferMB: config.maxBufferMB, verbose });
    engine = new CwbCorpusEngine({ registry: detectRegistry(config.registry, runner), runner });
  }

  const writer = new TmxWriter({ output: options.output, sourceLanguage: options.sourceLang });
  let units: number;
  try {
    units = exportAlignment(
      engine,
      {
        sourceCorpus: options.source,
        targetCorpus: options.target,
        pair: { source: options.sourceLang, target: options.targetLang },
      },
      writer
    );
  } catch (error) {
    writer.abort();
    throw error;
  }

  if (verbose) {
    console.log(`✅ Exported ${units} translation units${options.output ? ` to ${options.output}` : ''}`);
  }

  return { units, tmx: writer.toString() };
}
