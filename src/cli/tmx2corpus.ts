#!/usr/bin/env node

/**
 * Import a two-language TMX file as an aligned pair of CWB corpora.
 *
 * Usage:
 *   ts-node src/cli/tmx2corpus.ts --tmx="memory.tmx" --from=PT --to=EN
 */

import { tmxToCorpus } from '../bridge/convert';
import { MemoryCorpusBuilder } from '../memory/MemoryCorpus';
import { booleanFlag, parseArgs, ParsedArgs, stringFlag } from './args';

function showHelp(): void {
  console.log(`
📚 TMX -> CWB parallel corpus

Usage:
  ts-node src/cli/tmx2corpus.ts --tmx="memory.tmx" [--from=PT] [--to=EN]

Options:
  --tmx                TMX file to import (or the first positional argument)
  --from / --to        Source and target languages (guessed for two-language files)
  --name               Corpus base name (default: derived from the TMX file name)
  --corpora            Parent folder of the corpus data folders (default: /corpora)
  --registry           CWB registry folder (default: CORPUS_REGISTRY or cwb-config -r)
  --tokenize-source    Tokenize source segments instead of splitting on whitespace
  --tokenize-target    Tokenize target segments instead of splitting on whitespace
  --locale             Tokenizer locale (default: en)
  --work-dir           Folder for the staging files (default: current directory)
  --keep-staging       Keep source.cqp, target.cqp and align.txt afterwards
  --dry-run            Write and check the staging files without calling CWB
  --verbose            Report progress
  --help               Show this help

Environment Variables:
  CORPUS_REGISTRY      CWB registry folder
  CORPORA_DIR          Parent folder of the corpus data folders
  CWB_BIN_DIR          Folder holding the cwb-* programs
  TOKENIZER_LOCALE     Default tokenizer locale
  CWB_MAX_BUFFER_MB    Output cap per CWB command in megabytes (default: 256)
`);
}

function run(args: ParsedArgs): void {
  const dryRun = booleanFlag(args, 'dry-run');
  const result = tmxToCorpus({
    tmx: stringFlag(args, 'tmx') ?? args.positional[0] ?? '',
    from: stringFlag(args, 'from'),
    to: stringFlag(args, 'to'),
    corpusName: stringFlag(args, 'name'),
    corpora: stringFlag(args, 'corpora'),
    registry: stringFlag(args, 'registry'),
    tokenizeSource: booleanFlag(args, 'tokenize-source'),
    tokenizeTarget: booleanFlag(args, 'tokenize-target'),
    locale: stringFlag(args, 'locale'),
    workDir: stringFlag(args, 'work-dir'),
    keepStaging: dryRun || booleanFlag(args, 'keep-staging'),
    verbose: booleanFlag(args, 'verbose'),
    builder: dryRun ? new MemoryCorpusBuilder() : undefined,
  });

  console.log(
    `✅ ${result.retained} translation units (${result.skipped} skipped): ` +
      `${result.corpora.source} / ${result.corpora.target}`
  );
  if (dryRun) console.log(`📁 Staging files kept: ${Object.values(result.staging).join(', ')}`);
}

function main(): void {
  const args = parseArgs();

  if (booleanFlag(args, 'help') || (!stringFlag(args, 'tmx') && args.positional.length === 0)) {
    showHelp();
    process.exit(0);
  }

  try {
    run(args);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error('❌ Error:', errorMessage);
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}
