#!/usr/bin/env node

/**
 * Export an aligned pair of CWB corpora as a TMX file.
 *
 * Usage:
 *   ts-node src/cli/corpus2tmx.ts --source=memory_pt --target=memory_en \
 *     --source-lang=PT --target-lang=EN --output=memory.tmx
 */

import { corpusToTmx } from '../bridge/convert';
import { parseMegabytes } from '../config';
import { booleanFlag, parseArgs, ParsedArgs, stringFlag } from './args';

function showHelp(): void {
  console.log(`
📚 CWB parallel corpus -> TMX

Usage:
  ts-node src/cli/corpus2tmx.ts --source=<corpus> --target=<corpus> \\
    --source-lang=<code> --target-lang=<code> [--output=file.tmx]

Options:
  --source / --target            Corpus names (case-insensitive)
  --source-lang / --target-lang  Language codes written to the TMX
  --output                       Output file (default: standard output)
  --registry                     CWB registry folder
  --max-buffer-mb                Output cap for cwb-decode (default: CWB_MAX_BUFFER_MB or 256)
  --verbose                      Report progress
  --help                         Show this help
`);
}

function run(args: ParsedArgs): void {
  const output = stringFlag(args, 'output');
  const result = corpusToTmx({
    source: stringFlag(args, 'source') ?? '',
    target: stringFlag(args, 'target') ?? '',
    sourceLang: stringFlag(args, 'source-lang') ?? '',
    targetLang: stringFlag(args, 'target-lang') ?? '',
    output,
    registry: stringFlag(args, 'registry'),
    maxBufferMB: parseMegabytes(stringFlag(args, 'max-buffer-mb'), '--max-buffer-mb'),
    verbose: booleanFlag(args, 'verbose'),
  });

  if (!output) process.stdout.write(result.tmx);
}

function main(): void {
  const args = parseArgs();

  if (booleanFlag(args, 'help')) {
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
