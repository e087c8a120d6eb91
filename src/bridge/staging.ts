/**
 * Staging file format shared by the TU exporter and the corpus builders.
 *
 *   <tu id='1'>
 *   token
 *   token
 *   </tu>
 *
 * The alignment map names both corpora on its first line and then pairs
 * `id_N` regions one per line.
 */

import * as path from 'node:path';

export const TU_ELEMENT = 'tu';
export const TU_ID_ATTRIBUTE = 'id';
export const TU_KEY_PREFIX = 'id_';

/** s-attribute declaration handed to the indexer */
export const TU_STRUCTURE = `${TU_ELEMENT}+${TU_ID_ATTRIBUTE}`;

export const STAGING_FILES = {
  source: 'source.cqp',
  target: 'target.cqp',
  alignment: 'align.txt',
} as const;

const TU_OPEN_PATTERN = /^<tu id='(\d+)'>$/;
const TU_CLOSE = `</${TU_ELEMENT}>`;

/**
 * Only `<` and `>` are reserved in staging markup. The replacements carry no
 * trailing semicolon and contain neither character, so escaping twice is a no-op.
 */
export function escapeMarkup(text: string): string {
  return text.replace(/</g, '&lt').replace(/>/g, '&gt');
}

export function splitOnWhitespace(text: string): string[] {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function stagingBlock(id: number, tokens: readonly string[]): string {
  const body = tokens.map((token) => `${token}\n`).join('');
  return `<${TU_ELEMENT} ${TU_ID_ATTRIBUTE}='${id}'>\n${body}${TU_CLOSE}\n`;
}

export function alignmentKey(id: number): string {
  return `${TU_KEY_PREFIX}${id}`;
}

export function alignmentHeader(sourceCorpusId: string, targetCorpusId: string): string {
  return [
    sourceCorpusId.toUpperCase(),
    targetCorpusId.toUpperCase(),
    TU_ELEMENT,
    `${TU_KEY_PREFIX}{${TU_ID_ATTRIBUTE}}`,
  ].join('\t') + '\n';
}

export function alignmentLine(id: number): string {
  const key = alignmentKey(id);
  return `${key}\t${key}\n`;
}

/**
 * Folder and registry entry name of one side of the parallel corpus
 */
export function corpusName(baseName: string, language: string): string {
  return `${baseName}_${language}`.toLowerCase();
}

/**
 * Identifier the corpus engine knows the corpus by
 */
export function corpusId(baseName: string, language: string): string {
  return corpusName(baseName, language).toUpperCase();
}

/**
 * Default base name for a TMX file: its file name with `.` and `-` turned into `_`
 */
export function sanitizeBaseName(tmxPath: string): string {
  return path.basename(tmxPath).replace(/[.-]/g, '_');
}

export interface StagingRegion {
  id: number;
  tokens: string[];
}

/**
 * Parse staging text back into its regions, in file order.
 * Blank lines are ignored, as the indexer does.
 */
export function parseStaging(text: string): StagingRegion[] {
  const regions: StagingRegion[] = [];
  let current: StagingRegion | null = null;

  for (const line of text.split('\n')) {
    if (!line) continue;

    const open = TU_OPEN_PATTERN.exec(line);
    if (open) {
      current = { id: parseInt(open[1], 10), tokens: [] };
      regions.push(current);
    } else if (line === TU_CLOSE) {
      current = null;
    } else if (current) {
      current.tokens.push(line);
    }
  }

  return regions;
}

export interface AlignmentMap {
  sourceCorpus: string;
  targetCorpus: string;
  pairs: Array<[string, string]>;
}

export function parseAlignmentMap(text: string): AlignmentMap {
  const lines = text.split('\n').filter((line) => line.trim());
  const [header = '', ...records] = lines;
  const [sourceCorpus = '', targetCorpus = ''] = header.split('\t');

  const pairs = records.map((line): [string, string] => {
    const [sourceKey = '', targetKey = ''] = line.split('\t');
    return [sourceKey, targetKey];
  });

  return { sourceCorpus, targetCorpus, pairs };
}
