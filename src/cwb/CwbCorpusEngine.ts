/**
 * Read access to indexed CWB corpora.
 *
 * The registry file decides whether a corpus and its alignment attributes
 * exist; token strings and alignment beads are decoded with cwb-decode and
 * cwb-align-decode, once per corpus, and read back as UTF-8.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ExternalToolError } from '../bridge/errors';
import {
  AlignmentAttribute,
  AlignmentBlock,
  Corpus,
  CorpusEngine,
} from '../bridge/types';
import { CommandRunner, describeFailure } from './command-runner';

export interface CwbEngineConfig {
  registry: string;
  runner: CommandRunner;
}

const ALIGNED_PATTERN = /^\s*ALIGNED\s+(\S+)/;
const BEAD_PATTERN = /^\s*(-?\d+)\s+(-?\d+)\s+(-?\d+)\s+(-?\d+)(?:\s|$)/;

export class CwbCorpusEngine implements CorpusEngine {
  constructor(private config: CwbEngineConfig) {}

  open(name: string): Corpus | null {
    const registryFile = path.join(this.config.registry, name.toLowerCase());
    let registryEntry: string;
    try {
      registryEntry = fs.readFileSync(registryFile, 'utf8');
    } catch {
      return null;
    }
    return new CwbCorpus(name.toUpperCase(), parseAlignedAttributes(registryEntry), this.config);
  }
}

export function parseAlignedAttributes(registryEntry: string): Set<string> {
  const aligned = new Set<string>();
  for (const line of registryEntry.split('\n')) {
    const match = ALIGNED_PATTERN.exec(line);
    if (match) aligned.add(match[1].toLowerCase());
  }
  return aligned;
}

export function parseAlignmentBeads(output: string): AlignmentBlock[] {
  const blocks: AlignmentBlock[] = [];
  for (const line of output.split('\n')) {
    const match = BEAD_PATTERN.exec(line);
    if (!match) continue;
    const [, sourceStart, sourceEnd, targetStart, targetEnd] = match.map(Number);
    blocks.push({ sourceStart, sourceEnd, targetStart, targetEnd });
  }
  return blocks;
}

class CwbCorpus implements Corpus {
  private tokens: string[] | null = null;
  private beads = new Map<string, AlignmentBlock[]>();

  constructor(
    public readonly name: string,
    private aligned: Set<string>,
    private config: CwbEngineConfig
  ) {}

  words(start: number, end: number): string[] {
    if (!this.tokens) {
      const output = this.decode('cwb-decode', ['-C', this.name, '-P', 'word']);
      const lines = output.split('\n');
      if (lines[lines.length - 1] === '') lines.pop();
      this.tokens = lines;
    }
    return this.tokens.slice(Math.max(0, start), end + 1);
  }

  alignment(attributeName: string): AlignmentAttribute | null {
    const attribute = attributeName.toLowerCase();
    if (!this.aligned.has(attribute)) return null;

    let blocks = this.beads.get(attribute);
    if (!blocks) {
      blocks = parseAlignmentBeads(this.decode('cwb-align-decode', [this.name, attribute]));
      this.beads.set(attribute, blocks);
    }

    const loaded = blocks;
    return {
      blockCount: loaded.length,
      block: (index: number) => {
        const block = loaded[index];
        if (!block) throw new RangeError(`No alignment block ${index} in ${this.name}`);
        return block;
      },
    };
  }

  private decode(command: string, args: string[]): string {
    const result = this.config.runner(command, ['-r', this.config.registry, ...args]);
    const failure = describeFailure(result);
    if (failure) throw new ExternalToolError(command, failure, result.status);
    return result.stdout;
  }
}
