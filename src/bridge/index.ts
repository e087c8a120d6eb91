/**
 * TMX <-> parallel corpus bridge
 * Exports the conversion building blocks
 */

export * from './types';
export * from './errors';
export * from './language-detector';
export * from './staging';
export * from './tu-exporter';
export * from './alignment-exporter';
export * from './corpus-builder';
export * from './convert';
export { TmxReader } from '../tmx/TmxReader';
export { TmxWriter } from '../tmx/TmxWriter';
export { WordTokenizer } from '../utils/tokenizer';
export type { Tokenizer } from '../utils/tokenizer';
export { CwbCorpusBuilder } from '../cwb/CwbCorpusBuilder';
export { CwbCorpusEngine } from '../cwb/CwbCorpusEngine';
export { createSpawnRunner } from '../cwb/command-runner';
export type { CommandRunner, CommandResult } from '../cwb/command-runner';
export { MemoryCorpus, MemoryCorpusBuilder, MemoryCorpusEngine } from '../memory/MemoryCorpus';
