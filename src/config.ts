/**
 * Runtime configuration.
 * Explicit options win over environment variables (and .env), which win over defaults.
 */

import * as dotenv from 'dotenv';
import * as fs from 'node:fs';
import { ConfigurationError } from './bridge/errors';
import { CommandRunner, DEFAULT_MAX_BUFFER_MB } from './cwb/command-runner';

dotenv.config();

export const DEFAULT_CORPORA_DIR = '/corpora';
export const DEFAULT_LOCALE = 'en';

export interface BridgeConfig {
  registry?: string;
  corpora: string;
  cwbBinDir?: string;
  locale: string;
  /** Output cap per CWB command, in megabytes */
  maxBufferMB: number;
}

export function loadConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    registry: overrides.registry || process.env.CORPUS_REGISTRY || undefined,
    corpora: overrides.corpora || process.env.CORPORA_DIR || DEFAULT_CORPORA_DIR,
    cwbBinDir: overrides.cwbBinDir || process.env.CWB_BIN_DIR || undefined,
    locale: overrides.locale || process.env.TOKENIZER_LOCALE || DEFAULT_LOCALE,
    maxBufferMB:
      overrides.maxBufferMB ??
      parseMegabytes(process.env.CWB_MAX_BUFFER_MB, 'CWB_MAX_BUFFER_MB') ??
      DEFAULT_MAX_BUFFER_MB,
  };
}

export function parseMegabytes(value: string | undefined, name: string): number | undefined {
  if (!value) return undefined;
  const megabytes = Number(value);
  if (!Number.isFinite(megabytes) || megabytes <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got [${value}]`);
  }
  return megabytes;
}

/**
 * Registry folder: configured value, or whatever `cwb-config -r` reports
 */
export function detectRegistry(configured: string | undefined, runner: CommandRunner): string {
  let registry = configured;

  if (!registry) {
    const result = runner('cwb-config', ['-r']);
    if (result.status === 0) registry = result.stdout.trim();
  }

  if (!registry || !isDirectory(registry)) {
    throw new ConfigurationError('Could not detect a suitable CWB registry folder');
  }
  return registry;
}

export function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
