import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CORPORA_DIR, detectRegistry, loadConfig } from '../../src/config';
import { ConfigurationError } from '../../src/bridge/errors';
import { CommandResult, CommandRunner } from '../../src/cwb/command-runner';

describe('loadConfig', () => {
  beforeEach(() => {
    vi.stubEnv('CORPUS_REGISTRY', '');
    vi.stubEnv('CORPORA_DIR', '');
    vi.stubEnv('CWB_BIN_DIR', '');
    vi.stubEnv('TOKENIZER_LOCALE', '');
    vi.stubEnv('CWB_MAX_BUFFER_MB', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to defaults', () => {
    expect(loadConfig()).toEqual({
      registry: undefined,
      corpora: DEFAULT_CORPORA_DIR,
      cwbBinDir: undefined,
      locale: 'en',
      maxBufferMB: 256,
    });
  });

  it('reads the environment', () => {
    vi.stubEnv('CORPUS_REGISTRY', '/srv/registry');
    vi.stubEnv('TOKENIZER_LOCALE', 'pt');
    const config = loadConfig();
    expect(config.registry).toBe('/srv/registry');
    expect(config.locale).toBe('pt');
  });

  it('lets explicit options win over the environment', () => {
    vi.stubEnv('CORPORA_DIR', '/srv/corpora');
    expect(loadConfig({ corpora: '/tmp/corpora' }).corpora).toBe('/tmp/corpora');
  });

  it('reads the command output cap from the environment', () => {
    vi.stubEnv('CWB_MAX_BUFFER_MB', '1024');
    expect(loadConfig().maxBufferMB).toBe(1024);
    expect(loadConfig({ maxBufferMB: 64 }).maxBufferMB).toBe(64);
  });

  it('rejects an output cap that is not a positive number', () => {
    vi.stubEnv('CWB_MAX_BUFFER_MB', 'lots');
    expect(() => loadConfig()).toThrow(
      new ConfigurationError('CWB_MAX_BUFFER_MB must be a positive number, got [lots]')
    );
  });
});

describe('detectRegistry', () => {
  let registry: string;

  beforeEach(() => {
    registry = fs.mkdtempSync(path.join(os.tmpdir(), 'registry-'));
  });

  afterEach(() => {
    fs.rmSync(registry, { recursive: true, force: true });
  });

  it('uses the configured folder without asking cwb-config', () => {
    const runner = vi.fn<Parameters<CommandRunner>, CommandResult>();
    expect(detectRegistry(registry, runner)).toBe(registry);
    expect(runner).not.toHaveBeenCalled();
  });

  it('asks cwb-config when nothing is configured', () => {
    const runner = vi.fn<Parameters<CommandRunner>, CommandResult>(() => ({
      status: 0,
      signal: null,
      stdout: `${registry}\n`,
      stderr: '',
    }));
    expect(detectRegistry(undefined, runner)).toBe(registry);
    expect(runner).toHaveBeenCalledWith('cwb-config', ['-r']);
  });

  it('fails when no usable folder is found', () => {
    const runner: CommandRunner = () => ({ status: 1, signal: null, stdout: '', stderr: '' });
    expect(() => detectRegistry(undefined, runner)).toThrow(ConfigurationError);
    expect(() => detectRegistry(path.join(registry, 'missing'), runner)).toThrow(
      'Could not detect a suitable CWB registry folder'
    );
  });
});
