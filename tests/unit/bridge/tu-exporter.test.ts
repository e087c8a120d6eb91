import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  exportTranslationUnits,
  writeStagingFiles,
} from '../../../src/bridge/tu-exporter';
import { StagingIOError } from '../../../src/bridge/errors';
import { TranslationUnit } from '../../../src/bridge/types';
import { BufferSink } from '../../../src/utils/text-sink';
import { Tokenizer, WordTokenizer } from '../../../src/utils/tokenizer';

const pair = { source: 'PT', target: 'EN' };

function makeSinks() {
  return {
    source: new BufferSink(),
    target: new BufferSink(),
    alignment: new BufferSink(),
  };
}

function blockIds(staging: string): number[] {
  return [...staging.matchAll(/<tu id='(\d+)'>/g)].map((m) => Number(m[1]));
}

describe('exportTranslationUnits', () => {
  it('exports only units holding both languages', () => {
    const sinks = makeSinks();
    const units: TranslationUnit[] = [{ PT: 'Olá', EN: 'Hello' }, { PT: 'Mundo' }];

    const result = exportTranslationUnits(units, sinks, { pair, baseName: 'memo' });

    expect(result).toEqual({ retained: 1, skipped: 1 });
    expect(sinks.source.toString()).toBe("<tu id='1'>\nOlá\n</tu>\n");
    expect(sinks.target.toString()).toBe("<tu id='1'>\nHello\n</tu>\n");
    expect(sinks.alignment.toString().split('\n')).toEqual([
      'MEMO_PT\tMEMO_EN\ttu\tid_{id}',
      'id_1\tid_1',
      '',
    ]);
  });

  it('numbers retained units contiguously across gaps', () => {
    const sinks = makeSinks();
    const units: TranslationUnit[] = [
      { EN: 'only english' },
      { PT: 'um', EN: 'one' },
      { PT: 'só português' },
      { PT: 'dois', EN: 'two', ES: 'dos' },
      { ES: 'tres' },
      { PT: 'três', EN: 'three' },
    ];

    const result = exportTranslationUnits(units, sinks, { pair, baseName: 'memo' });

    expect(result).toEqual({ retained: 3, skipped: 3 });
    expect(blockIds(sinks.source.toString())).toEqual([1, 2, 3]);
    expect(blockIds(sinks.target.toString())).toEqual([1, 2, 3]);

    const [, ...records] = sinks.alignment.toString().trimEnd().split('\n');
    expect(records).toEqual(['id_1\tid_1', 'id_2\tid_2', 'id_3\tid_3']);
    expect(sinks.source.toString()).toContain("<tu id='3'>\ntrês\n</tu>\n");
  });

  it('treats a segment with no tokens as missing', () => {
    const sinks = makeSinks();
    const units: TranslationUnit[] = [{ PT: '   ', EN: 'blank' }, { PT: 'sim', EN: 'yes' }];

    const result = exportTranslationUnits(units, sinks, { pair, baseName: 'memo' });

    expect(result).toEqual({ retained: 1, skipped: 1 });
    expect(sinks.source.toString()).toBe("<tu id='1'>\nsim\n</tu>\n");
  });

  it('escapes angle brackets in staging output', () => {
    const sinks = makeSinks();
    exportTranslationUnits([{ PT: 'clique <a> aqui', EN: 'click <a> here' }], sinks, {
      pair,
      baseName: 'memo',
    });

    expect(sinks.source.toString()).toBe("<tu id='1'>\nclique\n&lta&gt\naqui\n</tu>\n");
    const body = sinks.target.toString().split('\n').slice(1, -2);
    expect(body).toEqual(['click', '&lta&gt', 'here']);
    for (const line of body) expect(line).not.toMatch(/[<>]/);
  });

  it('escapes markup split apart by the word tokenizer', () => {
    const sinks = makeSinks();
    exportTranslationUnits([{ PT: 'ver <a href="x">', EN: 'see' }], sinks, {
      pair,
      baseName: 'memo',
      tokenizeSource: true,
      tokenizer: new WordTokenizer('en'),
    });

    const body = sinks.source.toString().split('\n').slice(1, -2);
    expect(body.slice(0, 3)).toEqual(['ver', '&lt', 'a']);
    expect(body[body.length - 1]).toBe('&gt');
    for (const line of body) expect(line).not.toMatch(/[<>]/);
  });

  it('applies the tokenizer to each side according to its own flag', () => {
    const sinks = makeSinks();
    const tokenizer: Tokenizer = {
      tokenize: vi.fn((text: string) => text.split('')),
    };

    exportTranslationUnits([{ PT: 'ab cd', EN: 'ab cd' }], sinks, {
      pair,
      baseName: 'memo',
      tokenizeSource: true,
      tokenizeTarget: false,
      tokenizer,
    });

    expect(tokenizer.tokenize).toHaveBeenCalledOnce();
    expect(tokenizer.tokenize).toHaveBeenCalledWith('ab cd');
    expect(sinks.source.toString()).toBe("<tu id='1'>\na\nb\n \nc\nd\n</tu>\n");
    expect(sinks.target.toString()).toBe("<tu id='1'>\nab\ncd\n</tu>\n");
  });

  it('reports progress at the interval and once at the end', () => {
    const onProgress = vi.fn();
    const units: TranslationUnit[] = Array.from({ length: 5 }, (_, i) => ({
      PT: `pt ${i}`,
      EN: `en ${i}`,
    }));

    exportTranslationUnits(units, makeSinks(), {
      pair,
      baseName: 'memo',
      onProgress,
      progressInterval: 2,
    });

    expect(onProgress.mock.calls).toEqual([[2], [4], [5]]);
  });

  it('does not repeat the last report when the count falls on the interval', () => {
    const onProgress = vi.fn();

    exportTranslationUnits(
      [
        { PT: 'a', EN: 'b' },
        { PT: 'c', EN: 'd' },
      ],
      makeSinks(),
      { pair, baseName: 'memo', onProgress, progressInterval: 2 }
    );

    expect(onProgress.mock.calls).toEqual([[2]]);
  });

  it('reports zero when nothing was retained', () => {
    const onProgress = vi.fn();
    exportTranslationUnits([{ PT: 'só' }], makeSinks(), { pair, baseName: 'memo', onProgress });
    expect(onProgress.mock.calls).toEqual([[0]]);
  });

  it('keeps exporting when the progress callback throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sinks = makeSinks();

    const result = exportTranslationUnits(
      [
        { PT: 'a', EN: 'b' },
        { PT: 'c', EN: 'd' },
      ],
      sinks,
      {
        pair,
        baseName: 'memo',
        progressInterval: 1,
        onProgress: () => {
          throw new Error('display gone');
        },
      }
    );

    expect(result.retained).toBe(2);
    expect(blockIds(sinks.target.toString())).toEqual([1, 2]);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it('consumes the units lazily in document order', () => {
    const seen: string[] = [];
    function* units(): Generator<TranslationUnit> {
      for (const word of ['um', 'dois']) {
        seen.push(word);
        yield { PT: word, EN: word.toUpperCase() };
      }
    }

    const sinks = makeSinks();
    exportTranslationUnits(units(), sinks, { pair, baseName: 'memo' });

    expect(seen).toEqual(['um', 'dois']);
    expect(sinks.target.toString()).toBe("<tu id='1'>\nUM\n</tu>\n<tu id='2'>\nDOIS\n</tu>\n");
  });
});

describe('writeStagingFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'staging-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the three files completely before returning', () => {
    const paths = {
      source: path.join(dir, 'source.cqp'),
      target: path.join(dir, 'target.cqp'),
      alignment: path.join(dir, 'align.txt'),
    };

    const result = writeStagingFiles([{ PT: 'o gato', EN: 'the cat' }], paths, {
      pair,
      baseName: 'cats',
    });

    expect(result.retained).toBe(1);
    expect(fs.readFileSync(paths.source, 'utf8')).toBe("<tu id='1'>\no\ngato\n</tu>\n");
    expect(fs.readFileSync(paths.target, 'utf8')).toBe("<tu id='1'>\nthe\ncat\n</tu>\n");
    expect(fs.readFileSync(paths.alignment, 'utf8')).toBe(
      'CATS_PT\tCATS_EN\ttu\tid_{id}\nid_1\tid_1\n'
    );
  });

  it('fails with a staging error when a file cannot be created', () => {
    const paths = {
      source: path.join(dir, 'source.cqp'),
      target: path.join(dir, 'missing', 'target.cqp'),
      alignment: path.join(dir, 'align.txt'),
    };

    expect(() =>
      writeStagingFiles([{ PT: 'a', EN: 'b' }], paths, { pair, baseName: 'x' })
    ).toThrow(StagingIOError);
  });
});
