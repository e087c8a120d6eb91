import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  MemoryCorpus,
  MemoryCorpusBuilder,
  MemoryCorpusEngine,
} from '../../../src/memory/MemoryCorpus';
import { alignmentHeader, alignmentLine, stagingBlock } from '../../../src/bridge/staging';

describe('MemoryCorpus', () => {
  it('reads inclusive token ranges', () => {
    const corpus = new MemoryCorpus('TEST', ['a', 'b', 'c']);
    expect(corpus.words(0, 1)).toEqual(['a', 'b']);
    expect(corpus.words(2, 2)).toEqual(['c']);
    expect(corpus.words(2, 1)).toEqual([]);
  });

  it('keeps regions contiguous as they are appended', () => {
    const corpus = new MemoryCorpus('TEST');
    expect(corpus.addRegion(1, ['o', 'gato'])).toEqual([0, 1]);
    expect(corpus.addRegion(2, ['preto'])).toEqual([2, 2]);
    expect(corpus.region('id_2')).toEqual([2, 2]);
    expect(corpus.size).toBe(3);
  });

  it('looks alignment attributes up case-insensitively', () => {
    const corpus = new MemoryCorpus('A_PT');
    corpus.setAlignment('A_EN', [{ sourceStart: 0, sourceEnd: 0, targetStart: 0, targetEnd: 0 }]);
    expect(corpus.alignment('a_en')?.blockCount).toBe(1);
    expect(corpus.alignment('a_es')).toBeNull();
  });

  it('opens corpora by upper-cased name', () => {
    const engine = new MemoryCorpusEngine();
    engine.register(new MemoryCorpus('A_PT'));
    expect(engine.open('a_pt')?.name).toBe('A_PT');
    expect(engine.open('b_pt')).toBeNull();
  });
});

describe('MemoryCorpusBuilder', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-corpus-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, text: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, text, 'utf8');
    return file;
  }

  it('indexes staging files and imports the alignment in both directions', () => {
    const source = write('source.cqp', stagingBlock(1, ['um']) + stagingBlock(2, ['o', 'gato']));
    const target = write('target.cqp', stagingBlock(1, ['one']) + stagingBlock(2, ['the', 'cat']));
    const alignment = write(
      'align.txt',
      alignmentHeader('M_PT', 'M_EN') + alignmentLine(1) + alignmentLine(2)
    );
    const builder = new MemoryCorpusBuilder();

    expect(builder.encode({ stagingFile: source, corpusName: 'm_pt' })).toEqual({ ok: true });
    expect(builder.makeIndex('M_PT')).toEqual({ ok: true });
    expect(builder.encode({ stagingFile: target, corpusName: 'm_en' })).toEqual({ ok: true });
    expect(builder.makeIndex('M_EN')).toEqual({ ok: true });

    const request = { alignmentFile: alignment, sourceCorpus: 'm_pt', targetCorpus: 'm_en' };
    expect(builder.importAlignment({ ...request, inverse: false })).toEqual({ ok: true });
    expect(builder.importAlignment({ ...request, inverse: true })).toEqual({ ok: true });

    const forward = builder.engine.open('M_PT')?.alignment('m_en');
    expect(forward?.blockCount).toBe(2);
    expect(forward?.block(1)).toEqual({ sourceStart: 1, sourceEnd: 2, targetStart: 1, targetEnd: 2 });

    const inverse = builder.engine.open('M_EN')?.alignment('m_pt');
    expect(inverse?.block(0)).toEqual({ sourceStart: 0, sourceEnd: 0, targetStart: 0, targetEnd: 0 });
  });

  it('refuses to align corpora that were not indexed', () => {
    const source = write('source.cqp', stagingBlock(1, ['um']));
    const alignment = write('align.txt', alignmentHeader('M_PT', 'M_EN') + alignmentLine(1));
    const builder = new MemoryCorpusBuilder();
    builder.encode({ stagingFile: source, corpusName: 'm_pt' });

    const result = builder.importAlignment({
      alignmentFile: alignment,
      sourceCorpus: 'm_pt',
      targetCorpus: 'm_en',
      inverse: false,
    });

    expect(result).toEqual({
      ok: false,
      step: 'align-import',
      message: 'corpora M_PT and M_EN must be indexed first',
      exitCode: null,
    });
  });

  it('reports a missing staging file as a failed step', () => {
    const result = new MemoryCorpusBuilder().encode({
      stagingFile: path.join(dir, 'nope.cqp'),
      corpusName: 'm_pt',
    });
    expect(result.ok).toBe(false);
  });

  it('fails to index a corpus that was never encoded', () => {
    expect(new MemoryCorpusBuilder().makeIndex('GHOST')).toEqual({
      ok: false,
      step: 'make',
      message: 'corpus GHOST was never encoded',
      exitCode: null,
    });
  });
});
