/**
 * Runs the indexing steps of a parallel corpus in their only valid order:
 * each step reads what the previous one produced.
 */

import { ExternalToolError } from './errors';
import { corpusId, corpusName } from './staging';
import { CorpusBuilder, LanguagePair, StepResult } from './types';
import { StagingPaths } from './tu-exporter';

export interface ParallelCorpusRequest {
  baseName: string;
  pair: LanguagePair;
  staging: StagingPaths;
  onStep?: (step: string) => void;
}

export interface ParallelCorpusNames {
  source: string;
  target: string;
}

export function buildParallelCorpus(
  builder: CorpusBuilder,
  request: ParallelCorpusRequest
): ParallelCorpusNames {
  const { baseName, pair, staging, onStep } = request;
  const source = corpusName(baseName, pair.source);
  const target = corpusName(baseName, pair.target);

  const steps: Array<[string, () => StepResult]> = [
    [`encode ${source}`, () => builder.encode({ stagingFile: staging.source, corpusName: source })],
    [`index ${source}`, () => builder.makeIndex(corpusId(baseName, pair.source))],
    [`encode ${target}`, () => builder.encode({ stagingFile: staging.target, corpusName: target })],
    [`index ${target}`, () => builder.makeIndex(corpusId(baseName, pair.target))],
    [
      `align ${source} -> ${target}`,
      () =>
        builder.importAlignment({
          alignmentFile: staging.alignment,
          sourceCorpus: source,
          targetCorpus: target,
          inverse: false,
        }),
    ],
    [
      `align ${target} -> ${source}`,
      () =>
        builder.importAlignment({
          alignmentFile: staging.alignment,
          sourceCorpus: source,
          targetCorpus: target,
          inverse: true,
        }),
    ],
  ];

  for (const [label, run] of steps) {
    onStep?.(label);
    const result = run();
    if (!result.ok) {
      throw new ExternalToolError(result.step, result.message, result.exitCode);
    }
  }

  return { source, target };
}
