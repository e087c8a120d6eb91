/**
 * Corpus builder backed by the Open Corpus Workbench command-line tools.
 * Each step checks the exit status instead of trusting whatever the tool printed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TU_STRUCTURE } from '../bridge/staging';
import {
  AlignmentImportRequest,
  CorpusBuilder,
  EncodeRequest,
  StepResult,
} from '../bridge/types';
import { CommandRunner, describeFailure } from './command-runner';

export interface CwbBuilderConfig {
  /** Registry directory */
  registry: string;
  /** Parent folder of the corpus data folders */
  corpora: string;
  runner: CommandRunner;
  charset?: string;
}

export class CwbCorpusBuilder implements CorpusBuilder {
  private charset: string;

  constructor(private config: CwbBuilderConfig) {
    this.charset = config.charset ?? 'utf8';
  }

  encode(request: EncodeRequest): StepResult {
    const dataDir = path.join(this.config.corpora, request.corpusName);
    try {
      fs.mkdirSync(dataDir, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, step: 'cwb-encode', message, exitCode: null };
    }

    return this.run('cwb-encode', [
      '-c', this.charset,
      '-d', dataDir,
      '-f', request.stagingFile,
      '-R', path.join(this.config.registry, request.corpusName),
      '-S', TU_STRUCTURE,
    ]);
  }

  makeIndex(corpusId: string): StepResult {
    return this.run('cwb-make', ['-r', this.config.registry, '-V', corpusId.toUpperCase()]);
  }

  importAlignment(request: AlignmentImportRequest): StepResult {
    const args = ['-r', this.config.registry];
    if (request.inverse) args.push('-inverse');
    args.push(request.alignmentFile);
    return this.run('cwb-align-import', args);
  }

  private run(command: string, args: string[]): StepResult {
    const result = this.config.runner(command, args);
    const failure = describeFailure(result);
    if (failure) {
      return { ok: false, step: command, message: failure, exitCode: result.status };
    }
    return { ok: true };
  }
}
