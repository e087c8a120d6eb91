/**
 * Conversion errors. Every one of them is fatal to the running conversion.
 */

export type BridgeErrorCode =
  | 'UNAVAILABLE_LANGUAGE'
  | 'AMBIGUOUS_LANGUAGE_PAIR'
  | 'CORPUS_NOT_FOUND'
  | 'NO_ALIGNMENT_DATA'
  | 'STAGING_IO_FAILURE'
  | 'EXTERNAL_TOOL_FAILURE'
  | 'CONFIGURATION'
  | 'TMX_FORMAT';

export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeErrorCode
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

export class UnavailableLanguageError extends BridgeError {
  constructor(public readonly language: string) {
    super(`Language ${language} not available`, 'UNAVAILABLE_LANGUAGE');
    this.name = 'UnavailableLanguageError';
  }
}

export class AmbiguousLanguagePairError extends BridgeError {
  constructor(public readonly languages: string[]) {
    super(
      `Can't guess what languages to use among [${languages.join(', ')}]`,
      'AMBIGUOUS_LANGUAGE_PAIR'
    );
    this.name = 'AmbiguousLanguagePairError';
  }
}

export class CorpusNotFoundError extends BridgeError {
  constructor(public readonly corpus: string) {
    super(`Can't find corpus [${corpus}]`, 'CORPUS_NOT_FOUND');
    this.name = 'CorpusNotFoundError';
  }
}

export class NoAlignmentDataError extends BridgeError {
  constructor(
    public readonly source: string,
    public readonly target: string
  ) {
    super(`No alignment data from ${source} to ${target}`, 'NO_ALIGNMENT_DATA');
    this.name = 'NoAlignmentDataError';
  }
}

export class StagingIOError extends BridgeError {
  constructor(
    public readonly file: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Can't write staging file ${file}: ${reason}`, 'STAGING_IO_FAILURE');
    this.name = 'StagingIOError';
  }
}

export class ExternalToolError extends BridgeError {
  constructor(
    public readonly step: string,
    detail: string,
    public readonly exitCode: number | null
  ) {
    super(`${step} failed: ${detail}`, 'EXTERNAL_TOOL_FAILURE');
    this.name = 'ExternalToolError';
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class TmxFormatError extends BridgeError {
  constructor(message: string) {
    super(message, 'TMX_FORMAT');
    this.name = 'TmxFormatError';
  }
}
