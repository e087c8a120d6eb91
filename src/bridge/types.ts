/**
 * Bridge Types
 * Shared shapes for the TMX <-> parallel corpus conversions
 */

/**
 * One translation unit: language code -> segment text.
 * A language that has no segment in the unit is simply absent.
 */
export type TranslationUnit = Readonly<Partial<Record<string, string>>>;

/**
 * Ordered (source, target) language pair, resolved once per run
 */
export interface LanguagePair {
  readonly source: string;
  readonly target: string;
}

/**
 * Streaming TMX reader contract
 */
export interface TmxSource {
  languages(): string[];
  translationUnits(): Iterable<TranslationUnit>;
}

/**
 * TMX writer contract
 */
export interface TmxSink {
  begin(toolName: string, toolVersion: string): void;
  addTU(unit: TranslationUnit): void;
  end(): void;
}

/**
 * Append-only text output (a staging file, an alignment map, a buffer)
 */
export interface TextSink {
  write(chunk: string): void;
}

// ---------------------------------------------------------------------------
// Corpus access
// ---------------------------------------------------------------------------

/**
 * Token-position spans (cpos, inclusive) aligned across two corpora
 */
export interface AlignmentBlock {
  sourceStart: number;
  sourceEnd: number;
  targetStart: number;
  targetEnd: number;
}

export interface AlignmentAttribute {
  readonly blockCount: number;
  block(index: number): AlignmentBlock;
}

export interface Corpus {
  /** Upper-cased corpus identifier */
  readonly name: string;
  /** Surface strings of the word attribute for positions start..end (inclusive) */
  words(start: number, end: number): string[];
  /** Alignment attribute towards another corpus, by lower-cased name */
  alignment(attributeName: string): AlignmentAttribute | null;
}

export interface CorpusEngine {
  open(name: string): Corpus | null;
}

// ---------------------------------------------------------------------------
// Corpus building
// ---------------------------------------------------------------------------

export type StepResult =
  | { ok: true }
  | { ok: false; step: string; message: string; exitCode: number | null };

export interface EncodeRequest {
  stagingFile: string;
  /** Lower-cased name, used for the data folder and the registry entry */
  corpusName: string;
}

export interface AlignmentImportRequest {
  alignmentFile: string;
  sourceCorpus: string;
  targetCorpus: string;
  inverse: boolean;
}

/**
 * One method per indexing step; each reports success or failure explicitly
 */
export interface CorpusBuilder {
  encode(request: EncodeRequest): StepResult;
  makeIndex(corpusId: string): StepResult;
  importAlignment(request: AlignmentImportRequest): StepResult;
}
