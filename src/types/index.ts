/**
 * Shared type definitions for kasiski-kit.
 */

// ── Pattern analysis ────────────────────────────────────────────────────────

/**
 * Repeated substrings of a ciphertext mapped to their ascending start
 * indices. Every retained pattern occurs at least twice.
 */
export type PatternTable = Map<string, number[]>;

/** Stages of a Kasiski examination, in pipeline order. */
export type KasiskiStage =
  | 'initialize'
  | 'maximize'
  | 'deduplicate'
  | 'distances'
  | 'factors';

/** Emitted after each examination stage. */
export interface KasiskiStageEvent {
  stage: KasiskiStage;
  /** Patterns, periods or key lengths produced by the stage. */
  count: number;
}

export type KasiskiObserver = (event: KasiskiStageEvent) => void;

/** A pattern retained by the examination, with its repeat period. */
export interface PatternEntry {
  pattern: string;
  indices: number[];
  /** Constant distance between occurrences, or `null` when spacing varies. */
  period: number | null;
}

/** Full trace of one Kasiski examination. */
export interface KasiskiReport {
  ciphertextLength: number;
  minPatternLength: number;
  maxPatternLength: number;
  patterns: PatternEntry[];
  periods: number[];
  /** Candidate key lengths, longest first. */
  keyLengths: number[];
}

// ── Key recovery ────────────────────────────────────────────────────────────

export interface KeyCandidate {
  keyLength: number;
  /** Lower-case key letters. */
  key: string;
  /** Chi-squared statistic of the decryption against English. Lower is better. */
  score: number;
  plaintext: string;
}

export interface CaesarCandidate {
  shift: number;
  score: number;
  plaintext: string;
}

// ── Frequency analysis ──────────────────────────────────────────────────────

/** Upper-case letter → count, always holding all 26 letters. */
export type LetterCounts = Record<string, number>;

/** `[letter, count]` pairs. */
export type RankedCount = [string, number];

export interface FrequencyResult {
  totalLetters: number;
  ranked: RankedCount[];
  ngramSize: number;
  ngrams: RankedCount[];
  substitution: Record<string, string>;
  /** The input with `substitution` applied. */
  guess: string;
}

// ── Transposition ───────────────────────────────────────────────────────────

/** `rectangle[y][x]`; empty cells hold `''`. */
export type Rectangle = string[][];

/** `[x, y]` cell coordinate. */
export type Location = [number, number];

export interface SpiralOptions {
  /** Default: true */
  clockwise?: boolean;
  /** Default: true */
  inward?: boolean;
}

// ── CLI options ─────────────────────────────────────────────────────────────

export type OutputFormat = 'table' | 'json' | 'markdown';

/** Where the input text of a command came from. */
export interface InputOptions {
  text?: string;
  inputFile?: string;
  /** Keep the input verbatim instead of stripping non-letters. */
  raw?: boolean;
}

export interface KasiskiCommandOptions extends InputOptions {
  minLength?: number;
  maxLength?: number;
  format?: OutputFormat;
  output?: string;
}

export interface CrackCommandOptions extends InputOptions {
  minLength?: number;
  maxLength?: number;
  minKey?: number;
  maxKey?: number;
  top?: number;
  format?: OutputFormat;
}

export interface CrackResult {
  ciphertextLength: number;
  keyLengths: number[];
  candidates: KeyCandidate[];
}

export type CipherMode = 'encode' | 'decode';

export interface VigenereCommandOptions {
  mode: CipherMode;
  text: string;
  key: string;
}

export interface CaesarCommandOptions {
  text: string;
  shift?: number;
  all?: boolean;
  crack?: boolean;
}

export interface FrequencyCommandOptions extends InputOptions {
  ngram?: number;
  format?: OutputFormat;
}

export interface RouteCommandOptions extends SpiralOptions {
  mode: CipherMode;
  text: string;
  width: number;
  height: number;
  padding?: string;
}
