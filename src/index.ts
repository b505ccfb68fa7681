// Core types
export type {
  Position,
  Span,
  TokenKind,
  Token,
  DiagnosticKind,
  RuleName,
  Diagnostic,
  Rational,
  PitchLetter,
  Accidental,
  Pitch,
  Metre,
  Mode,
  KeySignature,
  HeaderValue,
  HeaderField,
  FieldChange,
  Element,
  NoteElement,
  RestElement,
  EmptyElement,
  UnmodeledElement,
  BarGroup,
  Barline,
  Bar,
  Body,
  Tune,
  ParseResult,
} from './types';

// Lexer and parser
export { tokenize } from './lexer';
export {
  parse,
  parseAbc,
  BarBuilder,
  BarInvariantError,
  createBar,
  BODY_FIELDS,
  MODE_ABBREVIATIONS,
  modeFromWord,
} from './parser';
export type { RuleResult } from './parser';

// Diagnostics
export {
  RULE_DESCRIPTIONS,
  MAX_NUMBER_DIGITS,
  describeToken,
  buildMessage,
  formatSummary,
  formatDiagnostic,
  formatReport,
} from './diagnostics';
export type { MessageDetails } from './diagnostics';

// Serializer
export { serialize, serializeAll, serializeHeaderValue, orderHeaders } from './serializer';

// Query
export {
  normalizeTune,
  tunesEqual,
  getBarCount,
  getNotes,
  getDuration,
  getFieldValues,
  getTitle,
  extractFeatures,
  pitchSequence,
  intervals,
  intervalHistogram,
  histogramDistance,
  HISTOGRAM_SIZE,
  HISTOGRAM_WIDTH,
} from './query';
export type {
  Feature,
  NormalizedTune,
  NormalizedHeader,
  NormalizedBar,
  NormalizedElement,
  NormalizedChange,
} from './query';

// Validation
export {
  validate,
  validateReference,
  validateElements,
  validateGroups,
  validateFieldChanges,
  isValid,
  assertValid,
  formatLocation,
  ValidationException,
} from './validator';
export type {
  ValidationErrorCode,
  ValidationLevel,
  ValidationLocation,
  ValidationError,
  ValidationResult,
  ValidateOptions,
} from './validator';

// File operations
export { parseFile, parseBytes, serializeToFile, decodeBuffer } from './file';
export type { ParsedFile, ParsedBytes } from './file';

// Tune cache
export {
  TuneCache,
  CacheFormatError,
  indexCache,
  decodeCache,
  encodeCache,
  loadCacheFile,
  saveCacheFile,
  scanDirectory,
  tuneIdFromFilename,
  SCAN_PROGRESS_INTERVAL,
} from './storage';
export type { CacheEntry, CacheFileOptions, DecodeCacheOptions, ScanResult } from './storage';

// Configuration and logging
export { loadConfig, requireBase, ConfigError, CACHE_FILE_NAME } from './config';
export type { AppConfig, ConfigOverrides } from './config';
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger';
export type { Logger, LogLevel, LoggerOptions } from './logger';

// Utils (pitch and duration arithmetic)
export {
  STEPS,
  STEP_SEMITONES,
  pitchToMidi,
  rational,
  add,
  multiply,
  divide,
  rationalEquals,
  rationalToString,
  defaultUnitLength,
  defaultTupletQ,
} from './utils';
