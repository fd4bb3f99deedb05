export { Punctuation, configure, restore, DEFAULT_MARKS } from './punctuation/punctuation';
export { MarkMatcher, createMarkMatcher, collapseMarks } from './punctuation/mark-matcher';
export { preserveLines } from './punctuation/punctuation-preserver';
export { restoreLines } from './punctuation/punctuation-restorer';
export {
  EscapeToken,
  RESERVED_ESCAPE_TOKENS,
  escapeDigitSeparators,
  unescapeDigitSeparators,
} from './punctuation/digit-escape';
export { InvalidConfigurationError } from './punctuation/punctuation-errors';
export {
  PunctuationStage,
  type TextChunkProcessor,
  type PunctuationStageResult,
} from './punctuation/punctuation-stage';
export {
  loadPunctuationConfig,
  loadPunctuationConfigAsync,
  mergePunctuationConfig,
  DEFAULT_PUNCTUATION_CONFIG,
  type PunctuationConfig,
  type PunctuationMode,
} from './punctuation-config';
export {
  toList,
  type MarkRecord,
  type MarkPosition,
  type MarkUnit,
  type PreservedText,
} from './punctuation/punctuation-types';
