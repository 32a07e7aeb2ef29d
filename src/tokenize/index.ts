/**
 * Tokenization pipeline.
 */

export { SourceReadError, StringSource, FileSource, type TextSource } from "./source.js";
export {
  split,
  simple,
  news,
  html,
  composeTokenizers,
  setTokenizerLogger,
  TokenizerCompositionError,
  TOKENIZER_NAMES,
  type Tokenizer,
  type TokenizerName,
} from "./tokenizers.js";
