export {
  HeuristicTokenCounter,
  TiktokenCounter,
  createTokenCounter,
  CHARS_PER_TOKEN,
  type TokenCounter,
  type TokenCounterType,
} from './counter.js';
