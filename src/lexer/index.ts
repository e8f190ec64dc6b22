export { LexerError } from './errors.js';
export { nextToken, tokenize, type TokenizeResult } from './tokenizer.js';
export { KEYWORDS } from './operators.js';
