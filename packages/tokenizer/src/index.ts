/**
 * @pegforge/tokenizer
 *
 * Indentation-aware tokenizer for grammar files and parser inputs.
 *
 * @module
 */

export type { Token, TokenType, TokenPosition, TokenizeOptions } from "./types.js";
export { TOKEN_TYPES } from "./types.js";
export { tokenize, describeToken, TokenizeError } from "./tokenizer.js";
