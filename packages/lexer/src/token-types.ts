/**
 * Token types
 *
 * Scanner token types are caller-defined strings. The tokenizer itself only
 * produces whitespace tokens.
 */

export const BuiltinTokenType = {
  WHITESPACE: 'Whitespace', // emitted when tokenizeWhitespace is on
} as const;

export type BuiltinTokenType = (typeof BuiltinTokenType)[keyof typeof BuiltinTokenType];

export type TokenType = string;
