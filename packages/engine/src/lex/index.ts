/**
 * Lexical analysis module.
 * Tokenizes source text into a flat array of single-character tokens.
 */

export {
	classifyCharacter,
	countCommentLines,
	isCommentLine,
	splitLines,
	stripBom,
	stripCommentLines,
	type TokenizeFileOptions,
	type TokenizeResult,
	tokenize,
	tokenizeFile,
} from './tokenizer.ts'
