import * as ohm from 'ohm-js'
import { stripCommentLines } from '../lex/tokenizer.ts'

/**
 * Reference grammar for the file format, independent of the hand-written parser.
 *
 * Input is the comment-filtered source (see stripCommentLines). Whitespace is
 * limited to space, tab, CR and LF; everything else that is not punctuation is
 * a bare-word character.
 */
const grammarSource = String.raw`
Tomlet {
  Document (a document) = SectionBlock*
  SectionBlock = sectionHeader KeyValue*

  KeyValue (a key-value pair) = bare "=" Value
  Value (a value) = string | List | InlineTable | bare
  List = "[" ListOf<Value, ","> "]"
  InlineTable = "{" ListOf<KeyValue, ","> "}"

  sectionHeader (a section header) = "[" bare "]"
  string (a string) = "\"" (~"\"" any)* "\""
                    | "'" (~"'" any)* "'"
  bare (a bare word) = bareChar+
  bareChar = ~special any
  special = "=" | "[" | "]" | "{" | "}" | "\"" | "'" | "," | "#" | space

  space := " " | "\t" | "\n" | "\r"
}
`

/**
 * The compiled reference grammar.
 */
export const TomletGrammar = ohm.grammar(grammarSource)

/**
 * Match raw file text against the reference grammar.
 * BOM and comment lines are removed exactly as the tokenizer removes them.
 */
export function match(source: string): ohm.MatchResult {
	return TomletGrammar.match(stripCommentLines(source))
}

/**
 * True if the reference grammar accepts the file text.
 */
export function recognize(source: string): boolean {
	return match(source).succeeded()
}

/**
 * Trace a match for debugging purposes.
 */
export function trace(source: string): string {
	return TomletGrammar.trace(stripCommentLines(source)).toString()
}
