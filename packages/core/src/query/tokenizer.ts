import { Effect } from "effect";
import { type QueryParseError, parseError } from "../errors/query-errors.js";

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind =
	| "OpenParen"
	| "CloseParen"
	| "OpenBracket"
	| "CloseBracket"
	| "Comma"
	| "Colon"
	| "Minus"
	| "Text"
	| "QuotedText";

export interface Token {
	readonly kind: TokenKind;
	readonly value: string;
	/** Zero-based offset of the first character in the source. */
	readonly position: number;
}

const SINGLE_CHARACTER_TOKENS: Readonly<Record<string, TokenKind>> = {
	"(": "OpenParen",
	")": "CloseParen",
	"[": "OpenBracket",
	"]": "CloseBracket",
	",": "Comma",
	":": "Colon",
};

const isWhitespace = (character: string): boolean => /\s/.test(character);

/**
 * Split a query string parameter value into tokens.
 *
 * Quoted text uses single quotes; a doubled quote inside it stands for one
 * quote character. `-` is a token of its own only where a new token starts.
 */
export const tokenize = (
	source: string,
	parameterName: string,
): Effect.Effect<ReadonlyArray<Token>, QueryParseError> =>
	Effect.suspend((): Effect.Effect<ReadonlyArray<Token>, QueryParseError> => {
		const tokens: Array<Token> = [];
		let text = "";
		let textStart = 0;

		const flushText = (): void => {
			if (text.length > 0) {
				tokens.push({ kind: "Text", value: text, position: textStart });
				text = "";
			}
		};

		let index = 0;
		while (index < source.length) {
			const character = source.charAt(index);

			if (character === "'") {
				flushText();
				const start = index;
				let value = "";
				index++;
				let closed = false;
				while (index < source.length) {
					const inner = source.charAt(index);
					if (inner === "'") {
						if (source.charAt(index + 1) === "'") {
							value += "'";
							index += 2;
							continue;
						}
						closed = true;
						index++;
						break;
					}
					value += inner;
					index++;
				}
				if (!closed) {
					return Effect.fail(
						parseError(parameterName, "' expected.", source.length),
					);
				}
				tokens.push({ kind: "QuotedText", value, position: start });
				continue;
			}

			const single = SINGLE_CHARACTER_TOKENS[character];
			if (single !== undefined) {
				flushText();
				tokens.push({ kind: single, value: character, position: index });
			} else if (isWhitespace(character)) {
				flushText();
			} else if (character === "-" && text.length === 0) {
				tokens.push({ kind: "Minus", value: character, position: index });
			} else {
				if (text.length === 0) textStart = index;
				text += character;
			}
			index++;
		}

		flushText();
		return Effect.succeed(tokens);
	});

// ============================================================================
// Cursor
// ============================================================================

/**
 * Read position over a token list. Parsers advance it while descending.
 */
export class TokenCursor {
	private index = 0;

	constructor(
		readonly tokens: ReadonlyArray<Token>,
		readonly source: string,
		readonly parameterName: string,
	) {}

	peek(offset = 0): Token | undefined {
		return this.tokens[this.index + offset];
	}

	next(): Token | undefined {
		const token = this.tokens[this.index];
		if (token !== undefined) this.index++;
		return token;
	}

	get isAtEnd(): boolean {
		return this.index >= this.tokens.length;
	}

	/** Offset used in error messages for the current token. */
	get position(): number {
		return this.peek()?.position ?? this.source.length;
	}

	/**
	 * Consume a token of the given kind or fail with `detail`.
	 */
	expect(kind: TokenKind, detail: string): Effect.Effect<Token, QueryParseError> {
		const token = this.peek();
		if (token === undefined || token.kind !== kind) {
			return Effect.fail(parseError(this.parameterName, detail, this.position));
		}
		this.index++;
		return Effect.succeed(token);
	}

	/**
	 * Consume the next token when it has the given kind.
	 */
	accept(kind: TokenKind): boolean {
		if (this.peek()?.kind === kind) {
			this.index++;
			return true;
		}
		return false;
	}

	fail(detail: string): QueryParseError {
		return parseError(this.parameterName, detail, this.position);
	}

	expectEnd(): Effect.Effect<void, QueryParseError> {
		return this.isAtEnd
			? Effect.void
			: Effect.fail(this.fail("End of expression expected."));
	}
}

export const openCursor = (
	source: string,
	parameterName: string,
): Effect.Effect<TokenCursor, QueryParseError> =>
	Effect.map(
		tokenize(source, parameterName),
		(tokens) => new TokenCursor(tokens, source, parameterName),
	);
