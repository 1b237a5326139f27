import { Effect } from "effect";
import {
	type QueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import { type TokenCursor, openCursor } from "../tokenizer.js";

export interface PaginationElement {
	/** Relationship chain text before the colon, if any. */
	readonly scope: string | undefined;
	readonly value: number;
}

const parseInteger = (
	cursor: TokenCursor,
): Effect.Effect<number, QueryStringParameterError> =>
	Effect.gen(function* () {
		const isNegative = cursor.accept("Minus");
		const token = yield* cursor.expect("Text", "Positive integer expected.");
		if (!/^\d+$/.test(token.value)) {
			return yield* cursor.fail("Positive integer expected.");
		}
		const value = Number(token.value) * (isNegative ? -1 : 1);
		if (value <= 0) {
			return yield* invalidParameter(
				cursor.parameterName,
				`Value '${isNegative ? "-" : ""}${token.value}' must be a positive integer.`,
			);
		}
		return value;
	});

/**
 * Parse `10,comments:5`: an optional unscoped value and any number of
 * `scope:value` pairs.
 */
export const parsePaginationValue = (
	source: string,
	parameterName: string,
): Effect.Effect<ReadonlyArray<PaginationElement>, QueryStringParameterError> =>
	Effect.gen(function* () {
		const cursor = yield* openCursor(source, parameterName);
		const elements: Array<PaginationElement> = [];

		do {
			const token = cursor.peek();
			let scope: string | undefined;
			if (token?.kind === "Text" && cursor.peek(1)?.kind === "Colon") {
				cursor.next();
				cursor.next();
				scope = token.value;
			}
			const value = yield* parseInteger(cursor);
			elements.push({ scope, value });
		} while (cursor.accept("Comma"));

		yield* cursor.expectEnd();
		return elements;
	});
