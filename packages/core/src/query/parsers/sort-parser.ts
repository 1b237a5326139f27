import { Effect } from "effect";
import {
	type QueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import type { ResourceContext } from "../../graph/graph-types.js";
import type { ResourceGraphShape } from "../../graph/resource-graph.js";
import {
	type SortElementExpression,
	type SortExpression,
	lastAttribute,
} from "../expressions.js";
import { resolveFieldChain } from "../field-chains.js";
import { formatExpression } from "../format.js";
import { openCursor } from "../tokenizer.js";

/**
 * Parse `-title,count(comments),author.name` into sort elements.
 * Listing the same element twice is rejected.
 */
export const parseSort = (
	source: string,
	context: ResourceContext,
	graph: ResourceGraphShape,
	parameterName: string,
): Effect.Effect<SortExpression, QueryStringParameterError> =>
	Effect.gen(function* () {
		const cursor = yield* openCursor(source, parameterName);
		const elements: Array<SortElementExpression> = [];
		const seen = new Set<string>();

		do {
			const isAscending = !cursor.accept("Minus");
			const token = yield* cursor.expect(
				"Text",
				"-, count function or field name expected.",
			);

			let element: SortElementExpression;
			if (token.value === "count" && cursor.peek()?.kind === "OpenParen") {
				cursor.next();
				const chainToken = yield* cursor.expect(
					"Text",
					"To-many relationship expected.",
				);
				const targetCollection = yield* resolveFieldChain(
					graph,
					context,
					chainToken.value,
					"toMany",
					parameterName,
				);
				yield* cursor.expect("CloseParen", ") expected.");
				element = {
					_tag: "SortElement",
					target: { _tag: "Count", targetCollection },
					isAscending,
				};
			} else {
				const chain = yield* resolveFieldChain(
					graph,
					context,
					token.value,
					"attribute",
					parameterName,
				);
				const attribute = lastAttribute(chain);
				if (attribute !== undefined && !attribute.capabilities.sort) {
					return yield* invalidParameter(
						parameterName,
						`Sorting on attribute '${attribute.publicName}' is not allowed.`,
					);
				}
				element = { _tag: "SortElement", target: chain, isAscending };
			}

			const key = formatExpression(element.target);
			if (seen.has(key)) {
				return yield* invalidParameter(
					parameterName,
					`Sort element '${key}' is specified more than once.`,
				);
			}
			seen.add(key);
			elements.push(element);
		} while (cursor.accept("Comma"));

		yield* cursor.expectEnd();
		return { _tag: "Sort", elements } as const;
	});
