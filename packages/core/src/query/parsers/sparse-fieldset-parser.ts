import { Effect, Option } from "effect";
import {
	type QueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import type {
	ResourceContext,
	ResourceField,
} from "../../graph/graph-types.js";
import type { ResourceGraphShape } from "../../graph/resource-graph.js";
import type { SparseFieldSetExpression } from "../expressions.js";
import { openCursor } from "../tokenizer.js";

/**
 * Parse `title,author` into the fields of `context` to return.
 */
export const parseSparseFieldSet = (
	source: string,
	context: ResourceContext,
	graph: ResourceGraphShape,
	parameterName: string,
): Effect.Effect<SparseFieldSetExpression, QueryStringParameterError> =>
	Effect.gen(function* () {
		const cursor = yield* openCursor(source, parameterName);
		const fields: Array<ResourceField> = [];

		do {
			const token = yield* cursor.expect("Text", "Field name expected.");
			const field = graph.findField(context, token.value);
			if (Option.isNone(field)) {
				return yield* invalidParameter(
					parameterName,
					`Field '${token.value}' does not exist on resource type '${context.publicName}'.`,
				);
			}
			if (field.value._tag === "Attribute" && !field.value.capabilities.view) {
				return yield* invalidParameter(
					parameterName,
					`Retrieving the attribute '${token.value}' is not allowed.`,
				);
			}
			if (!fields.includes(field.value)) {
				fields.push(field.value);
			}
		} while (cursor.accept("Comma"));

		yield* cursor.expectEnd();
		return { _tag: "SparseFieldSet", fields } as const;
	});
