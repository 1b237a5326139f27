import { Effect } from "effect";
import {
	type QueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import type {
	RelationshipDefinition,
	ResourceContext,
} from "../../graph/graph-types.js";
import type { ResourceGraphShape } from "../../graph/resource-graph.js";
import type {
	IncludeElementExpression,
	IncludeExpression,
} from "../expressions.js";
import { resolveFieldChain } from "../field-chains.js";
import { openCursor } from "../tokenizer.js";

interface IncludeNode {
	readonly relationship: RelationshipDefinition;
	readonly children: Map<string, IncludeNode>;
}

const toElements = (
	nodes: ReadonlyMap<string, IncludeNode>,
): ReadonlyArray<IncludeElementExpression> =>
	[...nodes.values()].map((node): IncludeElementExpression => ({
		_tag: "IncludeElement",
		relationship: node.relationship,
		children: toElements(node.children),
	}));

/**
 * Parse `author,comments.author` into one include tree. Chains sharing a
 * prefix share the nodes of that prefix.
 */
export const parseInclude = (
	source: string,
	context: ResourceContext,
	graph: ResourceGraphShape,
	parameterName: string,
	maximumDepth: number | undefined,
): Effect.Effect<IncludeExpression, QueryStringParameterError> =>
	Effect.gen(function* () {
		const cursor = yield* openCursor(source, parameterName);
		const roots = new Map<string, IncludeNode>();

		do {
			const token = yield* cursor.expect("Text", "Relationship name expected.");
			const chain = yield* resolveFieldChain(
				graph,
				context,
				token.value,
				"include",
				parameterName,
			);

			if (maximumDepth !== undefined && chain.fields.length > maximumDepth) {
				return yield* invalidParameter(
					parameterName,
					`Including '${token.value}' exceeds the maximum inclusion depth of ${maximumDepth}.`,
				);
			}

			let level = roots;
			for (const field of chain.fields) {
				if (field._tag !== "Relationship") continue;
				if (!field.canInclude) {
					return yield* invalidParameter(
						parameterName,
						`Including the relationship '${field.publicName}' on '${field.leftType}' is not allowed.`,
					);
				}
				let node = level.get(field.publicName);
				if (node === undefined) {
					node = { relationship: field, children: new Map() };
					level.set(field.publicName, node);
				}
				level = node.children;
			}
		} while (cursor.accept("Comma"));

		yield* cursor.expectEnd();
		return { _tag: "Include", elements: toElements(roots) } as const;
	});
