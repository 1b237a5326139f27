import { Effect, Option } from "effect";
import {
	type QueryStringParameterError,
	invalidParameter,
	parseError,
} from "../errors/query-errors.js";
import type { ResourceContext, ResourceField } from "../graph/graph-types.js";
import type { ResourceGraphShape } from "../graph/resource-graph.js";
import { type ResourceFieldChain, fieldChain } from "./expressions.js";

/**
 * What a field chain must look like at the place it is used.
 *
 * - `attribute`: to-one relationships followed by an attribute (`author.name`)
 * - `toMany`: to-one relationships followed by a to-many one (`author.articles`)
 * - `scope`: relationships of any kind ending in a to-many one
 * - `include`: one or more relationships of any kind
 */
export type ChainPattern = "attribute" | "toMany" | "scope" | "include";

const describeSegment = (field: ResourceField): string =>
	field._tag === "Attribute"
		? "an attribute"
		: field.cardinality === "hasOne"
			? "a to-one relationship"
			: "a to-many relationship";

const acceptsIntermediate = (
	pattern: ChainPattern,
	field: ResourceField,
): boolean => {
	if (field._tag === "Attribute") return false;
	if (pattern === "scope" || pattern === "include") return true;
	return field.cardinality === "hasOne";
};

const acceptsLast = (pattern: ChainPattern, field: ResourceField): boolean => {
	switch (pattern) {
		case "attribute":
			return field._tag === "Attribute";
		case "toMany":
		case "scope":
			return field._tag === "Relationship" && field.cardinality === "hasMany";
		case "include":
			return field._tag === "Relationship";
	}
};

const expectedAt = (pattern: ChainPattern, isLast: boolean): string => {
	if (!isLast) {
		return pattern === "scope" || pattern === "include"
			? "a relationship"
			: "a to-one relationship";
	}
	switch (pattern) {
		case "attribute":
			return "an attribute";
		case "toMany":
		case "scope":
			return "a to-many relationship";
		case "include":
			return "a relationship";
	}
};

/**
 * Resolve `path` against `context`, advancing through the right side of every
 * relationship on the way.
 */
export const resolveFieldChain = (
	graph: ResourceGraphShape,
	context: ResourceContext,
	path: string,
	pattern: ChainPattern,
	parameterName: string,
): Effect.Effect<ResourceFieldChain, QueryStringParameterError> =>
	Effect.gen(function* () {
		const segments = path.split(".");
		if (segments.some((segment) => segment.length === 0)) {
			return yield* parseError(
				parameterName,
				`Field chain '${path}' contains an empty segment.`,
			);
		}

		const fields: Array<ResourceField> = [];
		let current = context;
		for (const [index, segment] of segments.entries()) {
			const isLast = index === segments.length - 1;
			const field = graph.findField(current, segment);
			if (Option.isNone(field)) {
				return yield* invalidParameter(
					parameterName,
					`Field '${segment}' does not exist on resource type '${current.publicName}'.`,
				);
			}
			const accepted = isLast
				? acceptsLast(pattern, field.value)
				: acceptsIntermediate(pattern, field.value);
			if (!accepted) {
				return yield* invalidParameter(
					parameterName,
					`Field '${segment}' on resource type '${current.publicName}' is ${describeSegment(field.value)}, but ${expectedAt(pattern, isLast)} is expected here.`,
				);
			}
			fields.push(field.value);
			if (field.value._tag === "Relationship") {
				current = graph.getRightContext(field.value);
			}
		}

		return fieldChain(fields);
	});

/**
 * The resource type reached at the end of a relationship chain.
 */
export const contextAtEnd = (
	graph: ResourceGraphShape,
	root: ResourceContext,
	chain: ResourceFieldChain | undefined,
): ResourceContext => {
	let current = root;
	for (const field of chain?.fields ?? []) {
		if (field._tag === "Relationship") {
			current = graph.getRightContext(field);
		}
	}
	return current;
};
