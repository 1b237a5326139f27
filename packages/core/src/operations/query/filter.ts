import type {
	ComparisonExpression,
	ComparisonOperator,
	FilterExpression,
} from "../../query/expressions.js";
import type { StoredResource } from "../../types/resource-types.js";
import {
	type ResourceLookup,
	readAttributeChain,
	readCollectionChain,
} from "./resource-lookup.js";

const isScalar = (value: unknown): value is string | number | boolean =>
	typeof value === "string" ||
	typeof value === "number" ||
	typeof value === "boolean";

/**
 * Ordering of two values of the same primitive type; undefined when they
 * cannot be ordered.
 */
export const compareScalars = (
	left: unknown,
	right: unknown,
): number | undefined => {
	if (typeof left === "number" && typeof right === "number") {
		return left - right;
	}
	if (typeof left === "string" && typeof right === "string") {
		return left < right ? -1 : left > right ? 1 : 0;
	}
	if (typeof left === "boolean" && typeof right === "boolean") {
		// false < true in ascending order
		return (left ? 1 : 0) - (right ? 1 : 0);
	}
	return undefined;
};

const satisfies = (operator: ComparisonOperator, comparison: number): boolean => {
	switch (operator) {
		case "equals":
			return comparison === 0;
		case "greaterThan":
			return comparison > 0;
		case "greaterOrEqual":
			return comparison >= 0;
		case "lessThan":
			return comparison < 0;
		case "lessOrEqual":
			return comparison <= 0;
	}
};

const evaluateTerm = (
	resource: StoredResource,
	term: ComparisonExpression["right"],
	lookup: ResourceLookup,
): unknown => {
	switch (term._tag) {
		case "LiteralConstant":
			return term.value;
		case "NullConstant":
			return null;
		case "Count":
			return readCollectionChain(resource, term.targetCollection, lookup).length;
		case "ResourceFieldChain":
			return readAttributeChain(resource, term, lookup);
	}
};

const matchesComparison = (
	resource: StoredResource,
	expression: ComparisonExpression,
	lookup: ResourceLookup,
): boolean => {
	const left = evaluateTerm(resource, expression.left, lookup);
	const right = evaluateTerm(resource, expression.right, lookup);

	if (expression.right._tag === "NullConstant") {
		return left === null || left === undefined;
	}
	if (!isScalar(left) || !isScalar(right)) return false;

	const comparison = compareScalars(left, right);
	if (comparison === undefined) {
		return expression.operator === "equals" && left === right;
	}
	return satisfies(expression.operator, comparison);
};

/**
 * Evaluate a filter against one resource.
 */
export const matchesFilter = (
	resource: StoredResource,
	filter: FilterExpression,
	lookup: ResourceLookup,
): boolean => {
	switch (filter._tag) {
		case "Comparison":
			return matchesComparison(resource, filter, lookup);
		case "MatchText": {
			const value = readAttributeChain(resource, filter.targetAttribute, lookup);
			if (typeof value !== "string") return false;
			const text = String(filter.textValue.value);
			switch (filter.matchKind) {
				case "contains":
					return value.includes(text);
				case "startsWith":
					return value.startsWith(text);
				case "endsWith":
					return value.endsWith(text);
			}
		}
		case "Any": {
			const value = readAttributeChain(resource, filter.targetAttribute, lookup);
			return filter.constants.some((constant) => constant.value === value);
		}
		case "Logical":
			// An `or` needs one matching term, an `and` needs all of them
			return filter.operator === "and"
				? filter.terms.every((term) => matchesFilter(resource, term, lookup))
				: filter.terms.some((term) => matchesFilter(resource, term, lookup));
		case "Not":
			return !matchesFilter(resource, filter.child, lookup);
		case "Has": {
			const related = readCollectionChain(
				resource,
				filter.targetCollection,
				lookup,
			);
			const { filter: condition } = filter;
			return condition === undefined
				? related.length > 0
				: related.some((item) => matchesFilter(item, condition, lookup));
		}
	}
};

export const filterResources = (
	resources: ReadonlyArray<StoredResource>,
	filter: FilterExpression | undefined,
	lookup: ResourceLookup,
): ReadonlyArray<StoredResource> =>
	filter === undefined
		? resources
		: resources.filter((resource) => matchesFilter(resource, filter, lookup));
