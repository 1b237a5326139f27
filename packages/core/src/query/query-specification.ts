import { Option } from "effect";
import type {
	ExpressionInScope,
	FilterExpression,
	IncludeExpression,
	PaginationExpression,
	QueryExpression,
	SortExpression,
	SparseFieldSetExpression,
} from "./expressions.js";
import { scopeKey } from "./expressions.js";
import { formatExpressionInScope } from "./format.js";

export interface SerializationSettings {
	readonly omitDefaultValues: boolean;
	readonly omitNullValues: boolean;
}

/**
 * Everything the query string asked for, validated against the resource graph.
 */
export interface QuerySpecification {
	readonly resourceType: string;
	readonly constraints: ReadonlyArray<ExpressionInScope>;
	readonly serialization: SerializationSettings;
}

export const emptyQuerySpecification = (
	resourceType: string,
	serialization: SerializationSettings = {
		omitDefaultValues: false,
		omitNullValues: false,
	},
): QuerySpecification => ({ resourceType, constraints: [], serialization });

const FILTER_TAGS: ReadonlySet<string> = new Set([
	"Comparison",
	"MatchText",
	"Any",
	"Logical",
	"Not",
	"Has",
]);

export const isFilterExpression = (
	expression: QueryExpression,
): expression is FilterExpression => FILTER_TAGS.has(expression._tag);

const findInScope = <A extends QueryExpression>(
	specification: QuerySpecification,
	scope: string,
	refine: (expression: QueryExpression) => expression is A,
): Option.Option<A> => {
	for (const constraint of specification.constraints) {
		if (scopeKey(constraint.scope) === scope && refine(constraint.expression)) {
			return Option.some(constraint.expression);
		}
	}
	return Option.none();
};

// ============================================================================
// Accessors
// ============================================================================

/**
 * `scope` is the dot-separated relationship chain, or "" for the primary
 * resources.
 */
export const getFilter = (
	specification: QuerySpecification,
	scope = "",
): Option.Option<FilterExpression> =>
	findInScope(specification, scope, isFilterExpression);

export const getSort = (
	specification: QuerySpecification,
	scope = "",
): Option.Option<SortExpression> =>
	findInScope(
		specification,
		scope,
		(expression): expression is SortExpression => expression._tag === "Sort",
	);

export const getPagination = (
	specification: QuerySpecification,
	scope = "",
): Option.Option<PaginationExpression> =>
	findInScope(
		specification,
		scope,
		(expression): expression is PaginationExpression =>
			expression._tag === "Pagination",
	);

export const getInclude = (
	specification: QuerySpecification,
): Option.Option<IncludeExpression> =>
	findInScope(
		specification,
		"",
		(expression): expression is IncludeExpression =>
			expression._tag === "Include",
	);

export const getSparseFieldSet = (
	specification: QuerySpecification,
	resourceType: string,
): Option.Option<SparseFieldSetExpression> => {
	for (const { expression } of specification.constraints) {
		if (expression._tag === "SparseFieldTable") {
			return Option.fromNullable(expression.table.get(resourceType));
		}
	}
	return Option.none();
};

/**
 * Canonical text of every constraint, in reader order.
 */
export const formatQuerySpecification = (
	specification: QuerySpecification,
): ReadonlyArray<string> =>
	specification.constraints.map(formatExpressionInScope);
