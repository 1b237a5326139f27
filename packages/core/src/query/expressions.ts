/**
 * Typed query expressions produced by the query string readers.
 *
 * Every expression is an immutable tagged value. `formatExpression` renders
 * the canonical text form, which parses back into an equal expression.
 *
 * @module
 */

import type {
	AttributeDefinition,
	RelationshipDefinition,
	ResourceField,
} from "../graph/graph-types.js";

// ============================================================================
// Terms
// ============================================================================

/**
 * A dot-separated path through the resource graph, e.g. `author.name`.
 */
export interface ResourceFieldChain {
	readonly _tag: "ResourceFieldChain";
	readonly fields: ReadonlyArray<ResourceField>;
}

export interface LiteralConstant {
	readonly _tag: "LiteralConstant";
	readonly value: string | number | boolean;
}

export interface NullConstant {
	readonly _tag: "NullConstant";
}

export interface CountExpression {
	readonly _tag: "Count";
	readonly targetCollection: ResourceFieldChain;
}

// ============================================================================
// Filters
// ============================================================================

export type ComparisonOperator =
	| "equals"
	| "greaterThan"
	| "greaterOrEqual"
	| "lessThan"
	| "lessOrEqual";

export interface ComparisonExpression {
	readonly _tag: "Comparison";
	readonly operator: ComparisonOperator;
	readonly left: ResourceFieldChain | CountExpression;
	readonly right:
		| ResourceFieldChain
		| CountExpression
		| LiteralConstant
		| NullConstant;
}

export type TextMatchKind = "contains" | "startsWith" | "endsWith";

export interface MatchTextExpression {
	readonly _tag: "MatchText";
	readonly matchKind: TextMatchKind;
	readonly targetAttribute: ResourceFieldChain;
	readonly textValue: LiteralConstant;
}

export interface AnyExpression {
	readonly _tag: "Any";
	readonly targetAttribute: ResourceFieldChain;
	readonly constants: ReadonlyArray<LiteralConstant>;
}

export type LogicalOperator = "and" | "or";

export interface LogicalExpression {
	readonly _tag: "Logical";
	readonly operator: LogicalOperator;
	readonly terms: ReadonlyArray<FilterExpression>;
}

export interface NotExpression {
	readonly _tag: "Not";
	readonly child: FilterExpression;
}

export interface HasExpression {
	readonly _tag: "Has";
	readonly targetCollection: ResourceFieldChain;
	/** Evaluated against the resources on the right side of the collection. */
	readonly filter: FilterExpression | undefined;
}

export type FilterExpression =
	| ComparisonExpression
	| MatchTextExpression
	| AnyExpression
	| LogicalExpression
	| NotExpression
	| HasExpression;

// ============================================================================
// Other Constraints
// ============================================================================

export interface SortElementExpression {
	readonly _tag: "SortElement";
	readonly target: ResourceFieldChain | CountExpression;
	readonly isAscending: boolean;
}

export interface SortExpression {
	readonly _tag: "Sort";
	readonly elements: ReadonlyArray<SortElementExpression>;
}

export interface IncludeElementExpression {
	readonly _tag: "IncludeElement";
	readonly relationship: RelationshipDefinition;
	readonly children: ReadonlyArray<IncludeElementExpression>;
}

export interface IncludeExpression {
	readonly _tag: "Include";
	readonly elements: ReadonlyArray<IncludeElementExpression>;
}

export interface PaginationExpression {
	readonly _tag: "Pagination";
	/** One-based. */
	readonly pageNumber: number;
	/** Undefined means unlimited. */
	readonly pageSize: number | undefined;
}

export interface SparseFieldSetExpression {
	readonly _tag: "SparseFieldSet";
	readonly fields: ReadonlyArray<ResourceField>;
}

/**
 * Resource type public name -> fields to return for that type.
 */
export interface SparseFieldTableExpression {
	readonly _tag: "SparseFieldTable";
	readonly table: ReadonlyMap<string, SparseFieldSetExpression>;
}

/**
 * Client override of the serializer's omission of default or null values.
 */
export interface ValueHandlingExpression {
	readonly _tag: "ValueHandling";
	readonly setting: "defaults" | "nulls";
	readonly omit: boolean;
}

export type QueryExpression =
	| FilterExpression
	| ResourceFieldChain
	| LiteralConstant
	| NullConstant
	| CountExpression
	| SortElementExpression
	| SortExpression
	| IncludeElementExpression
	| IncludeExpression
	| PaginationExpression
	| SparseFieldSetExpression
	| SparseFieldTableExpression
	| ValueHandlingExpression;

/**
 * A constraint together with the to-many relationship chain it applies to.
 * An undefined scope targets the primary resources of the request.
 */
export interface ExpressionInScope {
	readonly scope: ResourceFieldChain | undefined;
	readonly expression: QueryExpression;
}

// ============================================================================
// Constructors
// ============================================================================

export const fieldChain = (
	fields: ReadonlyArray<ResourceField>,
): ResourceFieldChain => ({ _tag: "ResourceFieldChain", fields });

export const literal = (value: string | number | boolean): LiteralConstant => ({
	_tag: "LiteralConstant",
	value,
});

export const nullConstant: NullConstant = { _tag: "NullConstant" };

export const andAll = (
	terms: ReadonlyArray<FilterExpression>,
): FilterExpression | undefined => {
	if (terms.length === 0) return undefined;
	const [first] = terms;
	if (terms.length === 1 && first !== undefined) return first;
	return { _tag: "Logical", operator: "and", terms };
};

/**
 * The attribute at the end of a chain, when the chain ends in one.
 */
export const lastAttribute = (
	chain: ResourceFieldChain,
): AttributeDefinition | undefined => {
	const last = chain.fields[chain.fields.length - 1];
	return last !== undefined && last._tag === "Attribute" ? last : undefined;
};

export const scopeKey = (scope: ResourceFieldChain | undefined): string =>
	scope === undefined
		? ""
		: scope.fields.map((field) => field.publicName).join(".");
