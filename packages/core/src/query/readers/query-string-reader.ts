import { Effect } from "effect";
import {
	type QueryParseError,
	type QueryStringParameterError,
	parseError,
} from "../../errors/query-errors.js";
import type {
	RelationshipDefinition,
	ResourceContext,
} from "../../graph/graph-types.js";
import type { ExpressionInScope } from "../expressions.js";

// ============================================================================
// Request
// ============================================================================

/**
 * The endpoint a query string was sent to.
 *
 * - `primary`: `/articles` or `/articles/1`
 * - `secondary`: `/articles/1/author`
 * - `relationship`: `/articles/1/relationships/author`
 */
export interface JsonApiRequest {
	readonly kind: "primary" | "secondary" | "relationship";
	readonly primaryResource: ResourceContext;
	readonly secondaryResource?: ResourceContext;
	readonly relationship?: RelationshipDefinition;
	readonly isCollection: boolean;
}

/**
 * The resource type whose instances the endpoint returns.
 */
export const requestResourceContext = (
	request: JsonApiRequest,
): ResourceContext => request.secondaryResource ?? request.primaryResource;

// ============================================================================
// Reader Contract
// ============================================================================

export type QueryParameterKind =
	| "include"
	| "filter"
	| "sort"
	| "fields"
	| "page"
	| "defaults"
	| "nulls";

export const ALL_QUERY_PARAMETER_KINDS: ReadonlyArray<QueryParameterKind> = [
	"include",
	"filter",
	"sort",
	"fields",
	"page",
	"defaults",
	"nulls",
];

/**
 * Reads one aspect of the query string. Instances hold the state of a single
 * request.
 */
export interface QueryStringParameterReader {
	readonly kind: QueryParameterKind;
	readonly canRead: (parameterName: string) => boolean;
	/** False when the endpoint or the options turn this parameter off. */
	readonly isEnabled: (disabled: ReadonlySet<QueryParameterKind>) => boolean;
	readonly read: (
		parameterName: string,
		parameterValue: string,
	) => Effect.Effect<void, QueryStringParameterError>;
	readonly getConstraints: () => ReadonlyArray<ExpressionInScope>;
}

// ============================================================================
// Parameter Names
// ============================================================================

export interface ParameterName {
	readonly base: string;
	/** Contents of each `[...]` group, in order. */
	readonly brackets: ReadonlyArray<string>;
}

const PARAMETER_NAME = /^([^[\]]+)((?:\[[^[\]]+\])*)$/;

/**
 * Split `page[comments][size]` into its base name and bracket groups.
 * Unbalanced, empty or nested brackets are rejected.
 */
export const parseParameterName = (
	parameterName: string,
): Effect.Effect<ParameterName, QueryParseError> => {
	const match = PARAMETER_NAME.exec(parameterName);
	if (match === null) {
		return Effect.fail(
			parseError(
				parameterName,
				`Query string parameter name '${parameterName}' is malformed.`,
			),
		);
	}
	const [, base = "", groups = ""] = match;
	const brackets = [...groups.matchAll(/\[([^[\]]+)\]/g)].flatMap((group) =>
		group[1] === undefined ? [] : [group[1]],
	);
	return Effect.succeed({ base, brackets });
};

export const hasBase = (parameterName: string, base: string): boolean =>
	parameterName === base || parameterName.startsWith(`${base}[`);
