import { Effect } from "effect";
import type { ResourceFieldChain, FilterExpression } from "../expressions.js";
import { andAll, scopeKey } from "../expressions.js";
import { contextAtEnd } from "../field-chains.js";
import { formatExpression } from "../format.js";
import { parseFilter } from "../parsers/filter-parser.js";
import {
	convertLegacyCondition,
	extractConditions,
	type LegacyCondition,
} from "./legacy-filter-notation.js";
import {
	type QueryStringParameterReader,
	hasBase,
	parseParameterName,
	requestResourceContext,
} from "./query-string-reader.js";
import {
	type ReaderDependencies,
	resolveScope,
	unsupportedName,
} from "./reader-support.js";

interface ScopedFilters {
	readonly scope: ResourceFieldChain | undefined;
	readonly terms: Array<FilterExpression>;
	readonly formatted: Set<string>;
}

/**
 * `filter` and `filter[<to-many chain>]`, plus the legacy
 * `filter[<attribute>]=op:value` form when enabled. Filters on one scope are
 * combined with `and`; a condition already present is not added again.
 */
export const makeFilterReader = (
	dependencies: ReaderDependencies,
): QueryStringParameterReader => {
	const { graph, options, request } = dependencies;
	const filtersByScope = new Map<string, ScopedFilters>();

	const addFilter = (
		scope: ResourceFieldChain | undefined,
		filter: FilterExpression,
	): void => {
		const key = scopeKey(scope);
		let entry = filtersByScope.get(key);
		if (entry === undefined) {
			entry = { scope, terms: [], formatted: new Set() };
			filtersByScope.set(key, entry);
		}
		const text = formatExpression(filter);
		if (!entry.formatted.has(text)) {
			entry.formatted.add(text);
			entry.terms.push(filter);
		}
	};

	return {
		kind: "filter",
		canRead: (parameterName) => hasBase(parameterName, "filter"),
		isEnabled: (disabled) => !disabled.has("filter"),
		read: (parameterName, parameterValue) =>
			Effect.gen(function* () {
				const { brackets } = yield* parseParameterName(parameterName);
				if (brackets.length > 1) {
					return yield* unsupportedName(parameterName);
				}
				const bracket: string | undefined = brackets[0];

				const conditions: ReadonlyArray<LegacyCondition> =
					options.enableLegacyFilterNotation
						? extractConditions(parameterValue).map((condition) =>
								convertLegacyCondition(bracket, condition),
							)
						: [{ scope: bracket, expression: parameterValue }];

				for (const condition of conditions) {
					const scope = yield* resolveScope(
						dependencies,
						condition.scope,
						parameterName,
					);
					const context = contextAtEnd(
						graph,
						requestResourceContext(request),
						scope,
					);
					const filter = yield* parseFilter(
						condition.expression,
						context,
						graph,
						parameterName,
					);
					addFilter(scope, filter);
				}
			}),
		getConstraints: () =>
			[...filtersByScope.values()].flatMap((entry) => {
				const expression = andAll(entry.terms);
				return expression === undefined
					? []
					: [{ scope: entry.scope, expression }];
			}),
	};
};
