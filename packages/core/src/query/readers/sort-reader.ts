import { Effect } from "effect";
import { invalidParameter } from "../../errors/query-errors.js";
import type { ExpressionInScope } from "../expressions.js";
import { scopeKey } from "../expressions.js";
import { contextAtEnd } from "../field-chains.js";
import { parseSort } from "../parsers/sort-parser.js";
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

export const makeSortReader = (
	dependencies: ReaderDependencies,
): QueryStringParameterReader => {
	const sorts = new Map<string, ExpressionInScope>();

	return {
		kind: "sort",
		canRead: (parameterName) => hasBase(parameterName, "sort"),
		isEnabled: (disabled) => !disabled.has("sort"),
		read: (parameterName, parameterValue) =>
			Effect.gen(function* () {
				const { brackets } = yield* parseParameterName(parameterName);
				if (brackets.length > 1) {
					return yield* unsupportedName(parameterName);
				}
				const scope = yield* resolveScope(
					dependencies,
					brackets[0],
					parameterName,
				);
				const key = scopeKey(scope);
				if (sorts.has(key)) {
					return yield* invalidParameter(
						parameterName,
						key === ""
							? "Sort order of the primary resources is specified more than once."
							: `Sort order of '${key}' is specified more than once.`,
					);
				}
				const context = contextAtEnd(
					dependencies.graph,
					requestResourceContext(dependencies.request),
					scope,
				);
				const expression = yield* parseSort(
					parameterValue,
					context,
					dependencies.graph,
					parameterName,
				);
				sorts.set(key, { scope, expression });
			}),
		getConstraints: () => [...sorts.values()],
	};
};
