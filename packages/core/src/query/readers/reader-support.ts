import { Effect } from "effect";
import {
	type QueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import type { ApiOptionsShape } from "../../config/api-options.js";
import type { ResourceGraphShape } from "../../graph/resource-graph.js";
import type { ResourceFieldChain } from "../expressions.js";
import { resolveFieldChain } from "../field-chains.js";
import {
	type JsonApiRequest,
	requestResourceContext,
} from "./query-string-reader.js";

/**
 * What every reader needs to resolve names while reading one request.
 */
export interface ReaderDependencies {
	readonly graph: ResourceGraphShape;
	readonly options: ApiOptionsShape;
	readonly request: JsonApiRequest;
}

/**
 * Resolve the `[scope]` part of a parameter name. Without a scope the
 * parameter targets the primary resources, which must be a collection.
 */
export const resolveScope = (
	dependencies: ReaderDependencies,
	scopePath: string | undefined,
	parameterName: string,
): Effect.Effect<ResourceFieldChain | undefined, QueryStringParameterError> => {
	if (scopePath === undefined) {
		return dependencies.request.isCollection
			? Effect.succeed(undefined)
			: Effect.fail(
					invalidParameter(
						parameterName,
						"This query string parameter can only be used on a collection of resources (not on a single resource).",
					),
				);
	}
	return resolveFieldChain(
		dependencies.graph,
		requestResourceContext(dependencies.request),
		scopePath,
		"scope",
		parameterName,
	);
};

export const unsupportedName = (parameterName: string) =>
	invalidParameter(
		parameterName,
		`Query string parameter name '${parameterName}' is not supported.`,
	);
