/**
 * Reads every parameter of one request's query string into a
 * QuerySpecification.
 *
 * Parameter errors are collected so that one response can report all of
 * them. A malformed parameter name stops reading immediately.
 *
 * @module
 */

import { Effect, Either } from "effect";
import { ApiOptions } from "../config/api-options.js";
import {
	type QueryParseError,
	type QueryStringParameterError,
	QueryStringValidationError,
	invalidParameter,
} from "../errors/query-errors.js";
import { ResourceGraph } from "../graph/resource-graph.js";
import type { QuerySpecification } from "./query-specification.js";
import { makeFilterReader } from "./readers/filter-reader.js";
import { makeIncludeReader } from "./readers/include-reader.js";
import { makePaginationReader } from "./readers/pagination-reader.js";
import {
	type JsonApiRequest,
	type QueryParameterKind,
	type QueryStringParameterReader,
	parseParameterName,
	requestResourceContext,
} from "./readers/query-string-reader.js";
import type { ReaderDependencies } from "./readers/reader-support.js";
import { makeSortReader } from "./readers/sort-reader.js";
import { makeSparseFieldSetReader } from "./readers/sparse-fieldset-reader.js";
import {
	makeDefaultsReader,
	makeNullsReader,
} from "./readers/value-handling-readers.js";

/**
 * Raw query string: parameter name -> value, or every value of a repeated
 * parameter. Repeated values are read one at a time.
 */
export type QueryCollection = Readonly<
	Record<string, string | ReadonlyArray<string> | undefined>
>;

export const createReaders = (
	dependencies: ReaderDependencies,
): ReadonlyArray<QueryStringParameterReader> => [
	makeIncludeReader(dependencies),
	makeFilterReader(dependencies),
	makeSortReader(dependencies),
	makeSparseFieldSetReader(dependencies),
	makePaginationReader(dependencies),
	makeDefaultsReader(dependencies),
	makeNullsReader(dependencies),
];

const selectReader = (
	readers: ReadonlyArray<QueryStringParameterReader>,
	parameterName: string,
): QueryStringParameterReader | undefined =>
	readers.find(
		(reader) => reader.kind === parameterName && reader.canRead(parameterName),
	) ?? readers.find((reader) => reader.canRead(parameterName));

const unknownParameter = (parameterName: string) =>
	invalidParameter(
		parameterName,
		`Query string parameter '${parameterName}' is unknown. Set 'allowUnknownQueryStringParameters' to true to ignore unknown parameters.`,
		"Unknown query string parameter.",
	);

const parameterNotAllowed = (parameterName: string) =>
	invalidParameter(
		parameterName,
		`The parameter '${parameterName}' cannot be used at this endpoint.`,
		"Usage of one or more query string parameters is not allowed at the requested endpoint.",
	);

const missingValue = (parameterName: string) =>
	invalidParameter(
		parameterName,
		`Missing value for '${parameterName}' query string parameter.`,
		"Missing query string parameter value.",
	);

/**
 * Read `query` for the endpoint described by `request`. Readers whose kind is
 * in `disabled` reject their parameters.
 */
export const readQueryString = (
	request: JsonApiRequest,
	query: QueryCollection,
	disabled: ReadonlySet<QueryParameterKind> = new Set(),
): Effect.Effect<
	QuerySpecification,
	QueryParseError | QueryStringValidationError,
	ResourceGraph | ApiOptions
> =>
	Effect.gen(function* () {
		const graph = yield* ResourceGraph;
		const options = yield* ApiOptions;
		const readers = createReaders({ graph, options, request });
		const errors: Array<QueryStringParameterError> = [];

		for (const [parameterName, raw] of Object.entries(query)) {
			if (raw === undefined) continue;
			const values: ReadonlyArray<string> = typeof raw === "string" ? [raw] : raw;

			yield* parseParameterName(parameterName);

			const reader = selectReader(readers, parameterName);
			if (reader === undefined) {
				if (options.allowUnknownQueryStringParameters) {
					yield* Effect.logDebug("Skipped unknown query string parameter").pipe(
						Effect.annotateLogs({ parameter: parameterName }),
					);
				} else {
					errors.push(unknownParameter(parameterName));
				}
				continue;
			}
			if (!reader.isEnabled(disabled)) {
				errors.push(parameterNotAllowed(parameterName));
				continue;
			}
			if (values.length === 0 || values.includes("")) {
				errors.push(missingValue(parameterName));
				continue;
			}

			for (const parameterValue of values) {
				const result = yield* Effect.either(
					reader.read(parameterName, parameterValue),
				);
				if (Either.isLeft(result)) {
					errors.push(result.left);
					break;
				}
				yield* Effect.logDebug("Read query string parameter").pipe(
					Effect.annotateLogs({
						parameter: parameterName,
						value: parameterValue,
					}),
				);
			}
		}

		if (errors.length > 0) {
			return yield* new QueryStringValidationError({
				errors,
				message: errors.map((error) => error.message).join(" "),
			});
		}

		const constraints = readers.flatMap((reader) => reader.getConstraints());
		let { omitDefaultValues, omitNullValues } = options;
		for (const { expression } of constraints) {
			if (expression._tag !== "ValueHandling") continue;
			if (expression.setting === "defaults") omitDefaultValues = expression.omit;
			else omitNullValues = expression.omit;
		}

		return {
			resourceType: requestResourceContext(request).publicName,
			constraints,
			serialization: { omitDefaultValues, omitNullValues },
		};
	});
