/**
 * Runtime options for query-string reading, serialization and atomic operations.
 *
 * Options are an Effect service: hosts either provide them explicitly with
 * `makeApiOptionsLayer` or load them from the active ConfigProvider (env vars by
 * default) with `ApiOptionsFromConfigLayer`.
 */

import {
	Config,
	type ConfigError,
	Context,
	Effect,
	Layer,
	Option,
} from "effect";

// ============================================================================
// Types
// ============================================================================

export interface ApiOptionsShape {
	/** Skip parameters no reader claims instead of failing the request. */
	readonly allowUnknownQueryStringParameters: boolean;
	/** Accept `filter[attr]=eq:value` style filters next to the function notation. */
	readonly enableLegacyFilterNotation: boolean;
	/** Maximum number of relationships in one include chain; undefined means unlimited. */
	readonly maximumIncludeDepth: number | undefined;
	/** Page size applied to collections when the request names none; undefined disables paging. */
	readonly defaultPageSize: number | undefined;
	readonly maximumPageSize: number | undefined;
	readonly maximumPageNumber: number | undefined;
	readonly allowQueryStringOverrideForSerializerDefaultValueHandling: boolean;
	readonly allowQueryStringOverrideForSerializerNullValueHandling: boolean;
	readonly omitDefaultValues: boolean;
	readonly omitNullValues: boolean;
	readonly enableResourceHooks: boolean;
	readonly maximumOperationsPerRequest: number | undefined;
	readonly allowClientGeneratedIds: boolean;
}

export class ApiOptions extends Context.Tag("jsonweave/ApiOptions")<
	ApiOptions,
	ApiOptionsShape
>() {}

export const DEFAULT_API_OPTIONS: ApiOptionsShape = {
	allowUnknownQueryStringParameters: false,
	enableLegacyFilterNotation: false,
	maximumIncludeDepth: undefined,
	defaultPageSize: 10,
	maximumPageSize: undefined,
	maximumPageNumber: undefined,
	allowQueryStringOverrideForSerializerDefaultValueHandling: false,
	allowQueryStringOverrideForSerializerNullValueHandling: false,
	omitDefaultValues: false,
	omitNullValues: false,
	enableResourceHooks: false,
	maximumOperationsPerRequest: 10,
	allowClientGeneratedIds: false,
};

// ============================================================================
// Construction
// ============================================================================

export const makeApiOptions = (
	overrides: Partial<ApiOptionsShape> = {},
): ApiOptionsShape => ({
	...DEFAULT_API_OPTIONS,
	...overrides,
});

export const makeApiOptionsLayer = (
	overrides: Partial<ApiOptionsShape> = {},
): Layer.Layer<ApiOptions> =>
	Layer.succeed(ApiOptions, makeApiOptions(overrides));

const flag = (key: string, fallback: boolean) =>
	Config.boolean(key).pipe(Config.withDefault(fallback));

const optionalPositive = (key: string, fallback: number | undefined) =>
	Config.option(
		Config.integer(key).pipe(
			Config.validate({
				message: "Expected a positive integer",
				validation: (value) => value > 0,
			}),
		),
	).pipe(
		Config.map((value) => Option.getOrElse(value, () => fallback)),
	);

/**
 * Option keys as read from the ConfigProvider.
 */
export const ApiOptionsConfig: Config.Config<ApiOptionsShape> = Config.all({
	allowUnknownQueryStringParameters: flag(
		"JSONAPI_ALLOW_UNKNOWN_QUERY_STRING_PARAMETERS",
		DEFAULT_API_OPTIONS.allowUnknownQueryStringParameters,
	),
	enableLegacyFilterNotation: flag(
		"JSONAPI_ENABLE_LEGACY_FILTER_NOTATION",
		DEFAULT_API_OPTIONS.enableLegacyFilterNotation,
	),
	maximumIncludeDepth: optionalPositive(
		"JSONAPI_MAXIMUM_INCLUDE_DEPTH",
		DEFAULT_API_OPTIONS.maximumIncludeDepth,
	),
	defaultPageSize: optionalPositive(
		"JSONAPI_DEFAULT_PAGE_SIZE",
		DEFAULT_API_OPTIONS.defaultPageSize,
	),
	maximumPageSize: optionalPositive(
		"JSONAPI_MAXIMUM_PAGE_SIZE",
		DEFAULT_API_OPTIONS.maximumPageSize,
	),
	maximumPageNumber: optionalPositive(
		"JSONAPI_MAXIMUM_PAGE_NUMBER",
		DEFAULT_API_OPTIONS.maximumPageNumber,
	),
	allowQueryStringOverrideForSerializerDefaultValueHandling: flag(
		"JSONAPI_ALLOW_DEFAULTS_OVERRIDE",
		DEFAULT_API_OPTIONS.allowQueryStringOverrideForSerializerDefaultValueHandling,
	),
	allowQueryStringOverrideForSerializerNullValueHandling: flag(
		"JSONAPI_ALLOW_NULLS_OVERRIDE",
		DEFAULT_API_OPTIONS.allowQueryStringOverrideForSerializerNullValueHandling,
	),
	omitDefaultValues: flag(
		"JSONAPI_OMIT_DEFAULT_VALUES",
		DEFAULT_API_OPTIONS.omitDefaultValues,
	),
	omitNullValues: flag(
		"JSONAPI_OMIT_NULL_VALUES",
		DEFAULT_API_OPTIONS.omitNullValues,
	),
	enableResourceHooks: flag(
		"JSONAPI_ENABLE_RESOURCE_HOOKS",
		DEFAULT_API_OPTIONS.enableResourceHooks,
	),
	maximumOperationsPerRequest: optionalPositive(
		"JSONAPI_MAXIMUM_OPERATIONS_PER_REQUEST",
		DEFAULT_API_OPTIONS.maximumOperationsPerRequest,
	),
	allowClientGeneratedIds: flag(
		"JSONAPI_ALLOW_CLIENT_GENERATED_IDS",
		DEFAULT_API_OPTIONS.allowClientGeneratedIds,
	),
});

/**
 * Options read from the active ConfigProvider. Invalid values fail layer
 * construction with a ConfigError.
 */
export const ApiOptionsFromConfigLayer: Layer.Layer<
	ApiOptions,
	ConfigError.ConfigError
> = Layer.effect(
	ApiOptions,
	Effect.gen(function* () {
		const options = yield* ApiOptionsConfig;
		yield* Effect.logDebug("Loaded API options").pipe(
			Effect.annotateLogs({ options: JSON.stringify(options) }),
		);
		return options;
	}),
);
