import { Data } from "effect";

// ============================================================================
// Query String Error Types
// ============================================================================

/**
 * The value (or name) of a query string parameter is not well-formed.
 * `position` is the zero-based character offset in the value, when known.
 */
export class QueryParseError extends Data.TaggedError("QueryParseError")<{
	readonly parameterName: string;
	readonly detail: string;
	readonly position?: number;
	readonly message: string;
}> {}

/**
 * The parameter is well-formed but cannot be applied: unknown field or type,
 * a capability that is switched off, a literal of the wrong kind, a limit.
 */
export class InvalidQueryStringParameterError extends Data.TaggedError(
	"InvalidQueryStringParameterError",
)<{
	readonly parameterName: string;
	readonly title: string;
	readonly detail: string;
	readonly message: string;
}> {}

export type QueryStringParameterError =
	| QueryParseError
	| InvalidQueryStringParameterError;

/**
 * Every parameter error collected while reading one query string.
 */
export class QueryStringValidationError extends Data.TaggedError(
	"QueryStringValidationError",
)<{
	readonly errors: ReadonlyArray<QueryStringParameterError>;
	readonly message: string;
}> {}

// ============================================================================
// Constructors
// ============================================================================

export const parseError = (
	parameterName: string,
	detail: string,
	position?: number,
): QueryParseError =>
	new QueryParseError({
		parameterName,
		detail,
		position,
		message:
			position === undefined
				? `The specified ${parameterName} is invalid. ${detail}`
				: `The specified ${parameterName} is invalid. ${detail} Failed at position ${position + 1}.`,
	});

export const invalidParameter = (
	parameterName: string,
	detail: string,
	title = `The specified ${parameterName} is invalid.`,
): InvalidQueryStringParameterError =>
	new InvalidQueryStringParameterError({
		parameterName,
		title,
		detail,
		message: `${title} ${detail}`,
	});
