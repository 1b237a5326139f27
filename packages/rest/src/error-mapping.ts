/**
 * Error-to-HTTP mapping for JSON:API responses.
 *
 * Failures render as a JSON:API error document. Defects and interruptions
 * render as a generic 500 that exposes nothing about the cause; its `id` is
 * logged with the cause.
 *
 * @module
 */

import { randomBytes } from "node:crypto";
import { Cause, ConfigError, Effect, Option } from "effect";
import {
	buildErrorDocument,
	type ErrorDocument,
	type ErrorObject,
	errorDocumentStatus,
	internalErrorObject,
	type JsonApiError,
	toErrorObjects,
} from "@jsonweave/core";

export interface ErrorResponse {
	readonly status: number;
	readonly body: ErrorDocument;
}

export interface ErrorMappingOptions {
	/** Address of a page about a kind of failure, set as `links.about`. */
	readonly errorAbout?: (tag: JsonApiError["_tag"]) => string | undefined;
}

const withAbout = (
	errors: ReadonlyArray<ErrorObject>,
	about: string | undefined,
): ReadonlyArray<ErrorObject> =>
	about === undefined
		? errors
		: errors.map((error) => ({ ...error, links: { about } }));

export const mapErrorToResponse = (
	error: JsonApiError,
	options: ErrorMappingOptions = {},
): ErrorResponse => {
	const errors = withAbout(toErrorObjects(error), options.errorAbout?.(error._tag));
	return {
		status: errorDocumentStatus(errors),
		body: buildErrorDocument(errors),
	};
};

const internalError = (
	cause: Cause.Cause<unknown>,
): Effect.Effect<ErrorResponse> =>
	Effect.gen(function* () {
		const id = randomBytes(8).toString("hex");
		yield* Effect.logError("Unhandled failure while processing request", cause).pipe(
			Effect.annotateLogs("errorId", id),
		);
		return {
			status: 500,
			body: buildErrorDocument([{ id, ...internalErrorObject() }]),
		};
	});

/**
 * Map the cause of a failed request. Domain failures keep their status;
 * defects, interruptions and configuration failures are logged and hidden
 * behind a 500.
 */
export const mapCauseToResponse = (
	cause: Cause.Cause<JsonApiError | ConfigError.ConfigError>,
	options: ErrorMappingOptions = {},
): Effect.Effect<ErrorResponse> =>
	Option.match(Cause.failureOption(cause), {
		onSome: (error) =>
			ConfigError.isConfigError(error)
				? internalError(cause)
				: Effect.succeed(mapErrorToResponse(error, options)),
		onNone: () => internalError(cause),
	});
