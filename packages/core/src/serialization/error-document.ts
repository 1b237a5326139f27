/**
 * JSON:API error objects for every domain error.
 *
 * @module
 */

import type { JsonApiError } from "../errors/index.js";

export interface ErrorSource {
	readonly pointer?: string;
	readonly parameter?: string;
}

export interface ErrorLinks {
	readonly about?: string;
}

export interface ErrorObject {
	/** Identifies this occurrence of the problem, e.g. in server logs. */
	readonly id?: string;
	readonly links?: ErrorLinks;
	readonly status: string;
	readonly title: string;
	readonly detail?: string;
	readonly source?: ErrorSource;
}

export interface ErrorDocument {
	readonly errors: ReadonlyArray<ErrorObject>;
}

/**
 * HTTP status per error tag.
 */
export const ERROR_STATUS_MAP: Record<JsonApiError["_tag"], number> = {
	QueryParseError: 400,
	InvalidQueryStringParameterError: 400,
	QueryStringValidationError: 400,
	LocalIdAlreadyDeclaredError: 400,
	LocalIdNotFoundError: 400,
	ResourceNotFoundError: 404,
	UnsupportedOperationError: 403,
	TooManyOperationsError: 413,
	RequestBodyError: 422,
	HookError: 422,
	TransactionError: 500,
	InvalidConfigurationError: 500,
};

const pointerSource = (pointer: string | undefined): { source?: ErrorSource } =>
	pointer === undefined ? {} : { source: { pointer } };

/**
 * An error object that exposes nothing about the failure.
 */
export const internalErrorObject = (): ErrorObject => ({
	status: "500",
	title: "An unhandled error occurred while processing this request.",
});

export const toErrorObjects = (
	error: JsonApiError,
): ReadonlyArray<ErrorObject> => {
	const status = String(ERROR_STATUS_MAP[error._tag]);
	switch (error._tag) {
		case "QueryParseError":
			return [
				{
					status,
					title: `The specified ${error.parameterName} is invalid.`,
					detail:
						error.position === undefined
							? error.detail
							: `${error.detail} Failed at position ${error.position + 1}.`,
					source: { parameter: error.parameterName },
				},
			];
		case "InvalidQueryStringParameterError":
			return [
				{
					status,
					title: error.title,
					detail: error.detail,
					source: { parameter: error.parameterName },
				},
			];
		case "QueryStringValidationError":
			return error.errors.flatMap(toErrorObjects);
		case "LocalIdAlreadyDeclaredError":
			return [
				{
					status,
					title: "Another local ID with the same name is already defined at this point.",
					detail: error.message,
					...pointerSource(error.pointer),
				},
			];
		case "LocalIdNotFoundError":
			return [
				{
					status,
					title:
						error.reason === "undeclared"
							? "Local ID is not declared at this point."
							: "Server-generated value for local ID is not available at this point.",
					detail: error.message,
					...pointerSource(error.pointer),
				},
			];
		case "ResourceNotFoundError":
			return [
				{
					status,
					title:
						error.relationshipName === undefined
							? "The requested resource does not exist."
							: "A related resource does not exist.",
					detail: error.message,
					...pointerSource(error.pointer),
				},
			];
		case "UnsupportedOperationError":
			return [
				{
					status,
					title: "The requested operation is not accessible.",
					detail: error.message,
					...pointerSource(error.pointer),
				},
			];
		case "TooManyOperationsError":
			return [
				{
					status,
					title: "Too many operations in request.",
					detail: error.message,
				},
			];
		case "RequestBodyError":
			return [
				{
					status,
					title: error.title,
					detail: error.detail,
					...pointerSource(error.pointer),
				},
			];
		case "HookError":
			return [
				{
					status,
					title: "The operation was rejected.",
					detail: error.reason,
					...pointerSource(error.pointer),
				},
			];
		case "TransactionError":
		case "InvalidConfigurationError":
			return [internalErrorObject()];
	}
};

/**
 * Response status for a set of error objects: their common status when they
 * agree, 400 when all are client errors, 500 otherwise.
 */
export const errorDocumentStatus = (
	errors: ReadonlyArray<ErrorObject>,
): number => {
	const statuses = [...new Set(errors.map((error) => Number(error.status)))];
	const [first] = statuses;
	if (statuses.length === 1 && first !== undefined) return first;
	return statuses.length > 0 && statuses.every((status) => status >= 400 && status < 500)
		? 400
		: 500;
};

export const buildErrorDocument = (
	errors: ReadonlyArray<ErrorObject>,
): ErrorDocument => ({ errors });
