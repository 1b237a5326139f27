import type {
	InvalidQueryStringParameterError,
	QueryParseError,
	QueryStringValidationError,
} from "./query-errors.js";
import type {
	LocalIdAlreadyDeclaredError,
	LocalIdNotFoundError,
	RequestBodyError,
	TooManyOperationsError,
	UnsupportedOperationError,
} from "./operation-errors.js";
import type {
	HookError,
	InvalidConfigurationError,
	ResourceNotFoundError,
	TransactionError,
} from "./resource-errors.js";

export * from "./query-errors.js";
export * from "./operation-errors.js";
export * from "./resource-errors.js";
export * from "./pointers.js";

// ============================================================================
// Combined Error Union
// ============================================================================

export type JsonApiError =
	| QueryParseError
	| InvalidQueryStringParameterError
	| QueryStringValidationError
	| LocalIdAlreadyDeclaredError
	| LocalIdNotFoundError
	| UnsupportedOperationError
	| TooManyOperationsError
	| RequestBodyError
	| ResourceNotFoundError
	| HookError
	| TransactionError
	| InvalidConfigurationError;
