import { Data } from "effect";

// ============================================================================
// Atomic Operation Error Types
// ============================================================================

export class LocalIdAlreadyDeclaredError extends Data.TaggedError(
	"LocalIdAlreadyDeclaredError",
)<{
	readonly localId: string;
	readonly resourceType: string;
	readonly pointer?: string;
	readonly message: string;
}> {}

export class LocalIdNotFoundError extends Data.TaggedError(
	"LocalIdNotFoundError",
)<{
	readonly localId: string;
	readonly resourceType: string;
	readonly reason: "undeclared" | "unassigned";
	readonly pointer?: string;
	readonly message: string;
}> {}

export class UnsupportedOperationError extends Data.TaggedError(
	"UnsupportedOperationError",
)<{
	readonly operation: string;
	readonly resourceType: string;
	readonly pointer?: string;
	readonly message: string;
}> {}

export class TooManyOperationsError extends Data.TaggedError(
	"TooManyOperationsError",
)<{
	readonly count: number;
	readonly maximum: number;
	readonly message: string;
}> {}

export class RequestBodyError extends Data.TaggedError("RequestBodyError")<{
	readonly title: string;
	readonly detail?: string;
	readonly pointer?: string;
	readonly message: string;
}> {}

export type LocalIdError = LocalIdAlreadyDeclaredError | LocalIdNotFoundError;
