import { Data } from "effect";

// ============================================================================
// Resource Service Error Types
// ============================================================================

export class ResourceNotFoundError extends Data.TaggedError(
	"ResourceNotFoundError",
)<{
	readonly resourceType: string;
	readonly id: string;
	/** Set when the missing resource is a related one. */
	readonly relationshipName?: string;
	readonly pointer?: string;
	readonly message: string;
}> {}

export class HookError extends Data.TaggedError("HookError")<{
	readonly hook: string;
	readonly resourceType: string;
	readonly reason: string;
	readonly pointer?: string;
	readonly message: string;
}> {}

export class TransactionError extends Data.TaggedError("TransactionError")<{
	readonly operation: "begin" | "commit" | "rollback";
	readonly reason: string;
	readonly message: string;
}> {}

export class InvalidConfigurationError extends Data.TaggedError(
	"InvalidConfigurationError",
)<{
	readonly reason: string;
	readonly message: string;
}> {}

