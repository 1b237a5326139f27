import type { Effect } from "effect";
import type { HookError } from "../errors/resource-errors.js";
import type {
	ResourceObject,
	StoredResource,
} from "../types/resource-types.js";

/**
 * The request pipeline a hook runs in.
 */
export type ResourcePipeline =
	| "Get"
	| "GetSingle"
	| "GetSecondary"
	| "GetRelationship"
	| "Post"
	| "Patch"
	| "PatchRelationship"
	| "Delete"
	| "AtomicOperations";

// ============================================================================
// Contexts
// ============================================================================

export interface BeforeReadContext {
	readonly pipeline: ResourcePipeline;
	/** Set when a single resource is requested. */
	readonly id?: string;
}

export interface AfterReadContext {
	readonly resources: ReadonlyArray<StoredResource>;
	readonly pipeline: ResourcePipeline;
	/** False for the primary resources, true for resources reached through include. */
	readonly isIncluded: boolean;
}

export interface OnReturnContext {
	readonly resources: ReadonlyArray<StoredResource>;
	readonly pipeline: ResourcePipeline;
}

export interface BeforeCreateContext {
	readonly resource: ResourceObject;
	readonly pipeline: ResourcePipeline;
}

export interface AfterCreateContext {
	readonly resource: StoredResource;
	readonly pipeline: ResourcePipeline;
}

export interface BeforeUpdateContext {
	/** Incoming changes; attributes and relationships not listed stay as they are. */
	readonly resource: ResourceObject;
	readonly existing: StoredResource;
	readonly pipeline: ResourcePipeline;
}

export interface AfterUpdateContext {
	readonly resource: StoredResource;
	readonly previous: StoredResource;
	readonly pipeline: ResourcePipeline;
}

export interface BeforeDeleteContext {
	readonly resource: StoredResource;
	readonly pipeline: ResourcePipeline;
}

export interface AfterDeleteContext {
	readonly id: string;
	readonly pipeline: ResourcePipeline;
}

// ============================================================================
// Definitions
// ============================================================================

/**
 * Lifecycle callbacks of one resource type. Every callback is optional.
 *
 * Before-write hooks may return a changed resource. `onReturn` may drop
 * resources from a response or return changed copies, matched by type and
 * ID. After-write hooks run once the change is stored; their failures are
 * logged, not returned.
 */
export interface ResourceHooksDefinition {
	readonly beforeRead?: (ctx: BeforeReadContext) => Effect.Effect<void, HookError>;
	readonly afterRead?: (ctx: AfterReadContext) => Effect.Effect<void, HookError>;
	readonly onReturn?: (
		ctx: OnReturnContext,
	) => Effect.Effect<ReadonlyArray<StoredResource>, HookError>;
	readonly beforeCreate?: (
		ctx: BeforeCreateContext,
	) => Effect.Effect<ResourceObject, HookError>;
	readonly afterCreate?: (ctx: AfterCreateContext) => Effect.Effect<void, HookError>;
	readonly beforeUpdate?: (
		ctx: BeforeUpdateContext,
	) => Effect.Effect<ResourceObject, HookError>;
	readonly afterUpdate?: (ctx: AfterUpdateContext) => Effect.Effect<void, HookError>;
	readonly beforeDelete?: (ctx: BeforeDeleteContext) => Effect.Effect<void, HookError>;
	readonly afterDelete?: (ctx: AfterDeleteContext) => Effect.Effect<void, HookError>;
}

export interface ResourceHooksRegistration {
	readonly resourceType: string;
	readonly hooks: ResourceHooksDefinition;
}
