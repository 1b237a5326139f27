import { Context, type Effect, type Option } from "effect"
import type {
	ResourceObject,
	StoredResource,
} from "../types/resource-types.js"

// ============================================================================
// ResourceRepository Effect Service
// ============================================================================

/**
 * Persistence boundary of the default resource service. Relationship values
 * are stored on the resource that owns them.
 */
export interface ResourceRepositoryShape {
	readonly findAll: (
		resourceType: string,
	) => Effect.Effect<ReadonlyArray<StoredResource>>
	readonly findById: (
		resourceType: string,
		id: string,
	) => Effect.Effect<Option.Option<StoredResource>>
	/** Stores a new resource, generating an ID when it has none. */
	readonly insert: (resource: ResourceObject) => Effect.Effect<StoredResource>
	readonly replace: (resource: StoredResource) => Effect.Effect<void>
	/** Resolves to false when nothing was stored under the ID. */
	readonly remove: (
		resourceType: string,
		id: string,
	) => Effect.Effect<boolean>
}

export class ResourceRepository extends Context.Tag("jsonweave/ResourceRepository")<
	ResourceRepository,
	ResourceRepositoryShape
>() {}
