import { Context, Data, HashSet, type Effect, type Option } from "effect";
import type { RequestBodyError } from "../errors/operation-errors.js";
import type {
	HookError,
	ResourceNotFoundError,
} from "../errors/resource-errors.js";
import type { ResourcePipeline } from "../hooks/hook-types.js";
import type { QuerySpecification } from "../query/query-specification.js";
import type {
	RelationshipValue,
	ResourceIdentity,
	ResourceObject,
	ResourceQueryResult,
	StoredResource,
} from "../types/resource-types.js";

// ============================================================================
// Relationship Values
// ============================================================================

/**
 * Right side of a to-many relationship change. Identities compare by value,
 * so a resource listed twice is present once.
 */
export type ResourceIdentitySet = HashSet.HashSet<ResourceIdentity>;

/**
 * Right side of a relationship change: one resource or none for to-one
 * relationships, a set for to-many relationships.
 */
export type RelationshipRightValue =
	| ResourceIdentity
	| null
	| ResourceIdentitySet;

export const resourceIdentity = (type: string, id: string): ResourceIdentity =>
	Data.struct({ type, id });

export const identitySet = (
	identities: Iterable<ResourceIdentity>,
): ResourceIdentitySet =>
	HashSet.fromIterable(
		[...identities].map((identity) =>
			resourceIdentity(identity.type, identity.id),
		),
	);

export const isIdentitySet = (
	value: RelationshipRightValue,
): value is ResourceIdentitySet => HashSet.isHashSet(value);

// ============================================================================
// Service
// ============================================================================

export type ResourceServiceError =
	| ResourceNotFoundError
	| HookError
	| RequestBodyError;

/**
 * Reads and writes of one resource type.
 */
export interface ResourceServiceShape {
	readonly getAll: (
		specification: QuerySpecification,
	) => Effect.Effect<ResourceQueryResult, ResourceServiceError>;
	readonly getById: (
		id: string,
		specification: QuerySpecification,
	) => Effect.Effect<ResourceQueryResult, ResourceServiceError>;
	/** Resources on the right side of a relationship, as primary data. */
	readonly getSecondary: (
		id: string,
		relationshipName: string,
		specification: QuerySpecification,
	) => Effect.Effect<ResourceQueryResult, ResourceServiceError>;
	readonly getRelationship: (
		id: string,
		relationshipName: string,
	) => Effect.Effect<RelationshipValue, ResourceServiceError>;
	readonly create: (
		resource: ResourceObject,
		pipeline: ResourcePipeline,
	) => Effect.Effect<StoredResource, ResourceServiceError>;
	readonly update: (
		id: string,
		resource: ResourceObject,
		pipeline: ResourcePipeline,
	) => Effect.Effect<StoredResource, ResourceServiceError>;
	readonly delete: (
		id: string,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void, ResourceServiceError>;
	readonly setRelationship: (
		id: string,
		relationshipName: string,
		value: RelationshipRightValue,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void, ResourceServiceError>;
	readonly addToRelationship: (
		id: string,
		relationshipName: string,
		values: ResourceIdentitySet,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void, ResourceServiceError>;
	readonly removeFromRelationship: (
		id: string,
		relationshipName: string,
		values: ResourceIdentitySet,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void, ResourceServiceError>;
}

export interface ResourceServicesShape {
	/** None when the resource type exposes no service. */
	readonly serviceFor: (
		resourceType: string,
	) => Option.Option<ResourceServiceShape>;
}

export class ResourceServices extends Context.Tag("jsonweave/ResourceServices")<
	ResourceServices,
	ResourceServicesShape
>() {}
