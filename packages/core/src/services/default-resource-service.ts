/**
 * Resource service backed by a ResourceRepository.
 *
 * Reads evaluate the query specification in memory over the repository's
 * resources. Writes check that the primary resource and every related
 * resource exist before anything is stored, and decode the attributes through
 * the resource type's schema. Resource hooks run around every read and write.
 *
 * @module
 */

import { Effect, HashSet, Option } from "effect";
import { RequestBodyError } from "../errors/operation-errors.js";
import { ResourceNotFoundError } from "../errors/resource-errors.js";
import type {
	RelationshipDefinition,
	ResourceContext,
} from "../graph/graph-types.js";
import type { ResourceGraphShape } from "../graph/resource-graph.js";
import type { ResourceHooksShape } from "../hooks/hook-runner.js";
import type { ResourcePipeline } from "../hooks/hook-types.js";
import {
	evaluateCollection,
	resolveIncludes,
} from "../operations/query/evaluate-query.js";
import {
	makeResourceLookup,
	relatedResources,
} from "../operations/query/resource-lookup.js";
import type { QuerySpecification } from "../query/query-specification.js";
import type { ResourceRepositoryShape } from "../storage/storage-service.js";
import type {
	RelationshipValue,
	ResourceIdentifier,
	ResourceIdentity,
	ResourceObject,
	ResourceQueryResult,
	StoredResource,
} from "../types/resource-types.js";
import {
	identifiersOf,
	identityKey,
	isToManyValue,
} from "../types/resource-types.js";
import { validateAttributes } from "../validators/schema-validator.js";
import {
	type RelationshipRightValue,
	type ResourceIdentitySet,
	type ResourceServiceError,
	type ResourceServiceShape,
	isIdentitySet,
} from "./resource-service.js";

export interface DefaultServiceDependencies {
	readonly graph: ResourceGraphShape;
	readonly repository: ResourceRepositoryShape;
	readonly hooks: ResourceHooksShape;
}

type PointerFor = (relationshipName: string, index: number | undefined) => string;

const bodyPointer: PointerFor = (relationshipName, index) =>
	index === undefined
		? `/data/relationships/${relationshipName}/data`
		: `/data/relationships/${relationshipName}/data[${index}]`;

const relationshipBodyPointer: PointerFor = () => "/data";

const compareIdentities = (a: ResourceIdentity, b: ResourceIdentity): number =>
	a.type === b.type
		? a.id.localeCompare(b.id, undefined, { numeric: true })
		: a.type.localeCompare(b.type);

/**
 * Identities of a set in a stable order.
 */
export const sortedIdentities = (
	values: ResourceIdentitySet,
): ReadonlyArray<ResourceIdentity> =>
	[...HashSet.toValues(values)].sort(compareIdentities);

const plainIdentity = (identity: ResourceIdentity): ResourceIdentity => ({
	type: identity.type,
	id: identity.id,
});

const toRelationshipValue = (value: RelationshipRightValue): RelationshipValue =>
	value === null
		? null
		: isIdentitySet(value)
			? sortedIdentities(value).map(plainIdentity)
			: plainIdentity(value);

export const makeDefaultResourceService = (
	context: ResourceContext,
	{ graph, repository, hooks }: DefaultServiceDependencies,
): ResourceServiceShape => {
	const resourceType = context.publicName;

	const notFound = (id: string) =>
		new ResourceNotFoundError({
			resourceType,
			id,
			message: `Resource of type '${resourceType}' with ID '${id}' does not exist.`,
		});

	const findExisting = (id: string) =>
		Effect.flatMap(repository.findById(resourceType, id), (found) =>
			Option.match(found, {
				onNone: () => Effect.fail(notFound(id)),
				onSome: Effect.succeed,
			}),
		);

	const findRelationship = (
		id: string,
		relationshipName: string,
	): Effect.Effect<RelationshipDefinition, ResourceNotFoundError> => {
		const relationship = context.relationships.find(
			(candidate) => candidate.publicName === relationshipName,
		);
		return relationship === undefined
			? Effect.fail(
					new ResourceNotFoundError({
						resourceType,
						id,
						relationshipName,
						message: `Relationship '${relationshipName}' does not exist on resource type '${resourceType}'.`,
					}),
				)
			: Effect.succeed(relationship);
	};

	const loadLookup = Effect.map(
		Effect.forEach(graph.resourceContexts, (resourceContext) =>
			repository.findAll(resourceContext.publicName),
		),
		(collections) => makeResourceLookup(graph, collections.flat()),
	);

	const finishRead = (
		rightType: string,
		result: ResourceQueryResult,
		pipeline: ResourcePipeline,
	) =>
		Effect.gen(function* () {
			yield* hooks.afterRead(rightType, result, pipeline);
			return yield* hooks.onReturn(result, pipeline);
		});

	const assertRelatedExist = (
		relationships: Readonly<Record<string, RelationshipValue>>,
		pointerFor: PointerFor,
	): Effect.Effect<void, ResourceServiceError> =>
		Effect.gen(function* () {
			for (const [relationshipName, value] of Object.entries(relationships)) {
				const many = isToManyValue(value);
				for (const [index, identifier] of identifiersOf(value).entries()) {
					const pointer = pointerFor(relationshipName, many ? index : undefined);
					if (identifier.id === undefined) {
						return yield* new RequestBodyError({
							title: "The 'id' element is required.",
							detail: `Related resource of type '${identifier.type}' has no ID.`,
							pointer,
							message: `Related resource of type '${identifier.type}' has no ID.`,
						});
					}
					const related = yield* repository.findById(
						identifier.type,
						identifier.id,
					);
					if (Option.isNone(related)) {
						return yield* new ResourceNotFoundError({
							resourceType: identifier.type,
							id: identifier.id,
							relationshipName,
							pointer,
							message: `Related resource of type '${identifier.type}' with ID '${identifier.id}' in relationship '${relationshipName}' does not exist.`,
						});
					}
				}
			}
		});

	const normalizeRelationships = (
		relationships: Readonly<Record<string, RelationshipValue>>,
	): Record<string, RelationshipValue> => {
		const strip = (identifier: ResourceIdentifier): ResourceIdentifier => ({
			type: identifier.type,
			id: identifier.id,
		});
		const normalized: Record<string, RelationshipValue> = {};
		for (const [name, value] of Object.entries(relationships)) {
			normalized[name] = isToManyValue(value)
				? value.map(strip)
				: value === null
					? null
					: strip(value);
		}
		return normalized;
	};

	const emptyRelationships = (): Record<string, RelationshipValue> =>
		Object.fromEntries(
			context.relationships.map((relationship) => [
				relationship.publicName,
				relationship.cardinality === "hasMany" ? [] : null,
			]),
		);

	const applyUpdate = (
		id: string,
		change: ResourceObject,
		pipeline: ResourcePipeline,
		pointerFor: PointerFor,
	): Effect.Effect<StoredResource, ResourceServiceError> =>
		Effect.gen(function* () {
			const existing = yield* findExisting(id);
			const prepared = yield* hooks.beforeUpdate(change, existing, pipeline);
			const attributes = { ...existing.attributes, ...prepared.attributes };
			if (Object.keys(prepared.attributes).length > 0) {
				yield* validateAttributes(context, attributes);
			}
			yield* assertRelatedExist(prepared.relationships, pointerFor);
			const updated: StoredResource = {
				type: resourceType,
				id,
				attributes,
				relationships: {
					...existing.relationships,
					...normalizeRelationships(prepared.relationships),
				},
			};
			yield* repository.replace(updated);
			yield* hooks.afterUpdate(updated, existing, pipeline);
			return updated;
		});

	const relationshipChange = (
		id: string,
		relationshipName: string,
		value: RelationshipValue,
	): ResourceObject => ({
		type: resourceType,
		id,
		attributes: {},
		relationships: { [relationshipName]: value },
	});

	const findToMany = (id: string, relationshipName: string) =>
		Effect.gen(function* () {
			const relationship = yield* findRelationship(id, relationshipName);
			if (relationship.cardinality !== "hasMany") {
				return yield* new RequestBodyError({
					title: "Only to-many relationships can be targeted through this operation.",
					detail: `Relationship '${relationshipName}' is not a to-many relationship.`,
					message: `Relationship '${relationshipName}' is not a to-many relationship.`,
				});
			}
			return relationship;
		});

	return {
		getAll: (specification) =>
			Effect.gen(function* () {
				yield* hooks.beforeRead(resourceType, "Get");
				const lookup = yield* loadLookup;
				const resources = yield* repository.findAll(resourceType);
				const result = evaluateCollection(resources, specification, lookup);
				return yield* finishRead(resourceType, result, "Get");
			}),

		getById: (id, specification) =>
			Effect.gen(function* () {
				yield* hooks.beforeRead(resourceType, "GetSingle", id);
				const existing = yield* findExisting(id);
				const lookup = yield* loadLookup;
				const result = yield* finishRead(
					resourceType,
					{
						primary: [existing],
						included: resolveIncludes([existing], specification, lookup),
					},
					"GetSingle",
				);
				if (result.primary.length === 0) {
					return yield* notFound(id);
				}
				return result;
			}),

		getSecondary: (id, relationshipName, specification) =>
			Effect.gen(function* () {
				yield* hooks.beforeRead(resourceType, "GetSecondary", id);
				const existing = yield* findExisting(id);
				const relationship = yield* findRelationship(id, relationshipName);
				const lookup = yield* loadLookup;
				const related = relatedResources(existing, relationshipName, lookup);
				const result: ResourceQueryResult =
					relationship.cardinality === "hasMany"
						? evaluateCollection(related, specification, lookup)
						: {
								primary: related,
								included: resolveIncludes(related, specification, lookup),
							};
				return yield* finishRead(
					relationship.rightType,
					result,
					"GetSecondary",
				);
			}),

		getRelationship: (id, relationshipName) =>
			Effect.gen(function* () {
				yield* hooks.beforeRead(resourceType, "GetRelationship", id);
				const existing = yield* findExisting(id);
				const relationship = yield* findRelationship(id, relationshipName);
				const value = existing.relationships[relationshipName];
				if (value === undefined) {
					return relationship.cardinality === "hasMany" ? [] : null;
				}
				return value;
			}),

		create: (resource, pipeline) =>
			Effect.gen(function* () {
				const prepared = yield* hooks.beforeCreate(resource, pipeline);
				yield* validateAttributes(context, prepared.attributes);
				if (prepared.id !== undefined) {
					const existing = yield* repository.findById(resourceType, prepared.id);
					if (Option.isSome(existing)) {
						return yield* new RequestBodyError({
							title: "Another resource with the specified ID already exists.",
							detail: `Another resource of type '${resourceType}' with ID '${prepared.id}' already exists.`,
							pointer: "/data/id",
							message: `Another resource of type '${resourceType}' with ID '${prepared.id}' already exists.`,
						});
					}
				}
				yield* assertRelatedExist(prepared.relationships, bodyPointer);
				const stored = yield* repository.insert({
					type: resourceType,
					id: prepared.id,
					attributes: prepared.attributes,
					relationships: {
						...emptyRelationships(),
						...normalizeRelationships(prepared.relationships),
					},
				});
				yield* hooks.afterCreate(stored, pipeline);
				return stored;
			}),

		update: (id, resource, pipeline) =>
			applyUpdate(id, { ...resource, id }, pipeline, bodyPointer),

		delete: (id, pipeline) =>
			Effect.gen(function* () {
				const existing = yield* findExisting(id);
				yield* hooks.beforeDelete(existing, pipeline);
				yield* repository.remove(resourceType, id);

				// Drop references to the deleted resource from every other resource
				const deletedKey = identityKey(existing);
				for (const other of graph.resourceContexts) {
					const resources = yield* repository.findAll(other.publicName);
					for (const candidate of resources) {
						let changed = false;
						const relationships: Record<string, RelationshipValue> = {};
						for (const [name, value] of Object.entries(candidate.relationships)) {
							if (isToManyValue(value)) {
								const kept = value.filter(
									(identifier) => identityKey(identifier) !== deletedKey,
								);
								changed ||= kept.length !== value.length;
								relationships[name] = kept;
							} else if (value !== null && identityKey(value) === deletedKey) {
								changed = true;
								relationships[name] = null;
							} else {
								relationships[name] = value;
							}
						}
						if (changed) {
							yield* repository.replace({ ...candidate, relationships });
						}
					}
				}

				yield* hooks.afterDelete(resourceType, id, pipeline);
			}),

		setRelationship: (id, relationshipName, value, pipeline) =>
			Effect.gen(function* () {
				const relationship = yield* findRelationship(id, relationshipName);
				const isSet = value !== null && isIdentitySet(value);
				if (relationship.cardinality === "hasMany" ? !isSet : isSet) {
					return yield* new RequestBodyError({
						title:
							relationship.cardinality === "hasMany"
								? "Expected data[] element for to-many relationship."
								: "Expected single data element for to-one relationship.",
						detail: `The value for relationship '${relationshipName}' does not match its cardinality.`,
						pointer: "/data",
						message: `The value for relationship '${relationshipName}' does not match its cardinality.`,
					});
				}
				yield* applyUpdate(
					id,
					relationshipChange(id, relationshipName, toRelationshipValue(value)),
					pipeline,
					relationshipBodyPointer,
				);
			}),

		addToRelationship: (id, relationshipName, values, pipeline) =>
			Effect.gen(function* () {
				yield* findToMany(id, relationshipName);
				const existing = yield* findExisting(id);
				const current = identifiersOf(existing.relationships[relationshipName]);
				const present = new Set(current.map(identityKey));
				const added = sortedIdentities(values)
					.filter((identity) => !present.has(identityKey(identity)))
					.map(plainIdentity);
				yield* applyUpdate(
					id,
					relationshipChange(id, relationshipName, [...current, ...added]),
					pipeline,
					relationshipBodyPointer,
				);
			}),

		removeFromRelationship: (id, relationshipName, values, pipeline) =>
			Effect.gen(function* () {
				yield* findToMany(id, relationshipName);
				const existing = yield* findExisting(id);
				const removed = sortedIdentities(values);
				yield* assertRelatedExist(
					{ [relationshipName]: removed },
					relationshipBodyPointer,
				);
				const removedKeys = new Set(removed.map(identityKey));
				const remaining = identifiersOf(
					existing.relationships[relationshipName],
				).filter((identifier) => !removedKeys.has(identityKey(identifier)));
				yield* applyUpdate(
					id,
					relationshipChange(id, relationshipName, remaining),
					pipeline,
					relationshipBodyPointer,
				);
			}),
	};
};
