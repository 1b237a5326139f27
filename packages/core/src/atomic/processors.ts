/**
 * One processor per operation kind. Each delegates to the resource service
 * of the operation's resource type.
 *
 * @module
 */

import { Context, Effect, Layer, Option } from "effect";
import {
	RequestBodyError,
	UnsupportedOperationError,
} from "../errors/operation-errors.js";
import { ResourceNotFoundError } from "../errors/resource-errors.js";
import type { RelationshipDefinition } from "../graph/graph-types.js";
import { ResourceGraph, type ResourceGraphShape } from "../graph/resource-graph.js";
import {
	type RelationshipRightValue,
	type ResourceIdentitySet,
	type ResourceServiceError,
	type ResourceServiceShape,
	ResourceServices,
	identitySet,
	isIdentitySet,
	resourceIdentity,
} from "../services/resource-service.js";
import type {
	RelationshipValue,
	ResourceIdentifier,
	ResourceIdentity,
	ResourceObject,
} from "../types/resource-types.js";
import { identifiersOf, isToManyValue } from "../types/resource-types.js";
import type { OperationContainer, OperationKind } from "./operations.js";

export interface OperationProcessor {
	/**
	 * Some(resource) when the operation produces a resource for the response.
	 */
	readonly process: (
		operation: OperationContainer,
	) => Effect.Effect<Option.Option<ResourceObject>, ResourceServiceError>;
}

// ============================================================================
// Helpers
// ============================================================================

const requireId = (
	identifier: ResourceIdentifier,
	pointer: string,
): Effect.Effect<string, RequestBodyError> =>
	identifier.id === undefined
		? Effect.fail(
				new RequestBodyError({
					title: "The 'id' element is required.",
					detail: `Resource of type '${identifier.type}' has no ID.`,
					pointer,
					message: `Resource of type '${identifier.type}' has no ID.`,
				}),
			)
		: Effect.succeed(identifier.id);

const requireRelationship = (
	graph: ResourceGraphShape,
	operation: OperationContainer,
): Effect.Effect<RelationshipDefinition, RequestBodyError> => {
	const { relationshipName, resource } = operation;
	const relationship = Option.flatMap(
		graph.findResourceContext(resource.type),
		(context) =>
			Option.fromNullable(
				context.relationships.find(
					(candidate) => candidate.publicName === relationshipName,
				),
			),
	);
	return Option.match(relationship, {
		onNone: () =>
			Effect.fail(
				new RequestBodyError({
					title: "The referenced relationship does not exist.",
					detail: `Resource type '${resource.type}' has no relationship named '${relationshipName ?? ""}'.`,
					pointer: "/ref/relationship",
					message: `Resource type '${resource.type}' has no relationship named '${relationshipName ?? ""}'.`,
				}),
			),
		onSome: Effect.succeed,
	});
};

const toIdentities = (
	identifiers: ReadonlyArray<ResourceIdentifier>,
): Effect.Effect<ReadonlyArray<ResourceIdentity>, RequestBodyError> =>
	Effect.forEach(identifiers, (identifier, index) =>
		Effect.map(requireId(identifier, `/data[${index}]`), (id) =>
			resourceIdentity(identifier.type, id),
		),
	);

/**
 * The right side of a relationship operation: a set for to-many
 * relationships, in which duplicates collapse; the identifier as given for
 * to-one relationships.
 */
export const resolveRightValue = (
	relationship: RelationshipDefinition,
	operation: OperationContainer,
): Effect.Effect<RelationshipRightValue, RequestBodyError> =>
	Effect.gen(function* () {
		const value = operation.resource.relationships[relationship.publicName];
		if (relationship.cardinality === "hasMany") {
			if (value !== undefined && value !== null && !isToManyValue(value)) {
				return yield* new RequestBodyError({
					title: "Expected data[] element for to-many relationship.",
					detail: `Expected data[] element for '${relationship.publicName}' relationship.`,
					pointer: "/data",
					message: `Expected data[] element for '${relationship.publicName}' relationship.`,
				});
			}
			return identitySet(yield* toIdentities(identifiersOf(value)));
		}
		if (isToManyValue(value)) {
			return yield* new RequestBodyError({
				title: "Expected single data element for to-one relationship.",
				detail: `Expected single data element for '${relationship.publicName}' relationship.`,
				pointer: "/data",
				message: `Expected single data element for '${relationship.publicName}' relationship.`,
			});
		}
		if (value === undefined || value === null) return null;
		return resourceIdentity(value.type, yield* requireId(value, "/data"));
	});

/**
 * Point a missing related resource at its element in the `data` array of a
 * relationship document, as given in `value`.
 */
export const pointAtRightResource =
	(value: RelationshipValue | undefined) =>
	<A, R>(
		effect: Effect.Effect<A, ResourceServiceError, R>,
	): Effect.Effect<A, ResourceServiceError, R> =>
		Effect.mapError(effect, (error) => {
			if (
				error._tag !== "ResourceNotFoundError" ||
				error.relationshipName === undefined ||
				!isToManyValue(value)
			) {
				return error;
			}
			const { resourceType, id, relationshipName } = error;
			const index = value.findIndex(
				(identifier) => identifier.type === resourceType && identifier.id === id,
			);
			return index === -1
				? error
				: new ResourceNotFoundError({
						resourceType,
						id,
						relationshipName,
						pointer: `/data[${index}]`,
						message: error.message,
					});
		});

// ============================================================================
// Processors
// ============================================================================

const primaryId = (operation: OperationContainer) =>
	requireId(operation.resource, "/ref/id");

export const makeCreateProcessor = (
	service: ResourceServiceShape,
): OperationProcessor => ({
	process: (operation) =>
		Effect.map(
			service.create(operation.resource, "AtomicOperations"),
			(created): Option.Option<ResourceObject> => Option.some(created),
		),
});

export const makeUpdateProcessor = (
	service: ResourceServiceShape,
): OperationProcessor => ({
	process: (operation) =>
		Effect.gen(function* () {
			const id = yield* primaryId(operation);
			const updated = yield* service.update(
				id,
				operation.resource,
				"AtomicOperations",
			);
			return Option.some<ResourceObject>(updated);
		}),
});

export const makeDeleteProcessor = (
	service: ResourceServiceShape,
): OperationProcessor => ({
	process: (operation) =>
		Effect.gen(function* () {
			const id = yield* primaryId(operation);
			yield* service.delete(id, "AtomicOperations");
			return Option.none<ResourceObject>();
		}),
});

type ToManyChange = (
	service: ResourceServiceShape,
	id: string,
	relationshipName: string,
	values: ResourceIdentitySet,
) => Effect.Effect<void, ResourceServiceError>;

const makeRelationshipProcessor =
	(change: ToManyChange | "set") =>
	(service: ResourceServiceShape, graph: ResourceGraphShape): OperationProcessor => ({
		process: (operation) =>
			Effect.gen(function* () {
				const id = yield* primaryId(operation);
				const relationship = yield* requireRelationship(graph, operation);
				const value = yield* resolveRightValue(relationship, operation);
				const located = pointAtRightResource(
					operation.resource.relationships[relationship.publicName],
				);
				if (change === "set") {
					yield* located(
						service.setRelationship(
							id,
							relationship.publicName,
							value,
							"AtomicOperations",
						),
					);
				} else if (value !== null && isIdentitySet(value)) {
					yield* located(change(service, id, relationship.publicName, value));
				} else {
					return yield* new RequestBodyError({
						title: "Only to-many relationships can be targeted through this operation.",
						detail: `Relationship '${relationship.publicName}' is not a to-many relationship.`,
						pointer: "/ref/relationship",
						message: `Relationship '${relationship.publicName}' is not a to-many relationship.`,
					});
				}
				return Option.none<ResourceObject>();
			}),
	});

export const makeSetRelationshipProcessor = makeRelationshipProcessor("set");

export const makeAddToRelationshipProcessor = makeRelationshipProcessor(
	(service, id, relationshipName, values) =>
		service.addToRelationship(id, relationshipName, values, "AtomicOperations"),
);

export const makeRemoveFromRelationshipProcessor = makeRelationshipProcessor(
	(service, id, relationshipName, values) =>
		service.removeFromRelationship(
			id,
			relationshipName,
			values,
			"AtomicOperations",
		),
);

// ============================================================================
// Registry
// ============================================================================

export interface ProcessorRegistryShape {
	readonly resolve: (
		kind: OperationKind,
		resourceType: string,
	) => Effect.Effect<OperationProcessor, UnsupportedOperationError>;
}

export class ProcessorRegistry extends Context.Tag("jsonweave/ProcessorRegistry")<
	ProcessorRegistry,
	ProcessorRegistryShape
>() {}

/**
 * Processors that replace the default one for a (kind, resource type) pair.
 */
export type ProcessorOverrides = ReadonlyArray<{
	readonly kind: OperationKind;
	readonly resourceType: string;
	readonly processor: OperationProcessor;
}>;

const OPERATION_NAMES: Record<OperationKind, string> = {
	CreateResource: "add resource",
	UpdateResource: "update resource",
	DeleteResource: "remove resource",
	SetRelationship: "update relationship",
	AddToRelationship: "add to relationship",
	RemoveFromRelationship: "remove from relationship",
};

const defaultProcessor = (
	kind: OperationKind,
	service: ResourceServiceShape,
	graph: ResourceGraphShape,
): OperationProcessor => {
	switch (kind) {
		case "CreateResource":
			return makeCreateProcessor(service);
		case "UpdateResource":
			return makeUpdateProcessor(service);
		case "DeleteResource":
			return makeDeleteProcessor(service);
		case "SetRelationship":
			return makeSetRelationshipProcessor(service, graph);
		case "AddToRelationship":
			return makeAddToRelationshipProcessor(service, graph);
		case "RemoveFromRelationship":
			return makeRemoveFromRelationshipProcessor(service, graph);
	}
};

export const makeProcessorRegistryLayer = (
	overrides: ProcessorOverrides = [],
): Layer.Layer<ProcessorRegistry, never, ResourceGraph | ResourceServices> =>
	Layer.effect(
		ProcessorRegistry,
		Effect.gen(function* () {
			const graph = yield* ResourceGraph;
			const services = yield* ResourceServices;

			return {
				resolve: (kind, resourceType) => {
					const override = overrides.find(
						(entry) => entry.kind === kind && entry.resourceType === resourceType,
					);
					if (override !== undefined) return Effect.succeed(override.processor);

					return Option.match(services.serviceFor(resourceType), {
						onNone: () =>
							Effect.fail(
								new UnsupportedOperationError({
									operation: kind,
									resourceType,
									pointer: "/op",
									message: `Operation '${OPERATION_NAMES[kind]}' is not supported for resource type '${resourceType}'.`,
								}),
							),
						onSome: (service) =>
							Effect.succeed(defaultProcessor(kind, service, graph)),
					});
				},
			};
		}),
	);
