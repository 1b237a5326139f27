/**
 * Decoding and validation of JSON:API request bodies.
 *
 * Bodies are decoded with Effect Schema, then checked against the resource
 * graph: known types and fields, attribute capabilities and relationship
 * cardinality. Every failure is a RequestBodyError whose pointer locates the
 * offending element in the body. Attribute values are decoded later, through
 * the resource type's schema, by the resource service.
 *
 * @module
 */

import { Effect, Option, ParseResult, Schema } from "effect";
import {
	type ApiOptionsShape,
	type OperationContainer,
	type OperationKind,
	type RelationshipDefinition,
	type RelationshipValue,
	RequestBodyError,
	type ResourceContext,
	type ResourceGraphShape,
	type ResourceIdentifier,
	type ResourceObject,
	findAttribute,
	findRelationship,
	isToManyValue,
} from "@jsonweave/core";

// ============================================================================
// Schemas
// ============================================================================

const IdentifierSchema = Schema.Struct({
	type: Schema.String,
	id: Schema.optional(Schema.String),
	lid: Schema.optional(Schema.String),
});

const RelationshipDataSchema = Schema.Union(
	Schema.Null,
	IdentifierSchema,
	Schema.Array(IdentifierSchema),
);

const ResourceObjectSchema = Schema.Struct({
	type: Schema.String,
	id: Schema.optional(Schema.String),
	lid: Schema.optional(Schema.String),
	attributes: Schema.optional(
		Schema.Record({ key: Schema.String, value: Schema.Unknown }),
	),
	relationships: Schema.optional(
		Schema.Record({
			key: Schema.String,
			value: Schema.Struct({ data: RelationshipDataSchema }),
		}),
	),
});

export const ResourceDocumentBody = Schema.Struct({
	data: ResourceObjectSchema,
});

export const RelationshipDocumentBody = Schema.Struct({
	data: RelationshipDataSchema,
});

const OperationSchema = Schema.Struct({
	op: Schema.Literal("add", "update", "remove"),
	ref: Schema.optional(
		Schema.Struct({
			type: Schema.String,
			id: Schema.optional(Schema.String),
			lid: Schema.optional(Schema.String),
			relationship: Schema.optional(Schema.String),
		}),
	),
	data: Schema.optional(
		Schema.Union(
			Schema.Null,
			ResourceObjectSchema,
			Schema.Array(IdentifierSchema),
		),
	),
});

export const AtomicOperationsBody = Schema.Struct({
	"atomic:operations": Schema.Array(OperationSchema),
});

type DecodedResource = typeof ResourceObjectSchema.Type;
type DecodedIdentifier = typeof IdentifierSchema.Type;
type DecodedRelationshipData = typeof RelationshipDataSchema.Type;
type DecodedOperation = typeof OperationSchema.Type;

// ============================================================================
// Decoding
// ============================================================================

const bodyError = (title: string, detail: string | undefined, pointer?: string) =>
	new RequestBodyError({
		title,
		detail,
		pointer,
		message: detail === undefined ? title : `${title} ${detail}`,
	});

/**
 * JSON pointer for a Schema issue path; array indexes render as `[n]`.
 */
export const issuePointer = (path: ReadonlyArray<PropertyKey>): string =>
	path
		.map((segment) =>
			typeof segment === "number" ? `[${segment}]` : `/${String(segment)}`,
		)
		.join("");

export const decodeBody = <A, I>(
	schema: Schema.Schema<A, I>,
	body: unknown,
): Effect.Effect<A, RequestBodyError> => {
	if (body === undefined || body === null) {
		return Effect.fail(bodyError("Missing request body.", undefined));
	}
	return Schema.decodeUnknown(schema)(body).pipe(
		Effect.mapError((parseError) => {
			const [issue] = ParseResult.ArrayFormatter.formatErrorSync(parseError);
			return bodyError(
				"Failed to deserialize request body.",
				issue?.message,
				issue === undefined ? undefined : issuePointer(issue.path),
			);
		}),
	);
};

// ============================================================================
// Resource Validation
// ============================================================================

export type WriteMode = "create" | "update";

const findContext = (
	graph: ResourceGraphShape,
	type: string,
	pointer: string,
): Effect.Effect<ResourceContext, RequestBodyError> =>
	Option.match(graph.findResourceContext(type), {
		onNone: () =>
			Effect.fail(
				bodyError(
					"Unknown resource type found.",
					`Resource type '${type}' does not exist.`,
					pointer,
				),
			),
		onSome: Effect.succeed,
	});

const checkAttributeAccess = (
	context: ResourceContext,
	attributes: Readonly<Record<string, unknown>>,
	mode: WriteMode,
	base: string,
): Effect.Effect<void, RequestBodyError> =>
	Effect.forEach(
		Object.entries(attributes),
		([name]) =>
			Effect.gen(function* () {
				const pointer = `${base}/attributes/${name}`;
				const attribute = findAttribute(context, name);
				if (Option.isNone(attribute) || name === "id") {
					return yield* bodyError(
						"Unknown attribute found.",
						`Attribute '${name}' does not exist on resource type '${context.publicName}'.`,
						pointer,
					);
				}
				const { capabilities } = attribute.value;
				if (mode === "create" && !capabilities.create) {
					return yield* bodyError(
						"Setting the initial value of the requested attribute is not allowed.",
						`Setting the initial value of '${name}' is not allowed.`,
						pointer,
					);
				}
				if (mode === "update" && !capabilities.change) {
					return yield* bodyError(
						"Changing the value of the requested attribute is not allowed.",
						`Changing the value of '${name}' is not allowed.`,
						pointer,
					);
				}
			}),
		{ discard: true },
	);

const validateIdentifier = (
	relationship: RelationshipDefinition,
	identifier: DecodedIdentifier,
	pointer: string,
	allowLocalIds: boolean,
): Effect.Effect<ResourceIdentifier, RequestBodyError> =>
	Effect.gen(function* () {
		if (identifier.type !== relationship.rightType) {
			return yield* bodyError(
				"Incompatible resource type found.",
				`Type '${identifier.type}' is incompatible with type '${relationship.rightType}' of relationship '${relationship.publicName}'.`,
				`${pointer}/type`,
			);
		}
		if (identifier.id === undefined && identifier.lid === undefined) {
			return yield* bodyError(
				"The 'id' element is required.",
				undefined,
				pointer,
			);
		}
		if (identifier.lid !== undefined && !allowLocalIds) {
			return yield* bodyError(
				"The 'lid' element is not supported at this endpoint.",
				undefined,
				`${pointer}/lid`,
			);
		}
		return identifier;
	});

/**
 * Check one relationship value against the relationship it is assigned to.
 */
export const validateRelationshipData = (
	relationship: RelationshipDefinition,
	data: DecodedRelationshipData | undefined,
	pointer: string,
	allowLocalIds: boolean,
): Effect.Effect<RelationshipValue, RequestBodyError> =>
	Effect.gen(function* () {
		const toMany = relationship.cardinality === "hasMany";
		if (data === undefined) {
			return yield* bodyError("The 'data' element is required.", undefined, pointer);
		}
		if (data === null) {
			if (toMany) {
				return yield* bodyError(
					"Expected data[] element for to-many relationship.",
					`Expected data[] element for '${relationship.publicName}' relationship.`,
					pointer,
				);
			}
			return null;
		}
		if (isToManyValue(data)) {
			if (!toMany) {
				return yield* bodyError(
					"Expected single data element for to-one relationship.",
					`Expected single data element for '${relationship.publicName}' relationship.`,
					pointer,
				);
			}
			return yield* Effect.forEach(data, (identifier, index) =>
				validateIdentifier(
					relationship,
					identifier,
					`${pointer}[${index}]`,
					allowLocalIds,
				),
			);
		}
		if (toMany) {
			return yield* bodyError(
				"Expected data[] element for to-many relationship.",
				`Expected data[] element for '${relationship.publicName}' relationship.`,
				pointer,
			);
		}
		return yield* validateIdentifier(relationship, data, pointer, allowLocalIds);
	});

const findRelationshipAt = (
	context: ResourceContext,
	name: string,
	pointer: string,
): Effect.Effect<RelationshipDefinition, RequestBodyError> =>
	Option.match(findRelationship(context, name), {
		onNone: () =>
			Effect.fail(
				bodyError(
					"Unknown relationship found.",
					`Relationship '${name}' does not exist on resource type '${context.publicName}'.`,
					pointer,
				),
			),
		onSome: Effect.succeed,
	});

export interface ResourceValidation {
	readonly graph: ResourceGraphShape;
	readonly options: ApiOptionsShape;
	readonly mode: WriteMode;
	/** Pointer of the resource object in the body. */
	readonly base: string;
	/** Required type, when the endpoint fixes it. */
	readonly expectedType?: string;
	/** Required ID, when the endpoint fixes it. */
	readonly expectedId?: string;
	readonly allowLocalIds: boolean;
}

/**
 * Turn a decoded resource object into a ResourceObject the services accept.
 */
export const validateResource = (
	resource: DecodedResource,
	validation: ResourceValidation,
): Effect.Effect<ResourceObject, RequestBodyError> =>
	Effect.gen(function* () {
		const { base, mode } = validation;
		const context = yield* findContext(validation.graph, resource.type, `${base}/type`);

		if (
			validation.expectedType !== undefined &&
			resource.type !== validation.expectedType
		) {
			return yield* bodyError(
				"Incompatible resource type found.",
				`Type '${resource.type}' is incompatible with type '${validation.expectedType}'.`,
				`${base}/type`,
			);
		}

		if (mode === "create") {
			if (resource.id !== undefined && !validation.options.allowClientGeneratedIds) {
				return yield* bodyError(
					"The use of client-generated IDs is disabled.",
					undefined,
					`${base}/id`,
				);
			}
			if (resource.lid !== undefined && !validation.allowLocalIds) {
				return yield* bodyError(
					"The 'lid' element is not supported at this endpoint.",
					undefined,
					`${base}/lid`,
				);
			}
		} else {
			if (resource.id === undefined && resource.lid === undefined) {
				return yield* bodyError("The 'id' element is required.", undefined, `${base}/id`);
			}
			if (
				validation.expectedId !== undefined &&
				resource.id !== validation.expectedId
			) {
				return yield* bodyError(
					"Conflicting 'id' values found.",
					`Expected '${validation.expectedId}' instead of '${resource.id ?? ""}'.`,
					`${base}/id`,
				);
			}
		}

		const attributes = resource.attributes ?? {};
		yield* checkAttributeAccess(context, attributes, mode, base);

		const relationships: Record<string, RelationshipValue> = {};
		for (const [name, value] of Object.entries(resource.relationships ?? {})) {
			const pointer = `${base}/relationships/${name}`;
			const relationship = yield* findRelationshipAt(context, name, pointer);
			relationships[name] = yield* validateRelationshipData(
				relationship,
				value.data,
				`${pointer}/data`,
				validation.allowLocalIds,
			);
		}

		return {
			type: resource.type,
			id: resource.id,
			lid: resource.lid,
			attributes,
			relationships,
		};
	});

// ============================================================================
// Atomic Operations
// ============================================================================

const isResourceData = (
	data: DecodedOperation["data"],
): data is DecodedResource =>
	data !== undefined && data !== null && !isToManyValue(data);

const operationKind = (
	operation: DecodedOperation,
	hasRelationship: boolean,
): OperationKind => {
	switch (operation.op) {
		case "add":
			return hasRelationship ? "AddToRelationship" : "CreateResource";
		case "update":
			return hasRelationship ? "SetRelationship" : "UpdateResource";
		case "remove":
			return hasRelationship ? "RemoveFromRelationship" : "DeleteResource";
	}
};

const toOperation = (
	graph: ResourceGraphShape,
	options: ApiOptionsShape,
	operation: DecodedOperation,
	index: number,
): Effect.Effect<OperationContainer, RequestBodyError> =>
	Effect.gen(function* () {
		const base = `/atomic:operations[${index}]`;
		const { ref, data } = operation;
		const kind = operationKind(operation, ref?.relationship !== undefined);

		if (ref !== undefined) {
			yield* findContext(graph, ref.type, `${base}/ref/type`);
			if (kind !== "CreateResource" && ref.id === undefined && ref.lid === undefined) {
				return yield* bodyError(
					"The 'ref.id' or 'ref.lid' element is required.",
					undefined,
					`${base}/ref`,
				);
			}
			if (ref.id !== undefined && ref.lid !== undefined) {
				return yield* bodyError(
					"The 'ref.id' and 'ref.lid' elements are mutually exclusive.",
					undefined,
					`${base}/ref`,
				);
			}
		}

		switch (kind) {
			case "CreateResource":
			case "UpdateResource": {
				if (ref !== undefined && kind === "CreateResource") {
					return yield* bodyError(
						"The 'ref' element is not supported when adding a resource.",
						undefined,
						`${base}/ref`,
					);
				}
				if (!isResourceData(data)) {
					return yield* bodyError(
						"Expected an object in 'data' element.",
						undefined,
						`${base}/data`,
					);
				}
				const resource = yield* validateResource(data, {
					graph,
					options,
					mode: kind === "CreateResource" ? "create" : "update",
					base: `${base}/data`,
					expectedType: ref?.type,
					expectedId: ref?.id,
					allowLocalIds: true,
				});
				return { kind, resource };
			}
			case "DeleteResource": {
				if (ref === undefined) {
					return yield* bodyError("The 'ref' element is required.", undefined, base);
				}
				if (data !== undefined) {
					return yield* bodyError(
						"The 'data' element is not supported when removing a resource.",
						undefined,
						`${base}/data`,
					);
				}
				return {
					kind,
					resource: {
						type: ref.type,
						id: ref.id,
						lid: ref.lid,
						attributes: {},
						relationships: {},
					},
				};
			}
			case "SetRelationship":
			case "AddToRelationship":
			case "RemoveFromRelationship": {
				if (ref === undefined || ref.relationship === undefined) {
					return yield* bodyError("The 'ref' element is required.", undefined, base);
				}
				const context = yield* findContext(graph, ref.type, `${base}/ref/type`);
				const relationship = yield* findRelationshipAt(
					context,
					ref.relationship,
					`${base}/ref/relationship`,
				);
				if (kind !== "SetRelationship" && relationship.cardinality !== "hasMany") {
					return yield* bodyError(
						"Only to-many relationships can be targeted through this operation.",
						`Relationship '${relationship.publicName}' is not a to-many relationship.`,
						`${base}/ref/relationship`,
					);
				}
				if (isResourceData(data) && (data.attributes !== undefined || data.relationships !== undefined)) {
					return yield* bodyError(
						"Expected identifiers in 'data' element.",
						undefined,
						`${base}/data`,
					);
				}
				const value = yield* validateRelationshipData(
					relationship,
					isResourceData(data)
						? { type: data.type, id: data.id, lid: data.lid }
						: data,
					`${base}/data`,
					true,
				);
				return {
					kind,
					relationshipName: relationship.publicName,
					resource: {
						type: ref.type,
						id: ref.id,
						lid: ref.lid,
						attributes: {},
						relationships: { [relationship.publicName]: value },
					},
				};
			}
		}
	});

/**
 * Decode an atomic operations document into operations, in request order.
 */
export const readAtomicOperations = (
	graph: ResourceGraphShape,
	options: ApiOptionsShape,
	body: unknown,
): Effect.Effect<ReadonlyArray<OperationContainer>, RequestBodyError> =>
	Effect.gen(function* () {
		const document = yield* decodeBody(AtomicOperationsBody, body);
		const operations = document["atomic:operations"];
		if (operations.length === 0) {
			return yield* bodyError(
				"No operations found.",
				"The 'atomic:operations' element must contain at least one operation.",
				"/atomic:operations",
			);
		}
		return yield* Effect.forEach(operations, (operation, index) =>
			toOperation(graph, options, operation, index),
		);
	});
