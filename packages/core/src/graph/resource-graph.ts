/**
 * The resource graph: immutable metadata about every exposed resource type.
 *
 * Built once from an explicit configuration (no discovery) and then shared by
 * all requests.
 */

import { Context, Effect, Layer, Option } from "effect";
import { InvalidConfigurationError } from "../errors/resource-errors.js";
import type {
	AttributeCapabilities,
	AttributeDefinition,
	RelationshipDefinition,
	ResourceContext,
	ResourceField,
	ResourceGraphConfig,
} from "./graph-types.js";
import { readSchemaFields } from "./schema-fields.js";

// ============================================================================
// Service
// ============================================================================

export interface ResourceGraphShape {
	readonly resourceContexts: ReadonlyArray<ResourceContext>;
	readonly findResourceContext: (
		publicName: string,
	) => Option.Option<ResourceContext>;
	/**
	 * The context on the right side of a relationship. Relationship targets are
	 * checked when the graph is built.
	 */
	readonly getRightContext: (
		relationship: RelationshipDefinition,
	) => ResourceContext;
	readonly findField: (
		context: ResourceContext,
		publicName: string,
	) => Option.Option<ResourceField>;
}

export class ResourceGraph extends Context.Tag("jsonweave/ResourceGraph")<
	ResourceGraph,
	ResourceGraphShape
>() {}

// ============================================================================
// Construction
// ============================================================================

const ALL_CAPABILITIES: AttributeCapabilities = {
	view: true,
	filter: true,
	sort: true,
	create: true,
	change: true,
};

const ID_CAPABILITIES: AttributeCapabilities = {
	view: true,
	filter: true,
	sort: true,
	create: false,
	change: false,
};

const configurationError = (reason: string) =>
	new InvalidConfigurationError({
		reason,
		message: `Invalid resource graph: ${reason}`,
	});

/**
 * Build the resource graph from its configuration.
 *
 * Fails with InvalidConfigurationError when a relationship targets an
 * unregistered type, when a capability override names an unknown attribute,
 * or when a schema has no `id` property.
 */
export const buildResourceGraph = (
	config: ResourceGraphConfig,
): Effect.Effect<ResourceGraphShape, InvalidConfigurationError> =>
	Effect.gen(function* () {
		const contexts = new Map<string, ResourceContext>();

		for (const [publicName, resourceConfig] of Object.entries(config)) {
			const relationshipConfigs = resourceConfig.relationships ?? {};
			const relationships: Array<RelationshipDefinition> = [];

			for (const [relationshipName, relationship] of Object.entries(
				relationshipConfigs,
			)) {
				if (relationshipName === "id") {
					return yield* configurationError(
						`relationship 'id' on '${publicName}' collides with the identity attribute`,
					);
				}
				if (!Object.hasOwn(config, relationship.target)) {
					return yield* configurationError(
						`relationship '${relationshipName}' on '${publicName}' targets unknown resource type '${relationship.target}'`,
					);
				}
				relationships.push({
					_tag: "Relationship",
					publicName: relationshipName,
					cardinality: relationship.kind,
					leftType: publicName,
					rightType: relationship.target,
					canInclude: relationship.canInclude ?? true,
				});
			}

			const identityType = resourceConfig.identityType ?? "string";
			const fields = readSchemaFields(resourceConfig.schema);
			if (!fields.some((field) => field.name === "id")) {
				return yield* configurationError(
					`schema of '${publicName}' has no 'id' property`,
				);
			}

			const overrides = resourceConfig.attributes ?? {};
			const attributes: Array<AttributeDefinition> = [];
			for (const field of fields) {
				if (field.name === "id") {
					attributes.push({
						_tag: "Attribute",
						publicName: "id",
						kind: identityType,
						nullable: false,
						capabilities: ID_CAPABILITIES,
					});
					continue;
				}
				if (Object.hasOwn(relationshipConfigs, field.name)) continue;
				attributes.push({
					_tag: "Attribute",
					publicName: field.name,
					kind: field.kind,
					nullable: field.nullable,
					capabilities: {
						...ALL_CAPABILITIES,
						...(Object.hasOwn(overrides, field.name) ? overrides[field.name] : {}),
					},
				});
			}

			for (const overridden of Object.keys(overrides)) {
				if (!attributes.some((attribute) => attribute.publicName === overridden)) {
					return yield* configurationError(
						`capabilities are configured for unknown attribute '${overridden}' on '${publicName}'`,
					);
				}
			}

			contexts.set(publicName, {
				publicName,
				identityType,
				attributes,
				relationships,
				schema: resourceConfig.schema,
			});
		}

		return makeResourceGraph(contexts);
	});

const makeResourceGraph = (
	contexts: ReadonlyMap<string, ResourceContext>,
): ResourceGraphShape => {
	const fieldIndex = new Map<string, ReadonlyMap<string, ResourceField>>();
	for (const context of contexts.values()) {
		const fields = new Map<string, ResourceField>();
		for (const attribute of context.attributes) {
			fields.set(attribute.publicName, attribute);
		}
		for (const relationship of context.relationships) {
			fields.set(relationship.publicName, relationship);
		}
		fieldIndex.set(context.publicName, fields);
	}

	return {
		resourceContexts: [...contexts.values()],
		findResourceContext: (publicName) =>
			Option.fromNullable(contexts.get(publicName)),
		getRightContext: (relationship) => {
			const context = contexts.get(relationship.rightType);
			if (context === undefined) {
				// Unreachable for graphs produced by buildResourceGraph.
				throw configurationError(
					`unknown resource type '${relationship.rightType}'`,
				);
			}
			return context;
		},
		findField: (context, publicName) =>
			Option.fromNullable(fieldIndex.get(context.publicName)?.get(publicName)),
	};
};

/**
 * Build the graph and provide it as the ResourceGraph service.
 */
export const makeResourceGraphLayer = (
	config: ResourceGraphConfig,
): Layer.Layer<ResourceGraph, InvalidConfigurationError> =>
	Layer.effect(ResourceGraph, buildResourceGraph(config));

export const findAttribute = (
	context: ResourceContext,
	publicName: string,
): Option.Option<AttributeDefinition> =>
	Option.fromNullable(
		context.attributes.find((attribute) => attribute.publicName === publicName),
	);

export const findRelationship = (
	context: ResourceContext,
	publicName: string,
): Option.Option<RelationshipDefinition> =>
	Option.fromNullable(
		context.relationships.find(
			(relationship) => relationship.publicName === publicName,
		),
	);
