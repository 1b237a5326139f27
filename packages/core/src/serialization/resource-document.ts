/**
 * Rendering of resources into JSON:API documents.
 *
 * Sparse field sets restrict both attributes and relationships. Attributes
 * whose `view` capability is off are never rendered.
 *
 * @module
 */

import { Option } from "effect";
import type { ResourceField } from "../graph/graph-types.js";
import type { ResourceGraphShape } from "../graph/resource-graph.js";
import {
	getInclude,
	getSparseFieldSet,
	type QuerySpecification,
	type SerializationSettings,
} from "../query/query-specification.js";
import type {
	RelationshipValue,
	ResourceIdentifier,
	ResourceObject,
	ResourceQueryResult,
} from "../types/resource-types.js";
import { isToManyValue } from "../types/resource-types.js";

// ============================================================================
// Document Types
// ============================================================================

export interface ResourceIdentifierObject {
	readonly type: string;
	readonly id?: string;
	readonly lid?: string;
}

export type RelationshipData =
	| ResourceIdentifierObject
	| null
	| ReadonlyArray<ResourceIdentifierObject>;

export interface RelationshipObject {
	readonly data: RelationshipData;
}

export interface ResourceObjectDocument {
	readonly type: string;
	readonly id?: string;
	readonly lid?: string;
	readonly attributes?: Readonly<Record<string, unknown>>;
	readonly relationships?: Readonly<Record<string, RelationshipObject>>;
}

export interface ResourceDocument {
	readonly data: ResourceObjectDocument | null | ReadonlyArray<ResourceObjectDocument>;
	readonly included?: ReadonlyArray<ResourceObjectDocument>;
}

export interface RelationshipDocument {
	readonly data: RelationshipData;
}

/**
 * One entry per operation; operations that produce no resource render as `{}`.
 */
export interface AtomicResultsDocument {
	readonly "atomic:results": ReadonlyArray<{ readonly data?: ResourceObjectDocument }>;
}

// ============================================================================
// Resources
// ============================================================================

const isDefaultValue = (value: unknown): boolean =>
	value === null || value === 0 || value === false;

const toIdentifierObject = (
	identifier: ResourceIdentifier,
): ResourceIdentifierObject =>
	identifier.id === undefined
		? { type: identifier.type, lid: identifier.lid }
		: { type: identifier.type, id: identifier.id };

const toRelationshipData = (
	value: RelationshipValue | undefined,
	toMany: boolean,
): RelationshipData => {
	if (isToManyValue(value)) return value.map(toIdentifierObject);
	if (value === undefined || value === null) return toMany ? [] : null;
	return toIdentifierObject(value);
};

const inFieldSet = (
	fieldSet: Option.Option<ReadonlyArray<ResourceField>>,
	publicName: string,
): boolean =>
	Option.match(fieldSet, {
		onNone: () => true,
		onSome: (fields) => fields.some((field) => field.publicName === publicName),
	});

/**
 * Render one resource. Resource types unknown to the graph render as a bare
 * identifier.
 */
export const serializeResource = (
	graph: ResourceGraphShape,
	resource: ResourceObject,
	settings: SerializationSettings,
	fieldSet: Option.Option<ReadonlyArray<ResourceField>> = Option.none(),
): ResourceObjectDocument => {
	const identity: ResourceIdentifierObject = {
		type: resource.type,
		...(resource.id !== undefined ? { id: resource.id } : {}),
		...(resource.lid !== undefined ? { lid: resource.lid } : {}),
	};
	const context = graph.findResourceContext(resource.type);
	if (Option.isNone(context)) return identity;

	const attributes: Record<string, unknown> = {};
	for (const attribute of context.value.attributes) {
		const name = attribute.publicName;
		if (name === "id" || !attribute.capabilities.view) continue;
		if (!inFieldSet(fieldSet, name)) continue;
		const value = resource.attributes[name] ?? null;
		if (settings.omitNullValues && value === null) continue;
		if (settings.omitDefaultValues && isDefaultValue(value)) continue;
		attributes[name] = value;
	}

	const relationships: Record<string, RelationshipObject> = {};
	for (const relationship of context.value.relationships) {
		const name = relationship.publicName;
		if (!inFieldSet(fieldSet, name)) continue;
		relationships[name] = {
			data: toRelationshipData(
				resource.relationships[name],
				relationship.cardinality === "hasMany",
			),
		};
	}

	return {
		...identity,
		...(Object.keys(attributes).length > 0 ? { attributes } : {}),
		...(Object.keys(relationships).length > 0 ? { relationships } : {}),
	};
};

const fieldSetFor = (
	specification: QuerySpecification,
	resourceType: string,
): Option.Option<ReadonlyArray<ResourceField>> =>
	Option.map(getSparseFieldSet(specification, resourceType), (set) => set.fields);

// ============================================================================
// Documents
// ============================================================================

/**
 * Primary data (a single resource or a collection) plus `included` when the
 * request asked for an include.
 */
export const buildResourceDocument = (
	graph: ResourceGraphShape,
	result: ResourceQueryResult,
	specification: QuerySpecification,
	isCollection: boolean,
): ResourceDocument => {
	const render = (resource: ResourceObject) =>
		serializeResource(
			graph,
			resource,
			specification.serialization,
			fieldSetFor(specification, resource.type),
		);

	const primary = result.primary.map(render);
	const data = isCollection ? primary : (primary[0] ?? null);

	return Option.isSome(getInclude(specification))
		? { data, included: result.included.map(render) }
		: { data };
};

export const buildRelationshipDocument = (
	value: RelationshipValue,
): RelationshipDocument => ({
	data: toRelationshipData(value, isToManyValue(value)),
});

export const buildAtomicResultsDocument = (
	graph: ResourceGraphShape,
	results: ReadonlyArray<Option.Option<ResourceObject>>,
	settings: SerializationSettings,
): AtomicResultsDocument => ({
	"atomic:results": results.map((result) =>
		Option.match(result, {
			onNone: () => ({}),
			onSome: (resource) => ({
				data: serializeResource(graph, resource, settings),
			}),
		}),
	),
});
