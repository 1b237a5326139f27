import { Option } from "effect";
import type { ResourceGraphShape } from "../../graph/resource-graph.js";
import type { ResourceFieldChain } from "../../query/expressions.js";
import type {
	ResourceIdentifier,
	StoredResource,
} from "../../types/resource-types.js";
import { identifiersOf, identityKey } from "../../types/resource-types.js";

/**
 * Synchronous access to every stored resource while a read is evaluated.
 */
export interface ResourceLookup {
	readonly graph: ResourceGraphShape;
	readonly find: (identifier: ResourceIdentifier) => StoredResource | undefined;
}

export const makeResourceLookup = (
	graph: ResourceGraphShape,
	resources: Iterable<StoredResource>,
): ResourceLookup => {
	const index = new Map<string, StoredResource>();
	for (const resource of resources) {
		index.set(identityKey(resource), resource);
	}
	return {
		graph,
		find: (identifier) =>
			identifier.id === undefined
				? undefined
				: index.get(identityKey(identifier)),
	};
};

/**
 * Resources on the right side of `relationshipName`. Identifiers of missing
 * resources are skipped.
 */
export const relatedResources = (
	resource: StoredResource,
	relationshipName: string,
	lookup: ResourceLookup,
): ReadonlyArray<StoredResource> =>
	identifiersOf(resource.relationships[relationshipName]).flatMap(
		(identifier) => {
			const related = lookup.find(identifier);
			return related === undefined ? [] : [related];
		},
	);

const readAttribute = (
	resource: StoredResource,
	name: string,
	lookup: ResourceLookup,
): unknown => {
	if (name === "id") {
		const context = lookup.graph.findResourceContext(resource.type);
		return Option.isSome(context) && context.value.identityType === "number"
			? Number(resource.id)
			: resource.id;
	}
	return resource.attributes[name] ?? null;
};

/**
 * Follow the to-one relationships of `chain` and read the attribute at its
 * end. A missing resource on the way yields null.
 */
export const readAttributeChain = (
	resource: StoredResource,
	chain: ResourceFieldChain,
	lookup: ResourceLookup,
): unknown => {
	let current: StoredResource | undefined = resource;
	for (const field of chain.fields) {
		if (current === undefined) return null;
		if (field._tag === "Attribute") {
			return readAttribute(current, field.publicName, lookup);
		}
		current = relatedResources(current, field.publicName, lookup)[0];
	}
	return null;
};

/**
 * Resources at the end of a chain of to-one relationships followed by one
 * to-many relationship.
 */
export const readCollectionChain = (
	resource: StoredResource,
	chain: ResourceFieldChain,
	lookup: ResourceLookup,
): ReadonlyArray<StoredResource> => {
	let current: ReadonlyArray<StoredResource> = [resource];
	for (const field of chain.fields) {
		current = current.flatMap((item) =>
			relatedResources(item, field.publicName, lookup),
		);
	}
	return current;
};
