import { Option } from "effect";
import type { ResourceGraphShape } from "../graph/resource-graph.js";
import type {
	ResourceQueryResult,
	StoredResource,
} from "../types/resource-types.js";
import { identifiersOf, identityKey } from "../types/resource-types.js";

/**
 * One stop of the read-hook traversal: every instance of one resource type
 * in the response.
 */
export interface ReadLevel {
	readonly resourceType: string;
	readonly resources: ReadonlyArray<StoredResource>;
	readonly isIncluded: boolean;
}

const groupByType = (
	resources: ReadonlyArray<StoredResource>,
): Map<string, Map<string, StoredResource>> => {
	const groups = new Map<string, Map<string, StoredResource>>();
	for (const resource of resources) {
		let group = groups.get(resource.type);
		if (group === undefined) {
			group = new Map();
			groups.set(resource.type, group);
		}
		group.set(identityKey(resource), resource);
	}
	return groups;
};

/**
 * Walk the relationship edges of the graph depth-first, starting at the
 * primary resource type, over resources that are already part of `result`.
 *
 * Each resource type is visited once. When a type is reachable through
 * several paths, its level holds every instance of that type in the result.
 * Included instances of the primary type are reported with the primary
 * resources.
 */
export const collectReadLevels = (
	graph: ResourceGraphShape,
	resourceType: string,
	result: ResourceQueryResult,
): ReadonlyArray<ReadLevel> => {
	const included = groupByType(result.included);
	const visited = new Set<string>([resourceType]);
	const levels: Array<ReadLevel> = [];

	const rootResources = new Map(
		result.primary.map((resource) => [identityKey(resource), resource]),
	);
	for (const [key, resource] of included.get(resourceType) ?? []) {
		if (!rootResources.has(key)) rootResources.set(key, resource);
	}

	const visit = (
		type: string,
		resources: ReadonlyArray<StoredResource>,
		isIncluded: boolean,
	): void => {
		levels.push({ resourceType: type, resources, isIncluded });

		const context = graph.findResourceContext(type);
		if (Option.isNone(context)) return;

		for (const relationship of context.value.relationships) {
			const candidates = included.get(relationship.rightType);
			if (candidates === undefined || visited.has(relationship.rightType)) {
				continue;
			}
			const isReferenced = resources.some((resource) =>
				identifiersOf(resource.relationships[relationship.publicName]).some(
					(identifier) => candidates.has(identityKey(identifier)),
				),
			);
			if (!isReferenced) continue;

			visited.add(relationship.rightType);
			visit(relationship.rightType, [...candidates.values()], true);
		}
	};

	visit(resourceType, [...rootResources.values()], false);
	return levels;
};
