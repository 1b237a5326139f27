/**
 * In-memory evaluation of a QuerySpecification: filter, sort and page a
 * collection, then gather the resources named by `include`.
 *
 * @module
 */

import { Option } from "effect";
import type { IncludeElementExpression } from "../../query/expressions.js";
import {
	type QuerySpecification,
	getFilter,
	getInclude,
	getPagination,
	getSort,
} from "../../query/query-specification.js";
import type {
	ResourceQueryResult,
	StoredResource,
} from "../../types/resource-types.js";
import { identityKey } from "../../types/resource-types.js";
import { filterResources } from "./filter.js";
import { paginate } from "./paginate.js";
import { type ResourceLookup, relatedResources } from "./resource-lookup.js";
import { sortResources } from "./sort.js";

/**
 * Apply the filter, sort and pagination constraints of `scope` ("" for the
 * primary resources) to one collection.
 */
export const applyCollectionConstraints = (
	resources: ReadonlyArray<StoredResource>,
	specification: QuerySpecification,
	scope: string,
	lookup: ResourceLookup,
): ReadonlyArray<StoredResource> => {
	const filtered = filterResources(
		resources,
		Option.getOrUndefined(getFilter(specification, scope)),
		lookup,
	);
	const sorted = sortResources(
		filtered,
		Option.getOrUndefined(getSort(specification, scope)),
		lookup,
	);
	return paginate(
		sorted,
		Option.getOrUndefined(getPagination(specification, scope)),
	);
};

/**
 * Every resource reached through the include tree, once, excluding the
 * primary resources. To-many relationships are constrained by the
 * expressions scoped to their include path.
 */
export const resolveIncludes = (
	primary: ReadonlyArray<StoredResource>,
	specification: QuerySpecification,
	lookup: ResourceLookup,
): ReadonlyArray<StoredResource> => {
	const include = getInclude(specification);
	if (Option.isNone(include)) return [];

	const seen = new Set(primary.map(identityKey));
	const included: Array<StoredResource> = [];

	const visit = (
		parents: ReadonlyArray<StoredResource>,
		elements: ReadonlyArray<IncludeElementExpression>,
		path: string,
	): void => {
		for (const element of elements) {
			const { relationship } = element;
			const elementPath =
				path === ""
					? relationship.publicName
					: `${path}.${relationship.publicName}`;
			const reached = new Map<string, StoredResource>();

			for (const parent of parents) {
				const related = relatedResources(
					parent,
					relationship.publicName,
					lookup,
				);
				const selected =
					relationship.cardinality === "hasMany"
						? applyCollectionConstraints(
								related,
								specification,
								elementPath,
								lookup,
							)
						: related;
				for (const resource of selected) {
					const key = identityKey(resource);
					reached.set(key, resource);
					if (!seen.has(key)) {
						seen.add(key);
						included.push(resource);
					}
				}
			}

			visit([...reached.values()], element.children, elementPath);
		}
	};

	visit(primary, include.value.elements, "");
	return included;
};

/**
 * Evaluate a read of a collection: the page of primary resources and
 * everything they include.
 */
export const evaluateCollection = (
	resources: ReadonlyArray<StoredResource>,
	specification: QuerySpecification,
	lookup: ResourceLookup,
): ResourceQueryResult => {
	const primary = applyCollectionConstraints(
		resources,
		specification,
		"",
		lookup,
	);
	return {
		primary,
		included: resolveIncludes(primary, specification, lookup),
	};
};
