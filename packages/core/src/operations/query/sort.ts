import type { SortExpression } from "../../query/expressions.js";
import type { StoredResource } from "../../types/resource-types.js";
import { compareScalars } from "./filter.js";
import {
	type ResourceLookup,
	readAttributeChain,
	readCollectionChain,
} from "./resource-lookup.js";

/**
 * Sort resources by the elements of a sort expression, in order.
 * @returns A new array; the input is not modified.
 */
export function sortResources(
	resources: ReadonlyArray<StoredResource>,
	sort: SortExpression | undefined,
	lookup: ResourceLookup,
): ReadonlyArray<StoredResource> {
	if (!sort || sort.elements.length === 0) {
		return resources;
	}

	const sorted = [...resources];

	sorted.sort((a, b) => {
		for (const element of sort.elements) {
			const { target } = element;
			const aValue =
				target._tag === "Count"
					? readCollectionChain(a, target.targetCollection, lookup).length
					: readAttributeChain(a, target, lookup);
			const bValue =
				target._tag === "Count"
					? readCollectionChain(b, target.targetCollection, lookup).length
					: readAttributeChain(b, target, lookup);

			// null values always sort to the end
			if (aValue === undefined || aValue === null) {
				if (bValue === undefined || bValue === null) {
					continue;
				}
				return 1;
			}
			if (bValue === undefined || bValue === null) {
				return -1;
			}

			const comparison =
				compareScalars(aValue, bValue) ??
				String(aValue).localeCompare(String(bValue));

			if (comparison !== 0) {
				return element.isAscending ? comparison : -comparison;
			}
		}

		return 0;
	});

	return sorted;
}
