import type {
	ResourceIdentifier,
	ResourceObject,
} from "../types/resource-types.js";
import { identifiersOf } from "../types/resource-types.js";

export type OperationKind =
	| "CreateResource"
	| "UpdateResource"
	| "DeleteResource"
	| "SetRelationship"
	| "AddToRelationship"
	| "RemoveFromRelationship";

/**
 * One entry of an atomic operations request.
 *
 * For relationship operations, `resource.relationships[relationshipName]`
 * holds the right side of the change.
 */
export interface OperationContainer {
	readonly kind: OperationKind;
	readonly resource: ResourceObject;
	readonly relationshipName?: string;
}

export const isRelationshipOperation = (kind: OperationKind): boolean =>
	kind === "SetRelationship" ||
	kind === "AddToRelationship" ||
	kind === "RemoveFromRelationship";

/**
 * A resource referenced by an operation other than its primary resource,
 * with the location of its `lid` inside the operation.
 */
export interface SecondaryReference {
	readonly identifier: ResourceIdentifier;
	readonly pointer: string;
}

/**
 * Every related resource an operation references, in document order.
 */
export const secondaryReferences = (
	operation: OperationContainer,
): ReadonlyArray<SecondaryReference> => {
	const references: Array<SecondaryReference> = [];
	for (const [name, value] of Object.entries(operation.resource.relationships)) {
		const base = isRelationshipOperation(operation.kind)
			? "/data"
			: `/data/relationships/${name}/data`;
		const many = Array.isArray(value);
		identifiersOf(value).forEach((identifier, index) => {
			references.push({
				identifier,
				pointer: many ? `${base}[${index}]` : base,
			});
		});
	}
	return references;
};
