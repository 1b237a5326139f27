/**
 * Resource instances as they travel between the request body, the services
 * and the serializer.
 */

export interface ResourceIdentifier {
	readonly type: string;
	readonly id?: string;
	/** Client-chosen placeholder, valid within one atomic-operations request. */
	readonly lid?: string;
}

/**
 * Identifier of a persisted resource.
 */
export interface ResourceIdentity {
	readonly type: string;
	readonly id: string;
}

export type RelationshipValue =
	| ResourceIdentifier
	| null
	| ReadonlyArray<ResourceIdentifier>;

export interface ResourceObject {
	readonly type: string;
	readonly id?: string;
	readonly lid?: string;
	readonly attributes: Readonly<Record<string, unknown>>;
	readonly relationships: Readonly<Record<string, RelationshipValue>>;
}

export interface StoredResource extends ResourceObject {
	readonly id: string;
}

/**
 * Primary data of a read request together with everything it pulled in.
 */
export interface ResourceQueryResult {
	readonly primary: ReadonlyArray<StoredResource>;
	readonly included: ReadonlyArray<StoredResource>;
}

export const isToManyValue = (
	value: RelationshipValue | undefined,
): value is ReadonlyArray<ResourceIdentifier> => Array.isArray(value);

/**
 * Flatten a relationship value into the identifiers it holds.
 */
export const identifiersOf = (
	value: RelationshipValue | undefined,
): ReadonlyArray<ResourceIdentifier> => {
	if (value === undefined || value === null) return [];
	if (isToManyValue(value)) return value;
	return [value];
};

export const identityKey = (identity: {
	readonly type: string;
	readonly id?: string;
}): string => `${identity.type}:${identity.id ?? ""}`;
