import type { Schema } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface RelationshipConfig {
	readonly kind: "hasOne" | "hasMany";
	/** Public name of the resource type on the right side. */
	readonly target: string;
	/** Whether `include` may traverse this relationship. Defaults to true. */
	readonly canInclude?: boolean;
}

export interface AttributeCapabilities {
	readonly view: boolean;
	readonly filter: boolean;
	readonly sort: boolean;
	readonly create: boolean;
	readonly change: boolean;
}

/**
 * Configuration for a single resource type. Attributes come from the schema;
 * properties whose names match a relationship are not attributes.
 */
export interface ResourceConfig {
	readonly schema: Schema.Schema.All;
	readonly identityType?: "string" | "number";
	readonly relationships?: Readonly<Record<string, RelationshipConfig>>;
	readonly attributes?: Readonly<
		Record<string, Partial<AttributeCapabilities>>
	>;
}

/**
 * Public resource name -> resource configuration.
 */
export type ResourceGraphConfig = Readonly<Record<string, ResourceConfig>>;

// ============================================================================
// Metadata
// ============================================================================

export type AttributeKind = "string" | "number" | "boolean" | "unknown";

export interface AttributeDefinition {
	readonly _tag: "Attribute";
	readonly publicName: string;
	readonly kind: AttributeKind;
	readonly nullable: boolean;
	readonly capabilities: AttributeCapabilities;
}

export interface RelationshipDefinition {
	readonly _tag: "Relationship";
	readonly publicName: string;
	readonly cardinality: "hasOne" | "hasMany";
	readonly leftType: string;
	readonly rightType: string;
	readonly canInclude: boolean;
}

export type ResourceField = AttributeDefinition | RelationshipDefinition;

export interface ResourceContext {
	readonly publicName: string;
	readonly identityType: "string" | "number";
	/** Includes `id`, which is filterable and sortable but never written. */
	readonly attributes: ReadonlyArray<AttributeDefinition>;
	readonly relationships: ReadonlyArray<RelationshipDefinition>;
	readonly schema: Schema.Schema.All;
}

export const isToMany = (
	field: ResourceField,
): field is RelationshipDefinition =>
	field._tag === "Relationship" && field.cardinality === "hasMany";

export const isToOne = (field: ResourceField): field is RelationshipDefinition =>
	field._tag === "Relationship" && field.cardinality === "hasOne";
