import { type Schema, SchemaAST } from "effect";
import type { AttributeKind } from "./graph-types.js";

export interface SchemaField {
	readonly name: string;
	readonly kind: AttributeKind;
	readonly nullable: boolean;
}

interface KindInfo {
	readonly kind: AttributeKind;
	readonly nullable: boolean;
}

const UNKNOWN: KindInfo = { kind: "unknown", nullable: false };

const kindOf = (ast: SchemaAST.AST): KindInfo => {
	switch (ast._tag) {
		case "StringKeyword":
		case "TemplateLiteral":
			return { kind: "string", nullable: false };
		case "NumberKeyword":
			return { kind: "number", nullable: false };
		case "BooleanKeyword":
			return { kind: "boolean", nullable: false };
		case "Literal": {
			if (ast.literal === null) return { kind: "unknown", nullable: true };
			const type = typeof ast.literal;
			if (type === "string" || type === "number" || type === "boolean") {
				return { kind: type, nullable: false };
			}
			return UNKNOWN;
		}
		case "Enums": {
			const kinds = new Set(ast.enums.map(([, value]) => typeof value));
			if (kinds.size === 1 && kinds.has("string"))
				return { kind: "string", nullable: false };
			if (kinds.size === 1 && kinds.has("number"))
				return { kind: "number", nullable: false };
			return UNKNOWN;
		}
		case "Refinement":
			return kindOf(ast.from);
		case "Transformation":
			return kindOf(ast.to);
		case "Union": {
			let nullable = false;
			const kinds = new Set<AttributeKind>();
			for (const member of ast.types) {
				if (member._tag === "UndefinedKeyword") {
					nullable = true;
					continue;
				}
				const info = kindOf(member);
				nullable = nullable || info.nullable;
				if (member._tag === "Literal" && member.literal === null) continue;
				kinds.add(info.kind);
			}
			const [only] = kinds;
			return {
				kind: kinds.size === 1 && only !== undefined ? only : "unknown",
				nullable,
			};
		}
		default:
			return UNKNOWN;
	}
};

/**
 * Read the top-level properties of a struct schema with a coarse value kind,
 * used to convert query-string literals.
 */
export const readSchemaFields = (
	schema: Schema.Schema.All,
): ReadonlyArray<SchemaField> =>
	SchemaAST.getPropertySignatures(SchemaAST.typeAST(schema.ast)).map(
		(signature) => {
			const info = kindOf(signature.type);
			return {
				name: String(signature.name),
				kind: info.kind,
				nullable: info.nullable || signature.isOptional,
			};
		},
	);
