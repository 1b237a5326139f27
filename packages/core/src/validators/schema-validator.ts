/**
 * Effect Schema validation of the attributes of a written resource.
 *
 * The resource type's schema is decoded against the attributes that would be
 * stored. Issues on `id` and on relationship-named properties are skipped,
 * since neither lives in the attribute record. The first remaining issue
 * becomes a RequestBodyError pointing at `/data/attributes/<name>`.
 */

import { Effect, ParseResult, Schema } from "effect"
import { RequestBodyError } from "../errors/operation-errors.js"
import type { ResourceContext } from "../graph/graph-types.js"

const describeIssue = (
	name: string,
	issue: ParseResult.ArrayFormatterIssue,
): string =>
	issue._tag === "Missing"
		? `Attribute '${name}' is required.`
		: `Attribute '${name}' is invalid: ${issue.message}`

/**
 * Decode attributes through the schema of their resource type. Schemas that
 * need services to decode are not supported.
 */
export const validateAttributes = (
	context: ResourceContext,
	attributes: Readonly<Record<string, unknown>>,
): Effect.Effect<void, RequestBodyError> => {
	const schema = Schema.make<unknown, unknown, never>(context.schema.ast)
	const written = new Set(
		context.attributes
			.filter((attribute) => attribute.publicName !== "id")
			.map((attribute) => attribute.publicName),
	)

	return Schema.decodeUnknown(schema, { errors: "all" })(attributes).pipe(
		Effect.asVoid,
		Effect.catchTag(
			"ParseError",
			(parseError): Effect.Effect<void, RequestBodyError> => {
				const issues = ParseResult.ArrayFormatter.formatErrorSync(parseError)
				for (const issue of issues) {
					const [name] = issue.path
					if (typeof name !== "string" || !written.has(name)) continue
					const detail = describeIssue(name, issue)
					return Effect.fail(
						new RequestBodyError({
							title: "Input validation failed.",
							detail,
							pointer: `/data/attributes/${name}`,
							message: detail,
						}),
					)
				}
				return Effect.void
			},
		),
	)
}
