import { Effect, Option } from "effect";
import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { formatExpression } from "../src/query/format.js";
import { parseFilter } from "../src/query/parsers/filter-parser.js";
import { blogGraph } from "./fixtures/blog-graph.js";

const articles = Option.getOrThrow(blogGraph.findResourceContext("articles"));

const parse = (source: string) =>
	Effect.runSync(parseFilter(source, articles, blogGraph, "filter"));

const failure = (source: string) =>
	Effect.runSync(Effect.flip(parseFilter(source, articles, blogGraph, "filter")));

const quoted = (text: string) => `'${text.replaceAll("'", "''")}'`;

describe("parseFilter", () => {
	describe("comparisons", () => {
		it("parses an equality on an attribute", () => {
			const filter = parse("equals(title,'Alpha')");
			expect(filter).toMatchObject({
				_tag: "Comparison",
				operator: "equals",
				right: { _tag: "LiteralConstant", value: "Alpha" },
			});
		});

		it("converts literals to the kind of the attribute", () => {
			expect(parse("greaterThan(views,'5')")).toMatchObject({
				right: { value: 5 },
			});
			expect(parse("equals(published,'true')")).toMatchObject({
				right: { value: true },
			});
		});

		it("rejects a literal that does not convert", () => {
			const error = failure("equals(views,'abc')");
			expect(error._tag).toBe("InvalidQueryStringParameterError");
			expect(error.detail).toBe(
				"Failed to convert 'abc' of type 'String' to type 'Number'.",
			);
		});

		it("follows to-one relationships to an attribute", () => {
			const filter = parse("equals(author.name,'Ann')");
			expect(filter._tag).toBe("Comparison");
			if (filter._tag !== "Comparison" || filter.left._tag !== "ResourceFieldChain") {
				return;
			}
			expect(filter.left.fields.map((field) => field.publicName)).toEqual([
				"author",
				"name",
			]);
		});

		it("compares two attributes", () => {
			expect(formatExpression(parse("equals(title,caption)"))).toBe(
				"equals(title,caption)",
			);
		});

		it("compares the size of a to-many relationship", () => {
			const filter = parse("greaterThan(count(comments),'1')");
			expect(filter).toMatchObject({
				left: { _tag: "Count" },
				right: { value: 1 },
			});
		});

		it("accepts null only with equals", () => {
			expect(parse("equals(caption,null)")).toMatchObject({
				right: { _tag: "NullConstant" },
			});

			const error = failure("lessThan(caption,null)");
			expect(error._tag).toBe("QueryParseError");
			expect(error.detail).toBe("Value between quotes expected.");
			if (error._tag === "QueryParseError") {
				expect(error.position).toBe(17);
			}
		});

		it("unescapes doubled quotes", () => {
			expect(parse("equals(title,'it''s')")).toMatchObject({
				right: { value: "it's" },
			});
		});
	});

	describe("functions", () => {
		it("parses nested logical functions", () => {
			const source = "and(equals(title,'Alpha'),not(any(title,'Beta','Gamma')))";
			expect(formatExpression(parse(source))).toBe(source);
		});

		it("requires at least two terms in and/or", () => {
			const error = failure("and(equals(title,'Alpha'))");
			expect(error.detail).toBe(", expected.");
			if (error._tag === "QueryParseError") {
				expect(error.position).toBe(25);
			}
		});

		it("evaluates the condition of has against the related type", () => {
			const source = "has(comments,equals(body,'First'))";
			expect(formatExpression(parse(source))).toBe(source);
		});

		it("rejects has on a to-one relationship", () => {
			expect(failure("has(author)").detail).toBe(
				"Field 'author' on resource type 'articles' is a to-one relationship, but a to-many relationship is expected here.",
			);
		});

		it("rejects text matching on a non-text attribute", () => {
			expect(failure("contains(views,'1')").detail).toBe(
				"Function 'contains' requires attribute 'views' to be of type 'String'.",
			);
		});

		it("rejects an unknown function", () => {
			const error = failure("foo(title)");
			expect(error.detail).toBe("Filter function expected.");
			expect(error.message).toBe(
				"The specified filter is invalid. Filter function expected. Failed at position 1.",
			);
		});

		it("rejects trailing input", () => {
			const error = failure("equals(title,'a')x");
			expect(error.detail).toBe("End of expression expected.");
			if (error._tag === "QueryParseError") {
				expect(error.position).toBe(17);
			}
		});
	});

	describe("fields", () => {
		it("rejects an unknown attribute", () => {
			expect(failure("equals(missing,'x')").detail).toBe(
				"Field 'missing' does not exist on resource type 'articles'.",
			);
		});

		it("rejects an attribute that cannot be filtered", () => {
			expect(failure("equals(secret,'s')").detail).toBe(
				"Filtering on attribute 'secret' is not allowed.",
			);
		});
	});
});

// ============================================================================
// Properties
// ============================================================================

type FilterSources = {
	readonly filter: string;
	readonly logical: string;
	readonly negation: string;
};

const leafArbitrary: fc.Arbitrary<string> = fc.oneof(
	fc.string().map((text) => `equals(title,${quoted(text)})`),
	fc.integer().map((value) => `greaterThan(views,'${value}')`),
	fc.boolean().map((value) => `equals(published,'${value}')`),
	fc.string().map((text) => `contains(caption,${quoted(text)})`),
	fc.constant("equals(caption,null)"),
	fc.constant("has(comments)"),
	fc.nat({ max: 5 }).map((value) => `lessThan(count(comments),'${value}')`),
);

const { filter: filterArbitrary } = fc.letrec<FilterSources>((tie) => ({
	filter: fc.oneof({ maxDepth: 3 }, leafArbitrary, tie("logical"), tie("negation")),
	logical: fc
		.tuple(
			fc.constantFrom("and", "or"),
			fc.array(tie("filter"), { minLength: 2, maxLength: 3 }),
		)
		.map(([operator, terms]) => `${operator}(${terms.join(",")})`),
	negation: tie("filter").map((term) => `not(${term})`),
}));

describe("parseFilter properties", () => {
	it("keeps any quoted text as the literal value", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				const filter = parse(`equals(title,${quoted(text)})`);
				expect(filter).toMatchObject({ right: { value: text } });
			}),
		);
	});

	it("formats a parsed filter back to its source", () => {
		fc.assert(
			fc.property(filterArbitrary, (source) => {
				expect(formatExpression(parse(source))).toBe(source);
			}),
		);
	});
});
