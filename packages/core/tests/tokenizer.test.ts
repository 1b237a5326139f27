import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { parseParameterName } from "../src/query/readers/query-string-reader.js";
import { openCursor, tokenize } from "../src/query/tokenizer.js";

const tokensOf = (source: string) =>
	Effect.runSync(tokenize(source, "filter")).map((token) => [
		token.kind,
		token.value,
		token.position,
	]);

describe("tokenize", () => {
	it("splits a function call into tokens with their offsets", () => {
		expect(tokensOf("equals(name,'it''s')")).toEqual([
			["Text", "equals", 0],
			["OpenParen", "(", 6],
			["Text", "name", 7],
			["Comma", ",", 11],
			["QuotedText", "it's", 12],
			["CloseParen", ")", 19],
		]);
	});

	it("reads a leading minus as its own token", () => {
		expect(tokensOf("-name")).toEqual([
			["Minus", "-", 0],
			["Text", "name", 1],
		]);
	});

	it("keeps a minus inside text", () => {
		expect(tokensOf("first-name")).toEqual([["Text", "first-name", 0]]);
	});

	it("keeps dots inside text", () => {
		expect(tokensOf("author.name")).toEqual([["Text", "author.name", 0]]);
	});

	it("drops whitespace between tokens", () => {
		expect(tokensOf("a, b")).toEqual([
			["Text", "a", 0],
			["Comma", ",", 1],
			["Text", "b", 3],
		]);
	});

	it("keeps whitespace and parentheses inside quotes", () => {
		expect(tokensOf("' a (b) '")).toEqual([["QuotedText", " a (b) ", 0]]);
	});

	it("reads a colon between a scope and a value", () => {
		expect(tokensOf("comments:5")).toEqual([
			["Text", "comments", 0],
			["Colon", ":", 8],
			["Text", "5", 9],
		]);
	});

	it("fails on an unterminated quote at the end of the input", () => {
		const error = Effect.runSync(Effect.flip(tokenize("'abc", "filter")));
		expect(error._tag).toBe("QueryParseError");
		expect(error.position).toBe(4);
		expect(error.message).toBe(
			"The specified filter is invalid. ' expected. Failed at position 5.",
		);
	});
});

describe("TokenCursor", () => {
	it("reports the offset of the unexpected token", () => {
		const error = Effect.runSync(
			Effect.flip(
				Effect.flatMap(openCursor("a,b", "sort"), (cursor) => {
					cursor.next();
					return cursor.expect("Text", "Field name expected.");
				}),
			),
		);
		expect(error.detail).toBe("Field name expected.");
		expect(error.position).toBe(1);
	});

	it("reports the end of the input when nothing is left", () => {
		const error = Effect.runSync(
			Effect.flip(
				Effect.flatMap(openCursor("a", "sort"), (cursor) => {
					cursor.next();
					return cursor.expect("Comma", ", expected.");
				}),
			),
		);
		expect(error.position).toBe(1);
	});

	it("accepts only the expected kind", () => {
		const cursor = Effect.runSync(openCursor("-a", "sort"));
		expect(cursor.accept("Comma")).toBe(false);
		expect(cursor.accept("Minus")).toBe(true);
		expect(cursor.peek()?.value).toBe("a");
		cursor.next();
		expect(cursor.isAtEnd).toBe(true);
	});
});

describe("parseParameterName", () => {
	it("splits the base name from its bracket groups", () => {
		expect(Effect.runSync(parseParameterName("page[comments][size]"))).toEqual({
			base: "page",
			brackets: ["comments", "size"],
		});
		expect(Effect.runSync(parseParameterName("sort"))).toEqual({
			base: "sort",
			brackets: [],
		});
	});

	it.each(["filter[", "fields[]", "a[b[c]]", "page]size["])(
		"rejects the malformed name %s",
		(name) => {
			const error = Effect.runSync(Effect.flip(parseParameterName(name)));
			expect(error._tag).toBe("QueryParseError");
			expect(error.detail).toBe(`Query string parameter name '${name}' is malformed.`);
		},
	);
});
