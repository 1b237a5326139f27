/**
 * Recursive descent parser for the filter function notation, e.g.
 * `and(equals(author.name,'Ann'),has(tags),greaterThan(count(comments),'2'))`.
 *
 * @module
 */

import { Effect } from "effect";
import {
	type InvalidQueryStringParameterError,
	type QueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import type {
	AttributeDefinition,
	ResourceContext,
} from "../../graph/graph-types.js";
import type { ResourceGraphShape } from "../../graph/resource-graph.js";
import {
	type ComparisonExpression,
	type ComparisonOperator,
	type CountExpression,
	type FilterExpression,
	type LiteralConstant,
	type ResourceFieldChain,
	type TextMatchKind,
	lastAttribute,
	literal,
	nullConstant,
} from "../expressions.js";
import { contextAtEnd, resolveFieldChain } from "../field-chains.js";
import { type TokenCursor, openCursor } from "../tokenizer.js";

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>([
	"equals",
	"greaterThan",
	"greaterOrEqual",
	"lessThan",
	"lessOrEqual",
]);

const TEXT_MATCH_KINDS: ReadonlySet<string> = new Set<TextMatchKind>([
	"contains",
	"startsWith",
	"endsWith",
]);

const isComparisonOperator = (name: string): name is ComparisonOperator =>
	COMPARISON_OPERATORS.has(name);

const isTextMatchKind = (name: string): name is TextMatchKind =>
	TEXT_MATCH_KINDS.has(name);

type ParseResult<A> = Effect.Effect<A, QueryStringParameterError>;

interface ParserState {
	readonly cursor: TokenCursor;
	readonly graph: ResourceGraphShape;
}

// ============================================================================
// Literals
// ============================================================================

/**
 * Convert quoted text to the kind of the attribute it is compared with.
 */
export const convertLiteral = (
	text: string,
	target: AttributeDefinition | "count",
	parameterName: string,
): Effect.Effect<LiteralConstant, InvalidQueryStringParameterError> => {
	const kind = target === "count" ? "number" : target.kind;
	switch (kind) {
		case "number": {
			const trimmed = text.trim();
			return /^-?\d+(\.\d+)?$/.test(trimmed)
				? Effect.succeed(literal(Number(trimmed)))
				: Effect.fail(
						invalidParameter(
							parameterName,
							`Failed to convert '${text}' of type 'String' to type 'Number'.`,
						),
					);
		}
		case "boolean":
			return text === "true" || text === "false"
				? Effect.succeed(literal(text === "true"))
				: Effect.fail(
						invalidParameter(
							parameterName,
							`Failed to convert '${text}' of type 'String' to type 'Boolean'.`,
						),
					);
		case "string":
		case "unknown":
			return Effect.succeed(literal(text));
	}
};

// ============================================================================
// Terms
// ============================================================================

const parseAttributeChain = (
	state: ParserState,
	context: ResourceContext,
): ParseResult<readonly [ResourceFieldChain, AttributeDefinition]> =>
	Effect.gen(function* () {
		const { cursor } = state;
		const token = yield* cursor.expect("Text", "Field name expected.");
		const chain = yield* resolveFieldChain(
			state.graph,
			context,
			token.value,
			"attribute",
			cursor.parameterName,
		);
		const attribute = lastAttribute(chain);
		if (attribute === undefined) {
			return yield* cursor.fail("Field name expected.");
		}
		if (!attribute.capabilities.filter) {
			return yield* invalidParameter(
				cursor.parameterName,
				`Filtering on attribute '${attribute.publicName}' is not allowed.`,
			);
		}
		return [chain, attribute] as const;
	});

const parseToManyChain = (
	state: ParserState,
	context: ResourceContext,
): ParseResult<ResourceFieldChain> =>
	Effect.gen(function* () {
		const token = yield* state.cursor.expect(
			"Text",
			"To-many relationship expected.",
		);
		return yield* resolveFieldChain(
			state.graph,
			context,
			token.value,
			"toMany",
			state.cursor.parameterName,
		);
	});

const isCountAhead = (cursor: TokenCursor): boolean =>
	cursor.peek()?.kind === "Text" &&
	cursor.peek()?.value === "count" &&
	cursor.peek(1)?.kind === "OpenParen";

const parseCount = (
	state: ParserState,
	context: ResourceContext,
): ParseResult<CountExpression> =>
	Effect.gen(function* () {
		const { cursor } = state;
		yield* cursor.expect("Text", "Count function expected.");
		yield* cursor.expect("OpenParen", "( expected.");
		const targetCollection = yield* parseToManyChain(state, context);
		yield* cursor.expect("CloseParen", ") expected.");
		return { _tag: "Count", targetCollection } as const;
	});

const parseQuotedText = (cursor: TokenCursor): ParseResult<string> =>
	Effect.map(
		cursor.expect("QuotedText", "Value between quotes expected."),
		(token) => token.value,
	);

// ============================================================================
// Functions
// ============================================================================

const parseComparison = (
	state: ParserState,
	context: ResourceContext,
	operator: ComparisonOperator,
): ParseResult<ComparisonExpression> =>
	Effect.gen(function* () {
		const { cursor } = state;
		yield* cursor.expect("OpenParen", "( expected.");

		let left: ComparisonExpression["left"];
		let leftTarget: AttributeDefinition | "count";
		if (isCountAhead(cursor)) {
			left = yield* parseCount(state, context);
			leftTarget = "count";
		} else {
			const [chain, attribute] = yield* parseAttributeChain(state, context);
			left = chain;
			leftTarget = attribute;
		}

		yield* cursor.expect("Comma", ", expected.");

		let right: ComparisonExpression["right"];
		const token = cursor.peek();
		if (token?.kind === "QuotedText") {
			cursor.next();
			right = yield* convertLiteral(token.value, leftTarget, cursor.parameterName);
		} else if (token?.kind === "Text" && token.value === "null") {
			if (operator !== "equals") {
				return yield* cursor.fail("Value between quotes expected.");
			}
			cursor.next();
			right = nullConstant;
		} else if (isCountAhead(cursor)) {
			right = yield* parseCount(state, context);
		} else if (token?.kind === "Text") {
			const [chain] = yield* parseAttributeChain(state, context);
			right = chain;
		} else {
			return yield* cursor.fail(
				"Value between quotes, null, count function or field name expected.",
			);
		}

		yield* cursor.expect("CloseParen", ") expected.");
		return { _tag: "Comparison", operator, left, right } as const;
	});

const parseMatchText = (
	state: ParserState,
	context: ResourceContext,
	matchKind: TextMatchKind,
): ParseResult<FilterExpression> =>
	Effect.gen(function* () {
		const { cursor } = state;
		yield* cursor.expect("OpenParen", "( expected.");
		const [targetAttribute, attribute] = yield* parseAttributeChain(
			state,
			context,
		);
		if (attribute.kind !== "string" && attribute.kind !== "unknown") {
			return yield* invalidParameter(
				cursor.parameterName,
				`Function '${matchKind}' requires attribute '${attribute.publicName}' to be of type 'String'.`,
			);
		}
		yield* cursor.expect("Comma", ", expected.");
		const text = yield* parseQuotedText(cursor);
		yield* cursor.expect("CloseParen", ") expected.");
		return {
			_tag: "MatchText",
			matchKind,
			targetAttribute,
			textValue: literal(text),
		} as const;
	});

const parseAny = (
	state: ParserState,
	context: ResourceContext,
): ParseResult<FilterExpression> =>
	Effect.gen(function* () {
		const { cursor } = state;
		yield* cursor.expect("OpenParen", "( expected.");
		const [targetAttribute, attribute] = yield* parseAttributeChain(
			state,
			context,
		);
		const constants: Array<LiteralConstant> = [];
		yield* cursor.expect("Comma", ", expected.");
		do {
			const text = yield* parseQuotedText(cursor);
			constants.push(
				yield* convertLiteral(text, attribute, cursor.parameterName),
			);
		} while (cursor.accept("Comma"));
		yield* cursor.expect("CloseParen", ") expected.");
		return { _tag: "Any", targetAttribute, constants } as const;
	});

const parseHas = (
	state: ParserState,
	context: ResourceContext,
): ParseResult<FilterExpression> =>
	Effect.gen(function* () {
		const { cursor } = state;
		yield* cursor.expect("OpenParen", "( expected.");
		const targetCollection = yield* parseToManyChain(state, context);
		let filter: FilterExpression | undefined;
		if (cursor.accept("Comma")) {
			const rightContext = contextAtEnd(state.graph, context, targetCollection);
			filter = yield* parseFilterFunction(state, rightContext);
		}
		yield* cursor.expect("CloseParen", ") expected.");
		return { _tag: "Has", targetCollection, filter } as const;
	});

const parseLogical = (
	state: ParserState,
	context: ResourceContext,
	operator: "and" | "or",
): ParseResult<FilterExpression> =>
	Effect.gen(function* () {
		const { cursor } = state;
		yield* cursor.expect("OpenParen", "( expected.");
		const terms: Array<FilterExpression> = [
			yield* parseFilterFunction(state, context),
		];
		yield* cursor.expect("Comma", ", expected.");
		do {
			terms.push(yield* parseFilterFunction(state, context));
		} while (cursor.accept("Comma"));
		yield* cursor.expect("CloseParen", ") expected.");
		return { _tag: "Logical", operator, terms } as const;
	});

const parseFilterFunction = (
	state: ParserState,
	context: ResourceContext,
): ParseResult<FilterExpression> =>
	Effect.suspend((): ParseResult<FilterExpression> => {
		const { cursor } = state;
		const token = cursor.peek();
		if (token?.kind !== "Text" || cursor.peek(1)?.kind !== "OpenParen") {
			return Effect.fail(cursor.fail("Filter function expected."));
		}
		const name = token.value;
		if (isComparisonOperator(name)) {
			cursor.next();
			return parseComparison(state, context, name);
		}
		if (isTextMatchKind(name)) {
			cursor.next();
			return parseMatchText(state, context, name);
		}
		switch (name) {
			case "and":
			case "or":
				cursor.next();
				return parseLogical(state, context, name);
			case "not":
				cursor.next();
				return Effect.gen(function* () {
					yield* cursor.expect("OpenParen", "( expected.");
					const child = yield* parseFilterFunction(state, context);
					yield* cursor.expect("CloseParen", ") expected.");
					return { _tag: "Not", child } as const;
				});
			case "any":
				cursor.next();
				return parseAny(state, context);
			case "has":
				cursor.next();
				return parseHas(state, context);
			default:
				return Effect.fail(cursor.fail("Filter function expected."));
		}
	});

/**
 * Parse a complete filter value against the resource type it applies to.
 */
export const parseFilter = (
	source: string,
	context: ResourceContext,
	graph: ResourceGraphShape,
	parameterName: string,
): ParseResult<FilterExpression> =>
	Effect.gen(function* () {
		const cursor = yield* openCursor(source, parameterName);
		const expression = yield* parseFilterFunction({ cursor, graph }, context);
		yield* cursor.expectEnd();
		return expression;
	});
