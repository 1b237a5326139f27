import { Effect, Option } from "effect";
import { invalidParameter } from "../../errors/query-errors.js";
import type { SparseFieldSetExpression } from "../expressions.js";
import { parseSparseFieldSet } from "../parsers/sparse-fieldset-parser.js";
import {
	type QueryStringParameterReader,
	hasBase,
	parseParameterName,
} from "./query-string-reader.js";
import { type ReaderDependencies, unsupportedName } from "./reader-support.js";

/**
 * `fields[<type>]=a,b`: restricts the attributes and relationships returned
 * for every resource of that type in the response.
 */
export const makeSparseFieldSetReader = ({
	graph,
}: ReaderDependencies): QueryStringParameterReader => {
	const table = new Map<string, SparseFieldSetExpression>();

	return {
		kind: "fields",
		canRead: (parameterName) => hasBase(parameterName, "fields"),
		isEnabled: (disabled) => !disabled.has("fields"),
		read: (parameterName, parameterValue) =>
			Effect.gen(function* () {
				const { brackets } = yield* parseParameterName(parameterName);
				const resourceType: string | undefined = brackets[0];
				if (resourceType === undefined || brackets.length !== 1) {
					return yield* unsupportedName(parameterName);
				}
				const context = graph.findResourceContext(resourceType);
				if (Option.isNone(context)) {
					return yield* invalidParameter(
						parameterName,
						`Resource type '${resourceType}' does not exist.`,
					);
				}
				const fieldSet = yield* parseSparseFieldSet(
					parameterValue,
					context.value,
					graph,
					parameterName,
				);
				table.set(resourceType, fieldSet);
			}),
		getConstraints: () =>
			table.size === 0
				? []
				: [
						{
							scope: undefined,
							expression: { _tag: "SparseFieldTable", table },
						},
					],
	};
};
