import { Effect } from "effect";
import { invalidParameter } from "../../errors/query-errors.js";
import type { IncludeExpression } from "../expressions.js";
import { parseInclude } from "../parsers/include-parser.js";
import {
	type QueryStringParameterReader,
	requestResourceContext,
} from "./query-string-reader.js";
import type { ReaderDependencies } from "./reader-support.js";

export const makeIncludeReader = ({
	graph,
	options,
	request,
}: ReaderDependencies): QueryStringParameterReader => {
	let include: IncludeExpression | undefined;

	return {
		kind: "include",
		canRead: (parameterName) => parameterName === "include",
		isEnabled: (disabled) => !disabled.has("include"),
		read: (parameterName, parameterValue) =>
			Effect.gen(function* () {
				if (request.kind === "relationship") {
					return yield* invalidParameter(
						parameterName,
						"Including related resources is not supported on relationship endpoints.",
					);
				}
				include = yield* parseInclude(
					parameterValue,
					requestResourceContext(request),
					graph,
					parameterName,
					options.maximumIncludeDepth,
				);
			}),
		getConstraints: () =>
			include === undefined || include.elements.length === 0
				? []
				: [{ scope: undefined, expression: include }],
	};
};
