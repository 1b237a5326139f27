import { Effect } from "effect";
import {
	type InvalidQueryStringParameterError,
	invalidParameter,
} from "../../errors/query-errors.js";
import type { ValueHandlingExpression } from "../expressions.js";
import type { QueryStringParameterReader } from "./query-string-reader.js";
import type { ReaderDependencies } from "./reader-support.js";

const makeValueHandlingReader = (
	setting: "defaults" | "nulls",
	allowed: boolean,
): QueryStringParameterReader => {
	let handling: ValueHandlingExpression | undefined;

	return {
		kind: setting,
		canRead: (parameterName) => parameterName === setting,
		isEnabled: (disabled) => allowed && !disabled.has(setting),
		read: (parameterName, parameterValue) =>
			Effect.suspend((): Effect.Effect<void, InvalidQueryStringParameterError> => {
				const normalized = parameterValue.toLowerCase();
				if (normalized !== "true" && normalized !== "false") {
					return Effect.fail(
						invalidParameter(
							parameterName,
							`The value '${parameterValue}' must be 'true' or 'false'.`,
						),
					);
				}
				// `true` asks for the values to be written out.
				handling = { _tag: "ValueHandling", setting, omit: normalized === "false" };
				return Effect.void;
			}),
		getConstraints: () =>
			handling === undefined ? [] : [{ scope: undefined, expression: handling }],
	};
};

export const makeDefaultsReader = ({
	options,
}: ReaderDependencies): QueryStringParameterReader =>
	makeValueHandlingReader(
		"defaults",
		options.allowQueryStringOverrideForSerializerDefaultValueHandling,
	);

export const makeNullsReader = ({
	options,
}: ReaderDependencies): QueryStringParameterReader =>
	makeValueHandlingReader(
		"nulls",
		options.allowQueryStringOverrideForSerializerNullValueHandling,
	);
