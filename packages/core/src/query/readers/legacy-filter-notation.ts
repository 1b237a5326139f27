/**
 * Conversion of `filter[attribute]=operator:value` into the function notation.
 *
 * `filter[name]=abc,eq:abc` becomes two conditions, `equals(name,'abc')`
 * twice. `in:`, `nin:` and `expr:` values keep their commas.
 *
 * @module
 */

export interface LegacyCondition {
	/** Relationship chain the expression applies to, for `expr:` values. */
	readonly scope: string | undefined;
	readonly expression: string;
}

const EXPRESSION_PREFIX = "expr:";

const COMPARISON_PREFIXES: ReadonlyArray<readonly [string, string]> = [
	["eq:", "equals"],
	["lt:", "lessThan"],
	["le:", "lessOrEqual"],
	["gt:", "greaterThan"],
	["ge:", "greaterOrEqual"],
];

const quote = (value: string): string => `'${value.replaceAll("'", "''")}'`;

/**
 * Split a legacy filter value into its separate conditions.
 */
export const extractConditions = (
	parameterValue: string,
): ReadonlyArray<string> =>
	parameterValue.startsWith(EXPRESSION_PREFIX) ||
	parameterValue.startsWith("in:") ||
	parameterValue.startsWith("nin:")
		? [parameterValue]
		: parameterValue.split(",");

/**
 * Translate one condition of `filter[<attribute>]` into the function notation.
 * `attribute` is undefined for a bare `filter` parameter, whose value passes
 * through unchanged apart from an `expr:` prefix.
 */
export const convertLegacyCondition = (
	attribute: string | undefined,
	condition: string,
): LegacyCondition => {
	if (condition.startsWith(EXPRESSION_PREFIX)) {
		return {
			scope: attribute,
			expression: condition.slice(EXPRESSION_PREFIX.length),
		};
	}
	if (attribute === undefined) {
		return { scope: undefined, expression: condition };
	}

	const expression = (() => {
		for (const [prefix, operator] of COMPARISON_PREFIXES) {
			if (condition.startsWith(prefix)) {
				return `${operator}(${attribute},${quote(condition.slice(prefix.length))})`;
			}
		}
		if (condition.startsWith("ne:")) {
			return `not(equals(${attribute},${quote(condition.slice(3))}))`;
		}
		if (condition.startsWith("like:")) {
			return `contains(${attribute},${quote(condition.slice(5))})`;
		}
		if (condition.startsWith("in:")) {
			const values = condition.slice(3).split(",").map(quote);
			return `any(${attribute},${values.join(",")})`;
		}
		if (condition.startsWith("nin:")) {
			const values = condition.slice(4).split(",").map(quote);
			return `not(any(${attribute},${values.join(",")}))`;
		}
		if (condition.startsWith("isnull:")) {
			return `equals(${attribute},null)`;
		}
		if (condition.startsWith("isnotnull:")) {
			return `not(equals(${attribute},null))`;
		}
		return `equals(${attribute},${quote(condition)})`;
	})();

	return { scope: undefined, expression };
};
