import type {
	ExpressionInScope,
	IncludeElementExpression,
	QueryExpression,
} from "./expressions.js";
import { scopeKey } from "./expressions.js";

const quote = (value: string | number | boolean): string =>
	`'${String(value).replaceAll("'", "''")}'`;

const includePaths = (element: IncludeElementExpression): Array<string> =>
	element.children.length === 0
		? [element.relationship.publicName]
		: element.children.flatMap((child) =>
				includePaths(child).map(
					(path) => `${element.relationship.publicName}.${path}`,
				),
			);

/**
 * Render an expression in its canonical query string notation.
 */
export const formatExpression = (expression: QueryExpression): string => {
	switch (expression._tag) {
		case "ResourceFieldChain":
			return expression.fields.map((field) => field.publicName).join(".");
		case "LiteralConstant":
			return quote(expression.value);
		case "NullConstant":
			return "null";
		case "Count":
			return `count(${formatExpression(expression.targetCollection)})`;
		case "Comparison":
			return `${expression.operator}(${formatExpression(expression.left)},${formatExpression(expression.right)})`;
		case "MatchText":
			return `${expression.matchKind}(${formatExpression(expression.targetAttribute)},${formatExpression(expression.textValue)})`;
		case "Any":
			return `any(${[
				formatExpression(expression.targetAttribute),
				...expression.constants.map(formatExpression),
			].join(",")})`;
		case "Logical":
			return `${expression.operator}(${expression.terms.map(formatExpression).join(",")})`;
		case "Not":
			return `not(${formatExpression(expression.child)})`;
		case "Has":
			return expression.filter === undefined
				? `has(${formatExpression(expression.targetCollection)})`
				: `has(${formatExpression(expression.targetCollection)},${formatExpression(expression.filter)})`;
		case "SortElement":
			return `${expression.isAscending ? "" : "-"}${formatExpression(expression.target)}`;
		case "Sort":
			return expression.elements.map(formatExpression).join(",");
		case "IncludeElement":
			return includePaths(expression).join(",");
		case "Include":
			return expression.elements.flatMap(includePaths).join(",");
		case "Pagination":
			return expression.pageSize === undefined
				? `${expression.pageNumber}`
				: `${expression.pageNumber}(${expression.pageSize})`;
		case "SparseFieldSet":
			return expression.fields.map((field) => field.publicName).join(",");
		case "SparseFieldTable":
			return [...expression.table.entries()]
				.map(([type, fieldSet]) => `${type}(${formatExpression(fieldSet)})`)
				.join(",");
		case "ValueHandling":
			return `${expression.setting}(${expression.omit ? "omit" : "keep"})`;
	}
};

export const formatExpressionInScope = (constraint: ExpressionInScope): string =>
	constraint.scope === undefined
		? formatExpression(constraint.expression)
		: `${scopeKey(constraint.scope)}: ${formatExpression(constraint.expression)}`;
