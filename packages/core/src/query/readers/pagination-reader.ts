import { Effect } from "effect";
import { invalidParameter } from "../../errors/query-errors.js";
import type {
	ExpressionInScope,
	ResourceFieldChain,
} from "../expressions.js";
import { scopeKey } from "../expressions.js";
import {
	type PaginationElement,
	parsePaginationValue,
} from "../parsers/pagination-parser.js";
import {
	type QueryStringParameterReader,
	hasBase,
	parseParameterName,
} from "./query-string-reader.js";
import {
	type ReaderDependencies,
	resolveScope,
	unsupportedName,
} from "./reader-support.js";

type PageSetting = "size" | "number";

interface ScopedPage {
	readonly scope: ResourceFieldChain | undefined;
	size?: number;
	number?: number;
}

const isPageSetting = (value: string | undefined): value is PageSetting =>
	value === "size" || value === "number";

/**
 * `page[size]=10,comments:5`, `page[number]=2` and the nested
 * `page[comments][size]=5`. The primary resources of a collection request
 * always get a page, using the default size when none is given.
 */
export const makePaginationReader = (
	dependencies: ReaderDependencies,
): QueryStringParameterReader => {
	const { options, request } = dependencies;
	const pages = new Map<string, ScopedPage>();

	const apply = (
		parameterName: string,
		setting: PageSetting,
		element: PaginationElement,
	) =>
		Effect.gen(function* () {
			const limit =
				setting === "size" ? options.maximumPageSize : options.maximumPageNumber;
			if (limit !== undefined && element.value > limit) {
				return yield* invalidParameter(
					parameterName,
					`Page ${setting} cannot be higher than ${limit}.`,
				);
			}

			const scope = yield* resolveScope(
				dependencies,
				element.scope,
				parameterName,
			);
			const key = scopeKey(scope);
			let page = pages.get(key);
			if (page === undefined) {
				page = { scope };
				pages.set(key, page);
			}
			if (page[setting] !== undefined) {
				return yield* invalidParameter(
					parameterName,
					key === ""
						? `Page ${setting} of the primary resources is specified more than once.`
						: `Page ${setting} of '${key}' is specified more than once.`,
				);
			}
			page[setting] = element.value;
		});

	return {
		kind: "page",
		canRead: (parameterName) => hasBase(parameterName, "page"),
		isEnabled: (disabled) => !disabled.has("page"),
		read: (parameterName, parameterValue) =>
			Effect.gen(function* () {
				const { brackets } = yield* parseParameterName(parameterName);
				const setting = brackets[brackets.length - 1];
				if (!isPageSetting(setting) || brackets.length > 2) {
					return yield* unsupportedName(parameterName);
				}

				const elements = yield* parsePaginationValue(
					parameterValue,
					parameterName,
				);
				if (brackets.length === 2) {
					const [element] = elements;
					if (
						element === undefined ||
						elements.length !== 1 ||
						element.scope !== undefined
					) {
						return yield* invalidParameter(
							parameterName,
							"A single positive integer is expected.",
						);
					}
					yield* apply(parameterName, setting, {
						scope: brackets[0],
						value: element.value,
					});
					return;
				}

				for (const element of elements) {
					yield* apply(parameterName, setting, element);
				}
			}),
		getConstraints: () => {
			const constraints: Array<ExpressionInScope> = [];
			const root = pages.get("");
			if (root !== undefined || request.isCollection) {
				constraints.push({
					scope: undefined,
					expression: {
						_tag: "Pagination",
						pageNumber: root?.number ?? 1,
						pageSize: root?.size ?? options.defaultPageSize,
					},
				});
			}
			for (const [key, page] of pages) {
				if (key === "") continue;
				constraints.push({
					scope: page.scope,
					expression: {
						_tag: "Pagination",
						pageNumber: page.number ?? 1,
						pageSize: page.size ?? options.defaultPageSize,
					},
				});
			}
			return constraints;
		},
	};
};
