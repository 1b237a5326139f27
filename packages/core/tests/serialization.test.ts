import { Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	LocalIdNotFoundError,
	TooManyOperationsError,
} from "../src/errors/operation-errors.js";
import {
	InvalidQueryStringParameterError,
	QueryStringValidationError,
	parseError,
} from "../src/errors/query-errors.js";
import {
	ResourceNotFoundError,
	TransactionError,
} from "../src/errors/resource-errors.js";
import {
	buildErrorDocument,
	errorDocumentStatus,
	toErrorObjects,
} from "../src/serialization/error-document.js";
import {
	buildAtomicResultsDocument,
	buildRelationshipDocument,
	buildResourceDocument,
	serializeResource,
} from "../src/serialization/resource-document.js";
import { emptyQuerySpecification } from "../src/query/query-specification.js";
import type { ResourceField } from "../src/graph/graph-types.js";
import type { StoredResource } from "../src/types/resource-types.js";
import { blogGraph, blogSeed } from "./fixtures/blog-graph.js";

const seeded = (type: string, id: string): StoredResource => {
	const resource = blogSeed[type]?.find((candidate) => candidate.id === id);
	if (resource === undefined) throw new Error(`No seed resource ${type}:${id}`);
	return resource;
};

const keepAll = { omitDefaultValues: false, omitNullValues: false };

describe("serializeResource", () => {
	it("renders viewable attributes and every relationship", () => {
		expect(serializeResource(blogGraph, seeded("articles", "1"), keepAll)).toEqual({
			type: "articles",
			id: "1",
			attributes: { title: "Alpha", views: 10, published: true, caption: null },
			relationships: {
				author: { data: { type: "people", id: "1" } },
				comments: {
					data: [
						{ type: "comments", id: "1" },
						{ type: "comments", id: "2" },
					],
				},
				tags: { data: [{ type: "tags", id: "1" }] },
			},
		});
	});

	it("omits null and default values when asked", () => {
		const article = seeded("articles", "2");
		expect(
			serializeResource(blogGraph, article, {
				omitDefaultValues: false,
				omitNullValues: true,
			}).attributes,
		).toEqual({ title: "Beta", views: 3, published: false, caption: "second" });
		expect(
			serializeResource(blogGraph, seeded("articles", "3"), {
				omitDefaultValues: false,
				omitNullValues: true,
			}).attributes,
		).toEqual({ title: "Gamma", views: 7, published: true });
		expect(
			serializeResource(blogGraph, article, {
				omitDefaultValues: true,
				omitNullValues: false,
			}).attributes,
		).toEqual({ title: "Beta", views: 3, caption: "second" });
	});

	it("renders missing values as null or an empty list", () => {
		const document = serializeResource(
			blogGraph,
			{ type: "articles", id: "9", attributes: { title: "Draft" }, relationships: {} },
			keepAll,
		);
		expect(document.attributes).toEqual({
			title: "Draft",
			views: null,
			published: null,
			caption: null,
		});
		expect(document.relationships).toEqual({
			author: { data: null },
			comments: { data: [] },
			tags: { data: [] },
		});
	});

	it("restricts attributes and relationships to the field set", () => {
		const articles = Option.getOrThrow(blogGraph.findResourceContext("articles"));
		const fields: ReadonlyArray<ResourceField> = [
			...articles.attributes.filter((attribute) => attribute.publicName === "title"),
			...articles.relationships.filter((relationship) => relationship.publicName === "author"),
		];
		expect(
			serializeResource(blogGraph, seeded("articles", "1"), keepAll, Option.some(fields)),
		).toEqual({
			type: "articles",
			id: "1",
			attributes: { title: "Alpha" },
			relationships: { author: { data: { type: "people", id: "1" } } },
		});
		expect(
			serializeResource(blogGraph, seeded("articles", "1"), keepAll, Option.some([])),
		).toEqual({ type: "articles", id: "1" });
	});

	it("renders a local ID and unknown types as bare identifiers", () => {
		expect(
			serializeResource(
				blogGraph,
				{ type: "tags", lid: "t1", attributes: {}, relationships: {} },
				keepAll,
			),
		).toEqual({ type: "tags", lid: "t1", attributes: { name: null } });
		expect(
			serializeResource(
				blogGraph,
				{ type: "unicorns", id: "1", attributes: { horn: 1 }, relationships: {} },
				keepAll,
			),
		).toEqual({ type: "unicorns", id: "1" });
	});
});

describe("documents", () => {
	it("renders a collection with included resources", () => {
		const specification = {
			...emptyQuerySpecification("comments"),
			constraints: [
				{
					scope: undefined,
					expression: {
						_tag: "Include" as const,
						elements: [],
					},
				},
			],
		};
		const document = buildResourceDocument(
			blogGraph,
			{ primary: [seeded("comments", "1")], included: [seeded("people", "2")] },
			specification,
			true,
		);
		expect(document).toEqual({
			data: [
				{
					type: "comments",
					id: "1",
					attributes: { body: "First" },
					relationships: { author: { data: { type: "people", id: "2" } } },
				},
			],
			included: [
				{
					type: "people",
					id: "2",
					attributes: { name: "Bob", age: 25 },
					relationships: { articles: { data: [] } },
				},
			],
		});
	});

	it("renders null for a missing single resource", () => {
		expect(
			buildResourceDocument(
				blogGraph,
				{ primary: [], included: [] },
				emptyQuerySpecification("tags"),
				false,
			),
		).toEqual({ data: null });
	});

	it("renders relationship documents", () => {
		expect(buildRelationshipDocument([{ type: "tags", id: "1" }])).toEqual({
			data: [{ type: "tags", id: "1" }],
		});
		expect(buildRelationshipDocument(null)).toEqual({ data: null });
	});

	it("renders an empty object for operations without a result", () => {
		expect(
			buildAtomicResultsDocument(
				blogGraph,
				[Option.some(seeded("tags", "1")), Option.none()],
				keepAll,
			),
		).toEqual({
			"atomic:results": [
				{ data: { type: "tags", id: "1", attributes: { name: "news" } } },
				{},
			],
		});
	});
});

describe("toErrorObjects", () => {
	it("reports the one-based position of a parse error", () => {
		expect(toErrorObjects(parseError("filter", "Field name expected.", 3))).toEqual([
			{
				status: "400",
				title: "The specified filter is invalid.",
				detail: "Field name expected. Failed at position 4.",
				source: { parameter: "filter" },
			},
		]);
	});

	it("flattens the errors of a query string", () => {
		const sortError = new InvalidQueryStringParameterError({
			parameterName: "sort",
			title: "The specified sort is invalid.",
			detail: "Sorting on attribute 'secret' is not allowed.",
			message: "The specified sort is invalid. Sorting on attribute 'secret' is not allowed.",
		});
		const objects = toErrorObjects(
			new QueryStringValidationError({
				errors: [parseError("filter", "Filter function expected.", 0), sortError],
				message: "two errors",
			}),
		);
		expect(objects.map((object) => object.source)).toEqual([
			{ parameter: "filter" },
			{ parameter: "sort" },
		]);
	});

	it("points into the request body", () => {
		expect(
			toErrorObjects(
				new ResourceNotFoundError({
					resourceType: "tags",
					id: "99",
					relationshipName: "tags",
					pointer: "/data/relationships/tags/data[0]",
					message: "Related resource missing.",
				}),
			),
		).toEqual([
			{
				status: "404",
				title: "A related resource does not exist.",
				detail: "Related resource missing.",
				source: { pointer: "/data/relationships/tags/data[0]" },
			},
		]);
		expect(
			toErrorObjects(
				new LocalIdNotFoundError({
					localId: "p1",
					resourceType: "people",
					reason: "unassigned",
					message: "Not yet.",
				}),
			),
		).toEqual([
			{
				status: "400",
				title: "Server-generated value for local ID is not available at this point.",
				detail: "Not yet.",
			},
		]);
	});

	it("hides the details of internal failures", () => {
		expect(
			toErrorObjects(
				new TransactionError({
					operation: "commit",
					reason: "disk full",
					message: "Cannot commit: disk full",
				}),
			),
		).toEqual([
			{
				status: "500",
				title: "An unhandled error occurred while processing this request.",
			},
		]);
	});
});

describe("errorDocumentStatus", () => {
	const document = (...statuses: Array<string>) =>
		buildErrorDocument(statuses.map((status) => ({ status, title: "failed" }))).errors;

	it.each<[Array<string>, number]>([
		[["404"], 404],
		[["413", "413"], 413],
		[["400", "404"], 400],
		[["422", "500"], 500],
		[[], 500],
	])("maps %j to %i", (statuses, expected) => {
		expect(errorDocumentStatus(document(...statuses))).toBe(expected);
	});

	it("uses the status of each error tag", () => {
		const tooMany = new TooManyOperationsError({
			count: 3,
			maximum: 2,
			message: "too many",
		});
		expect(errorDocumentStatus(toErrorObjects(tooMany))).toBe(413);
	});
});
