import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import type { OperationContainer } from "../src/atomic/operations.js";
import { processOperations } from "../src/atomic/process-operations.js";
import type { ResourceHooksRegistration } from "../src/hooks/hook-types.js";
import { ResourceRepository } from "../src/storage/storage-service.js";
import type { ResourceObject } from "../src/types/resource-types.js";
import {
	type TestLayerOptions,
	type TestServices,
	makeTestLayer,
} from "./fixtures/blog-graph.js";

const run = <A, E>(
	effect: Effect.Effect<A, E, TestServices>,
	settings?: TestLayerOptions,
) => Effect.runSync(effect.pipe(Effect.provide(makeTestLayer(settings))));

const stored = (type: string, id: string) =>
	Effect.flatMap(ResourceRepository, (repository) =>
		Effect.map(repository.findById(type, id), Option.getOrThrow),
	);

const tagNames = Effect.flatMap(ResourceRepository, (repository) =>
	Effect.map(repository.findAll("tags"), (tags) =>
		tags.map((tag) => tag.attributes.name),
	),
);

const resourceAt = (
	results: ReadonlyArray<Option.Option<ResourceObject>>,
	index: number,
) => Option.getOrUndefined(results[index] ?? Option.none());

const draftArticle = {
	title: "Delta",
	views: 0,
	published: false,
	caption: null,
	secret: "s4",
};

const createTag = (name: string): OperationContainer => ({
	kind: "CreateResource",
	resource: { type: "tags", attributes: { name }, relationships: {} },
});

describe("processOperations", () => {
	it("runs operations in order and resolves local IDs", () => {
		const operations: ReadonlyArray<OperationContainer> = [
			{
				kind: "CreateResource",
				resource: {
					type: "people",
					lid: "p1",
					attributes: { name: "Cleo" },
					relationships: {},
				},
			},
			{
				kind: "CreateResource",
				resource: {
					type: "articles",
					lid: "a1",
					attributes: draftArticle,
					relationships: { author: { type: "people", lid: "p1" } },
				},
			},
			{
				kind: "AddToRelationship",
				relationshipName: "tags",
				resource: {
					type: "articles",
					lid: "a1",
					attributes: {},
					relationships: { tags: [{ type: "tags", id: "2" }] },
				},
			},
		];

		const [results, article] = run(
			Effect.gen(function* () {
				const results = yield* processOperations(operations);
				return [results, yield* stored("articles", "4")] as const;
			}),
		);

		expect(resourceAt(results, 0)).toEqual({
			type: "people",
			id: "3",
			lid: "p1",
			attributes: { name: "Cleo" },
			relationships: { articles: [] },
		});
		expect(resourceAt(results, 1)?.lid).toBe("a1");
		expect(resourceAt(results, 1)?.id).toBe("4");
		expect(results).toHaveLength(3);
		expect(resourceAt(results, 2)).toBeUndefined();
		expect(article.relationships).toEqual({
			author: { type: "people", id: "3" },
			comments: [],
			tags: [{ type: "tags", id: "2" }],
		});
	});

	it("sets a relationship on a resource created earlier in the batch", () => {
		const [results, article] = run(
			Effect.gen(function* () {
				const results = yield* processOperations([
					{
						kind: "CreateResource",
						resource: {
							type: "articles",
							lid: "a1",
							attributes: draftArticle,
							relationships: {},
						},
					},
					{
						kind: "SetRelationship",
						relationshipName: "author",
						resource: {
							type: "articles",
							lid: "a1",
							attributes: {},
							relationships: { author: { type: "people", id: "2" } },
						},
					},
				]);
				return [results, yield* stored("articles", "4")] as const;
			}),
		);

		expect(resourceAt(results, 0)?.id).toBe("4");
		expect(resourceAt(results, 1)).toBeUndefined();
		expect(article.relationships.author).toEqual({ type: "people", id: "2" });
	});

	it("returns the updated resource", () => {
		const results = run(
			processOperations([
				{
					kind: "UpdateResource",
					resource: {
						type: "articles",
						id: "2",
						attributes: { title: "Beta 2" },
						relationships: {},
					},
				},
			]),
		);
		expect(resourceAt(results, 0)?.attributes.title).toBe("Beta 2");
	});

	it("checks local IDs before running anything", () => {
		const [error, names] = run(
			Effect.gen(function* () {
				const error = yield* Effect.flip(
					processOperations([
						createTag("ops"),
						{
							kind: "UpdateResource",
							resource: {
								type: "people",
								lid: "zz",
								attributes: { name: "Nobody" },
								relationships: {},
							},
						},
					]),
				);
				return [error, yield* tagNames] as const;
			}),
		);
		expect(error).toMatchObject({
			_tag: "LocalIdNotFoundError",
			pointer: "/atomic:operations[1]/ref/lid",
			message: "Local ID 'zz' of resource type 'people' is not declared at this point.",
		});
		expect(names).toEqual(["news", "tech"]);
	});

	it("rejects a create that refers to its own local ID before running anything", () => {
		const [error, names] = run(
			Effect.gen(function* () {
				const error = yield* Effect.flip(
					processOperations([
						createTag("ops"),
						{
							kind: "CreateResource",
							resource: {
								type: "articles",
								lid: "a1",
								attributes: draftArticle,
								relationships: { author: { type: "articles", lid: "a1" } },
							},
						},
					]),
				);
				return [error, yield* tagNames] as const;
			}),
		);
		expect(error).toMatchObject({
			_tag: "LocalIdNotFoundError",
			pointer: "/atomic:operations[1]/data/relationships/author/data/lid",
			message: "Local ID cannot be both defined and used within the same operation.",
		});
		expect(names).toEqual(["news", "tech"]);
	});

	it("rejects a batch over the maximum size", () => {
		const error = run(
			Effect.flip(
				processOperations([createTag("a"), createTag("b"), createTag("c")]),
			),
			{ options: { maximumOperationsPerRequest: 2 } },
		);
		expect(error).toMatchObject({
			_tag: "TooManyOperationsError",
			message: "The number of operations in this request (3) is higher than the maximum of 2.",
		});
	});

	it("rolls back every operation when one fails", () => {
		const [error, names] = run(
			Effect.gen(function* () {
				const error = yield* Effect.flip(
					processOperations([
						createTag("ops"),
						{
							kind: "DeleteResource",
							resource: { type: "tags", id: "99", attributes: {}, relationships: {} },
						},
					]),
				);
				return [error, yield* tagNames] as const;
			}),
		);
		expect(error).toMatchObject({
			_tag: "ResourceNotFoundError",
			pointer: "/atomic:operations[1]",
		});
		expect(names).toEqual(["news", "tech"]);
	});

	it("prefixes pointers into the operation body", () => {
		const error = run(
			Effect.flip(
				processOperations([
					{
						kind: "CreateResource",
						resource: {
							type: "articles",
							attributes: draftArticle,
							relationships: { comments: [{ type: "comments", id: "99" }] },
						},
					},
				]),
			),
		);
		expect(error).toMatchObject({
			_tag: "ResourceNotFoundError",
			pointer: "/atomic:operations[0]/data/relationships/comments/data[0]",
		});
	});

	it("points at the missing element of a relationship operation", () => {
		const error = run(
			Effect.flip(
				processOperations([
					{
						kind: "AddToRelationship",
						relationshipName: "tags",
						resource: {
							type: "articles",
							id: "2",
							attributes: {},
							relationships: {
								tags: [
									{ type: "tags", id: "1" },
									{ type: "tags", id: "99" },
								],
							},
						},
					},
				]),
			),
		);
		expect(error).toMatchObject({
			_tag: "ResourceNotFoundError",
			pointer: "/atomic:operations[0]/data[1]",
		});
	});

	it("rejects operations on a type without a service", () => {
		const error = run(Effect.flip(processOperations([createTag("ops")])), {
			services: { tags: null },
		});
		expect(error).toMatchObject({
			_tag: "UnsupportedOperationError",
			pointer: "/atomic:operations[0]/op",
			message: "Operation 'add resource' is not supported for resource type 'tags'.",
		});
	});

	it("uses a registered processor instead of the default one", () => {
		const seen: Array<string> = [];
		const [results, names] = run(
			Effect.gen(function* () {
				const results = yield* processOperations([createTag("ops")]);
				return [results, yield* tagNames] as const;
			}),
			{
				processors: [
					{
						kind: "CreateResource",
						resourceType: "tags",
						processor: {
							process: (operation) =>
								Effect.sync(() => {
									seen.push(operation.resource.type);
									return Option.none();
								}),
						},
					},
				],
			},
		);
		expect(seen).toEqual(["tags"]);
		expect(results).toHaveLength(1);
		expect(resourceAt(results, 0)).toBeUndefined();
		expect(names).toEqual(["news", "tech"]);
	});

	it("runs overlapping batches one after the other", async () => {
		const slowTags: ResourceHooksRegistration = {
			resourceType: "tags",
			hooks: {
				beforeCreate: ({ resource }) =>
					Effect.as(Effect.sleep("10 millis"), resource),
			},
		};
		const [first, second, names] = await Effect.runPromise(
			Effect.gen(function* () {
				const [first, second] = yield* Effect.all(
					[
						processOperations([createTag("ops")]),
						Effect.zipRight(
							Effect.sleep("1 millis"),
							processOperations([createTag("qa")]),
						),
					],
					{ concurrency: "unbounded" },
				);
				return [first, second, yield* tagNames] as const;
			}).pipe(Effect.provide(makeTestLayer({
					hooks: [slowTags],
					options: { enableResourceHooks: true },
				}))),
		);
		expect(resourceAt(first, 0)?.id).toBe("3");
		expect(resourceAt(second, 0)?.id).toBe("4");
		expect(names).toEqual(["news", "tech", "ops", "qa"]);
	});
});
