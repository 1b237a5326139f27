import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	LocalIdTracker,
	LocalIdTrackerLive,
} from "../src/atomic/local-id-tracker.js";
import { validateLocalIds } from "../src/atomic/local-id-validator.js";
import type { OperationContainer } from "../src/atomic/operations.js";

const withTracker = <A, E>(effect: Effect.Effect<A, E, LocalIdTracker>) =>
	Effect.runSync(effect.pipe(Effect.provide(LocalIdTrackerLive)));

const createPerson = (lid: string): OperationContainer => ({
	kind: "CreateResource",
	resource: { type: "people", lid, attributes: { name: "Cleo" }, relationships: {} },
});

const validationFailure = (operations: ReadonlyArray<OperationContainer>) =>
	withTracker(Effect.flip(validateLocalIds(operations)));

describe("LocalIdTracker", () => {
	it("returns the assigned value of a declared local ID", () => {
		const id = withTracker(
			Effect.gen(function* () {
				const tracker = yield* LocalIdTracker;
				yield* tracker.declare("p1", "people");
				yield* tracker.assign("p1", "people", "42");
				return yield* tracker.getValue("p1", "people");
			}),
		);
		expect(id).toBe("42");
	});

	it("has no value before the declaring operation has run", () => {
		const error = withTracker(
			Effect.gen(function* () {
				const tracker = yield* LocalIdTracker;
				yield* tracker.declare("p1", "people");
				return yield* Effect.flip(tracker.getValue("p1", "people"));
			}),
		);
		expect(error.reason).toBe("unassigned");
		expect(error.message).toBe(
			"Server-generated value for local ID 'p1' is not available at this point.",
		);
	});

	it("rejects a second declaration of the same local ID", () => {
		const error = withTracker(
			Effect.gen(function* () {
				const tracker = yield* LocalIdTracker;
				yield* tracker.declare("p1", "people");
				return yield* Effect.flip(tracker.declare("p1", "people"));
			}),
		);
		expect(error._tag).toBe("LocalIdAlreadyDeclaredError");
		expect(error.message).toBe(
			"Another local ID with name 'p1' is already defined at this point.",
		);
	});

	it("keys local IDs by resource type", () => {
		const declared = withTracker(
			Effect.gen(function* () {
				const tracker = yield* LocalIdTracker;
				yield* tracker.declare("x", "people");
				yield* tracker.declare("x", "articles");
				return [
					yield* tracker.isDeclared("x", "people"),
					yield* tracker.isDeclared("x", "comments"),
				];
			}),
		);
		expect(declared).toEqual([true, false]);
	});

	it("rejects lookups and assignments of undeclared local IDs", () => {
		const errors = withTracker(
			Effect.gen(function* () {
				const tracker = yield* LocalIdTracker;
				return [
					yield* Effect.flip(tracker.getValue("nope", "people")),
					yield* Effect.flip(tracker.assign("nope", "people", "1")),
				];
			}),
		);
		expect(errors.map((error) => error.message)).toEqual([
			"Local ID 'nope' of resource type 'people' is not declared at this point.",
			"Local ID 'nope' of resource type 'people' is not declared at this point.",
		]);
	});

	it("forgets every local ID on reset", () => {
		const declared = withTracker(
			Effect.gen(function* () {
				const tracker = yield* LocalIdTracker;
				yield* tracker.declare("p1", "people");
				yield* tracker.reset();
				return yield* tracker.isDeclared("p1", "people");
			}),
		);
		expect(declared).toBe(false);
	});
});

describe("validateLocalIds", () => {
	it("accepts local IDs referenced after their create operation", () => {
		const operations: ReadonlyArray<OperationContainer> = [
			createPerson("p1"),
			{
				kind: "UpdateResource",
				resource: { type: "people", lid: "p1", attributes: { age: 40 }, relationships: {} },
			},
			{
				kind: "CreateResource",
				resource: {
					type: "articles",
					attributes: { title: "Delta" },
					relationships: { author: { type: "people", lid: "p1" } },
				},
			},
		];
		expect(withTracker(validateLocalIds(operations))).toBeUndefined();
	});

	it("rejects a reference before the declaring operation", () => {
		const error = validationFailure([
			{
				kind: "DeleteResource",
				resource: { type: "people", lid: "p1", attributes: {}, relationships: {} },
			},
			createPerson("p1"),
		]);
		expect(error._tag).toBe("LocalIdNotFoundError");
		expect(error.pointer).toBe("/atomic:operations[0]/ref/lid");
	});

	it("rejects a local ID declared twice", () => {
		const error = validationFailure([createPerson("p1"), createPerson("p1")]);
		expect(error._tag).toBe("LocalIdAlreadyDeclaredError");
		expect(error.pointer).toBe("/atomic:operations[1]/data/lid");
	});

	it("points into the relationships of a resource", () => {
		const error = validationFailure([
			{
				kind: "CreateResource",
				resource: {
					type: "articles",
					attributes: { title: "Delta" },
					relationships: {
						author: { type: "people", id: "1" },
						comments: [
							{ type: "comments", id: "1" },
							{ type: "comments", lid: "c9" },
						],
					},
				},
			},
		]);
		expect(error.pointer).toBe(
			"/atomic:operations[0]/data/relationships/comments/data[1]/lid",
		);
		expect(error.message).toBe(
			"Local ID 'c9' of resource type 'comments' is not declared at this point.",
		);
	});

	it("points into the data of a relationship operation", () => {
		const addComment = (lid: string): OperationContainer => ({
			kind: "AddToRelationship",
			relationshipName: "comments",
			resource: {
				type: "articles",
				id: "1",
				attributes: {},
				relationships: { comments: [{ type: "comments", lid }] },
			},
		});

		expect(validationFailure([addComment("c1")]).pointer).toBe(
			"/atomic:operations[0]/data[0]/lid",
		);
		expect(
			withTracker(
				validateLocalIds([
					{
						kind: "CreateResource",
						resource: {
							type: "comments",
							lid: "c1",
							attributes: { body: "Fourth" },
							relationships: {},
						},
					},
					addComment("c1"),
				]),
			),
		).toBeUndefined();
	});

	it("rejects a create that refers to its own local ID", () => {
		const error = validationFailure([
			createPerson("p1"),
			{
				kind: "CreateResource",
				resource: {
					type: "people",
					lid: "p2",
					attributes: { name: "Dana" },
					relationships: { friend: { type: "people", lid: "p2" } },
				},
			},
		]);
		expect(error).toMatchObject({
			_tag: "LocalIdNotFoundError",
			reason: "unassigned",
			pointer: "/atomic:operations[1]/data/relationships/friend/data/lid",
			message: "Local ID cannot be both defined and used within the same operation.",
		});
	});
});
