import { Effect, Option } from "effect"
import { describe, expect, it } from "vitest"
import { OperationsTransaction } from "../src/atomic/operations-transaction.js"
import { makeInMemoryStoreLayer } from "../src/storage/in-memory-store-layer.js"
import { ResourceRepository } from "../src/storage/storage-service.js"
import { blogSeed } from "./fixtures/blog-graph.js"

const runStore = <A, E>(
	effect: Effect.Effect<A, E, ResourceRepository | OperationsTransaction>,
) => Effect.runSync(effect.pipe(Effect.provide(makeInMemoryStoreLayer(blogSeed))))

const insertTag = (name: string, id?: string) =>
	Effect.flatMap(ResourceRepository, (repository) =>
		repository.insert({
			type: "tags",
			id,
			attributes: { name },
			relationships: {},
		}),
	)

const tagNames = Effect.gen(function* () {
	const repository = yield* ResourceRepository
	const tags = yield* repository.findAll("tags")
	return tags.map((tag) => tag.attributes.name)
})

describe("in-memory store", () => {
	it("continues the numeric IDs of the seed", () => {
		const ids = runStore(
			Effect.gen(function* () {
				const first = yield* insertTag("ops")
				const second = yield* insertTag("qa")
				return [first.id, second.id]
			}),
		)
		expect(ids).toEqual(["3", "4"])
	})

	it("skips past client-chosen numeric IDs", () => {
		const id = runStore(
			Effect.gen(function* () {
				yield* insertTag("ops", "7")
				const generated = yield* insertTag("qa")
				return generated.id
			}),
		)
		expect(id).toBe("8")
	})

	it("starts a sequence for a type without seed data", () => {
		const stored = Effect.runSync(
			insertTag("ops").pipe(Effect.provide(makeInMemoryStoreLayer())),
		)
		expect(stored.id).toBe("1")
	})

	it("replaces and removes resources", () => {
		const [found, removed, removedAgain] = runStore(
			Effect.gen(function* () {
				const repository = yield* ResourceRepository
				yield* repository.replace({
					type: "tags",
					id: "1",
					attributes: { name: "world" },
					relationships: {},
				})
				const found = yield* repository.findById("tags", "1")
				const removed = yield* repository.remove("tags", "2")
				const removedAgain = yield* repository.remove("tags", "2")
				return [found, removed, removedAgain] as const
			}),
		)
		expect(Option.getOrUndefined(found)?.attributes.name).toBe("world")
		expect(removed).toBe(true)
		expect(removedAgain).toBe(false)
	})

	it("returns nothing for an unknown type or ID", () => {
		const [missingType, missingId] = runStore(
			Effect.gen(function* () {
				const repository = yield* ResourceRepository
				return [
					yield* repository.findAll("unicorns"),
					yield* repository.findById("tags", "99"),
				] as const
			}),
		)
		expect(missingType).toEqual([])
		expect(Option.isNone(missingId)).toBe(true)
	})
})

describe("store transactions", () => {
	it("keeps the changes of a successful transaction", () => {
		const names = runStore(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				yield* transaction.run(insertTag("ops"))
				return yield* tagNames
			}),
		)
		expect(names).toEqual(["news", "tech", "ops"])
	})

	it("restores every resource type when the transaction fails", () => {
		const names = runStore(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				const repository = yield* ResourceRepository
				const outcome = yield* Effect.either(
					transaction.run(
						Effect.gen(function* () {
							yield* insertTag("ops")
							yield* repository.remove("people", "1")
							return yield* Effect.fail("rejected")
						}),
					),
				)
				expect(outcome._tag).toBe("Left")
				const person = yield* repository.findById("people", "1")
				expect(Option.isSome(person)).toBe(true)
				return yield* tagNames
			}),
		)
		expect(names).toEqual(["news", "tech"])
	})

	it("sees its own writes", () => {
		const names = runStore(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				return yield* transaction.run(
					Effect.zipRight(insertTag("ops"), tagNames),
				)
			}),
		)
		expect(names).toEqual(["news", "tech", "ops"])
	})

	it("rejects a transaction while another is active", () => {
		const error = runStore(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				return yield* Effect.flip(
					transaction.run(transaction.run(Effect.void)),
				)
			}),
		)
		expect(error).toMatchObject({
			_tag: "TransactionError",
			operation: "begin",
			reason: "another transaction is already active",
		})
	})

	it("releases the lock after a failure", () => {
		const names = runStore(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				yield* Effect.either(transaction.run(Effect.fail("rejected")))
				yield* transaction.run(insertTag("ops"))
				return yield* tagNames
			}),
		)
		expect(names).toEqual(["news", "tech", "ops"])
	})

	it("queues a transaction behind the one running", async () => {
		const ids = await Effect.runPromise(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				return yield* Effect.all(
					[
						transaction.run(
							Effect.zipRight(Effect.sleep("10 millis"), insertTag("ops")),
						),
						Effect.zipRight(
							Effect.sleep("1 millis"),
							transaction.run(insertTag("qa")),
						),
					],
					{ concurrency: "unbounded" },
				)
			}).pipe(Effect.provide(makeInMemoryStoreLayer(blogSeed))),
		)
		expect(ids.map((tag) => tag.id)).toEqual(["3", "4"])
	})

	it("reads committed state while a transaction runs", async () => {
		const [, names] = await Effect.runPromise(
			Effect.gen(function* () {
				const transaction = yield* OperationsTransaction
				return yield* Effect.all(
					[
						Effect.either(
							transaction.run(
								insertTag("ops").pipe(
									Effect.zipRight(Effect.sleep("10 millis")),
									Effect.zipRight(Effect.fail("rejected")),
								),
							),
						),
						Effect.zipRight(Effect.sleep("1 millis"), transaction.read(tagNames)),
					],
					{ concurrency: "unbounded" },
				)
			}).pipe(Effect.provide(makeInMemoryStoreLayer(blogSeed))),
		)
		expect(names).toEqual(["news", "tech"])
	})
})
