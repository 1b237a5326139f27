/**
 * In-memory ResourceRepository with snapshot transactions, as an Effect Layer.
 * All state lives in one Ref, so a rollback restores every resource type at once.
 */

import { Context, Effect, Layer, Option, Ref } from "effect"
import {
	OperationsTransaction,
	type OperationsTransactionShape,
} from "../atomic/operations-transaction.js"
import {
	makeTransactionLock,
	readCommitted,
	runInTransaction,
} from "../transactions/transaction.js"
import type { StoredResource } from "../types/resource-types.js"
import {
	ResourceRepository,
	type ResourceRepositoryShape,
} from "./storage-service.js"

// ============================================================================
// State
// ============================================================================

type Collections = ReadonlyMap<string, ReadonlyMap<string, StoredResource>>

interface StoreState {
	readonly collections: Collections
	/** Last generated numeric ID per resource type. */
	readonly sequences: ReadonlyMap<string, number>
}

/**
 * Resource type -> initial resources.
 */
export type StoreSeed = Readonly<Record<string, ReadonlyArray<StoredResource>>>

const initialState = (seed: StoreSeed): StoreState => {
	const collections = new Map<string, ReadonlyMap<string, StoredResource>>()
	const sequences = new Map<string, number>()
	for (const [type, resources] of Object.entries(seed)) {
		collections.set(
			type,
			new Map(resources.map((resource) => [resource.id, resource])),
		)
		const numericIds = resources
			.map((resource) => Number(resource.id))
			.filter((id) => Number.isInteger(id))
		sequences.set(type, Math.max(0, ...numericIds))
	}
	return { collections, sequences }
}

const withCollection = (
	state: StoreState,
	type: string,
	update: (collection: Map<string, StoredResource>) => void,
): StoreState => {
	const collection = new Map(state.collections.get(type) ?? [])
	update(collection)
	const collections = new Map(state.collections)
	collections.set(type, collection)
	return { ...state, collections }
}

// ============================================================================
// Repository
// ============================================================================

const makeRepository = (state: Ref.Ref<StoreState>): ResourceRepositoryShape => ({
	findAll: (resourceType) =>
		Effect.map(Ref.get(state), (current) => [
			...(current.collections.get(resourceType)?.values() ?? []),
		]),

	findById: (resourceType, id) =>
		Effect.map(Ref.get(state), (current) =>
			Option.fromNullable(current.collections.get(resourceType)?.get(id)),
		),

	insert: (resource) =>
		Ref.modify(state, (current) => {
			const last = current.sequences.get(resource.type) ?? 0
			const id = resource.id ?? String(last + 1)
			// Client-chosen numeric IDs advance the sequence too.
			const numericId = Number(id)
			const sequences = new Map(current.sequences)
			sequences.set(
				resource.type,
				Number.isInteger(numericId) ? Math.max(last, numericId) : last,
			)
			const stored: StoredResource = {
				type: resource.type,
				id,
				attributes: resource.attributes,
				relationships: resource.relationships,
			}
			const next = withCollection(
				{ ...current, sequences },
				resource.type,
				(collection) => collection.set(stored.id, stored),
			)
			return [stored, next] as const
		}),

	replace: (resource) =>
		Ref.update(state, (current) =>
			withCollection(current, resource.type, (collection) =>
				collection.set(resource.id, resource),
			),
		),

	remove: (resourceType, id) =>
		Ref.modify(state, (current) => {
			if (current.collections.get(resourceType)?.has(id) !== true) {
				return [false, current] as const
			}
			return [
				true,
				withCollection(current, resourceType, (collection) =>
					collection.delete(id),
				),
			] as const
		}),
})

// ============================================================================
// Layer construction
// ============================================================================

/**
 * ResourceRepository and OperationsTransaction over the same in-memory state.
 * Each build of the layer starts from `seed`.
 */
export const makeInMemoryStoreLayer = (
	seed: StoreSeed = {},
): Layer.Layer<ResourceRepository | OperationsTransaction> =>
	Layer.effectContext(
		Effect.gen(function* () {
			const state = yield* Ref.make(initialState(seed))
			const lock = yield* makeTransactionLock
			const transaction: OperationsTransactionShape = {
				run: (effect) => runInTransaction(state, lock, effect),
				read: (effect) => readCommitted(lock, effect),
			}
			return Context.make(ResourceRepository, makeRepository(state)).pipe(
				Context.add(OperationsTransaction, transaction),
			)
		}),
	)
