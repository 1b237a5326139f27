/**
 * Snapshot transactions over a single state Ref.
 *
 * Changes made inside the transaction are visible immediately (read-own-writes).
 * On success they stay; on failure or interruption the state is restored to
 * the snapshot taken at begin. Transactions queue on a single permit, so
 * writers run one at a time. A transaction begun from inside another fails
 * instead of waiting for its own permit.
 */

import { Effect, Exit, FiberRef, Ref } from "effect"
import { TransactionError } from "../errors/resource-errors.js"

export interface TransactionLock {
	readonly semaphore: Effect.Semaphore
	/** True in every fiber running inside the transaction. */
	readonly active: FiberRef.FiberRef<boolean>
}

export const makeTransactionLock: Effect.Effect<TransactionLock> = Effect.gen(
	function* () {
		const semaphore = yield* Effect.makeSemaphore(1)
		const active = yield* Effect.sync(() => FiberRef.unsafeMake(false))
		return { semaphore, active }
	},
)

/**
 * Run `effect` inside a transaction over `state`, after any transaction
 * already running has finished.
 *
 * Fails with TransactionError (operation "begin") when called from inside a
 * transaction on the same lock.
 */
export const runInTransaction = <S, A, E, R>(
	state: Ref.Ref<S>,
	lock: TransactionLock,
	effect: Effect.Effect<A, E, R>,
): Effect.Effect<A, E | TransactionError, R> =>
	Effect.gen(function* () {
		if (yield* FiberRef.get(lock.active)) {
			return yield* new TransactionError({
				operation: "begin",
				reason: "another transaction is already active",
				message: "Cannot begin transaction: another transaction is already active",
			})
		}
		return yield* lock.semaphore.withPermits(1)(
			Effect.acquireUseRelease(
				Ref.get(state),
				() => Effect.locally(effect, lock.active, true),
				(snapshot, exit) =>
					Exit.isFailure(exit)
						? Effect.zipRight(
								Ref.set(state, snapshot),
								Effect.logDebug("Transaction rolled back"),
							)
						: Effect.void,
			),
		)
	})

/**
 * Run a read against committed state: it waits for a running transaction to
 * finish. Inside a transaction it runs at once and sees the transaction's own
 * writes.
 */
export const readCommitted = <A, E, R>(
	lock: TransactionLock,
	effect: Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R> =>
	Effect.flatMap(FiberRef.get(lock.active), (inside) =>
		inside ? effect : lock.semaphore.withPermits(1)(effect),
	)
