import { Context, type Effect } from "effect";
import type { TransactionError } from "../errors/resource-errors.js";

export interface OperationsTransactionShape {
	/**
	 * Run `effect` so that its changes are kept only when it succeeds. Failure
	 * and interruption discard them.
	 */
	readonly run: <A, E, R>(
		effect: Effect.Effect<A, E, R>,
	) => Effect.Effect<A, E | TransactionError, R>;
	/**
	 * Run a read outside any transaction so that it sees committed state only.
	 * Inside a transaction it sees the transaction's own writes.
	 */
	readonly read: <A, E, R>(
		effect: Effect.Effect<A, E, R>,
	) => Effect.Effect<A, E, R>;
}

export class OperationsTransaction extends Context.Tag(
	"jsonweave/OperationsTransaction",
)<OperationsTransaction, OperationsTransactionShape>() {}
