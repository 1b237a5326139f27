/**
 * Local IDs of one atomic operations request.
 *
 * A local ID is declared by the create operation that introduces it and
 * receives the server-generated ID once that operation has run. State is
 * keyed by (local ID, resource type) and lives only as long as the layer
 * instance, so every batch gets its own tracker.
 *
 * @module
 */

import { Context, Data, Effect, HashMap, Layer, Option, Ref } from "effect";
import {
	LocalIdAlreadyDeclaredError,
	LocalIdNotFoundError,
} from "../errors/operation-errors.js";

export interface LocalIdTrackerShape {
	readonly reset: () => Effect.Effect<void>;
	readonly declare: (
		localId: string,
		resourceType: string,
	) => Effect.Effect<void, LocalIdAlreadyDeclaredError>;
	readonly assign: (
		localId: string,
		resourceType: string,
		id: string,
	) => Effect.Effect<void, LocalIdNotFoundError>;
	readonly isDeclared: (
		localId: string,
		resourceType: string,
	) => Effect.Effect<boolean>;
	/**
	 * The server-generated ID. Fails when the local ID was never declared or
	 * the operation declaring it has not run yet.
	 */
	readonly getValue: (
		localId: string,
		resourceType: string,
	) => Effect.Effect<string, LocalIdNotFoundError>;
}

export class LocalIdTracker extends Context.Tag("jsonweave/LocalIdTracker")<
	LocalIdTracker,
	LocalIdTrackerShape
>() {}

interface LocalIdKey {
	readonly localId: string;
	readonly resourceType: string;
}

const keyOf = (localId: string, resourceType: string): LocalIdKey =>
	Data.struct({ localId, resourceType });

const notDeclared = (localId: string, resourceType: string) =>
	new LocalIdNotFoundError({
		localId,
		resourceType,
		reason: "undeclared",
		message: `Local ID '${localId}' of resource type '${resourceType}' is not declared at this point.`,
	});

export const makeLocalIdTracker: Effect.Effect<LocalIdTrackerShape> =
	Effect.gen(function* () {
		// Option.none() marks a declared local ID without a server-generated value.
		const state = yield* Ref.make(
			HashMap.empty<LocalIdKey, Option.Option<string>>(),
		);

		const lookup = (localId: string, resourceType: string) =>
			Effect.map(Ref.get(state), HashMap.get(keyOf(localId, resourceType)));

		return {
			reset: () => Ref.set(state, HashMap.empty()),

			declare: (localId, resourceType) =>
				Effect.gen(function* () {
					const existing = yield* lookup(localId, resourceType);
					if (Option.isSome(existing)) {
						return yield* new LocalIdAlreadyDeclaredError({
							localId,
							resourceType,
							message: `Another local ID with name '${localId}' is already defined at this point.`,
						});
					}
					yield* Ref.update(
						state,
						HashMap.set(keyOf(localId, resourceType), Option.none<string>()),
					);
				}),

			assign: (localId, resourceType, id) =>
				Effect.gen(function* () {
					const existing = yield* lookup(localId, resourceType);
					if (Option.isNone(existing)) {
						return yield* notDeclared(localId, resourceType);
					}
					yield* Ref.update(
						state,
						HashMap.set(keyOf(localId, resourceType), Option.some(id)),
					);
				}),

			isDeclared: (localId, resourceType) =>
				Effect.map(lookup(localId, resourceType), Option.isSome),

			getValue: (localId, resourceType) =>
				Effect.gen(function* () {
					const existing = yield* lookup(localId, resourceType);
					if (Option.isNone(existing)) {
						return yield* notDeclared(localId, resourceType);
					}
					if (Option.isNone(existing.value)) {
						return yield* new LocalIdNotFoundError({
							localId,
							resourceType,
							reason: "unassigned",
							message: `Server-generated value for local ID '${localId}' is not available at this point.`,
						});
					}
					return existing.value.value;
				}),
		};
	});

/**
 * Builds a new, empty tracker each time the layer is built.
 */
export const LocalIdTrackerLive: Layer.Layer<LocalIdTracker> = Layer.effect(
	LocalIdTracker,
	makeLocalIdTracker,
);
