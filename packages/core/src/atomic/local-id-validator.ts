import { Effect } from "effect";
import {
	type LocalIdError,
	LocalIdNotFoundError,
} from "../errors/operation-errors.js";
import { mapPointer, prefixWithOperation } from "../errors/pointers.js";
import { LocalIdTracker } from "./local-id-tracker.js";
import { type OperationContainer, secondaryReferences } from "./operations.js";

const atPointer =
	(pointer: string) =>
	<A, R>(effect: Effect.Effect<A, LocalIdError, R>) =>
		Effect.mapError(effect, (error) => mapPointer(error, () => pointer));

// Every create seen so far has been assigned in this pass, so a declared but
// unassigned local ID can only be the one the current operation declares.
const assertAssigned = (localId: string, resourceType: string) =>
	Effect.gen(function* () {
		const tracker = yield* LocalIdTracker;
		yield* tracker.getValue(localId, resourceType).pipe(
			Effect.mapError((error) =>
				error.reason === "unassigned"
					? new LocalIdNotFoundError({
							localId,
							resourceType,
							reason: "unassigned",
							message:
								"Local ID cannot be both defined and used within the same operation.",
						})
					: error,
			),
		);
	});

const validateOperation = (operation: OperationContainer) =>
	Effect.gen(function* () {
		const tracker = yield* LocalIdTracker;
		const { resource } = operation;
		const creates = operation.kind === "CreateResource";

		if (resource.lid !== undefined) {
			if (creates) {
				yield* tracker
					.declare(resource.lid, resource.type)
					.pipe(atPointer("/data/lid"));
			} else {
				yield* assertAssigned(resource.lid, resource.type).pipe(
					atPointer("/ref/lid"),
				);
			}
		}

		for (const { identifier, pointer } of secondaryReferences(operation)) {
			if (identifier.lid === undefined) continue;
			yield* assertAssigned(identifier.lid, identifier.type).pipe(
				atPointer(`${pointer}/lid`),
			);
		}

		if (creates && resource.lid !== undefined) {
			// No server value exists yet; an empty one marks the local ID usable.
			yield* tracker
				.assign(resource.lid, resource.type, "")
				.pipe(atPointer("/data/lid"));
		}
	});

/**
 * Check that every local ID is declared by an earlier create operation before
 * it is referenced, without running any operation. The first violation fails with
 * a pointer prefixed by `/atomic:operations[<index>]`.
 */
export const validateLocalIds = (
	operations: ReadonlyArray<OperationContainer>,
): Effect.Effect<void, LocalIdError, LocalIdTracker> =>
	Effect.gen(function* () {
		const tracker = yield* LocalIdTracker;
		yield* tracker.reset();

		for (const [index, operation] of operations.entries()) {
			yield* validateOperation(operation).pipe(
				Effect.mapError((error) => prefixWithOperation(error, index)),
			);
		}
	});
