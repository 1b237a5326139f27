/**
 * Sequential execution of an atomic operations batch inside one transaction.
 *
 * @module
 */

import { Effect, Option } from "effect";
import { ApiOptions } from "../config/api-options.js";
import {
	type LocalIdError,
	TooManyOperationsError,
} from "../errors/operation-errors.js";
import {
	mapPointer,
	type PointerError,
	prefixWithOperation,
} from "../errors/pointers.js";
import type { TransactionError } from "../errors/resource-errors.js";
import type {
	RelationshipValue,
	ResourceIdentifier,
	ResourceObject,
} from "../types/resource-types.js";
import { isToManyValue } from "../types/resource-types.js";
import {
	LocalIdTracker,
	LocalIdTrackerLive,
	type LocalIdTrackerShape,
} from "./local-id-tracker.js";
import { validateLocalIds } from "./local-id-validator.js";
import {
	type OperationContainer,
	isRelationshipOperation,
} from "./operations.js";
import { OperationsTransaction } from "./operations-transaction.js";
import { ProcessorRegistry } from "./processors.js";

export type ProcessOperationsError =
	| TooManyOperationsError
	| PointerError
	| TransactionError;

/**
 * One entry of the results: the resource an operation produced, if any.
 */
export type OperationResult = Option.Option<ResourceObject>;

// ============================================================================
// Local ID substitution
// ============================================================================

const atPointer =
	(pointer: string) =>
	<A>(effect: Effect.Effect<A, LocalIdError>) =>
		Effect.mapError(effect, (error) => mapPointer(error, () => pointer));

const resolveIdentifier = (
	tracker: LocalIdTrackerShape,
	identifier: ResourceIdentifier,
	pointer: string,
): Effect.Effect<ResourceIdentifier, LocalIdError> =>
	identifier.lid === undefined
		? Effect.succeed(identifier)
		: tracker.getValue(identifier.lid, identifier.type).pipe(
				Effect.map((id) => ({ type: identifier.type, id })),
				atPointer(`${pointer}/lid`),
			);

const resolveRelationshipValue = (
	tracker: LocalIdTrackerShape,
	value: RelationshipValue,
	base: string,
): Effect.Effect<RelationshipValue, LocalIdError> => {
	if (value === null) return Effect.succeed(null);
	if (isToManyValue(value)) {
		return Effect.forEach(value, (identifier, index) =>
			resolveIdentifier(tracker, identifier, `${base}[${index}]`),
		);
	}
	return resolveIdentifier(tracker, value, base);
};

/**
 * Replace every local ID an operation references with the ID the server
 * assigned to it. The create operation's own `lid` is left in place.
 */
const substituteLocalIds = (
	tracker: LocalIdTrackerShape,
	operation: OperationContainer,
): Effect.Effect<OperationContainer, LocalIdError> =>
	Effect.gen(function* () {
		const { resource } = operation;
		let id = resource.id;
		if (resource.lid !== undefined && operation.kind !== "CreateResource") {
			id = yield* tracker
				.getValue(resource.lid, resource.type)
				.pipe(atPointer("/ref/lid"));
		}

		const relationships: Record<string, RelationshipValue> = {};
		for (const [name, value] of Object.entries(resource.relationships)) {
			const base = isRelationshipOperation(operation.kind)
				? "/data"
				: `/data/relationships/${name}/data`;
			relationships[name] = yield* resolveRelationshipValue(tracker, value, base);
		}

		return {
			...operation,
			resource: {
				type: resource.type,
				id,
				lid: operation.kind === "CreateResource" ? resource.lid : undefined,
				attributes: resource.attributes,
				relationships,
			},
		};
	});

// ============================================================================
// Pipeline
// ============================================================================

const processOne = (
	tracker: LocalIdTrackerShape,
	operation: OperationContainer,
	index: number,
): Effect.Effect<OperationResult, PointerError, ProcessorRegistry> =>
	Effect.gen(function* () {
		const registry = yield* ProcessorRegistry;
		const resolved = yield* substituteLocalIds(tracker, operation);
		const { resource } = resolved;

		if (resolved.kind === "CreateResource" && resource.lid !== undefined) {
			yield* tracker
				.declare(resource.lid, resource.type)
				.pipe(atPointer("/data/lid"));
		}

		const processor = yield* registry.resolve(resolved.kind, resource.type);
		const result = yield* processor.process(resolved);
		yield* Effect.logDebug("Processed operation");

		if (
			resolved.kind === "CreateResource" &&
			resource.lid !== undefined &&
			Option.isSome(result) &&
			result.value.id !== undefined
		) {
			const lid = resource.lid;
			yield* tracker
				.assign(lid, resource.type, result.value.id)
				.pipe(atPointer("/data/lid"));
			return Option.some<ResourceObject>({ ...result.value, lid });
		}
		return result;
	}).pipe(
		Effect.mapError((error) => prefixWithOperation(error, index)),
		Effect.annotateLogs({
			operationIndex: index,
			kind: operation.kind,
			resourceType: operation.resource.type,
		}),
	);

/**
 * Run a batch of operations in order, all or nothing.
 *
 * Local IDs are checked for every operation before the first one runs. Any
 * failure rolls the transaction back and carries a pointer prefixed with
 * `/atomic:operations[<index>]`.
 */
export const processOperations = (
	operations: ReadonlyArray<OperationContainer>,
): Effect.Effect<
	ReadonlyArray<OperationResult>,
	ProcessOperationsError,
	ApiOptions | OperationsTransaction | ProcessorRegistry
> =>
	Effect.gen(function* () {
		const options = yield* ApiOptions;
		const maximum = options.maximumOperationsPerRequest;
		if (maximum !== undefined && operations.length > maximum) {
			return yield* new TooManyOperationsError({
				count: operations.length,
				maximum,
				message: `The number of operations in this request (${operations.length}) is higher than the maximum of ${maximum}.`,
			});
		}

		yield* validateLocalIds(operations);

		const tracker = yield* LocalIdTracker;
		yield* tracker.reset();

		const transaction = yield* OperationsTransaction;
		return yield* transaction.run(
			Effect.forEach(operations, (operation, index) =>
				processOne(tracker, operation, index),
			),
		);
	}).pipe(
		Effect.withLogSpan("atomic-operations"),
		Effect.provide(LocalIdTrackerLive),
	);
