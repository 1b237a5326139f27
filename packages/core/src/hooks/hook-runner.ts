/**
 * Resource hooks executor.
 *
 * Before-hooks may change or reject the resource. After-write hooks run once
 * the change is stored; a failure there is logged and does not undo it.
 * Read hooks walk the materialized response (see read-traversal.ts).
 * Every call is a no-op unless `enableResourceHooks` is set.
 */

import { Context, Effect, Layer, Option } from "effect";
import { ApiOptions } from "../config/api-options.js";
import {
	type HookError,
	InvalidConfigurationError,
} from "../errors/resource-errors.js";
import {
	ResourceGraph,
	type ResourceGraphShape,
} from "../graph/resource-graph.js";
import {
	type ResourceObject,
	type ResourceQueryResult,
	type StoredResource,
	identityKey,
} from "../types/resource-types.js";
import type {
	ResourceHooksDefinition,
	ResourceHooksRegistration,
	ResourcePipeline,
} from "./hook-types.js";
import { collectReadLevels } from "./read-traversal.js";

// ============================================================================
// Service
// ============================================================================

export interface ResourceHooksShape {
	readonly beforeRead: (
		resourceType: string,
		pipeline: ResourcePipeline,
		id?: string,
	) => Effect.Effect<void, HookError>;
	readonly afterRead: (
		resourceType: string,
		result: ResourceQueryResult,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void, HookError>;
	readonly onReturn: (
		result: ResourceQueryResult,
		pipeline: ResourcePipeline,
	) => Effect.Effect<ResourceQueryResult, HookError>;
	readonly beforeCreate: (
		resource: ResourceObject,
		pipeline: ResourcePipeline,
	) => Effect.Effect<ResourceObject, HookError>;
	readonly afterCreate: (
		resource: StoredResource,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void>;
	readonly beforeUpdate: (
		resource: ResourceObject,
		existing: StoredResource,
		pipeline: ResourcePipeline,
	) => Effect.Effect<ResourceObject, HookError>;
	readonly afterUpdate: (
		resource: StoredResource,
		previous: StoredResource,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void>;
	readonly beforeDelete: (
		resource: StoredResource,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void, HookError>;
	readonly afterDelete: (
		resourceType: string,
		id: string,
		pipeline: ResourcePipeline,
	) => Effect.Effect<void>;
}

export class ResourceHooks extends Context.Tag("jsonweave/ResourceHooks")<
	ResourceHooks,
	ResourceHooksShape
>() {}

// ============================================================================
// Executor
// ============================================================================

const logAfterHookFailure =
	(hook: string, resourceType: string) =>
	(effect: Effect.Effect<void, HookError>): Effect.Effect<void> =>
		Effect.catchAll(effect, (error) =>
			Effect.logWarning(`${hook} hook failed`).pipe(
				Effect.annotateLogs({ resourceType, reason: error.reason }),
			),
		);

const makeResourceHooks = (
	definitions: ReadonlyMap<string, ResourceHooksDefinition>,
	graph: ResourceGraphShape,
): ResourceHooksShape => {
	const hooksFor = (resourceType: string) => definitions.get(resourceType);

	return {
		beforeRead: (resourceType, pipeline, id) => {
			const hook = hooksFor(resourceType)?.beforeRead;
			return hook === undefined
				? Effect.void
				: hook(id === undefined ? { pipeline } : { pipeline, id });
		},

		afterRead: (resourceType, result, pipeline) =>
			Effect.forEach(
				collectReadLevels(graph, resourceType, result),
				(level) => {
					const hook = hooksFor(level.resourceType)?.afterRead;
					return hook === undefined
						? Effect.void
						: hook({
								resources: level.resources,
								pipeline,
								isIncluded: level.isIncluded,
							});
				},
				{ discard: true },
			),

		onReturn: (result, pipeline) =>
			Effect.gen(function* () {
				// Returned resources replace the originals with the same identity.
				const kept = new Map<string, StoredResource>();
				const all = [...result.primary, ...result.included];
				const types = new Set(all.map((resource) => resource.type));
				for (const type of types) {
					const ofType = all.filter((resource) => resource.type === type);
					const hook = hooksFor(type)?.onReturn;
					const returned =
						hook === undefined
							? ofType
							: yield* hook({ resources: ofType, pipeline });
					for (const resource of returned) {
						if (resource.type === type) kept.set(identityKey(resource), resource);
					}
				}
				const keptOf = (resources: ReadonlyArray<StoredResource>) =>
					resources.flatMap((resource) => kept.get(identityKey(resource)) ?? []);
				return { primary: keptOf(result.primary), included: keptOf(result.included) };
			}),

		beforeCreate: (resource, pipeline) => {
			const hook = hooksFor(resource.type)?.beforeCreate;
			return hook === undefined
				? Effect.succeed(resource)
				: hook({ resource, pipeline });
		},

		afterCreate: (resource, pipeline) => {
			const hook = hooksFor(resource.type)?.afterCreate;
			return hook === undefined
				? Effect.void
				: hook({ resource, pipeline }).pipe(
						logAfterHookFailure("afterCreate", resource.type),
					);
		},

		beforeUpdate: (resource, existing, pipeline) => {
			const hook = hooksFor(resource.type)?.beforeUpdate;
			return hook === undefined
				? Effect.succeed(resource)
				: hook({ resource, existing, pipeline });
		},

		afterUpdate: (resource, previous, pipeline) => {
			const hook = hooksFor(resource.type)?.afterUpdate;
			return hook === undefined
				? Effect.void
				: hook({ resource, previous, pipeline }).pipe(
						logAfterHookFailure("afterUpdate", resource.type),
					);
		},

		beforeDelete: (resource, pipeline) => {
			const hook = hooksFor(resource.type)?.beforeDelete;
			return hook === undefined ? Effect.void : hook({ resource, pipeline });
		},

		afterDelete: (resourceType, id, pipeline) => {
			const hook = hooksFor(resourceType)?.afterDelete;
			return hook === undefined
				? Effect.void
				: hook({ id, pipeline }).pipe(
						logAfterHookFailure("afterDelete", resourceType),
					);
		},
	};
};

// ============================================================================
// Layer
// ============================================================================

const configurationError = (reason: string) =>
	new InvalidConfigurationError({
		reason,
		message: `Invalid resource hooks: ${reason}`,
	});

/**
 * Register hook definitions for an explicit list of resource types.
 *
 * Fails with InvalidConfigurationError when a type is registered twice or is
 * not part of the resource graph. With `enableResourceHooks` off the
 * definitions are checked but never called.
 */
export const makeResourceHooksLayer = (
	registrations: ReadonlyArray<ResourceHooksRegistration>,
): Layer.Layer<
	ResourceHooks,
	InvalidConfigurationError,
	ResourceGraph | ApiOptions
> =>
	Layer.effect(
		ResourceHooks,
		Effect.gen(function* () {
			const graph = yield* ResourceGraph;
			const options = yield* ApiOptions;
			const definitions = new Map<string, ResourceHooksDefinition>();

			for (const { resourceType, hooks } of registrations) {
				if (definitions.has(resourceType)) {
					return yield* configurationError(
						`Cannot define multiple resource hook definitions for '${resourceType}'.`,
					);
				}
				if (Option.isNone(graph.findResourceContext(resourceType))) {
					return yield* configurationError(
						`Resource hooks are defined for unknown resource type '${resourceType}'.`,
					);
				}
				definitions.set(resourceType, hooks);
			}

			return makeResourceHooks(
				options.enableResourceHooks ? definitions : new Map(),
				graph,
			);
		}),
	);
