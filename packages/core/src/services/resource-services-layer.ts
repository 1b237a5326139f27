import { Effect, Layer, Option } from "effect";
import { ResourceGraph } from "../graph/resource-graph.js";
import { ResourceHooks } from "../hooks/hook-runner.js";
import { ResourceRepository } from "../storage/storage-service.js";
import { makeDefaultResourceService } from "./default-resource-service.js";
import {
	type ResourceServiceShape,
	ResourceServices,
} from "./resource-service.js";

/**
 * Resource type -> its service, or null to expose no service for the type.
 */
export type ResourceServiceOverrides = Readonly<
	Record<string, ResourceServiceShape | null>
>;

/**
 * One service per resource type of the graph: the override when there is
 * one, the repository-backed default otherwise.
 */
export const makeResourceServicesLayer = (
	overrides: ResourceServiceOverrides = {},
): Layer.Layer<
	ResourceServices,
	never,
	ResourceGraph | ResourceRepository | ResourceHooks
> =>
	Layer.effect(
		ResourceServices,
		Effect.gen(function* () {
			const graph = yield* ResourceGraph;
			const repository = yield* ResourceRepository;
			const hooks = yield* ResourceHooks;

			const services = new Map<string, ResourceServiceShape>();
			for (const context of graph.resourceContexts) {
				const override: ResourceServiceShape | null | undefined =
					overrides[context.publicName];
				if (override === null) continue;
				services.set(
					context.publicName,
					override ??
						makeDefaultResourceService(context, { graph, repository, hooks }),
				);
			}

			return {
				serviceFor: (resourceType) =>
					Option.fromNullable(services.get(resourceType)),
			};
		}),
	);
