import { Effect, Option } from "effect";
import {
	type ApiOptions,
	type ApiOptionsShape,
	type JsonApiError,
	type OperationsTransaction,
	type ProcessorRegistry,
	type ResourceGraph,
	type ResourceServiceShape,
	ResourceServices,
	type SerializationSettings,
	UnsupportedOperationError,
} from "@jsonweave/core";
import type { RestRequest, RestResponse } from "./handlers.js";

/**
 * Services every route needs from the host's layer.
 */
export type JsonApiEnvironment =
	| ResourceGraph
	| ApiOptions
	| ResourceServices
	| ProcessorRegistry
	| OperationsTransaction;

export type RouteEffect = Effect.Effect<
	RestResponse,
	JsonApiError,
	JsonApiEnvironment
>;

/**
 * Runs a route's effect for one request, honoring its abort signal.
 */
export type RouteRunner = (
	request: RestRequest,
	effect: RouteEffect,
) => Promise<RestResponse>;

export const requireService = (
	resourceType: string,
	endpoint: string,
): Effect.Effect<ResourceServiceShape, UnsupportedOperationError, ResourceServices> =>
	Effect.flatMap(ResourceServices, (services) =>
		Option.match(services.serviceFor(resourceType), {
			onNone: () =>
				Effect.fail(
					new UnsupportedOperationError({
						operation: endpoint,
						resourceType,
						message: `Endpoint '${endpoint}' is not accessible for resource type '${resourceType}'.`,
					}),
				),
			onSome: Effect.succeed,
		}),
	);

export const serializationSettings = (
	options: ApiOptionsShape,
): SerializationSettings => ({
	omitDefaultValues: options.omitDefaultValues,
	omitNullValues: options.omitNullValues,
});

export const noContent: RestResponse = { status: 204, body: undefined };
