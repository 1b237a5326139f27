/**
 * JSON:API handler generation for a resource graph.
 *
 * Generates framework-agnostic route descriptors for every resource type and
 * for the atomic operations endpoint. Handlers run on a runtime built once
 * from the host's layer, so state held by that layer (such as the in-memory
 * store) is shared by all requests.
 *
 * @module
 */

import {
	type ConfigError,
	Effect,
	Exit,
	type Layer,
	ManagedRuntime,
} from "effect";
import {
	ApiOptions,
	type JsonApiError,
	type JsonApiRequest,
	OperationsTransaction,
	QueryStringValidationError,
	type ResourceContext,
	type ResourceGraphShape,
	buildAtomicResultsDocument,
	buildResourceDocument,
	invalidParameter,
	processOperations,
	readQueryString,
} from "@jsonweave/core";
import { type ErrorMappingOptions, mapCauseToResponse } from "./error-mapping.js";
import { createRelationshipRoutes } from "./relationship-routes.js";
import {
	ResourceDocumentBody,
	decodeBody,
	readAtomicOperations,
	validateResource,
} from "./request-body.js";
import {
	type JsonApiEnvironment,
	type RouteEffect,
	type RouteRunner,
	noContent,
	requireService,
	serializationSettings,
} from "./route-support.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Framework-agnostic request object shape.
 * Adapters for specific frameworks convert their native request objects to
 * this shape before invoking handlers.
 */
export interface RestRequest {
	/**
	 * URL path parameters extracted by the framework's router.
	 * Example: for route "/articles/:id", params = { id: "1" }
	 */
	readonly params: Record<string, string>;

	/**
	 * URL query parameters. Repeated parameters arrive as arrays.
	 * Example: ?fields[people]=name&sort=-name → { "fields[people]": "name", sort: "-name" }
	 */
	readonly query: Record<string, string | ReadonlyArray<string>>;

	/** Parsed JSON body, for POST and PATCH requests. */
	readonly body: unknown;

	/** Aborting interrupts the request at its next suspension point. */
	readonly signal?: AbortSignal;
}

export interface RestResponse {
	readonly status: number;
	/** JSON:API document, or undefined for 204 responses. */
	readonly body: unknown;
	readonly headers?: Record<string, string>;
}

export type RestHandler = (req: RestRequest) => Promise<RestResponse>;

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface RouteDescriptor {
	readonly method: HttpMethod;
	/** URL path pattern (e.g., "/articles", "/articles/:id") */
	readonly path: string;
	readonly handler: RestHandler;
}

export interface JsonApiHandlerOptions {
	/** Prefix for every route path. Defaults to "". */
	readonly basePath?: string;
	/** Expose `POST /operations`. Defaults to true. */
	readonly enableAtomicOperations?: boolean;
	/** Address of a page about a kind of failure, set as `links.about`. */
	readonly errorAbout?: ErrorMappingOptions["errorAbout"];
}

// ============================================================================
// Runner
// ============================================================================

const JSON_API_HEADERS = { "content-type": "application/vnd.api+json" };

const withHeaders = (response: RestResponse): RestResponse =>
	response.body === undefined
		? response
		: { ...response, headers: { ...JSON_API_HEADERS, ...response.headers } };

const makeRunner = <LayerError extends JsonApiError | ConfigError.ConfigError>(
	runtime: ManagedRuntime.ManagedRuntime<JsonApiEnvironment, LayerError>,
	errorOptions: ErrorMappingOptions,
): RouteRunner => {
	return async (req, effect) => {
		const exit = await runtime.runPromiseExit(effect, { signal: req.signal });
		if (Exit.isSuccess(exit)) return withHeaders(exit.value);
		const response = await Effect.runPromise(
			mapCauseToResponse(exit.cause, errorOptions),
		);
		return withHeaders(response);
	};
};

// ============================================================================
// Resource Routes
// ============================================================================

const primaryRequest = (
	context: ResourceContext,
	isCollection: boolean,
): JsonApiRequest => ({
	kind: "primary",
	primaryResource: context,
	isCollection,
});

const logged = (method: HttpMethod, path: string) =>
	(effect: RouteEffect): RouteEffect =>
		effect.pipe(
			Effect.annotateLogs({ method, path }),
			Effect.withLogSpan("request"),
		);

const createResourceRoutes = (
	graph: ResourceGraphShape,
	context: ResourceContext,
	basePath: string,
	run: RouteRunner,
): ReadonlyArray<RouteDescriptor> => {
	const type = context.publicName;
	const collectionPath = `${basePath}/${type}`;
	const resourcePath = `${collectionPath}/:id`;

	const getCollection: RestHandler = (req) =>
		run(
			req,
			Effect.gen(function* () {
				const specification = yield* readQueryString(
					primaryRequest(context, true),
					req.query,
				);
				const service = yield* requireService(type, "GET");
				const transaction = yield* OperationsTransaction;
				const result = yield* transaction.read(service.getAll(specification));
				return {
					status: 200,
					body: buildResourceDocument(graph, result, specification, true),
				};
			}).pipe(logged("GET", collectionPath)),
		);

	const getResource: RestHandler = (req) =>
		run(
			req,
			Effect.gen(function* () {
				const id = req.params.id ?? "";
				const specification = yield* readQueryString(
					primaryRequest(context, false),
					req.query,
				);
				const service = yield* requireService(type, "GET");
				const transaction = yield* OperationsTransaction;
				const result = yield* transaction.read(service.getById(id, specification));
				return {
					status: 200,
					body: buildResourceDocument(graph, result, specification, false),
				};
			}).pipe(logged("GET", resourcePath)),
		);

	const postResource: RestHandler = (req) =>
		run(
			req,
			Effect.gen(function* () {
				const options = yield* ApiOptions;
				const specification = yield* readQueryString(
					primaryRequest(context, false),
					req.query,
				);
				const document = yield* decodeBody(ResourceDocumentBody, req.body);
				const resource = yield* validateResource(document.data, {
					graph,
					options,
					mode: "create",
					base: "/data",
					expectedType: type,
					allowLocalIds: false,
				});
				const service = yield* requireService(type, "POST");
				const transaction = yield* OperationsTransaction;
				const created = yield* transaction.run(service.create(resource, "Post"));
				const result = yield* transaction.read(
					service.getById(created.id, specification),
				);
				return {
					status: 201,
					body: buildResourceDocument(graph, result, specification, false),
					headers: { location: `${collectionPath}/${created.id}` },
				};
			}).pipe(logged("POST", collectionPath)),
		);

	const patchResource: RestHandler = (req) =>
		run(
			req,
			Effect.gen(function* () {
				const id = req.params.id ?? "";
				const options = yield* ApiOptions;
				const specification = yield* readQueryString(
					primaryRequest(context, false),
					req.query,
				);
				const document = yield* decodeBody(ResourceDocumentBody, req.body);
				const resource = yield* validateResource(document.data, {
					graph,
					options,
					mode: "update",
					base: "/data",
					expectedType: type,
					expectedId: id,
					allowLocalIds: false,
				});
				const service = yield* requireService(type, "PATCH");
				const transaction = yield* OperationsTransaction;
				yield* transaction.run(service.update(id, resource, "Patch"));
				const result = yield* transaction.read(service.getById(id, specification));
				return {
					status: 200,
					body: buildResourceDocument(graph, result, specification, false),
				};
			}).pipe(logged("PATCH", resourcePath)),
		);

	const deleteResource: RestHandler = (req) =>
		run(
			req,
			Effect.gen(function* () {
				const id = req.params.id ?? "";
				const service = yield* requireService(type, "DELETE");
				const transaction = yield* OperationsTransaction;
				yield* transaction.run(service.delete(id, "Delete"));
				return noContent;
			}).pipe(logged("DELETE", resourcePath)),
		);

	return [
		{ method: "GET", path: collectionPath, handler: getCollection },
		{ method: "GET", path: resourcePath, handler: getResource },
		{ method: "POST", path: collectionPath, handler: postResource },
		{ method: "PATCH", path: resourcePath, handler: patchResource },
		{ method: "DELETE", path: resourcePath, handler: deleteResource },
	];
};

// ============================================================================
// Atomic Operations Route
// ============================================================================

const rejectQueryString = (
	query: RestRequest["query"],
): Effect.Effect<void, QueryStringValidationError> => {
	const names = Object.keys(query);
	if (names.length === 0) return Effect.void;
	const errors = names.map((name) =>
		invalidParameter(
			name,
			`The parameter '${name}' cannot be used at this endpoint.`,
			"Usage of one or more query string parameters is not allowed at the requested endpoint.",
		),
	);
	return Effect.fail(
		new QueryStringValidationError({
			errors,
			message: errors.map((error) => error.message).join(" "),
		}),
	);
};

const createOperationsRoute = (
	graph: ResourceGraphShape,
	basePath: string,
	run: RouteRunner,
): RouteDescriptor => {
	const path = `${basePath}/operations`;
	return {
		method: "POST",
		path,
		handler: (req) =>
			run(
				req,
				Effect.gen(function* () {
					yield* rejectQueryString(req.query);
					const options = yield* ApiOptions;
					const operations = yield* readAtomicOperations(graph, options, req.body);
					const results = yield* processOperations(operations);
					const document = buildAtomicResultsDocument(
						graph,
						results,
						serializationSettings(options),
					);
					return document["atomic:results"].every(
						(result) => result.data === undefined,
					)
						? noContent
						: { status: 200, body: document };
				}).pipe(logged("POST", path)),
			),
	};
};

// ============================================================================
// Handler Factory
// ============================================================================

/**
 * Create JSON:API handlers for every resource type in the graph.
 *
 * Generated routes per resource type:
 * - GET    /:type                          collection, with query string
 * - GET    /:type/:id                      single resource
 * - POST   /:type                          create
 * - PATCH  /:type/:id                      update
 * - DELETE /:type/:id                      delete
 * - GET    /:type/:id/:relationship        related resources
 * - GET    /:type/:id/relationships/:name  relationship identifiers
 * - PATCH  /:type/:id/relationships/:name  replace relationship
 * - POST   /:type/:id/relationships/:name  add to to-many relationship
 * - DELETE /:type/:id/relationships/:name  remove from to-many relationship
 *
 * plus `POST /operations` for atomic operations.
 *
 * @example
 * ```typescript
 * const routes = createJsonApiHandlers(graph, appLayer)
 *
 * for (const { method, path, handler } of routes) {
 *   app[method.toLowerCase()](path, async (req, res) => {
 *     const response = await handler({
 *       params: req.params,
 *       query: req.query,
 *       body: req.body,
 *     })
 *     res.status(response.status).set(response.headers ?? {}).json(response.body)
 *   })
 * }
 * ```
 */
export const createJsonApiHandlers = <LayerError extends JsonApiError | ConfigError.ConfigError>(
	graph: ResourceGraphShape,
	layer: Layer.Layer<JsonApiEnvironment, LayerError>,
	options: JsonApiHandlerOptions = {},
): ReadonlyArray<RouteDescriptor> => {
	const basePath = options.basePath ?? "";
	const run = makeRunner(ManagedRuntime.make(layer), {
		errorAbout: options.errorAbout,
	});
	const routes: Array<RouteDescriptor> = [];

	for (const context of graph.resourceContexts) {
		routes.push(...createResourceRoutes(graph, context, basePath, run));
		routes.push(...createRelationshipRoutes(graph, context, basePath, run));
	}

	if (options.enableAtomicOperations ?? true) {
		routes.push(createOperationsRoute(graph, basePath, run));
	}

	return routes;
};
