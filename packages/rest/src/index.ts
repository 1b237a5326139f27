/**
 * @jsonweave/rest: framework-agnostic JSON:API handlers.
 *
 * Given a resource graph and a layer providing the JSON:API services,
 * generates route descriptors for resources, relationships and atomic
 * operations.
 *
 * @example
 * ```ts
 * import { createJsonApiHandlers } from "@jsonweave/rest"
 *
 * const routes = createJsonApiHandlers(graph, appLayer)
 *
 * // Framework-agnostic handler signature:
 * // (req: { params, query, body, signal? }) => Promise<{ status, body, headers? }>
 * ```
 *
 * @module
 */

// ============================================================================
// Handler Generation
// ============================================================================

export {
	createJsonApiHandlers,
	type HttpMethod,
	type JsonApiHandlerOptions,
	type RestHandler,
	type RestRequest,
	type RestResponse,
	type RouteDescriptor,
} from "./handlers.js";

export type { JsonApiEnvironment } from "./route-support.js";

// ============================================================================
// Request Bodies
// ============================================================================

export {
	AtomicOperationsBody,
	RelationshipDocumentBody,
	ResourceDocumentBody,
	decodeBody,
	issuePointer,
	readAtomicOperations,
	validateRelationshipData,
	validateResource,
	type ResourceValidation,
	type WriteMode,
} from "./request-body.js";

// ============================================================================
// Error Mapping
// ============================================================================

export {
	type ErrorMappingOptions,
	type ErrorResponse,
	mapCauseToResponse,
	mapErrorToResponse,
} from "./error-mapping.js";

// ============================================================================
// Relationship Routes
// ============================================================================

export { createRelationshipRoutes } from "./relationship-routes.js";
