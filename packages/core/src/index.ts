/**
 * Main entry point for @jsonweave/core.
 *
 * Exports the resource graph, the query-string readers, atomic operations,
 * resource hooks, the default resource services with their in-memory store,
 * and the JSON:API document builders.
 */

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	QueryParseError,
	InvalidQueryStringParameterError,
	QueryStringValidationError,
	LocalIdAlreadyDeclaredError,
	LocalIdNotFoundError,
	UnsupportedOperationError,
	TooManyOperationsError,
	RequestBodyError,
	ResourceNotFoundError,
	HookError,
	TransactionError,
	InvalidConfigurationError,
	parseError,
	invalidParameter,
	operationPointer,
	mapPointer,
	prefixWithOperation,
} from "./errors/index.js";

export type {
	JsonApiError,
	QueryStringParameterError,
	LocalIdError,
	PointerError,
} from "./errors/index.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	ApiOptions,
	DEFAULT_API_OPTIONS,
	makeApiOptions,
	makeApiOptionsLayer,
	ApiOptionsConfig,
	ApiOptionsFromConfigLayer,
} from "./config/api-options.js";

export type { ApiOptionsShape } from "./config/api-options.js";

// ============================================================================
// Resource Graph
// ============================================================================

export {
	ResourceGraph,
	buildResourceGraph,
	makeResourceGraphLayer,
	findAttribute,
	findRelationship,
} from "./graph/resource-graph.js";

export type { ResourceGraphShape } from "./graph/resource-graph.js";

export { isToMany, isToOne } from "./graph/graph-types.js";

export type {
	RelationshipConfig,
	AttributeCapabilities,
	ResourceConfig,
	ResourceGraphConfig,
	AttributeKind,
	AttributeDefinition,
	RelationshipDefinition,
	ResourceField,
	ResourceContext,
} from "./graph/graph-types.js";

// ============================================================================
// Resource Types
// ============================================================================

export {
	isToManyValue,
	identifiersOf,
	identityKey,
} from "./types/resource-types.js";

export type {
	ResourceIdentifier,
	ResourceIdentity,
	RelationshipValue,
	ResourceObject,
	StoredResource,
	ResourceQueryResult,
} from "./types/resource-types.js";

// ============================================================================
// Query Strings
// ============================================================================

export {
	fieldChain,
	literal,
	nullConstant,
	andAll,
	scopeKey,
} from "./query/expressions.js";

export type {
	ResourceFieldChain,
	LiteralConstant,
	NullConstant,
	CountExpression,
	ComparisonOperator,
	ComparisonExpression,
	TextMatchKind,
	MatchTextExpression,
	AnyExpression,
	LogicalOperator,
	LogicalExpression,
	NotExpression,
	HasExpression,
	FilterExpression,
	SortElementExpression,
	SortExpression,
	IncludeElementExpression,
	IncludeExpression,
	PaginationExpression,
	SparseFieldSetExpression,
	SparseFieldTableExpression,
	ValueHandlingExpression,
	QueryExpression,
	ExpressionInScope,
} from "./query/expressions.js";

export { formatExpression, formatExpressionInScope } from "./query/format.js";

export {
	emptyQuerySpecification,
	getFilter,
	getSort,
	getPagination,
	getInclude,
	getSparseFieldSet,
	formatQuerySpecification,
} from "./query/query-specification.js";

export type {
	QuerySpecification,
	SerializationSettings,
} from "./query/query-specification.js";

export { readQueryString, createReaders } from "./query/read-query-string.js";

export type { QueryCollection } from "./query/read-query-string.js";

export {
	ALL_QUERY_PARAMETER_KINDS,
	parseParameterName,
	requestResourceContext,
} from "./query/readers/query-string-reader.js";

export type {
	JsonApiRequest,
	QueryParameterKind,
	QueryStringParameterReader,
} from "./query/readers/query-string-reader.js";

export { parseFilter } from "./query/parsers/filter-parser.js";
export { parseSort } from "./query/parsers/sort-parser.js";
export { parseInclude } from "./query/parsers/include-parser.js";

// ============================================================================
// Atomic Operations
// ============================================================================

export {
	isRelationshipOperation,
	secondaryReferences,
} from "./atomic/operations.js";

export type {
	OperationKind,
	OperationContainer,
} from "./atomic/operations.js";

export {
	LocalIdTracker,
	LocalIdTrackerLive,
	makeLocalIdTracker,
} from "./atomic/local-id-tracker.js";

export type { LocalIdTrackerShape } from "./atomic/local-id-tracker.js";

export { validateLocalIds } from "./atomic/local-id-validator.js";

export { OperationsTransaction } from "./atomic/operations-transaction.js";

export type { OperationsTransactionShape } from "./atomic/operations-transaction.js";

export {
	ProcessorRegistry,
	makeProcessorRegistryLayer,
	makeCreateProcessor,
	makeUpdateProcessor,
	makeDeleteProcessor,
	makeSetRelationshipProcessor,
	makeAddToRelationshipProcessor,
	makeRemoveFromRelationshipProcessor,
	pointAtRightResource,
	resolveRightValue,
} from "./atomic/processors.js";

export type {
	OperationProcessor,
	ProcessorRegistryShape,
	ProcessorOverrides,
} from "./atomic/processors.js";

export { processOperations } from "./atomic/process-operations.js";

export type {
	OperationResult,
	ProcessOperationsError,
} from "./atomic/process-operations.js";

// ============================================================================
// Resource Hooks
// ============================================================================

export { ResourceHooks, makeResourceHooksLayer } from "./hooks/hook-runner.js";

export type { ResourceHooksShape } from "./hooks/hook-runner.js";

export type {
	ResourcePipeline,
	ResourceHooksDefinition,
	ResourceHooksRegistration,
} from "./hooks/hook-types.js";

// ============================================================================
// Resource Services & Storage
// ============================================================================

export {
	ResourceServices,
	resourceIdentity,
	identitySet,
	isIdentitySet,
} from "./services/resource-service.js";

export type {
	ResourceServiceShape,
	ResourceServicesShape,
	ResourceServiceError,
	ResourceIdentitySet,
	RelationshipRightValue,
} from "./services/resource-service.js";

export { makeDefaultResourceService } from "./services/default-resource-service.js";
export { validateAttributes } from "./validators/schema-validator.js";

export { makeResourceServicesLayer } from "./services/resource-services-layer.js";

export type { ResourceServiceOverrides } from "./services/resource-services-layer.js";

export { ResourceRepository } from "./storage/storage-service.js";

export type { ResourceRepositoryShape } from "./storage/storage-service.js";

export { makeInMemoryStoreLayer } from "./storage/in-memory-store-layer.js";

export type { StoreSeed } from "./storage/in-memory-store-layer.js";

// ============================================================================
// Serialization
// ============================================================================

export {
	serializeResource,
	buildResourceDocument,
	buildRelationshipDocument,
	buildAtomicResultsDocument,
} from "./serialization/resource-document.js";

export type {
	ResourceIdentifierObject,
	ResourceObjectDocument,
	ResourceDocument,
	RelationshipDocument,
	AtomicResultsDocument,
} from "./serialization/resource-document.js";

export {
	ERROR_STATUS_MAP,
	internalErrorObject,
	toErrorObjects,
	errorDocumentStatus,
	buildErrorDocument,
} from "./serialization/error-document.js";

export type {
	ErrorObject,
	ErrorLinks,
	ErrorDocument,
} from "./serialization/error-document.js";
