/**
 * Shared resource graph and seed data for the core tests.
 */

import { Effect, Layer, Schema } from "effect";
import {
	type ApiOptionsShape,
	makeApiOptionsLayer,
} from "../../src/config/api-options.js";
import {
	type ResourceGraphShape,
	buildResourceGraph,
	makeResourceGraphLayer,
} from "../../src/graph/resource-graph.js";
import type { ResourceGraphConfig } from "../../src/graph/graph-types.js";
import { makeResourceHooksLayer } from "../../src/hooks/hook-runner.js";
import type { ResourceHooksRegistration } from "../../src/hooks/hook-types.js";
import { makeProcessorRegistryLayer } from "../../src/atomic/processors.js";
import type { ProcessorOverrides } from "../../src/atomic/processors.js";
import {
	type ResourceServiceOverrides,
	makeResourceServicesLayer,
} from "../../src/services/resource-services-layer.js";
import {
	type StoreSeed,
	makeInMemoryStoreLayer,
} from "../../src/storage/in-memory-store-layer.js";

// ============================================================================
// Schemas
// ============================================================================

const PersonSchema = Schema.Struct({
	id: Schema.String,
	name: Schema.String,
	age: Schema.optional(Schema.Number),
});

const ArticleSchema = Schema.Struct({
	id: Schema.String,
	title: Schema.String,
	views: Schema.Number,
	published: Schema.Boolean,
	caption: Schema.NullOr(Schema.String),
	secret: Schema.String,
});

const CommentSchema = Schema.Struct({
	id: Schema.String,
	body: Schema.String,
});

const TagSchema = Schema.Struct({
	id: Schema.String,
	name: Schema.String,
});

const WorkItemSchema = Schema.Struct({
	id: Schema.String,
	description: Schema.String,
	priority: Schema.Number,
});

// ============================================================================
// Graph
// ============================================================================

export const blogGraphConfig: ResourceGraphConfig = {
	people: {
		schema: PersonSchema,
		identityType: "number",
		relationships: {
			articles: { kind: "hasMany", target: "articles" },
		},
	},
	articles: {
		schema: ArticleSchema,
		relationships: {
			author: { kind: "hasOne", target: "people" },
			comments: { kind: "hasMany", target: "comments" },
			tags: { kind: "hasMany", target: "tags", canInclude: false },
		},
		attributes: {
			secret: { view: false, filter: false, sort: false },
			views: { change: false },
		},
	},
	comments: {
		schema: CommentSchema,
		relationships: {
			author: { kind: "hasOne", target: "people" },
		},
	},
	tags: {
		schema: TagSchema,
	},
	workItems: {
		schema: WorkItemSchema,
		relationships: {
			assignee: { kind: "hasOne", target: "people" },
			subscribers: { kind: "hasMany", target: "people" },
		},
	},
};

export const blogGraph: ResourceGraphShape = Effect.runSync(
	buildResourceGraph(blogGraphConfig),
);

// ============================================================================
// Seed
// ============================================================================

export const blogSeed: StoreSeed = {
	people: [
		{
			type: "people",
			id: "1",
			attributes: { name: "Ann", age: 30 },
			relationships: { articles: [] },
		},
		{
			type: "people",
			id: "2",
			attributes: { name: "Bob", age: 25 },
			relationships: { articles: [] },
		},
	],
	articles: [
		{
			type: "articles",
			id: "1",
			attributes: {
				title: "Alpha",
				views: 10,
				published: true,
				caption: null,
				secret: "s1",
			},
			relationships: {
				author: { type: "people", id: "1" },
				comments: [
					{ type: "comments", id: "1" },
					{ type: "comments", id: "2" },
				],
				tags: [{ type: "tags", id: "1" }],
			},
		},
		{
			type: "articles",
			id: "2",
			attributes: {
				title: "Beta",
				views: 3,
				published: false,
				caption: "second",
				secret: "s2",
			},
			relationships: {
				author: { type: "people", id: "2" },
				comments: [],
				tags: [],
			},
		},
		{
			type: "articles",
			id: "3",
			attributes: {
				title: "Gamma",
				views: 7,
				published: true,
				caption: null,
				secret: "s3",
			},
			relationships: {
				author: { type: "people", id: "1" },
				comments: [{ type: "comments", id: "3" }],
				tags: [
					{ type: "tags", id: "1" },
					{ type: "tags", id: "2" },
				],
			},
		},
	],
	comments: [
		{
			type: "comments",
			id: "1",
			attributes: { body: "First" },
			relationships: { author: { type: "people", id: "2" } },
		},
		{
			type: "comments",
			id: "2",
			attributes: { body: "Second" },
			relationships: { author: { type: "people", id: "1" } },
		},
		{
			type: "comments",
			id: "3",
			attributes: { body: "Third" },
			relationships: { author: { type: "people", id: "2" } },
		},
	],
	tags: [
		{ type: "tags", id: "1", attributes: { name: "news" }, relationships: {} },
		{ type: "tags", id: "2", attributes: { name: "tech" }, relationships: {} },
	],
	workItems: [
		{
			type: "workItems",
			id: "1",
			attributes: { description: "Fix the build", priority: 1 },
			relationships: {
				assignee: { type: "people", id: "1" },
				subscribers: [{ type: "people", id: "2" }],
			},
		},
	],
};

// ============================================================================
// Layers
// ============================================================================

export interface TestLayerOptions {
	readonly options?: Partial<ApiOptionsShape>;
	readonly seed?: StoreSeed;
	readonly hooks?: ReadonlyArray<ResourceHooksRegistration>;
	readonly services?: ResourceServiceOverrides;
	readonly processors?: ProcessorOverrides;
}

/**
 * Graph, options and in-memory store.
 */
export const makeBaseLayer = (settings: TestLayerOptions = {}) =>
	Layer.mergeAll(
		makeResourceGraphLayer(blogGraphConfig),
		makeApiOptionsLayer(settings.options),
		makeInMemoryStoreLayer(settings.seed ?? blogSeed),
	);

/**
 * Everything the services and the atomic pipeline need, over one store.
 */
export const makeTestLayer = (settings: TestLayerOptions = {}) =>
	makeProcessorRegistryLayer(settings.processors).pipe(
		Layer.provideMerge(makeResourceServicesLayer(settings.services)),
		Layer.provideMerge(makeResourceHooksLayer(settings.hooks ?? [])),
		Layer.provideMerge(makeBaseLayer(settings)),
	);

/**
 * Every service `makeTestLayer` provides.
 */
export type TestServices = Layer.Layer.Success<ReturnType<typeof makeTestLayer>>;
