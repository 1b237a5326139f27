/**
 * Relationship sub-routes for every relationship in the resource graph.
 *
 * For each relationship `r` on type `t`:
 *   GET    /t/:id/r                  related resources as primary data
 *   GET    /t/:id/relationships/r    resource identifiers
 *   PATCH  /t/:id/relationships/r    replace the relationship
 *
 * and for to-many relationships additionally:
 *   POST   /t/:id/relationships/r    add members
 *   DELETE /t/:id/relationships/r    remove members
 *
 * @module
 */

import { Effect } from "effect";
import {
	type JsonApiRequest,
	OperationsTransaction,
	type OperationKind,
	type RelationshipDefinition,
	RequestBodyError,
	type ResourceContext,
	type ResourceGraphShape,
	buildRelationshipDocument,
	buildResourceDocument,
	isIdentitySet,
	pointAtRightResource,
	readQueryString,
	resolveRightValue,
} from "@jsonweave/core";
import type { HttpMethod, RestHandler, RestRequest, RouteDescriptor } from "./handlers.js";
import { RelationshipDocumentBody, decodeBody, validateRelationshipData } from "./request-body.js";
import {
	type RouteEffect,
	type RouteRunner,
	noContent,
	requireService,
} from "./route-support.js";

const relationshipRequest = (
	graph: ResourceGraphShape,
	context: ResourceContext,
	relationship: RelationshipDefinition,
	kind: "secondary" | "relationship",
): JsonApiRequest => ({
	kind,
	primaryResource: context,
	secondaryResource: graph.getRightContext(relationship),
	relationship,
	isCollection: relationship.cardinality === "hasMany",
});

/**
 * Decode a relationship document into the right value of a change, and a
 * wrapper that points a missing related resource at its place in `data`.
 */
const readRightValue = (
	context: ResourceContext,
	relationship: RelationshipDefinition,
	id: string,
	kind: OperationKind,
	req: RestRequest,
) =>
	Effect.gen(function* () {
		const document = yield* decodeBody(RelationshipDocumentBody, req.body);
		const value = yield* validateRelationshipData(
			relationship,
			document.data,
			"/data",
			false,
		);
		const right = yield* resolveRightValue(relationship, {
			kind,
			relationshipName: relationship.publicName,
			resource: {
				type: context.publicName,
				id,
				attributes: {},
				relationships: { [relationship.publicName]: value },
			},
		});
		return { right, located: pointAtRightResource(value) };
	});

const toManyValue = (relationship: RelationshipDefinition) =>
	new RequestBodyError({
		title: "Expected data[] element for to-many relationship.",
		detail: `Expected data[] element for '${relationship.publicName}' relationship.`,
		pointer: "/data",
		message: `Expected data[] element for '${relationship.publicName}' relationship.`,
	});

export const createRelationshipRoutes = (
	graph: ResourceGraphShape,
	context: ResourceContext,
	basePath: string,
	run: RouteRunner,
): ReadonlyArray<RouteDescriptor> => {
	const type = context.publicName;
	const routes: Array<RouteDescriptor> = [];

	const route = (
		method: HttpMethod,
		path: string,
		effect: (req: RestRequest, id: string) => RouteEffect,
	) => {
		const handler: RestHandler = (req) =>
			run(
				req,
				effect(req, req.params.id ?? "").pipe(
					Effect.annotateLogs({ method, path }),
					Effect.withLogSpan("request"),
				),
			);
		routes.push({ method, path, handler });
	};

	for (const relationship of context.relationships) {
		const name = relationship.publicName;
		const secondaryPath = `${basePath}/${type}/:id/${name}`;
		const relationshipPath = `${basePath}/${type}/:id/relationships/${name}`;
		const toMany = relationship.cardinality === "hasMany";

		route("GET", secondaryPath, (req, id) =>
			Effect.gen(function* () {
				const specification = yield* readQueryString(
					relationshipRequest(graph, context, relationship, "secondary"),
					req.query,
				);
				const service = yield* requireService(type, "GET");
				const transaction = yield* OperationsTransaction;
				const result = yield* transaction.read(
					service.getSecondary(id, name, specification),
				);
				return {
					status: 200,
					body: buildResourceDocument(graph, result, specification, toMany),
				};
			}),
		);

		route("GET", relationshipPath, (req, id) =>
			Effect.gen(function* () {
				yield* readQueryString(
					relationshipRequest(graph, context, relationship, "relationship"),
					req.query,
				);
				const service = yield* requireService(type, "GET");
				const transaction = yield* OperationsTransaction;
				const value = yield* transaction.read(service.getRelationship(id, name));
				return { status: 200, body: buildRelationshipDocument(value) };
			}),
		);

		route("PATCH", relationshipPath, (req, id) =>
			Effect.gen(function* () {
				const { right, located } = yield* readRightValue(
					context,
					relationship,
					id,
					"SetRelationship",
					req,
				);
				const service = yield* requireService(type, "PATCH");
				const transaction = yield* OperationsTransaction;
				yield* transaction.run(
					located(
						service.setRelationship(id, name, right, "PatchRelationship"),
					),
				);
				return noContent;
			}),
		);

		if (!toMany) continue;

		route("POST", relationshipPath, (req, id) =>
			Effect.gen(function* () {
				const { right, located } = yield* readRightValue(
					context,
					relationship,
					id,
					"AddToRelationship",
					req,
				);
				if (right === null || !isIdentitySet(right)) {
					return yield* toManyValue(relationship);
				}
				const service = yield* requireService(type, "POST");
				const transaction = yield* OperationsTransaction;
				yield* transaction.run(
					located(
						service.addToRelationship(id, name, right, "PatchRelationship"),
					),
				);
				return noContent;
			}),
		);

		route("DELETE", relationshipPath, (req, id) =>
			Effect.gen(function* () {
				const { right, located } = yield* readRightValue(
					context,
					relationship,
					id,
					"RemoveFromRelationship",
					req,
				);
				if (right === null || !isIdentitySet(right)) {
					return yield* toManyValue(relationship);
				}
				const service = yield* requireService(type, "DELETE");
				const transaction = yield* OperationsTransaction;
				yield* transaction.run(
					located(
						service.removeFromRelationship(id, name, right, "PatchRelationship"),
					),
				);
				return noContent;
			}),
		);
	}

	return routes;
};
