import { describe, expect, it } from "vitest";
import { makeLibrary } from "./fixtures/library.js";

const identifiers = (...ids: Array<string>) =>
	ids.map((id) => ({ type: "authors", id }));

describe("related resource routes", () => {
	it("returns the target of a to-one relationship as primary data", async () => {
		const response = await makeLibrary().send("GET", "/books/:id/author", {
			params: { id: "1" },
		});

		expect(response.status).toBe(200);
		expect(response.body).toEqual({
			data: {
				type: "authors",
				id: "2",
				attributes: { name: "Frank" },
				relationships: { books: { data: [] } },
			},
		});
	});

	it("returns a to-many relationship as a collection", async () => {
		const response = await makeLibrary().send("GET", "/books/:id/reviewers", {
			params: { id: "2" },
		});

		expect(response.body).toEqual({ data: [] });
	});

	it("returns 404 when the owner does not exist", async () => {
		const response = await makeLibrary().send("GET", "/books/:id/author", {
			params: { id: "9" },
		});

		expect(response.status).toBe(404);
	});
});

describe("relationship routes", () => {
	it("returns the identifiers of a relationship", async () => {
		const { send } = makeLibrary();
		const toMany = await send("GET", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
		});
		const toOne = await send("GET", "/books/:id/relationships/author", {
			params: { id: "1" },
		});

		expect(toMany.body).toEqual({ data: identifiers("1") });
		expect(toOne.body).toEqual({ data: { type: "authors", id: "2" } });
	});

	it("replaces a to-one relationship", async () => {
		const { send } = makeLibrary();
		const response = await send("PATCH", "/books/:id/relationships/author", {
			params: { id: "2" },
			body: { data: { type: "authors", id: "2" } },
		});
		expect(response).toEqual({ status: 204, body: undefined });

		const read = await send("GET", "/books/:id/relationships/author", {
			params: { id: "2" },
		});
		expect(read.body).toEqual({ data: { type: "authors", id: "2" } });
	});

	it("clears a to-one relationship", async () => {
		const { send } = makeLibrary();
		await send("PATCH", "/books/:id/relationships/author", {
			params: { id: "1" },
			body: { data: null },
		});

		const read = await send("GET", "/books/:id/relationships/author", {
			params: { id: "1" },
		});
		expect(read.body).toEqual({ data: null });
	});

	it("adds to and removes from a to-many relationship", async () => {
		const { send } = makeLibrary();
		const added = await send("POST", "/books/:id/relationships/reviewers", {
			params: { id: "2" },
			body: { data: identifiers("2", "1") },
		});
		expect(added.status).toBe(204);
		const afterAdd = await send("GET", "/books/:id/relationships/reviewers", {
			params: { id: "2" },
		});
		expect(afterAdd.body).toEqual({ data: identifiers("1", "2") });

		await send("DELETE", "/books/:id/relationships/reviewers", {
			params: { id: "2" },
			body: { data: identifiers("1") },
		});
		const afterRemove = await send("GET", "/books/:id/relationships/reviewers", {
			params: { id: "2" },
		});
		expect(afterRemove.body).toEqual({ data: identifiers("2") });
	});

	it("replaces a to-many relationship", async () => {
		const { send } = makeLibrary();
		await send("PATCH", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
			body: { data: [] },
		});

		const read = await send("GET", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
		});
		expect(read.body).toEqual({ data: [] });
	});

	it("rejects a list for a to-one relationship", async () => {
		const response = await makeLibrary().send("PATCH", "/books/:id/relationships/author", {
			params: { id: "1" },
			body: { data: identifiers("1") },
		});

		expect(response.body).toEqual({
			errors: [
				{
					status: "422",
					title: "Expected single data element for to-one relationship.",
					detail: "Expected single data element for 'author' relationship.",
					source: { pointer: "/data" },
				},
			],
		});
	});

	it("points at an identifier of the wrong type", async () => {
		const response = await makeLibrary().send("POST", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
			body: { data: [{ type: "books", id: "2" }] },
		});

		expect(response.body).toEqual({
			errors: [
				{
					status: "422",
					title: "Incompatible resource type found.",
					detail: "Type 'books' is incompatible with type 'authors' of relationship 'reviewers'.",
					source: { pointer: "/data[0]/type" },
				},
			],
		});
	});

	it("reports a related resource that does not exist", async () => {
		const { send } = makeLibrary();
		const response = await send("POST", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
			body: { data: identifiers("9") },
		});

		expect(response.status).toBe(404);
		expect(response.body).toMatchObject({
			errors: [{ title: "A related resource does not exist." }],
		});
		const read = await send("GET", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
		});
		expect(read.body).toEqual({ data: identifiers("1") });
	});

	it("points at the missing identifier in the request order", async () => {
		const response = await makeLibrary().send("POST", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
			body: { data: identifiers("9", "2") },
		});

		expect(response.status).toBe(404);
		expect(response.body).toMatchObject({
			errors: [{ source: { pointer: "/data[0]" } }],
		});

		const second = await makeLibrary().send("POST", "/books/:id/relationships/reviewers", {
			params: { id: "1" },
			body: { data: identifiers("2", "10") },
		});
		expect(second.body).toMatchObject({
			errors: [{ source: { pointer: "/data[1]" } }],
		});
	});

	it("rejects local IDs outside atomic operations", async () => {
		const response = await makeLibrary().send("PATCH", "/books/:id/relationships/author", {
			params: { id: "1" },
			body: { data: { type: "authors", lid: "a1" } },
		});

		expect(response.body).toEqual({
			errors: [
				{
					status: "422",
					title: "The 'lid' element is not supported at this endpoint.",
					source: { pointer: "/data/lid" },
				},
			],
		});
	});
});
