import { ConfigProvider, Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	ApiOptions,
	ApiOptionsFromConfigLayer,
	DEFAULT_API_OPTIONS,
	makeApiOptions,
} from "../src/config/api-options.js";

const loadFrom = (entries: ReadonlyArray<readonly [string, string]>) =>
	ApiOptions.pipe(
		Effect.provide(ApiOptionsFromConfigLayer),
		Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))),
	);

describe("makeApiOptions", () => {
	it("fills every option left out with its default", () => {
		const options = makeApiOptions({ defaultPageSize: undefined, omitNullValues: true });
		expect(options).toEqual({
			...DEFAULT_API_OPTIONS,
			defaultPageSize: undefined,
			omitNullValues: true,
		});
		expect(options.maximumOperationsPerRequest).toBe(10);
	});
});

describe("ApiOptionsFromConfigLayer", () => {
	it("uses the defaults when nothing is configured", () => {
		expect(Effect.runSync(loadFrom([]))).toEqual(DEFAULT_API_OPTIONS);
	});

	it("reads flags and limits from the config provider", () => {
		const options = Effect.runSync(
			loadFrom([
				["JSONAPI_ALLOW_UNKNOWN_QUERY_STRING_PARAMETERS", "true"],
				["JSONAPI_DEFAULT_PAGE_SIZE", "25"],
				["JSONAPI_MAXIMUM_INCLUDE_DEPTH", "3"],
				["JSONAPI_OMIT_DEFAULT_VALUES", "true"],
			]),
		);
		expect(options.allowUnknownQueryStringParameters).toBe(true);
		expect(options.defaultPageSize).toBe(25);
		expect(options.maximumIncludeDepth).toBe(3);
		expect(options.omitDefaultValues).toBe(true);
		expect(options.enableResourceHooks).toBe(false);
	});

	it("rejects a limit that is not positive", () => {
		const error = Effect.runSync(
			Effect.flip(loadFrom([["JSONAPI_DEFAULT_PAGE_SIZE", "0"]])),
		);
		expect(error).toMatchObject({
			_op: "InvalidData",
			message: "Expected a positive integer",
		});
	});
});
