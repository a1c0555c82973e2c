/**
 * Tests for filter-helpers.ts: property paths, metadata resolution and
 * join chains.
 */

import { createRequest } from "@apilayer/core";
import { Either, Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	addJoinsForNestedProperty,
	extractProperties,
	getNestedMetadata,
	getPropertySetting,
	isPropertyEnabled,
	isPropertyMapped,
	isPropertyNested,
	resolveFilterProperty,
	splitPropertyParts,
} from "../src/filters/filter-helpers.js";
import { makeQueryBuilder } from "../src/query-builder.js";
import { makeQueryNameGenerator } from "../src/query-name-generator.js";
import { runWithMetadata } from "./fixtures.js";

// ============================================================================
// Property paths
// ============================================================================

describe("isPropertyNested", () => {
	it("is true only for dotted properties", () => {
		expect(isPropertyNested("name")).toBe(false);
		expect(isPropertyNested("author.name")).toBe(true);
		expect(isPropertyNested("author.address.city")).toBe(true);
	});
});

describe("splitPropertyParts", () => {
	it("splits a nested property into associations and field", () => {
		expect(splitPropertyParts("author.name")).toEqual({
			associations: ["author"],
			field: "name",
		});
	});

	it("keeps association order from outermost to innermost", () => {
		expect(splitPropertyParts("author.address.city")).toEqual({
			associations: ["author", "address"],
			field: "city",
		});
	});

	it("returns no associations for a plain property", () => {
		expect(splitPropertyParts("name")).toEqual({
			associations: [],
			field: "name",
		});
	});
});

describe("isPropertyEnabled", () => {
	it("enables plain properties and disables nested ones without an allow-list", () => {
		expect(isPropertyEnabled("name", null)).toBe(true);
		expect(isPropertyEnabled("author.name", null)).toBe(false);
	});

	it("enables exactly the allow-listed properties", () => {
		const properties = { "author.name": null };

		expect(isPropertyEnabled("author.name", properties)).toBe(true);
		expect(isPropertyEnabled("name", properties)).toBe(false);
	});
});

describe("getPropertySetting", () => {
	it("returns the setting of an allow-listed property", () => {
		expect(getPropertySetting("title", { title: "desc" })).toBe("desc");
		expect(getPropertySetting("title", { title: null })).toBeNull();
	});

	it("returns null for names only found on Object.prototype", () => {
		const properties = { title: "asc" };

		expect(getPropertySetting("toString", properties)).toBeNull();
		expect(getPropertySetting("constructor", properties)).toBeNull();
		expect(getPropertySetting("__proto__", properties)).toBeNull();
	});

	it("returns null without an allow-list", () => {
		expect(getPropertySetting("title", null)).toBeNull();
	});
});

// ============================================================================
// Metadata resolution
// ============================================================================

describe("getNestedMetadata", () => {
	it("follows associations to the innermost class", () => {
		const result = runWithMetadata(
			getNestedMetadata("books", ["author", "address"]),
		);

		expect(Either.getOrThrow(result).name).toBe("addresses");
	});

	it("returns the root metadata without associations", () => {
		const result = runWithMetadata(getNestedMetadata("books", []));

		expect(Either.getOrThrow(result).name).toBe("books");
	});

	it("stays on the current class for a segment that is not an association", () => {
		const result = runWithMetadata(getNestedMetadata("books", ["title"]));

		expect(Either.getOrThrow(result).name).toBe("books");
	});

	it("keeps walking from the current class after such a segment", () => {
		const result = runWithMetadata(
			getNestedMetadata("books", ["publisher", "author"]),
		);

		expect(Either.getOrThrow(result).name).toBe("authors");
	});

	it("fails for an unknown root class", () => {
		const result = runWithMetadata(getNestedMetadata("movies", ["director"]));

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ResourceClassNotFoundError");
		}
	});
});

describe("isPropertyMapped", () => {
	const mapped = (property: string, allowAssociation?: boolean) =>
		Either.getOrThrow(
			runWithMetadata(isPropertyMapped(property, "books", allowAssociation)),
		);

	it("maps fields of the root class", () => {
		expect(mapped("title")).toBe(true);
		expect(mapped("missing")).toBe(false);
	});

	it("maps fields reached through associations", () => {
		expect(mapped("author.name")).toBe(true);
		expect(mapped("author.address.city")).toBe(true);
		expect(mapped("author.missing")).toBe(false);
	});

	it("maps associations only when allowed", () => {
		expect(mapped("author")).toBe(false);
		expect(mapped("author", true)).toBe(true);
		expect(mapped("author.address", true)).toBe(true);
	});
});

// ============================================================================
// Joins
// ============================================================================

describe("addJoinsForNestedProperty", () => {
	it("adds one join for a single association", () => {
		const queryBuilder = makeQueryBuilder("books");

		const result = runWithMetadata(
			addJoinsForNestedProperty(
				"author.name",
				"o",
				queryBuilder,
				makeQueryNameGenerator(),
			),
		);

		expect(Either.getOrThrow(result)).toEqual(["author_a1", "name"]);
		expect(queryBuilder.getJoins()).toEqual([
			{ join: "o.author", alias: "author_a1" },
		]);
	});

	it("chains joins from each alias to the next", () => {
		const queryBuilder = makeQueryBuilder("books");

		const result = runWithMetadata(
			addJoinsForNestedProperty(
				"author.address.city",
				"o",
				queryBuilder,
				makeQueryNameGenerator(),
			),
		);

		expect(Either.getOrThrow(result)).toEqual(["address_a2", "city"]);
		expect(queryBuilder.getJoins()).toEqual([
			{ join: "o.author", alias: "author_a1" },
			{ join: "author_a1.address", alias: "address_a2" },
		]);
	});

	it("fails with InvalidArgumentError for a plain property", () => {
		const queryBuilder = makeQueryBuilder("books");

		const result = runWithMetadata(
			addJoinsForNestedProperty("name", "o", queryBuilder, makeQueryNameGenerator()),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("InvalidArgumentError");
			expect(result.left.message).toBe(
				'Cannot add joins for property "name" - property is not nested.',
			);
		}
		expect(queryBuilder.getJoins()).toEqual([]);
	});
});

describe("resolveFilterProperty", () => {
	const resolve = (
		property: string,
		properties: Readonly<Record<string, string | null>> | null,
	) => {
		const queryBuilder = makeQueryBuilder("books");
		const resolved = Either.getOrThrow(
			runWithMetadata(
				resolveFilterProperty(
					property,
					"books",
					properties,
					queryBuilder,
					makeQueryNameGenerator(),
				),
			),
		);
		return { resolved, joins: queryBuilder.getJoins() };
	};

	it("resolves a plain property to the root alias", () => {
		const { resolved, joins } = resolve("title", null);

		expect(Option.getOrThrow(resolved)).toEqual(["o", "title"]);
		expect(joins).toEqual([]);
	});

	it("joins an allow-listed nested property", () => {
		const { resolved, joins } = resolve("author.name", { "author.name": null });

		expect(Option.getOrThrow(resolved)).toEqual(["author_a1", "name"]);
		expect(joins).toHaveLength(1);
	});

	it("skips a nested property that is not allow-listed", () => {
		const { resolved, joins } = resolve("author.name", null);

		expect(Option.isNone(resolved)).toBe(true);
		expect(joins).toEqual([]);
	});

	it("skips an unmapped property", () => {
		const { resolved } = resolve("author.missing", { "author.missing": null });

		expect(Option.isNone(resolved)).toBe(true);
	});
});

// ============================================================================
// Request properties
// ============================================================================

describe("extractProperties", () => {
	it("returns the parsed query when nothing needs fixing", () => {
		const request = createRequest({
			query: { title: "Dune" },
			queryString: "title=Dune",
		});

		expect(extractProperties(request, { title: null })).toBe(request.query);
	});

	it("recovers dotted names rewritten with underscores", () => {
		const request = createRequest({
			query: { author_name: "Le Guin" },
			queryString: "author.name=Le%20Guin",
		});

		expect(extractProperties(request, { "author.name": null })).toEqual({
			"author.name": "Le Guin",
		});
	});

	it("recovers dotted names inside brackets", () => {
		const request = createRequest({
			query: { "order[author_name]": "asc" },
			queryString: "order[author.name]=asc",
		});

		expect(extractProperties(request, { "author.name": "asc" })).toEqual({
			"order[author.name]": "asc",
		});
	});

	it("keeps the parsed query without an allow-list", () => {
		const request = createRequest({
			query: { author_name: "Le Guin" },
			queryString: "author.name=Le%20Guin",
		});

		expect(extractProperties(request, null)).toBe(request.query);
	});

	it("keeps the parsed query without a raw query string", () => {
		const request = createRequest({ query: { author_name: "Le Guin" } });

		expect(extractProperties(request, { "author.name": null })).toBe(
			request.query,
		);
	});
});
