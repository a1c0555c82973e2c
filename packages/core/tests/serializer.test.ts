import { Effect, Either } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";
import { jsonCodec } from "../src/serializers/codecs/json.js";
import { jsonLdCodec } from "../src/serializers/codecs/json-ld.js";
import { yamlCodec } from "../src/serializers/codecs/yaml.js";
import { allTextCodecs, defaultCodecs } from "../src/serializers/presets.js";
import {
	formatsFromCodecs,
	makeSerializerLayer,
} from "../src/serializers/format-codec.js";
import { Serializer } from "../src/serializers/serializer-service.js";
import type { SerializerContext } from "../src/types/resource-config-types.js";
import { resources } from "./fixtures.js";

const SerializerLayer = makeSerializerLayer(
	[jsonCodec(), jsonLdCodec(), yamlCodec()],
	resources,
);

const deserialize = (
	content: string,
	resourceClass: string,
	format: string,
	context: SerializerContext = {},
) =>
	Effect.runPromise(
		Effect.either(
			Effect.flatMap(Serializer, (serializer) =>
				serializer.deserialize(content, resourceClass, format, context),
			).pipe(Effect.provide(SerializerLayer)),
		),
	);

const dune = { id: "1", title: "Dune", year: 1965, authorId: "a1" };

describe("makeSerializerLayer: deserialize", () => {
	it("decodes a JSON body into a resource object", async () => {
		const result = await deserialize(JSON.stringify(dune), "books", "json");

		expect(Either.getOrThrow(result)).toEqual(dune);
	});

	it("drops properties the schema does not declare", async () => {
		const result = await deserialize(
			JSON.stringify({ ...dune, rating: 5 }),
			"books",
			"json",
		);

		expect(Either.getOrThrow(result)).toEqual(dune);
	});

	it("rejects undeclared properties when allowExtraAttributes is false", async () => {
		const result = await deserialize(
			JSON.stringify({ ...dune, rating: 5 }),
			"books",
			"json",
			{ allowExtraAttributes: false },
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("DeserializationError");
		}
	});

	it("merges the payload over objectToPopulate", async () => {
		const existing = { ...dune };
		const result = await deserialize(JSON.stringify({ year: 1966 }), "books", "json", {
			objectToPopulate: existing,
		});

		expect(Either.getOrThrow(result)).toEqual({ ...dune, year: 1966 });
		expect(existing.year).toBe(1965);
	});

	it("fails with DeserializationError on malformed JSON", async () => {
		const result = await deserialize("{", "books", "json");

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("DeserializationError");
		}
		if (Either.isLeft(result) && result.left._tag === "DeserializationError") {
			expect(result.left.format).toBe("json");
			expect(result.left.resourceClass).toBe("books");
			expect(result.left.message.startsWith("Failed to deserialize json data: ")).toBe(
				true,
			);
		}
	});

	it("fails with DeserializationError when the payload is not an object", async () => {
		const result = await deserialize("[1, 2]", "books", "json");

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("DeserializationError");
			expect(result.left.message).toBe(
				"Expected a json object for resource class 'books'",
			);
		}
	});

	it("fails with DeserializationError when the payload violates the schema", async () => {
		const result = await deserialize(
			JSON.stringify({ ...dune, year: "nineteen sixty-five" }),
			"books",
			"json",
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("DeserializationError");
		}
	});

	it("fails with UnsupportedFormatError for an unknown format", async () => {
		const result = await deserialize("<book/>", "books", "xml");

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("UnsupportedFormatError");
			expect(result.left.message).toBe(
				"Unsupported format 'xml'. Available formats: json, jsonld, yaml",
			);
		}
	});

	it("fails with ResourceClassNotFoundError for an unknown resource class", async () => {
		const result = await deserialize("{}", "movies", "json");

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ResourceClassNotFoundError");
		}
	});

	it("decodes JSON-LD bodies without their keywords", async () => {
		const result = await deserialize(
			JSON.stringify({ "@context": "/contexts/Book", "@type": "Book", ...dune }),
			"books",
			"jsonld",
			{ allowExtraAttributes: false },
		);

		expect(Either.getOrThrow(result)).toEqual(dune);
	});

	it("decodes YAML bodies", async () => {
		const result = await deserialize(
			"id: '1'\ntitle: Dune\nyear: 1965\nauthorId: a1\n",
			"books",
			"yaml",
		);

		expect(Either.getOrThrow(result)).toEqual(dune);
	});
});

describe("makeSerializerLayer: serialize", () => {
	it("encodes with the codec of the format", async () => {
		const json = await Effect.runPromise(
			Effect.flatMap(Serializer, (serializer) =>
				serializer.serialize({ id: "1" }, "json"),
			).pipe(Effect.provide(SerializerLayer)),
		);

		expect(json).toBe('{\n  "id": "1"\n}');
	});
});

describe("makeSerializerLayer: registration", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("warns when two codecs share a format name", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

		makeSerializerLayer([jsonCodec(), jsonCodec({ indent: 4 })], resources);

		expect(warn).toHaveBeenCalledWith(
			"Duplicate format 'json': earlier codec overwritten",
		);
	});
});

describe("formatsFromCodecs", () => {
	it("keeps codec order and MIME types", () => {
		const formats = formatsFromCodecs([jsonLdCodec(), jsonCodec(), yamlCodec()]);

		expect(Object.keys(formats)).toEqual(["jsonld", "json", "yaml"]);
		expect(formats).toEqual({
			jsonld: ["application/ld+json"],
			json: ["application/json"],
			yaml: ["application/x-yaml", "text/yaml"],
		});
	});
});

describe("jsonCodec", () => {
	it("negotiates extra MIME types as JSON", () => {
		expect(
			formatsFromCodecs([
				jsonCodec({ mimeTypes: ["application/json", "application/vnd.api+json"] }),
			]),
		).toEqual({ json: ["application/json", "application/vnd.api+json"] });
	});
});

describe("codec presets", () => {
	it("negotiates JSON-LD first by default", () => {
		expect(formatsFromCodecs(defaultCodecs())).toEqual({
			jsonld: ["application/ld+json"],
			json: ["application/json"],
		});
	});

	it("adds YAML to the text presets", () => {
		expect(allTextCodecs().map((codec) => codec.name)).toEqual([
			"jsonld",
			"json",
			"yaml",
		]);
	});
});
