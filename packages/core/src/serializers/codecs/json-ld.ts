import type { FormatCodec, FormatOptions } from "../format-codec.js";

/**
 * Drops JSON-LD keywords ("@context", "@id", "@type", ...) from the top level
 * of a decoded document. Nested values are left untouched.
 */
const stripKeywords = (data: unknown): unknown => {
	if (data === null || typeof data !== "object" || Array.isArray(data)) {
		return data;
	}

	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		if (!key.startsWith("@")) {
			result[key] = value;
		}
	}
	return result;
};

/**
 * Creates a JSON-LD codec.
 *
 * Encodes like JSON. Decoding strips the top-level JSON-LD keywords so the
 * payload can be validated against the plain resource schema.
 *
 * @returns A FormatCodec for JSON-LD
 */
export const jsonLdCodec = (): FormatCodec => ({
	name: "jsonld",
	mimeTypes: ["application/ld+json"],
	encode: (data: unknown, formatOptions?: FormatOptions): string =>
		JSON.stringify(data, null, formatOptions?.indent ?? 2),
	decode: (raw: string): unknown => stripKeywords(JSON.parse(raw)),
});
