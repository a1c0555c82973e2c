/**
 * HTTP layer configuration.
 *
 * Untyped configuration (parsed from a YAML or JSON file, or read from the
 * environment by the host) is decoded with Effect Schema. Any problem is
 * reported as a ConfigurationError naming the offending setting.
 *
 * @module
 */

import { ConfigurationError } from "@apilayer/core";
import type { FormatCodec, FormatTable } from "@apilayer/core";
import { Effect, Either, ParseResult, Schema } from "effect";

// ============================================================================
// Schema
// ============================================================================

const FormatsSchema = Schema.Record({
	key: Schema.String,
	value: Schema.NonEmptyArray(Schema.String),
});

const ApiConfigSchema = Schema.Struct({
	formats: FormatsSchema,
});

export interface ApiConfig {
	readonly formats: FormatTable;
}

// ============================================================================
// Loaders
// ============================================================================

// Keys JavaScript enumerates ahead of insertion order
const INTEGER_KEY = /^(0|[1-9][0-9]*)$/;

/**
 * Validate a format table: at least one format, each with at least one
 * MIME type, none named like an integer.
 */
export const makeFormatTable = (
	formats: Readonly<Record<string, ReadonlyArray<string>>>,
): Effect.Effect<FormatTable, ConfigurationError> => {
	const entries = Object.entries(formats);

	if (entries.length === 0) {
		return Effect.fail(
			new ConfigurationError({
				setting: "formats",
				message: "No formats configured: at least one format is required",
			}),
		);
	}

	for (const [format, mimeTypes] of entries) {
		if (INTEGER_KEY.test(format)) {
			return Effect.fail(
				new ConfigurationError({
					setting: `formats.${format}`,
					message: `Format identifier '${format}' is an integer and would not keep its position`,
				}),
			);
		}
		if (mimeTypes.length === 0) {
			return Effect.fail(
				new ConfigurationError({
					setting: `formats.${format}`,
					message: `Format '${format}' has no MIME types`,
				}),
			);
		}
	}

	return Effect.succeed(formats);
};

/**
 * Decode an untyped configuration object into an ApiConfig.
 *
 * @example
 * ```typescript
 * loadApiConfig({ formats: { jsonld: ["application/ld+json"] } })
 * // → Effect succeeding with { formats: { jsonld: ["application/ld+json"] } }
 * ```
 */
export const loadApiConfig = (
	raw: unknown,
): Effect.Effect<ApiConfig, ConfigurationError> =>
	Effect.gen(function* () {
		const decoded = Schema.decodeUnknownEither(ApiConfigSchema)(raw);

		if (Either.isLeft(decoded)) {
			return yield* Effect.fail(
				new ConfigurationError({
					setting: "formats",
					message: `Invalid API configuration: ${ParseResult.TreeFormatter.formatErrorSync(decoded.left)}`,
					cause: decoded.left,
				}),
			);
		}

		const formats = yield* makeFormatTable(decoded.right.formats);
		return { formats };
	});

/**
 * Parse configuration text with a codec (e.g. yamlCodec()) and decode it.
 */
export const parseApiConfig = (
	text: string,
	codec: FormatCodec,
): Effect.Effect<ApiConfig, ConfigurationError> =>
	Effect.try({
		try: () => codec.decode(text),
		catch: (error) =>
			new ConfigurationError({
				setting: "formats",
				message: `Failed to parse ${codec.name} configuration: ${error instanceof Error ? error.message : "Unknown error"}`,
				cause: error,
			}),
	}).pipe(Effect.flatMap(loadApiConfig));
