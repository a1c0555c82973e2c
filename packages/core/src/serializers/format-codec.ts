import { Effect, Either, Layer, ParseResult, Schema } from "effect";
import { ResourceClassNotFoundError } from "../errors/metadata-errors.js";
import {
	DeserializationError,
	SerializationError,
	UnsupportedFormatError,
} from "../errors/serialization-errors.js";
import type { ResourcesConfig } from "../types/resource-config-types.js";
import { Serializer, type SerializerShape } from "./serializer-service.js";

// ============================================================================
// FormatCodec: Minimal plugin point for serialization formats
// ============================================================================

/**
 * Options for encoding data.
 */
export interface FormatOptions {
	readonly indent?: number;
}

/**
 * A FormatCodec defines a serialization format with:
 * - A format identifier (e.g., "json", "jsonld", "yaml")
 * - The MIME types it answers to (e.g., ["application/json"])
 * - Synchronous encode/decode functions that throw on failure
 *
 * The compositor (makeSerializerLayer) wraps these in Effect.try
 * with proper error tagging.
 */
export interface FormatCodec {
	readonly name: string;
	readonly mimeTypes: ReadonlyArray<string>;
	readonly encode: (data: unknown, options?: FormatOptions) => string;
	readonly decode: (raw: string) => unknown;
}

/**
 * Format identifier → MIME types. Key order is the negotiation order;
 * the first key is the default format.
 *
 * Key order is `Object.keys` order, which lists integer-like keys ("1",
 * "42") before all others whatever their insertion order. Tables loaded
 * through `makeFormatTable` reject such identifiers.
 */
export type FormatTable = Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * Build a format table from codecs, in codec order.
 */
export const formatsFromCodecs = (
	codecs: ReadonlyArray<FormatCodec>,
): FormatTable => {
	const formats: Record<string, ReadonlyArray<string>> = {};
	for (const codec of codecs) {
		formats[codec.name] = codec.mimeTypes;
	}
	return formats;
};

// ============================================================================
// Payload helpers
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
	value !== null && typeof value === "object" && !Array.isArray(value);

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : "Unknown error";

// ============================================================================
// makeSerializerLayer: Compositor for building Serializer from codecs
// ============================================================================

/**
 * Creates a Serializer Layer from an array of FormatCodec instances and the
 * resource configuration.
 *
 * Deserialization:
 * 1. Looks up the codec by format name (UnsupportedFormatError when missing)
 * 2. Decodes the body; codec failures and non-object payloads become
 *    DeserializationError
 * 3. Merges the payload over `context.objectToPopulate` when it is an object
 * 4. Validates the result against the resource schema. Unknown properties are
 *    dropped, or rejected when `context.allowExtraAttributes` is false
 *
 * Logs console.warn on duplicate codec names (last wins).
 */
export const makeSerializerLayer = (
	codecs: ReadonlyArray<FormatCodec>,
	resources: ResourcesConfig,
): Layer.Layer<Serializer> => {
	const codecMap = new Map<string, FormatCodec>();
	for (const codec of codecs) {
		if (codecMap.has(codec.name)) {
			console.warn(
				`Duplicate format '${codec.name}': earlier codec overwritten`,
			);
		}
		codecMap.set(codec.name, codec);
	}

	const supportedFormats = Array.from(codecMap.keys()).join(", ");

	const lookupCodec = (
		format: string,
	): Effect.Effect<FormatCodec, UnsupportedFormatError> => {
		const codec = codecMap.get(format);
		if (!codec) {
			return Effect.fail(
				new UnsupportedFormatError({
					format,
					message:
						supportedFormats.length > 0
							? `Unsupported format '${format}'. Available formats: ${supportedFormats}`
							: `Unsupported format '${format}'. No formats registered.`,
				}),
			);
		}
		return Effect.succeed(codec);
	};

	const serializer: SerializerShape = {
		serialize: (data, format) =>
			Effect.flatMap(lookupCodec(format), (codec) =>
				Effect.try({
					try: () => codec.encode(data),
					catch: (error) =>
						new SerializationError({
							format: codec.name,
							message: `Failed to serialize data to ${codec.name}: ${describeError(error)}`,
							cause: error,
						}),
				}),
			),

		deserialize: (content, resourceClass, format, context) =>
			Effect.gen(function* () {
				const codec = yield* lookupCodec(format);

				const resource = resources[resourceClass];
				if (!resource) {
					return yield* Effect.fail(
						new ResourceClassNotFoundError({
							resourceClass,
							message: `Resource class '${resourceClass}' not found`,
						}),
					);
				}

				const payload = yield* Effect.try({
					try: () => codec.decode(content),
					catch: (error) =>
						new DeserializationError({
							format: codec.name,
							resourceClass,
							message: `Failed to deserialize ${codec.name} data: ${describeError(error)}`,
							cause: error,
						}),
				});

				if (!isRecord(payload)) {
					return yield* Effect.fail(
						new DeserializationError({
							format: codec.name,
							resourceClass,
							message: `Expected a ${codec.name} object for resource class '${resourceClass}'`,
						}),
					);
				}

				const populated = isRecord(context.objectToPopulate)
					? { ...context.objectToPopulate, ...payload }
					: payload;

				const decoded = Schema.decodeUnknownEither(resource.schema)(populated, {
					onExcessProperty:
						context.allowExtraAttributes === false ? "error" : "ignore",
				});

				if (Either.isLeft(decoded)) {
					return yield* Effect.fail(
						new DeserializationError({
							format: codec.name,
							resourceClass,
							message: ParseResult.TreeFormatter.formatErrorSync(decoded.left),
							cause: decoded.left,
						}),
					);
				}

				const value: unknown = decoded.right;
				return value;
			}),
	};

	return Layer.succeed(Serializer, serializer);
};
