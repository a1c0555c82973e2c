import { Context } from "effect";
import type { Effect } from "effect";
import type { ResourceClassNotFoundError } from "../errors/metadata-errors.js";
import type {
	DeserializationError,
	SerializationError,
	UnsupportedFormatError,
} from "../errors/serialization-errors.js";
import type { SerializerContext } from "../types/resource-config-types.js";

// ============================================================================
// Serializer Effect Service
// ============================================================================

export interface SerializerShape {
	readonly serialize: (
		data: unknown,
		format: string,
	) => Effect.Effect<string, SerializationError | UnsupportedFormatError>;
	readonly deserialize: (
		content: string,
		resourceClass: string,
		format: string,
		context: SerializerContext,
	) => Effect.Effect<
		unknown,
		DeserializationError | UnsupportedFormatError | ResourceClassNotFoundError
	>;
}

export class Serializer extends Context.Tag("Serializer")<
	Serializer,
	SerializerShape
>() {}
