import { Data } from "effect";

// ============================================================================
// Effect TaggedError Serialization Error Types
// ============================================================================

export class DeserializationError extends Data.TaggedError(
	"DeserializationError",
)<{
	readonly format: string;
	readonly resourceClass: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class SerializationError extends Data.TaggedError("SerializationError")<{
	readonly format: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class UnsupportedFormatError extends Data.TaggedError(
	"UnsupportedFormatError",
)<{
	readonly format: string;
	readonly message: string;
}> {}

// ============================================================================
// Serialization Error Union
// ============================================================================

export type SerializerError =
	| DeserializationError
	| SerializationError
	| UnsupportedFormatError;
