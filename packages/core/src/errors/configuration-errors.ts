import { Data } from "effect";

// ============================================================================
// Effect TaggedError Configuration Error Types
// ============================================================================

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
	readonly setting: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class InvalidArgumentError extends Data.TaggedError(
	"InvalidArgumentError",
)<{
	readonly argument: string;
	readonly value: unknown;
	readonly message: string;
}> {}

// ============================================================================
// Configuration Error Union
// ============================================================================

export type SetupError = ConfigurationError | InvalidArgumentError;
