/**
 * Error-to-HTTP-status mapping for REST API responses.
 *
 * Maps apilayer tagged errors to HTTP status codes and structured error
 * response bodies. Each error's _tag is the discriminant, and the response
 * includes the error's fields for debugging.
 *
 * @module
 */

import { Cause, Option, Runtime } from "effect";

// ============================================================================
// Types
// ============================================================================

/**
 * Structured error response returned by mapErrorToResponse.
 */
export interface ErrorResponse {
	/** HTTP status code (e.g., 400, 404, 415, 500) */
	readonly status: number;

	readonly body: {
		/** Error tag identifying the error type */
		readonly _tag: string;
		/** Human-readable error title */
		readonly error: string;
		/** Remaining error fields */
		readonly details?: Record<string, unknown>;
	};
}

interface TaggedErrorLike {
	readonly _tag: string;
	readonly [key: string]: unknown;
}

const isTaggedError = (value: unknown): value is TaggedErrorLike =>
	value !== null &&
	typeof value === "object" &&
	"_tag" in value &&
	typeof value._tag === "string";

/**
 * Extract a tagged error from an unknown error value.
 *
 * Effect.runPromise rejects with a FiberFailure when the Effect fails; the
 * underlying failure is read from its cause.
 */
const extractTaggedError = (error: unknown): TaggedErrorLike | null => {
	if (Runtime.isFiberFailure(error)) {
		const failure = Cause.failureOption(error[Runtime.FiberFailureCauseId]);
		if (Option.isSome(failure) && isTaggedError(failure.value)) {
			return failure.value;
		}
	}

	if (isTaggedError(error)) {
		return error;
	}

	return null;
};

// ============================================================================
// Status Code Mapping
// ============================================================================

/**
 * - 400 Bad Request: DeserializationError (malformed or invalid body)
 * - 404 Not Found: ResourceClassNotFoundError
 * - 415 Unsupported Media Type: UnsupportedFormatError
 * - 500 Internal Server Error: configuration and programming errors
 */
const ERROR_STATUS_MAP: Record<string, number> = {
	DeserializationError: 400,
	ResourceClassNotFoundError: 404,
	UnsupportedFormatError: 415,
	SerializationError: 500,
	ConfigurationError: 500,
	InvalidArgumentError: 500,
};

const ERROR_MESSAGES: Record<string, string> = {
	DeserializationError: "Deserialization error",
	ResourceClassNotFoundError: "Resource class not found",
	UnsupportedFormatError: "Unsupported format",
	SerializationError: "Serialization error",
	ConfigurationError: "Configuration error",
	InvalidArgumentError: "Invalid argument",
};

// ============================================================================
// Error Mapping Function
// ============================================================================

/**
 * Map an apilayer tagged error to an HTTP response.
 * Unknown errors default to 500 Internal Server Error.
 *
 * @example
 * ```typescript
 * const error = new DeserializationError({
 *   format: "json",
 *   resourceClass: "books",
 *   message: "Unexpected end of JSON input",
 * })
 *
 * mapErrorToResponse(error)
 * // → {
 * //   status: 400,
 * //   body: {
 * //     _tag: "DeserializationError",
 * //     error: "Deserialization error",
 * //     details: { format: "json", resourceClass: "books", ... }
 * //   }
 * // }
 * ```
 */
export const mapErrorToResponse = (error: unknown): ErrorResponse => {
	const taggedError = extractTaggedError(error);

	if (taggedError !== null) {
		const tag = taggedError._tag;
		const status = ERROR_STATUS_MAP[tag] ?? 500;
		const errorMessage = ERROR_MESSAGES[tag] ?? "Internal server error";

		// cause is internal and may not be serializable
		const { _tag, cause: _cause, ...fields } = taggedError;

		return {
			status,
			body: {
				_tag: tag,
				error: errorMessage,
				details: Object.keys(fields).length > 0 ? fields : undefined,
			},
		};
	}

	if (error instanceof Error) {
		return {
			status: 500,
			body: {
				_tag: "UnknownError",
				error: "Internal server error",
				details: {
					message: error.message,
					name: error.name,
				},
			},
		};
	}

	return {
		status: 500,
		body: {
			_tag: "UnknownError",
			error: "Internal server error",
		},
	};
};
