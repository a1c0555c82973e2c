/**
 * @apilayer/rest: request-side listeners for REST/hypermedia APIs.
 *
 * Negotiates the format of incoming request bodies, deserializes them into
 * resource objects (merging into an existing object for PUT) and maps
 * apilayer errors to HTTP responses.
 *
 * @example
 * ```ts
 * import { makeDeserializeListener } from "@apilayer/rest"
 *
 * const listener = makeDeserializeListener({
 *   jsonld: ["application/ld+json"],
 *   json: ["application/json"],
 * })
 *
 * // POST /books with Content-Type: application/json
 * // → request.attributes.data holds the validated book
 * ```
 *
 * @module
 */

// ============================================================================
// Format Negotiation
// ============================================================================

export {
	getMimeTypeFormat,
	negotiateFormat,
	normalizeMimeType,
} from "./format-negotiator.js";

// ============================================================================
// Deserialize Listener
// ============================================================================

export {
	type DeserializeListener,
	type DeserializeListenerError,
	makeDeserializeListener,
	OBJECT_TO_POPULATE,
} from "./deserialize-listener.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	type ApiConfig,
	loadApiConfig,
	makeFormatTable,
	parseApiConfig,
} from "./config.js";

// ============================================================================
// Error Mapping
// ============================================================================

export { type ErrorResponse, mapErrorToResponse } from "./error-mapping.js";
