/**
 * Request body deserialization listener.
 *
 * Runs before the controller of a managed resource operation, reads the body
 * in the negotiated format and stores the resulting object on the request.
 *
 * @module
 */

import {
	type ApiRequest,
	type ConfigurationError,
	type DeserializationError,
	extractAttributes,
	type FormatTable,
	isSafeMethod,
	type ResourceClassNotFoundError,
	Serializer,
	type SerializerContext,
	SerializerContextBuilder,
	type UnsupportedFormatError,
} from "@apilayer/core";
import { Effect, Option } from "effect";
import { negotiateFormat } from "./format-negotiator.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Context key under which an existing object is handed to the deserializer.
 */
export const OBJECT_TO_POPULATE = "objectToPopulate";

export type DeserializeListenerError =
	| ConfigurationError
	| DeserializationError
	| UnsupportedFormatError
	| ResourceClassNotFoundError;

export interface DeserializeListener {
	/**
	 * Deserialize the request body into `request.attributes.data`.
	 * Safe-method and unmanaged requests are left untouched.
	 */
	readonly onRequest: (
		request: ApiRequest,
	) => Effect.Effect<
		void,
		DeserializeListenerError,
		Serializer | SerializerContextBuilder
	>;
}

// ============================================================================
// Listener Factory
// ============================================================================

/**
 * Create a deserialize listener for the given format table.
 *
 * Errors raised by the serializer or the context builder are propagated as-is
 * for the host's error handling (see mapErrorToResponse).
 *
 * @example
 * ```typescript
 * const listener = makeDeserializeListener({ json: ["application/json"] })
 *
 * await Effect.runPromise(
 *   listener.onRequest(request).pipe(
 *     Effect.provide(Layer.merge(serializerLayer, contextBuilderLayer)),
 *   ),
 * )
 * // request.attributes.data now holds the deserialized object
 * ```
 */
export const makeDeserializeListener = (
	formats: FormatTable,
): DeserializeListener => ({
	onRequest: (request) =>
		Effect.gen(function* () {
			if (isSafeMethod(request.method)) {
				yield* Effect.logDebug(`Skipping safe ${request.method} request`);
				return;
			}

			const extracted = extractAttributes(request);
			if (Option.isNone(extracted)) {
				yield* Effect.logDebug("Skipping request without resource attributes");
				return;
			}
			const attributes = extracted.value;

			const format = yield* negotiateFormat(request, formats);

			const contextBuilder = yield* SerializerContextBuilder;
			const built = yield* contextBuilder.createFromRequest(
				request,
				false,
				attributes,
			);

			const context: SerializerContext =
				attributes.objectToPopulate !== undefined
					? { ...built, [OBJECT_TO_POPULATE]: attributes.objectToPopulate }
					: built;

			const serializer = yield* Serializer;
			const data = yield* serializer.deserialize(
				request.content,
				attributes.resourceClass,
				format,
				context,
			);

			yield* Effect.logDebug("Request body deserialized").pipe(
				Effect.annotateLogs({ resourceClass: attributes.resourceClass, format }),
			);

			request.attributes.data = data;
		}),
});
