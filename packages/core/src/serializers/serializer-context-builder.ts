import { Context, Effect, Layer, Option } from "effect";
import { ResourceClassNotFoundError } from "../errors/metadata-errors.js";
import {
	type ApiRequest,
	type ExtractedAttributes,
	extractAttributes,
} from "../request/request.js";
import type {
	OperationConfig,
	ResourcesConfig,
	SerializerContext,
} from "../types/resource-config-types.js";

// ============================================================================
// SerializerContextBuilder Effect Service
// ============================================================================

export interface SerializerContextBuilderShape {
	/**
	 * Build the serializer context for a request.
	 *
	 * @param request - The request being handled
	 * @param normalization - true when serializing a response, false when
	 *   deserializing a request body
	 * @param attributes - Pre-extracted attributes; extracted from the request
	 *   when omitted
	 */
	readonly createFromRequest: (
		request: ApiRequest,
		normalization: boolean,
		attributes?: ExtractedAttributes,
	) => Effect.Effect<SerializerContext, ResourceClassNotFoundError>;
}

export class SerializerContextBuilder extends Context.Tag(
	"SerializerContextBuilder",
)<SerializerContextBuilder, SerializerContextBuilderShape>() {}

// ============================================================================
// Default implementation
// ============================================================================

const pickContext = (
	source: OperationConfig | undefined,
	normalization: boolean,
): Readonly<Record<string, unknown>> =>
	(normalization
		? source?.normalizationContext
		: source?.denormalizationContext) ?? {};

/**
 * Creates a SerializerContextBuilder Layer reading contexts from ResourcesConfig.
 *
 * Later entries win:
 * 1. The resource's normalizationContext or denormalizationContext
 * 2. The matching collection or item operation's context
 * 3. `resourceClass` and the operation name key
 *
 * Requests without resource attributes fail with ResourceClassNotFoundError.
 */
export const makeSerializerContextBuilderLayer = (
	resources: ResourcesConfig,
): Layer.Layer<SerializerContextBuilder> => {
	const builder: SerializerContextBuilderShape = {
		createFromRequest: (request, normalization, attributes) =>
			Effect.gen(function* () {
				const extracted =
					attributes ?? Option.getOrUndefined(extractAttributes(request));

				if (extracted === undefined) {
					return yield* Effect.fail(
						new ResourceClassNotFoundError({
							resourceClass: request.attributes.resourceClass ?? "",
							message:
								"Request has no resource class or operation name attributes",
						}),
					);
				}

				const resource = resources[extracted.resourceClass];
				if (!resource) {
					return yield* Effect.fail(
						new ResourceClassNotFoundError({
							resourceClass: extracted.resourceClass,
							message: `Resource class '${extracted.resourceClass}' not found`,
						}),
					);
				}

				const operations =
					extracted.operationType === "collection"
						? resource.collectionOperations
						: resource.itemOperations;

				const context: SerializerContext = {
					...pickContext(resource, normalization),
					...pickContext(operations?.[extracted.operationName], normalization),
					resourceClass: extracted.resourceClass,
					...(extracted.operationType === "collection"
						? { collectionOperationName: extracted.operationName }
						: { itemOperationName: extracted.operationName }),
				};

				return context;
			}),
	};

	return Layer.succeed(SerializerContextBuilder, builder);
};
