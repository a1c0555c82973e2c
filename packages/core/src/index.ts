/**
 * Core building blocks shared by the apilayer packages.
 *
 * Exports typed errors, the request snapshot, resource configuration,
 * the metadata registry and the codec-based serializer services.
 */

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	ConfigurationError,
	InvalidArgumentError,
} from "./errors/configuration-errors.js";

export type { SetupError } from "./errors/configuration-errors.js";

export {
	DeserializationError,
	SerializationError,
	UnsupportedFormatError,
} from "./errors/serialization-errors.js";

export type { SerializerError } from "./errors/serialization-errors.js";

export { ResourceClassNotFoundError } from "./errors/metadata-errors.js";

// Union type
export type { ApiError } from "./errors/index.js";

// ============================================================================
// Request
// ============================================================================

export {
	createRequest,
	extractAttributes,
	isSafeMethod,
} from "./request/request.js";

export type {
	ApiRequest,
	ExtractedAttributes,
	OperationType,
	RequestAttributes,
} from "./request/request.js";

// ============================================================================
// Resource Configuration
// ============================================================================

export type {
	OperationConfig,
	RelationshipConfig,
	ResourceConfig,
	ResourcesConfig,
	SerializerContext,
} from "./types/resource-config-types.js";

// ============================================================================
// Metadata
// ============================================================================

export {
	getClassMetadata,
	MetadataRegistry,
} from "./metadata/metadata-registry.js";

export type {
	ClassMetadata,
	MetadataRegistryShape,
} from "./metadata/metadata-registry.js";

export {
	makeClassMetadata,
	makeMetadataRegistryLayer,
} from "./metadata/resource-metadata.js";

// ============================================================================
// Serialization
// ============================================================================

export { Serializer } from "./serializers/serializer-service.js";
export type { SerializerShape } from "./serializers/serializer-service.js";

export {
	formatsFromCodecs,
	makeSerializerLayer,
} from "./serializers/format-codec.js";

export type {
	FormatCodec,
	FormatOptions,
	FormatTable,
} from "./serializers/format-codec.js";

export { jsonCodec } from "./serializers/codecs/json.js";
export type { JsonCodecOptions } from "./serializers/codecs/json.js";
export { jsonLdCodec } from "./serializers/codecs/json-ld.js";
export { yamlCodec } from "./serializers/codecs/yaml.js";
export type { YamlCodecOptions } from "./serializers/codecs/yaml.js";
export { allTextCodecs, defaultCodecs } from "./serializers/presets.js";

export {
	makeSerializerContextBuilderLayer,
	SerializerContextBuilder,
} from "./serializers/serializer-context-builder.js";

export type { SerializerContextBuilderShape } from "./serializers/serializer-context-builder.js";
