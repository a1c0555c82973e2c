/**
 * Resource configuration types.
 *
 * A resource class is described by an Effect Schema (its fields) plus its
 * relationships to other resource classes (its associations). The metadata
 * registry, the serializer and the serializer context builder all read from
 * the same ResourcesConfig.
 */

import type { Schema } from "effect";

/**
 * A relation from one resource class to another.
 */
export interface RelationshipConfig {
	/** `ref` holds a single target, `inverse` a collection of targets */
	readonly type: "ref" | "inverse";

	/** Resource class the relation points at */
	readonly target: string;

	/** Field on the owning side holding the target's identifier */
	readonly foreignKey?: string;
}

/**
 * Options bag handed to the serializer for one call.
 * Arbitrary keys are allowed; the listed ones have fixed meaning.
 */
export interface SerializerContext {
	readonly resourceClass?: string;
	readonly collectionOperationName?: string;
	readonly itemOperationName?: string;

	/**
	 * Existing object the deserializer merges the payload into
	 * instead of building a fresh one.
	 */
	readonly objectToPopulate?: unknown;

	readonly [key: string]: unknown;
}

/**
 * Per-operation overrides for a resource class.
 */
export interface OperationConfig {
	readonly normalizationContext?: Readonly<Record<string, unknown>>;
	readonly denormalizationContext?: Readonly<Record<string, unknown>>;
}

/**
 * Configuration for a single resource class.
 */
export type ResourceConfig = {
	/**
	 * Effect Schema.Struct describing the fields of the resource.
	 * Payloads are validated against it after deserialization.
	 */
	readonly schema: Schema.Schema.AnyNoContext & {
		readonly fields: Schema.Struct.Fields;
	};

	/**
	 * Relationship definitions for this resource class
	 */
	readonly relationships: Readonly<Record<string, RelationshipConfig>>;

	/** Context merged into every serialization of this resource */
	readonly normalizationContext?: Readonly<Record<string, unknown>>;

	/** Context merged into every deserialization of this resource */
	readonly denormalizationContext?: Readonly<Record<string, unknown>>;

	/** Collection operations keyed by operation name (e.g. "get", "post") */
	readonly collectionOperations?: Readonly<Record<string, OperationConfig>>;

	/** Item operations keyed by operation name (e.g. "get", "put") */
	readonly itemOperations?: Readonly<Record<string, OperationConfig>>;
};

/**
 * All resource classes known to the API, keyed by resource class name.
 */
export type ResourcesConfig = Readonly<Record<string, ResourceConfig>>;
