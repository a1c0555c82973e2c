import { Context, Effect } from "effect";
import type { ResourceClassNotFoundError } from "../errors/metadata-errors.js";

// ============================================================================
// ClassMetadata: read-only view of one resource class
// ============================================================================

export interface ClassMetadata {
	readonly name: string;
	readonly hasField: (field: string) => boolean;
	readonly hasAssociation: (association: string) => boolean;
	/** Target resource class of the association, undefined when not an association */
	readonly getAssociationTargetClass: (
		association: string,
	) => string | undefined;
	readonly getFieldNames: () => ReadonlyArray<string>;
}

// ============================================================================
// MetadataRegistry Effect Service
// ============================================================================

export interface MetadataRegistryShape {
	readonly getClassMetadata: (
		resourceClass: string,
	) => Effect.Effect<ClassMetadata, ResourceClassNotFoundError>;
}

export class MetadataRegistry extends Context.Tag("MetadataRegistry")<
	MetadataRegistry,
	MetadataRegistryShape
>() {}

/**
 * Look up class metadata through the MetadataRegistry service.
 */
export const getClassMetadata = (
	resourceClass: string,
): Effect.Effect<ClassMetadata, ResourceClassNotFoundError, MetadataRegistry> =>
	Effect.flatMap(MetadataRegistry, (registry) =>
		registry.getClassMetadata(resourceClass),
	);
