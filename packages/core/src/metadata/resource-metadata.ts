import { Effect, Layer } from "effect";
import { ResourceClassNotFoundError } from "../errors/metadata-errors.js";
import type {
	ResourceConfig,
	ResourcesConfig,
} from "../types/resource-config-types.js";
import {
	type ClassMetadata,
	MetadataRegistry,
	type MetadataRegistryShape,
} from "./metadata-registry.js";

// ============================================================================
// Metadata built from ResourcesConfig
// ============================================================================

/**
 * Build the ClassMetadata of one resource class.
 *
 * Fields come from the schema's struct fields, associations from the
 * relationships. A relationship name is never reported as a field, even when
 * the schema carries a property of the same name.
 */
export const makeClassMetadata = (
	name: string,
	config: ResourceConfig,
): ClassMetadata => {
	const associations = new Map<string, string>();
	for (const [association, relationship] of Object.entries(
		config.relationships,
	)) {
		associations.set(association, relationship.target);
	}

	const fields = Object.keys(config.schema.fields).filter(
		(field) => !associations.has(field),
	);
	const fieldSet = new Set(fields);

	return {
		name,
		hasField: (field) => fieldSet.has(field),
		hasAssociation: (association) => associations.has(association),
		getAssociationTargetClass: (association) => associations.get(association),
		getFieldNames: () => fields,
	};
};

/**
 * Creates a MetadataRegistry Layer from a ResourcesConfig.
 *
 * Metadata is computed once per resource class when the layer is built.
 * Lookups of unknown classes fail with ResourceClassNotFoundError.
 */
export const makeMetadataRegistryLayer = (
	resources: ResourcesConfig,
): Layer.Layer<MetadataRegistry> => {
	const metadataByClass = new Map<string, ClassMetadata>();
	for (const [name, config] of Object.entries(resources)) {
		metadataByClass.set(name, makeClassMetadata(name, config));
	}

	const known = Array.from(metadataByClass.keys()).join(", ");

	const registry: MetadataRegistryShape = {
		getClassMetadata: (resourceClass) => {
			const metadata = metadataByClass.get(resourceClass);
			if (!metadata) {
				return Effect.fail(
					new ResourceClassNotFoundError({
						resourceClass,
						message:
							known.length > 0
								? `Resource class '${resourceClass}' not found. Known classes: ${known}`
								: `Resource class '${resourceClass}' not found. No resource classes registered.`,
					}),
				);
			}
			return Effect.succeed(metadata);
		},
	};

	return Layer.succeed(MetadataRegistry, registry);
};
