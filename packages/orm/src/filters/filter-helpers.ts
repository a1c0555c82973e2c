/**
 * Helpers shared by filters: property path resolution against resource
 * metadata and join chain construction for nested properties.
 *
 * A nested property is a dotted path such as "author.address.city": every
 * segment but the last names an association, the last names the field.
 *
 * @module
 */

import {
	type ApiRequest,
	type ClassMetadata,
	InvalidArgumentError,
	MetadataRegistry,
	type ResourceClassNotFoundError,
} from "@apilayer/core";
import { Effect, Option } from "effect";
import type { QueryBuilder } from "../query-builder.js";
import type { QueryNameGenerator } from "../query-name-generator.js";
import { parseRequestParams, type QueryParams } from "../request-parser.js";

// ============================================================================
// Types
// ============================================================================

export interface PropertyParts {
	/** Associations in nesting order, outermost first */
	readonly associations: ReadonlyArray<string>;
	/** The leaf field */
	readonly field: string;
}

/**
 * Allow-list of filterable properties. Values carry filter-specific settings
 * (a search strategy, a default direction) or null.
 */
export type FilterProperties<Setting = string> = Readonly<
	Record<string, Setting | null>
>;

// ============================================================================
// Property paths
// ============================================================================

/**
 * Whether the property goes through at least one association.
 */
export const isPropertyNested = (property: string): boolean =>
	property.includes(".");

/**
 * Split a property into its associations and its leaf field.
 *
 * @example
 * splitPropertyParts("author.name") // { associations: ["author"], field: "name" }
 * splitPropertyParts("name")        // { associations: [], field: "name" }
 */
export const splitPropertyParts = (property: string): PropertyParts => {
	const parts = property.split(".");
	const field = parts.pop() ?? "";
	return { associations: parts, field };
};

/**
 * Whether filtering on the property is allowed.
 *
 * Without an allow-list every plain property is enabled, and nested
 * properties must still be listed explicitly. With an allow-list a property is
 * enabled iff it is one of its keys.
 */
export const isPropertyEnabled = <Setting>(
	property: string,
	properties: FilterProperties<Setting> | null,
): boolean => {
	if (properties === null) {
		return !isPropertyNested(property);
	}

	return Object.hasOwn(properties, property);
};

/**
 * The allow-list setting of a property, or null when it has none. Only own
 * keys count: `order[toString]` must not find `Object.prototype.toString`.
 */
export const getPropertySetting = <Setting>(
	property: string,
	properties: FilterProperties<Setting> | null,
): Setting | null =>
	properties !== null && Object.hasOwn(properties, property)
		? (properties[property] ?? null)
		: null;

// ============================================================================
// Metadata resolution
// ============================================================================

/**
 * Walk the associations from a resource class and return the metadata the
 * walk ends on.
 *
 * A segment that is not an association of the current class does not move the
 * walk: the metadata stays where it is and the following segments are looked
 * up on it. No error is raised for such a segment.
 */
export const getNestedMetadata = (
	resourceClass: string,
	associations: ReadonlyArray<string>,
): Effect.Effect<ClassMetadata, ResourceClassNotFoundError, MetadataRegistry> =>
	Effect.gen(function* () {
		const registry = yield* MetadataRegistry;
		let metadata = yield* registry.getClassMetadata(resourceClass);

		for (const association of associations) {
			if (!metadata.hasAssociation(association)) continue;

			const targetClass = metadata.getAssociationTargetClass(association);
			if (targetClass !== undefined) {
				metadata = yield* registry.getClassMetadata(targetClass);
			}
		}

		return metadata;
	});

/**
 * Whether the property resolves to a field of the resource class (or of the
 * class its associations lead to). Associations count as mapped only when
 * `allowAssociation` is set.
 */
export const isPropertyMapped = (
	property: string,
	resourceClass: string,
	allowAssociation = false,
): Effect.Effect<boolean, ResourceClassNotFoundError, MetadataRegistry> =>
	Effect.gen(function* () {
		const { associations, field } = splitPropertyParts(property);
		const metadata = yield* getNestedMetadata(resourceClass, associations);

		return (
			metadata.hasField(field) ||
			(allowAssociation && metadata.hasAssociation(field))
		);
	});

// ============================================================================
// Request properties
// ============================================================================

/**
 * Query parameters a filter reads from.
 *
 * When an allow-listed nested property shows up with underscores in place of
 * its dots ("author_name" for "author.name"), the raw query string is parsed
 * again so the dotted names are recovered.
 */
export const extractProperties = <Setting>(
	request: ApiRequest,
	properties: FilterProperties<Setting> | null,
): QueryParams => {
	if (properties === null || request.queryString === undefined) {
		return request.query;
	}

	const names = Object.keys(request.query);
	const needsFixing = Object.keys(properties).some((property) => {
		if (!isPropertyNested(property)) return false;

		const underscored = property.replaceAll(".", "_");
		return names.some(
			(name) =>
				name === underscored ||
				name.startsWith(`${underscored}[`) ||
				name.endsWith(`[${underscored}]`),
		);
	});

	return needsFixing ? parseRequestParams(request.queryString) : request.query;
};

// ============================================================================
// Joins
// ============================================================================

/**
 * Add one left join per association of a nested property.
 *
 * Starting from `rootAlias`, each association is joined from the previous
 * alias under a freshly generated alias.
 *
 * @returns The alias of the last joined class and the leaf field
 *
 * @example
 * ```typescript
 * addJoinsForNestedProperty("author.name", "o", queryBuilder, nameGenerator)
 * // leftJoin("o.author", "author_a1")
 * // → Effect succeeding with ["author_a1", "name"]
 * ```
 */
export const addJoinsForNestedProperty = (
	property: string,
	rootAlias: string,
	queryBuilder: QueryBuilder,
	nameGenerator: QueryNameGenerator,
): Effect.Effect<readonly [string, string], InvalidArgumentError> => {
	const { associations, field } = splitPropertyParts(property);

	if (associations.length === 0) {
		return Effect.fail(
			new InvalidArgumentError({
				argument: "property",
				value: property,
				message: `Cannot add joins for property "${property}" - property is not nested.`,
			}),
		);
	}

	let parentAlias = rootAlias;
	for (const association of associations) {
		const alias = nameGenerator.generateJoinAlias(association);
		queryBuilder.leftJoin(`${parentAlias}.${association}`, alias);
		parentAlias = alias;
	}

	return Effect.succeed([parentAlias, field] as const);
};

/**
 * Resolve where a filter should read a property from.
 *
 * Returns None (and logs at debug level) for disabled or unmapped properties.
 * Nested properties get their joins added; plain ones resolve to the root
 * alias.
 */
export const resolveFilterProperty = <Setting>(
	property: string,
	resourceClass: string,
	properties: FilterProperties<Setting> | null,
	queryBuilder: QueryBuilder,
	nameGenerator: QueryNameGenerator,
): Effect.Effect<
	Option.Option<readonly [string, string]>,
	ResourceClassNotFoundError | InvalidArgumentError,
	MetadataRegistry
> =>
	Effect.gen(function* () {
		if (!isPropertyEnabled(property, properties)) {
			yield* Effect.logDebug(`Property '${property}' is not enabled`);
			return Option.none();
		}

		if (!(yield* isPropertyMapped(property, resourceClass))) {
			yield* Effect.logDebug(
				`Property '${property}' is not mapped on '${resourceClass}'`,
			);
			return Option.none();
		}

		if (!isPropertyNested(property)) {
			return Option.some([queryBuilder.getRootAlias(), property] as const);
		}

		return Option.some(
			yield* addJoinsForNestedProperty(
				property,
				queryBuilder.getRootAlias(),
				queryBuilder,
				nameGenerator,
			),
		);
	});
