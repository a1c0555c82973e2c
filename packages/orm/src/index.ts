/**
 * @apilayer/orm: query filters for mapped resource graphs.
 *
 * Turns query parameters into joins, predicates and orderings on a query
 * builder. Dotted properties ("author.name") are resolved through resource
 * metadata and joined one association at a time; they must be allow-listed
 * to be filterable.
 *
 * @example
 * ```ts
 * import { applyFilters, makeQueryBuilder, makeSearchFilter } from "@apilayer/orm"
 *
 * const queryBuilder = makeQueryBuilder("books")
 * const search = makeSearchFilter({ properties: { title: "partial", "author.name": null } })
 *
 * await Effect.runPromise(
 *   applyFilters(queryBuilder, "books", request, [search]).pipe(
 *     Effect.provide(makeMetadataRegistryLayer(resources)),
 *   ),
 * )
 *
 * queryBuilder.getDQL()
 * // SELECT o FROM books o LEFT JOIN o.author author_a1 WHERE author_a1.name = :name_p1
 * ```
 *
 * @module
 */

// ============================================================================
// Filter Helpers
// ============================================================================

export {
	addJoinsForNestedProperty,
	extractProperties,
	type FilterProperties,
	getNestedMetadata,
	getPropertySetting,
	isPropertyEnabled,
	isPropertyMapped,
	isPropertyNested,
	type PropertyParts,
	resolveFilterProperty,
	splitPropertyParts,
} from "./filters/filter-helpers.js";

// ============================================================================
// Filters
// ============================================================================

export type {
	Filter,
	FilterDescription,
	FilterError,
	SearchStrategy,
} from "./filters/filter.js";

export {
	escapeLikeValue,
	makeSearchFilter,
	type SearchFilterOptions,
} from "./filters/search-filter.js";

export {
	makeOrderFilter,
	type OrderFilterOptions,
	type OrderSetting,
} from "./filters/order-filter.js";

export {
	makeRangeFilter,
	type RangeFilterOptions,
	type RangeOperator,
} from "./filters/range-filter.js";

export { applyFilters, describeFilters } from "./filter-extension.js";

// ============================================================================
// Query Building
// ============================================================================

export {
	type JoinPart,
	makeQueryBuilder,
	type OrderByPart,
	type OrderDirection,
	type QueryBuilder,
	type RecordingQueryBuilder,
} from "./query-builder.js";

export {
	makeQueryNameGenerator,
	type QueryNameGenerator,
} from "./query-name-generator.js";

export { parseRequestParams, type QueryParams } from "./request-parser.js";
