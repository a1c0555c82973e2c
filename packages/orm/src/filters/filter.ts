import type {
	ApiRequest,
	InvalidArgumentError,
	MetadataRegistry,
	ResourceClassNotFoundError,
} from "@apilayer/core";
import type { Effect } from "effect";
import type { QueryBuilder } from "../query-builder.js";
import type { QueryNameGenerator } from "../query-name-generator.js";

// ============================================================================
// Filter contract
// ============================================================================

export type SearchStrategy = "exact" | "partial" | "start" | "end";

/**
 * Documentation of one query parameter a filter understands.
 */
export interface FilterDescription {
	readonly property: string;
	readonly type: "string" | "number";
	readonly required: boolean;
	readonly strategy?: SearchStrategy;
}

export type FilterError = ResourceClassNotFoundError | InvalidArgumentError;

export interface Filter {
	/**
	 * Add the joins, predicates, parameters and orderings the request asks for.
	 */
	readonly apply: (
		queryBuilder: QueryBuilder,
		nameGenerator: QueryNameGenerator,
		resourceClass: string,
		request: ApiRequest,
	) => Effect.Effect<void, FilterError, MetadataRegistry>;

	/**
	 * Query parameters understood for the resource class, keyed by parameter name.
	 */
	readonly getDescription: (
		resourceClass: string,
	) => Effect.Effect<
		Readonly<Record<string, FilterDescription>>,
		ResourceClassNotFoundError,
		MetadataRegistry
	>;
}
