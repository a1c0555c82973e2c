/**
 * Collection extension applying a resource's filters to a query.
 *
 * @module
 */

import type {
	ApiRequest,
	MetadataRegistry,
	ResourceClassNotFoundError,
} from "@apilayer/core";
import { Effect } from "effect";
import type { Filter, FilterDescription, FilterError } from "./filters/filter.js";
import type { QueryBuilder } from "./query-builder.js";
import { makeQueryNameGenerator } from "./query-name-generator.js";

/**
 * Apply every filter to the query builder, in order.
 *
 * One QueryNameGenerator is shared by the filters of this call, so aliases and
 * parameter names never collide within the query.
 */
export const applyFilters = (
	queryBuilder: QueryBuilder,
	resourceClass: string,
	request: ApiRequest,
	filters: ReadonlyArray<Filter>,
): Effect.Effect<void, FilterError, MetadataRegistry> =>
	Effect.gen(function* () {
		const nameGenerator = makeQueryNameGenerator();

		for (const filter of filters) {
			yield* filter.apply(queryBuilder, nameGenerator, resourceClass, request);
		}
	}).pipe(Effect.annotateLogs({ resourceClass }));

/**
 * Merge the descriptions of several filters. Later filters win on a shared
 * parameter name.
 */
export const describeFilters = (
	resourceClass: string,
	filters: ReadonlyArray<Filter>,
): Effect.Effect<
	Readonly<Record<string, FilterDescription>>,
	ResourceClassNotFoundError,
	MetadataRegistry
> =>
	Effect.gen(function* () {
		const description: Record<string, FilterDescription> = {};

		for (const filter of filters) {
			Object.assign(description, yield* filter.getDescription(resourceClass));
		}

		return description;
	});
