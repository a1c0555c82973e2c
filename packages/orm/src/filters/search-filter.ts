/**
 * Search filter: equality and LIKE matching on string properties.
 *
 * `?title=Dune` → `o.title = :title_p1`
 * `?author.name=Le%20Guin` → join on `o.author`, then `author_a1.name = :name_p1`
 * `?title[]=Dune&title[]=Emma` → `o.title IN (:title_p1)`
 *
 * @module
 */

import { getClassMetadata } from "@apilayer/core";
import { Effect, Option } from "effect";
import type { Filter, FilterDescription, SearchStrategy } from "./filter.js";
import {
	extractProperties,
	type FilterProperties,
	getPropertySetting,
	isPropertyMapped,
	resolveFilterProperty,
} from "./filter-helpers.js";

export interface SearchFilterOptions {
	/**
	 * Allow-listed properties and their strategy (null means "exact").
	 * Without it every plain field is searchable with the exact strategy.
	 */
	readonly properties?: FilterProperties<SearchStrategy>;
}

/**
 * Escape LIKE wildcards in a user value. Backslash is the escape character,
 * the default of MySQL and PostgreSQL.
 */
export const escapeLikeValue = (value: string): string =>
	value.replace(/[\\%_]/g, "\\$&");

const LIKE_PATTERNS: Record<Exclude<SearchStrategy, "exact">, (value: string) => string> = {
	partial: (value) => `%${escapeLikeValue(value)}%`,
	start: (value) => `${escapeLikeValue(value)}%`,
	end: (value) => `%${escapeLikeValue(value)}`,
};

const normalizeValues = (value: string | ReadonlyArray<string>): ReadonlyArray<string> =>
	(typeof value === "string" ? [value] : value).filter((v) => v.length > 0);

export const makeSearchFilter = (options: SearchFilterOptions = {}): Filter => {
	const properties = options.properties ?? null;

	const strategyFor = (property: string): SearchStrategy =>
		getPropertySetting(property, properties) ?? "exact";

	return {
		apply: (queryBuilder, nameGenerator, resourceClass, request) =>
			Effect.gen(function* () {
				for (const [property, value] of Object.entries(
					extractProperties(request, properties),
				)) {
					const values = normalizeValues(value);
					if (values.length === 0) continue;

					const resolved = yield* resolveFilterProperty(
						property,
						resourceClass,
						properties,
						queryBuilder,
						nameGenerator,
					);
					if (Option.isNone(resolved)) continue;

					const [alias, field] = resolved.value;
					const column = `${alias}.${field}`;
					const strategy = strategyFor(property);

					if (strategy === "exact") {
						const parameter = nameGenerator.generateParameterName(field);
						const [single] = values;
						if (values.length === 1 && single !== undefined) {
							queryBuilder.andWhere(`${column} = :${parameter}`);
							queryBuilder.setParameter(parameter, single);
						} else {
							queryBuilder.andWhere(`${column} IN (:${parameter})`);
							queryBuilder.setParameter(parameter, values);
						}
						continue;
					}

					const pattern = LIKE_PATTERNS[strategy];
					const predicates = values.map((v) => {
						const parameter = nameGenerator.generateParameterName(field);
						queryBuilder.setParameter(parameter, pattern(v));
						return `${column} LIKE :${parameter}`;
					});

					queryBuilder.andWhere(
						predicates.length === 1
							? predicates.join("")
							: `(${predicates.join(" OR ")})`,
					);
				}
			}),

		getDescription: (resourceClass) =>
			Effect.gen(function* () {
				const description: Record<string, FilterDescription> = {};

				const candidates =
					properties === null
						? (yield* getClassMetadata(resourceClass)).getFieldNames()
						: Object.keys(properties);

				for (const property of candidates) {
					if (!(yield* isPropertyMapped(property, resourceClass))) continue;

					description[property] = {
						property,
						type: "string",
						required: false,
						strategy: strategyFor(property),
					};
				}

				return description;
			}),
	};
};
