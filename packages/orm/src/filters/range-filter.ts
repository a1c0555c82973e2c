/**
 * Range filter on numeric properties.
 *
 * `?price[between]=10..20` → `o.price BETWEEN :price_p1 AND :price_p2`
 * `?price[gte]=10` → `o.price >= :price_p1`
 *
 * Values that are not numbers are ignored.
 *
 * @module
 */

import { getClassMetadata } from "@apilayer/core";
import { Effect, Option } from "effect";
import type { Filter, FilterDescription } from "./filter.js";
import {
	extractProperties,
	type FilterProperties,
	isPropertyMapped,
	resolveFilterProperty,
} from "./filter-helpers.js";

export type RangeOperator = "between" | "gt" | "gte" | "lt" | "lte";

const RANGE_OPERATORS: ReadonlyArray<RangeOperator> = [
	"between",
	"gt",
	"gte",
	"lt",
	"lte",
];

const COMPARISONS: Record<Exclude<RangeOperator, "between">, string> = {
	gt: ">",
	gte: ">=",
	lt: "<",
	lte: "<=",
};

const KEY_PATTERN = /^(.+)\[(between|gt|gte|lt|lte)\]$/;

const isRangeOperator = (value: string): value is RangeOperator =>
	RANGE_OPERATORS.some((operator) => operator === value);

export interface RangeFilterOptions {
	/** Allow-listed properties. Without it every plain field is accepted. */
	readonly properties?: FilterProperties;
}

const parseNumber = (value: string): number | undefined => {
	const trimmed = value.trim();
	if (trimmed.length === 0) return undefined;
	const parsed = Number(trimmed);
	return Number.isFinite(parsed) ? parsed : undefined;
};

export const makeRangeFilter = (options: RangeFilterOptions = {}): Filter => {
	const properties = options.properties ?? null;

	return {
		apply: (queryBuilder, nameGenerator, resourceClass, request) =>
			Effect.gen(function* () {
				for (const [key, value] of Object.entries(
					extractProperties(request, properties),
				)) {
					const match = KEY_PATTERN.exec(key);
					const property = match?.[1];
					const operator = match?.[2];
					if (
						property === undefined ||
						operator === undefined ||
						!isRangeOperator(operator) ||
						typeof value !== "string"
					) {
						continue;
					}

					let bounds: ReadonlyArray<number>;
					if (operator === "between") {
						const [lower, upper, ...rest] = value.split("..");
						const lowerValue = lower === undefined ? undefined : parseNumber(lower);
						const upperValue = upper === undefined ? undefined : parseNumber(upper);
						if (
							rest.length > 0 ||
							lowerValue === undefined ||
							upperValue === undefined
						) {
							yield* Effect.logDebug(
								`Ignoring invalid range '${value}' for '${property}'`,
							);
							continue;
						}
						bounds = [lowerValue, upperValue];
					} else {
						const parsed = parseNumber(value);
						if (parsed === undefined) {
							yield* Effect.logDebug(
								`Ignoring non-numeric value '${value}' for '${property}'`,
							);
							continue;
						}
						bounds = [parsed];
					}

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
					const parameters = bounds.map((bound) => {
						const parameter = nameGenerator.generateParameterName(field);
						queryBuilder.setParameter(parameter, bound);
						return parameter;
					});

					if (operator === "between") {
						queryBuilder.andWhere(
							`${column} BETWEEN :${parameters[0]} AND :${parameters[1]}`,
						);
					} else {
						queryBuilder.andWhere(
							`${column} ${COMPARISONS[operator]} :${parameters[0]}`,
						);
					}
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

					for (const operator of RANGE_OPERATORS) {
						description[`${property}[${operator}]`] = {
							property,
							type: "number",
							required: false,
						};
					}
				}

				return description;
			}),
	};
};
