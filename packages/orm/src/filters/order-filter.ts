/**
 * Order filter: `?order[title]=desc&order[author.name]=asc`.
 *
 * @module
 */

import { getClassMetadata } from "@apilayer/core";
import { Effect, Option } from "effect";
import type { OrderDirection } from "../query-builder.js";
import type { Filter, FilterDescription } from "./filter.js";
import {
	extractProperties,
	type FilterProperties,
	getPropertySetting,
	isPropertyMapped,
	resolveFilterProperty,
} from "./filter-helpers.js";

export type OrderSetting = "asc" | "desc";

export interface OrderFilterOptions {
	/**
	 * Allow-listed properties and the direction used when the parameter has
	 * no value. Without it every plain field can be ordered on.
	 */
	readonly properties?: FilterProperties<OrderSetting>;

	/** Name of the query parameter (default: "order") */
	readonly orderParameterName?: string;
}

const parseDirection = (value: string): OrderDirection | undefined => {
	const lowered = value.trim().toLowerCase();
	if (lowered === "asc") return "ASC";
	if (lowered === "desc") return "DESC";
	return undefined;
};

const escapeRegExp = (value: string): string =>
	value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const makeOrderFilter = (options: OrderFilterOptions = {}): Filter => {
	const properties = options.properties ?? null;
	const parameterName = options.orderParameterName ?? "order";
	const keyPattern = new RegExp(`^${escapeRegExp(parameterName)}\\[(.+)\\]$`);

	return {
		apply: (queryBuilder, nameGenerator, resourceClass, request) =>
			Effect.gen(function* () {
				for (const [key, value] of Object.entries(
					extractProperties(request, properties),
				)) {
					const match = keyPattern.exec(key);
					const property = match?.[1];
					if (property === undefined) continue;

					const raw = typeof value === "string" ? value : value.join("");
					const fallback = getPropertySetting(property, properties);
					const direction =
						raw.length > 0
							? parseDirection(raw)
							: fallback !== null
								? parseDirection(fallback)
								: undefined;
					if (direction === undefined) continue;

					const resolved = yield* resolveFilterProperty(
						property,
						resourceClass,
						properties,
						queryBuilder,
						nameGenerator,
					);
					if (Option.isNone(resolved)) continue;

					const [alias, field] = resolved.value;
					queryBuilder.addOrderBy(`${alias}.${field}`, direction);
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

					description[`${parameterName}[${property}]`] = {
						property,
						type: "string",
						required: false,
					};
				}

				return description;
			}),
	};
};
