/**
 * Query string parsing that keeps parameter names as sent.
 *
 * Some front ends rewrite dots in parameter names to underscores
 * ("author.name" → "author_name"). Filters re-read the raw query string
 * through this parser to recover the dotted names.
 *
 * @module
 */

export type QueryParams = Record<string, string | ReadonlyArray<string>>;

/**
 * Parse a raw query string into query parameters.
 *
 * - Names keep their dots and brackets: `order[author.name]=asc` stays under
 *   the key "order[author.name]"
 * - A trailing "[]" marks an array parameter and is dropped from the key
 * - Repeated names collect into an array
 *
 * @example
 * ```typescript
 * parseRequestParams("author.name=Le%20Guin&tags[]=a&tags[]=b")
 * // → { "author.name": "Le Guin", tags: ["a", "b"] }
 * ```
 */
export const parseRequestParams = (queryString: string): QueryParams => {
	const raw = queryString.startsWith("?") ? queryString.slice(1) : queryString;
	const params: Record<string, string | Array<string>> = {};

	for (const [rawName, value] of new URLSearchParams(raw)) {
		const isArray = rawName.endsWith("[]");
		const name = isArray ? rawName.slice(0, -2) : rawName;
		if (name.length === 0) continue;

		const existing = params[name];
		if (existing === undefined) {
			params[name] = isArray ? [value] : value;
		} else if (Array.isArray(existing)) {
			existing.push(value);
		} else {
			params[name] = [existing, value];
		}
	}

	return params;
};
