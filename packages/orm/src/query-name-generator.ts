/**
 * Unique names for join aliases and query parameters.
 *
 * A generator is scoped to one query-building call: counters start at 1 for
 * every new generator, so names are unique within the query it builds and
 * carry no identity across requests.
 *
 * @module
 */

export interface QueryNameGenerator {
	/** e.g. "author" → "author_a1", "author_a2", ... */
	readonly generateJoinAlias: (association: string) => string;
	/** e.g. "name" → "name_p1", "name_p2", ... */
	readonly generateParameterName: (name: string) => string;
}

const sanitize = (name: string): string => name.replace(/[^A-Za-z0-9_]/g, "_");

export const makeQueryNameGenerator = (): QueryNameGenerator => {
	let joinCount = 0;
	let parameterCount = 0;

	return {
		generateJoinAlias: (association) => {
			joinCount += 1;
			return `${sanitize(association)}_a${joinCount}`;
		},
		generateParameterName: (name) => {
			parameterCount += 1;
			return `${sanitize(name)}_p${parameterCount}`;
		},
	};
};
