/**
 * Query builder contract used by filters, and a recording implementation.
 *
 * Filters only ever add joins, predicates, parameters and orderings. The
 * recording builder keeps those parts and renders them as a DQL-like string
 * for the host's query layer (or a test) to consume; it executes nothing.
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

export type OrderDirection = "ASC" | "DESC";

export interface QueryBuilder {
	readonly getRootAlias: () => string;
	/** Left (outer) join of `join` ("parentAlias.association") as `alias` */
	readonly leftJoin: (join: string, alias: string) => void;
	/** Add a predicate, combined with the existing ones by AND */
	readonly andWhere: (predicate: string) => void;
	readonly setParameter: (name: string, value: unknown) => void;
	readonly addOrderBy: (sort: string, direction: OrderDirection) => void;
}

export interface JoinPart {
	readonly join: string;
	readonly alias: string;
}

export interface OrderByPart {
	readonly sort: string;
	readonly direction: OrderDirection;
}

export interface RecordingQueryBuilder extends QueryBuilder {
	readonly getEntity: () => string;
	readonly getJoins: () => ReadonlyArray<JoinPart>;
	readonly getWhere: () => ReadonlyArray<string>;
	readonly getParameters: () => Readonly<Record<string, unknown>>;
	readonly getOrderBy: () => ReadonlyArray<OrderByPart>;
	/**
	 * Render the query, e.g.
	 * `SELECT o FROM books o LEFT JOIN o.author author_a1 WHERE author_a1.name = :name_p1`
	 */
	readonly getDQL: () => string;
}

// ============================================================================
// Recording implementation
// ============================================================================

export const makeQueryBuilder = (
	entity: string,
	rootAlias = "o",
): RecordingQueryBuilder => {
	const joins: Array<JoinPart> = [];
	const where: Array<string> = [];
	const parameters: Record<string, unknown> = {};
	const orderBy: Array<OrderByPart> = [];

	return {
		getRootAlias: () => rootAlias,
		leftJoin: (join, alias) => {
			joins.push({ join, alias });
		},
		andWhere: (predicate) => {
			where.push(predicate);
		},
		setParameter: (name, value) => {
			parameters[name] = value;
		},
		addOrderBy: (sort, direction) => {
			orderBy.push({ sort, direction });
		},

		getEntity: () => entity,
		getJoins: () => joins,
		getWhere: () => where,
		getParameters: () => parameters,
		getOrderBy: () => orderBy,
		getDQL: () => {
			const parts = [`SELECT ${rootAlias} FROM ${entity} ${rootAlias}`];

			for (const { join, alias } of joins) {
				parts.push(`LEFT JOIN ${join} ${alias}`);
			}

			if (where.length > 0) {
				parts.push(`WHERE ${where.join(" AND ")}`);
			}

			if (orderBy.length > 0) {
				parts.push(
					`ORDER BY ${orderBy.map(({ sort, direction }) => `${sort} ${direction}`).join(", ")}`,
				);
			}

			return parts.join(" ");
		},
	};
};
