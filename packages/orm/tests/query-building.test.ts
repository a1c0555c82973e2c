import { describe, expect, it } from "vitest";
import { makeQueryBuilder } from "../src/query-builder.js";
import { makeQueryNameGenerator } from "../src/query-name-generator.js";

describe("makeQueryNameGenerator", () => {
	it("numbers join aliases from 1", () => {
		const generator = makeQueryNameGenerator();

		expect(generator.generateJoinAlias("author")).toBe("author_a1");
		expect(generator.generateJoinAlias("author")).toBe("author_a2");
		expect(generator.generateJoinAlias("address")).toBe("address_a3");
	});

	it("numbers parameters independently of aliases", () => {
		const generator = makeQueryNameGenerator();

		generator.generateJoinAlias("author");
		expect(generator.generateParameterName("name")).toBe("name_p1");
		expect(generator.generateParameterName("title")).toBe("title_p2");
	});

	it("replaces characters that are not valid in identifiers", () => {
		const generator = makeQueryNameGenerator();

		expect(generator.generateParameterName("order[title]")).toBe("order_title__p1");
		expect(generator.generateJoinAlias("co-author")).toBe("co_author_a1");
	});

	it("starts every generator from scratch", () => {
		makeQueryNameGenerator().generateJoinAlias("author");

		expect(makeQueryNameGenerator().generateJoinAlias("author")).toBe("author_a1");
	});
});

describe("makeQueryBuilder", () => {
	it("renders a bare select on the root alias", () => {
		expect(makeQueryBuilder("books").getDQL()).toBe("SELECT o FROM books o");
	});

	it("uses a custom root alias", () => {
		const queryBuilder = makeQueryBuilder("books", "b");

		expect(queryBuilder.getRootAlias()).toBe("b");
		expect(queryBuilder.getDQL()).toBe("SELECT b FROM books b");
	});

	it("renders joins, predicates and orderings in order", () => {
		const queryBuilder = makeQueryBuilder("books");

		queryBuilder.leftJoin("o.author", "author_a1");
		queryBuilder.andWhere("author_a1.name = :name_p1");
		queryBuilder.andWhere("o.year > :year_p2");
		queryBuilder.addOrderBy("o.title", "ASC");
		queryBuilder.addOrderBy("o.year", "DESC");

		expect(queryBuilder.getDQL()).toBe(
			"SELECT o FROM books o LEFT JOIN o.author author_a1 WHERE author_a1.name = :name_p1 AND o.year > :year_p2 ORDER BY o.title ASC, o.year DESC",
		);
	});

	it("records parameters by name", () => {
		const queryBuilder = makeQueryBuilder("books");

		queryBuilder.setParameter("title_p1", "Dune");
		queryBuilder.setParameter("year_p2", 1965);

		expect(queryBuilder.getParameters()).toEqual({
			title_p1: "Dune",
			year_p2: 1965,
		});
	});
});
