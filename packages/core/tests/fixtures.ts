/**
 * Shared resource configuration for core tests.
 */

import { Schema } from "effect";
import type {
	ResourceConfig,
	ResourcesConfig,
} from "../src/types/resource-config-types.js";

export const BookSchema = Schema.Struct({
	id: Schema.String,
	title: Schema.String,
	year: Schema.Number,
	authorId: Schema.String,
});

export const AuthorSchema = Schema.Struct({
	id: Schema.String,
	name: Schema.String,
	addressId: Schema.optional(Schema.String),
});

export const AddressSchema = Schema.Struct({
	id: Schema.String,
	city: Schema.String,
});

export const booksResource: ResourceConfig = {
	schema: BookSchema,
	relationships: {
		author: { type: "ref", target: "authors", foreignKey: "authorId" },
	},
	normalizationContext: { groups: ["book:read"] },
	denormalizationContext: { groups: ["book:write"] },
	itemOperations: {
		put: { denormalizationContext: { groups: ["book:update"] } },
	},
};

export const resources: ResourcesConfig = {
	books: booksResource,
	authors: {
		schema: AuthorSchema,
		relationships: {
			books: { type: "inverse", target: "books", foreignKey: "authorId" },
			address: { type: "ref", target: "addresses", foreignKey: "addressId" },
		},
	},
	addresses: {
		schema: AddressSchema,
		relationships: {},
	},
};
