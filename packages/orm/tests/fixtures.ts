/**
 * Resource graph shared by the filter tests:
 *
 *   books ──author──▶ authors ──address──▶ addresses
 *     ▲                  │
 *     └──────books───────┘
 */

import {
	type MetadataRegistry,
	makeMetadataRegistryLayer,
	type ResourcesConfig,
} from "@apilayer/core";
import { Effect, Schema } from "effect";

export const resources: ResourcesConfig = {
	books: {
		schema: Schema.Struct({
			id: Schema.String,
			title: Schema.String,
			year: Schema.Number,
			price: Schema.Number,
			authorId: Schema.String,
		}),
		relationships: {
			author: { type: "ref", target: "authors", foreignKey: "authorId" },
		},
	},
	authors: {
		schema: Schema.Struct({
			id: Schema.String,
			name: Schema.String,
			addressId: Schema.String,
		}),
		relationships: {
			address: { type: "ref", target: "addresses", foreignKey: "addressId" },
			books: { type: "inverse", target: "books", foreignKey: "authorId" },
		},
	},
	addresses: {
		schema: Schema.Struct({
			id: Schema.String,
			city: Schema.String,
		}),
		relationships: {},
	},
};

export const MetadataLayer = makeMetadataRegistryLayer(resources);

/**
 * Run a synchronous Effect against the fixture metadata.
 */
export const runWithMetadata = <A, E>(
	effect: Effect.Effect<A, E, MetadataRegistry>,
) => Effect.runSync(Effect.either(Effect.provide(effect, MetadataLayer)));
