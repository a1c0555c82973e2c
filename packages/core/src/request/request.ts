/**
 * Framework-agnostic request snapshot.
 *
 * Adapters for specific frameworks (Express, Hono, node:http) convert their
 * native request objects to this shape before running listeners. Everything
 * is read-only except `attributes.data`, where listeners store their result.
 *
 * @module
 */

import { Option } from "effect";

// ============================================================================
// Types
// ============================================================================

/**
 * Out-of-band attributes set by the router for managed resource requests.
 */
export interface RequestAttributes {
	/** Resource class targeted by the route (e.g. "books") */
	readonly resourceClass?: string;

	/** Name of the collection operation (e.g. "post") */
	readonly collectionOperationName?: string;

	/** Name of the item operation (e.g. "put") */
	readonly itemOperationName?: string;

	/** Object loaded before deserialization, populated in place of a new one */
	readonly objectToPopulate?: unknown;

	/** Deserialized result, written by the deserialize listener */
	data?: unknown;
}

export interface ApiRequest {
	/** HTTP method, as sent by the client */
	readonly method: string;

	/** Header values keyed by lower-cased header name */
	readonly headers: Readonly<Record<string, string | undefined>>;

	/**
	 * Format resolved upstream (e.g. from a ".json" route suffix).
	 */
	readonly requestFormat?: string;

	/** Raw request body */
	readonly content: string;

	/** Parsed URL query parameters */
	readonly query: Readonly<Record<string, string | ReadonlyArray<string>>>;

	/** Raw query string without the leading "?" */
	readonly queryString?: string;

	readonly attributes: RequestAttributes;
}

export type OperationType = "collection" | "item";

/**
 * Attributes of a managed resource request.
 */
export interface ExtractedAttributes {
	readonly resourceClass: string;
	readonly operationType: OperationType;
	readonly operationName: string;
	readonly objectToPopulate?: unknown;
}

// ============================================================================
// Helpers
// ============================================================================

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS", "TRACE"]);

/**
 * Whether the method is one without body semantics.
 */
export const isSafeMethod = (method: string): boolean =>
	SAFE_METHODS.has(method.toUpperCase());

/**
 * Extract the managed-resource attributes of a request.
 *
 * Returns None when the request has no resource class or no operation name,
 * i.e. when the router did not match it to a resource operation.
 * A collection operation name takes precedence over an item operation name.
 */
export const extractAttributes = (
	request: ApiRequest,
): Option.Option<ExtractedAttributes> => {
	const { resourceClass, collectionOperationName, itemOperationName } =
		request.attributes;

	if (resourceClass === undefined) {
		return Option.none();
	}

	const operation: { type: OperationType; name: string } | undefined =
		collectionOperationName !== undefined
			? { type: "collection", name: collectionOperationName }
			: itemOperationName !== undefined
				? { type: "item", name: itemOperationName }
				: undefined;

	if (operation === undefined) {
		return Option.none();
	}

	const extracted: ExtractedAttributes = {
		resourceClass,
		operationType: operation.type,
		operationName: operation.name,
	};

	return Option.some(
		request.attributes.objectToPopulate !== undefined
			? { ...extracted, objectToPopulate: request.attributes.objectToPopulate }
			: extracted,
	);
};

/**
 * Create an ApiRequest with defaults for every omitted field.
 * Header names are lower-cased.
 */
export const createRequest = (
	init: Partial<Omit<ApiRequest, "attributes">> & {
		readonly attributes?: RequestAttributes;
	} = {},
): ApiRequest => {
	const headers: Record<string, string | undefined> = {};
	for (const [name, value] of Object.entries(init.headers ?? {})) {
		headers[name.toLowerCase()] = value;
	}

	return {
		method: init.method ?? "GET",
		headers,
		content: init.content ?? "",
		query: init.query ?? {},
		attributes: init.attributes ?? {},
		...(init.requestFormat !== undefined
			? { requestFormat: init.requestFormat }
			: {}),
		...(init.queryString !== undefined
			? { queryString: init.queryString }
			: {}),
	};
};
