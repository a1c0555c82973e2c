import type { FormatCodec, FormatOptions } from "../format-codec.js";

export interface JsonCodecOptions {
	/** Spaces per indentation level of encoded responses (default: 2) */
	readonly indent?: number;
	/**
	 * Content types negotiated to the "json" format. Add vendor types such as
	 * "application/vnd.api+json" here to accept them as plain JSON bodies.
	 */
	readonly mimeTypes?: ReadonlyArray<string>;
}

/**
 * Plain JSON request and response bodies, negotiated from
 * `Content-Type: application/json` or the `json` format hint.
 *
 * @example
 * ```typescript
 * const codec = jsonCodec({ mimeTypes: ["application/json", "application/vnd.api+json"] })
 * formatsFromCodecs([codec]) // { json: ["application/json", "application/vnd.api+json"] }
 * ```
 */
export const jsonCodec = (options?: JsonCodecOptions): FormatCodec => {
	const indent = options?.indent ?? 2;

	return {
		name: "json",
		mimeTypes: options?.mimeTypes ?? ["application/json"],
		encode: (data: unknown, formatOptions?: FormatOptions): string =>
			JSON.stringify(data, null, formatOptions?.indent ?? indent),
		decode: (raw: string): unknown => JSON.parse(raw),
	};
};
