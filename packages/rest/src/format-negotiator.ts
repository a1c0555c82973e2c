/**
 * Request format negotiation.
 *
 * Resolves the single format identifier used to read a request body from the
 * upstream format hint, the Content-Type header and a configured format table.
 *
 * @module
 */

import { ConfigurationError } from "@apilayer/core";
import type { ApiRequest, FormatTable } from "@apilayer/core";
import { Effect, Option } from "effect";

/**
 * Strip parameters (";charset=utf-8") and normalize case of a MIME type.
 */
export const normalizeMimeType = (contentType: string): string => {
	const semicolon = contentType.indexOf(";");
	const bare = semicolon === -1 ? contentType : contentType.slice(0, semicolon);
	return bare.trim().toLowerCase();
};

/**
 * Find the first format, in table order, whose MIME types include the given
 * content type.
 */
export const getMimeTypeFormat = (
	contentType: string,
	formats: FormatTable,
): Option.Option<string> => {
	const mimeType = normalizeMimeType(contentType);
	if (mimeType.length === 0) {
		return Option.none();
	}

	for (const [format, mimeTypes] of Object.entries(formats)) {
		if (mimeTypes.some((candidate) => candidate.toLowerCase() === mimeType)) {
			return Option.some(format);
		}
	}

	return Option.none();
};

/**
 * Resolve the format of a request body.
 *
 * 1. An upstream format hint that names a configured format wins
 * 2. Otherwise the Content-Type header is matched against the table
 * 3. Otherwise the first format of the table is used. Requests are not
 *    rejected for an unknown content type at this stage
 *
 * Fails with ConfigurationError when the table is empty.
 */
export const negotiateFormat = (
	request: ApiRequest,
	formats: FormatTable,
): Effect.Effect<string, ConfigurationError> => {
	const available = Object.keys(formats);
	const defaultFormat = available[0];

	if (defaultFormat === undefined) {
		return Effect.fail(
			new ConfigurationError({
				setting: "formats",
				message: "No formats configured: at least one format is required",
			}),
		);
	}

	const hint = request.requestFormat;
	if (hint !== undefined && Object.hasOwn(formats, hint)) {
		return Effect.succeed(hint);
	}

	const contentType = request.headers["content-type"];
	const matched =
		contentType === undefined
			? Option.none<string>()
			: getMimeTypeFormat(contentType, formats);

	return Effect.succeed(Option.getOrElse(matched, () => defaultFormat));
};
