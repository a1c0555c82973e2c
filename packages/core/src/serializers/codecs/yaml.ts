import YAML from "yaml";
import type { FormatCodec, FormatOptions } from "../format-codec.js";

export interface YamlCodecOptions {
	readonly indent?: number;
	/** Column at which long scalars are folded (default: 80) */
	readonly lineWidth?: number;
}

/**
 * YAML bodies. Both `application/x-yaml` and `text/yaml` negotiate to the
 * "yaml" format, since clients send either. Also used to read the formats
 * configuration file (see `parseApiConfig` in @apilayer/rest).
 */
export const yamlCodec = (options?: YamlCodecOptions): FormatCodec => {
	const indent = options?.indent ?? 2;
	const lineWidth = options?.lineWidth ?? 80;

	return {
		name: "yaml",
		mimeTypes: ["application/x-yaml", "text/yaml"],
		encode: (data: unknown, formatOptions?: FormatOptions): string =>
			YAML.stringify(data, {
				indent: formatOptions?.indent ?? indent,
				lineWidth,
			}),
		decode: (raw: string): unknown => YAML.parse(raw),
	};
};
