import { jsonCodec } from "./codecs/json.js";
import { jsonLdCodec } from "./codecs/json-ld.js";
import { yamlCodec } from "./codecs/yaml.js";
import type { FormatCodec } from "./format-codec.js";

// ============================================================================
// Preset codec lists
// ============================================================================

/**
 * Codecs for the default API formats, in negotiation order:
 * - JSON-LD (application/ld+json), the default
 * - JSON (application/json)
 */
export const defaultCodecs = (): ReadonlyArray<FormatCodec> => [
	jsonLdCodec(),
	jsonCodec(),
];

/**
 * The default codecs plus YAML (application/x-yaml, text/yaml).
 */
export const allTextCodecs = (): ReadonlyArray<FormatCodec> => [
	jsonLdCodec(),
	jsonCodec(),
	yamlCodec(),
];
