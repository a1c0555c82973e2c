// ============================================================================
// Configuration Errors (re-exported from configuration-errors.ts)
// ============================================================================

export type { SetupError } from "./configuration-errors.js";
export {
	ConfigurationError,
	InvalidArgumentError,
} from "./configuration-errors.js";

// ============================================================================
// Serialization Errors (re-exported from serialization-errors.ts)
// ============================================================================

export type { SerializerError } from "./serialization-errors.js";
export {
	DeserializationError,
	SerializationError,
	UnsupportedFormatError,
} from "./serialization-errors.js";

// ============================================================================
// Metadata Errors (re-exported from metadata-errors.ts)
// ============================================================================

export { ResourceClassNotFoundError } from "./metadata-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { SetupError } from "./configuration-errors.js";
import type { ResourceClassNotFoundError } from "./metadata-errors.js";
import type { SerializerError } from "./serialization-errors.js";

export type ApiError = SetupError | SerializerError | ResourceClassNotFoundError;
