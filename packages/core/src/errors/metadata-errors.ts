import { Data } from "effect";

export class ResourceClassNotFoundError extends Data.TaggedError(
	"ResourceClassNotFoundError",
)<{
	readonly resourceClass: string;
	readonly message: string;
}> {}
