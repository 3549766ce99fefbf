// ---------------------------------------------------------------------------
// Safe navigation over loosely structured JSON:API payloads
// ---------------------------------------------------------------------------
//
// Every accessor takes a root value and a path of object keys / array indices
// and returns `undefined` as soon as a segment is missing or of the wrong
// shape. Mappers call these instead of writing nested presence checks.

export type PathSegment = string | number;
export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Raw value at `path`, or `undefined`. */
export function at(root: unknown, ...path: PathSegment[]): unknown {
	let current: unknown = root;
	for (const segment of path) {
		if (typeof segment === "number") {
			if (!Array.isArray(current)) return undefined;
			current = current[segment];
		} else {
			if (!isJsonObject(current)) return undefined;
			current = current[segment];
		}
		if (current === undefined || current === null) return undefined;
	}
	return current;
}

/**
 * Non-empty string at `path`. Finite numbers are rendered as strings;
 * empty strings, booleans, objects and arrays count as absent.
 */
export function text(root: unknown, ...path: PathSegment[]): string | undefined {
	const value = at(root, ...path);
	if (typeof value === "string") return value.length > 0 ? value : undefined;
	if (typeof value === "number" && Number.isFinite(value)) return String(value);
	return undefined;
}

/** Object at `path`, or `undefined`. */
export function node(root: unknown, ...path: PathSegment[]): JsonObject | undefined {
	const value = at(root, ...path);
	return isJsonObject(value) ? value : undefined;
}

/** Array at `path`; anything else yields an empty array. */
export function list(root: unknown, ...path: PathSegment[]): unknown[] {
	const value = at(root, ...path);
	return Array.isArray(value) ? value : [];
}

/** First non-empty string among several paths. */
export function firstText(root: unknown, ...paths: PathSegment[][]): string | undefined {
	for (const path of paths) {
		const value = text(root, ...path);
		if (value !== undefined) return value;
	}
	return undefined;
}

/**
 * Human-readable rendering of a scalar or nested value for document bodies.
 * Objects and arrays are serialized as JSON.
 */
export function display(root: unknown, ...path: PathSegment[]): string | undefined {
	const value = at(root, ...path);
	if (value === undefined) return undefined;
	if (typeof value === "string") return value.length > 0 ? value : undefined;
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	const serialized = JSON.stringify(value);
	return serialized === "{}" || serialized === "[]" ? undefined : serialized;
}
