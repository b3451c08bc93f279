/**
 * Typed access into loosely shaped Voyager JSON.
 * Every accessor fails closed: a missing or mismatched node yields undefined or the default.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type PathSegment = string | number;

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` from `root`. Strings index objects, numbers index arrays.
 *
 * @example
 * getPath(data, "elements", 0, "entityUrn")
 */
export function getPath(root: unknown, ...path: PathSegment[]): unknown {
	let node: unknown = root;
	for (const segment of path) {
		if (typeof segment === "number") {
			if (!Array.isArray(node) || segment < 0 || segment >= node.length) {
				return undefined;
			}
			node = node[segment];
		} else {
			if (!isJsonObject(node) || !Object.hasOwn(node, segment)) {
				return undefined;
			}
			node = node[segment];
		}
	}
	return node;
}

export function getString(root: unknown, ...path: PathSegment[]): string | undefined {
	const value = getPath(root, ...path);
	return typeof value === "string" ? value : undefined;
}

export function getNumber(root: unknown, ...path: PathSegment[]): number | undefined {
	const value = getPath(root, ...path);
	return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function getBoolean(root: unknown, ...path: PathSegment[]): boolean | undefined {
	const value = getPath(root, ...path);
	return typeof value === "boolean" ? value : undefined;
}

export function getArray(root: unknown, ...path: PathSegment[]): unknown[] {
	const value = getPath(root, ...path);
	return Array.isArray(value) ? value : [];
}

export function getObject(root: unknown, ...path: PathSegment[]): JsonObject | undefined {
	const value = getPath(root, ...path);
	return isJsonObject(value) ? value : undefined;
}
