export function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/** True for a Node filesystem error whose code is ENOENT. */
export function isEnoent(value: unknown): boolean {
	return isRecord(value) && value.code === "ENOENT";
}
