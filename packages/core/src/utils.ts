
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Cut to `maxLength` characters, the last three being `...`
 */
export function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) {
		return str;
	}
	return `${str.slice(0, maxLength - 3)}...`;
}

/**
 * Render an arbitrary value for error messages and logs.
 */
export function stringify(value: unknown, maxLength = 500): string {
	if (value === undefined) {
		return "undefined";
	}
	if (typeof value === "string") {
		return truncate(JSON.stringify(value), maxLength);
	}
	try {
		return truncate(JSON.stringify(value) ?? String(value), maxLength);
	} catch {
		return truncate(String(value), maxLength);
	}
}

/**
 * Narrow an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
