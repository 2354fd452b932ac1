/**
 * Prefix every character of a delimiter with a backslash, so `**` becomes `\*\*`.
 * @param chars - Delimiter to escape.
 */
export function poEscapedString(chars: string): string {
	return Array.from(chars, (ch) => `\\${ch}`).join('');
}

/**
 * Find the smallest run length of `char` that never occurs consecutively in `text`.
 * A code span fenced with that many backticks cannot be closed early by its content.
 * @param char - Character whose runs are counted.
 * @param text - Text to scan.
 * @returns 1 when `char` does not appear at all.
 */
export function minNotMaxCharsInARow(char: string, text: string): number {
	const runs = new Set<number>();
	let current = 0;
	for (const ch of text) {
		if (ch === char) {
			current++;
			continue;
		}
		if (current) runs.add(current);
		current = 0;
	}
	if (current) runs.add(current);

	let length = 1;
	while (runs.has(length)) length++;
	return length;
}

/**
 * Remove any trailing characters contained in `chars`.
 * @param value - String to trim.
 * @param chars - Set of characters to strip, as a string.
 */
export function trimEndChars(value: string, chars: string): string {
	if (!chars) return value;
	let end = value.length;
	while (end > 0 && chars.includes(value.charAt(end - 1))) end--;
	return value.slice(0, end);
}

/**
 * Escape a string for literal use inside a regular expression, including character classes.
 * @param value - Raw string.
 */
export function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
}

/**
 * Narrow an unknown value to a plain object.
 * @param value - Value to check.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
