import { escapeRegExp } from './string_utils';

/**
 * Escape the `"` title delimiter inside a bare link or image title.
 * @param title - Title as produced by the parser, without surrounding quotes.
 */
export function escapeTitleDelimiters(title: string): string {
	return title.replace(/"/g, '\\"');
}

/**
 * Escape `"` characters found inside the titles of inline links.
 *
 * Looks for `[text](href "title")` forms; the title payload runs from the first quote after
 * the href up to the first `)`. Each payload is re-wrapped in double quotes with its inner
 * quotes escaped, so `[a](b "say "hi"")` becomes `[a](b "say \"hi\"")`.
 *
 * @param text - Text where the link titles will be searched.
 * @param linkStartString - Delimiter opening the link text.
 * @param linkEndString - Delimiter closing the link text.
 * @returns The same text with the delimiters inside titles escaped.
 */
export function escapeLinkTitle(text: string, linkStartString = '[', linkEndString = ']'): string {
	const start = escapeRegExp(linkStartString);
	const end = escapeRegExp(linkEndString);
	const regex = new RegExp(`(${start}[^${end}]+${end}\\([^\\s)]+\\s)(["'][^)]*)`, 'g');

	let result = text;
	for (const match of text.matchAll(regex)) {
		const head = match[1] ?? '';
		const payload = match[2] ?? '';
		const escaped = `${head}"${escapeTitleDelimiters(payload.slice(1, -1))}"`;
		result = result.replace(head + payload, () => escaped);
	}
	return result;
}
