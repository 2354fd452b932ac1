import { describe, it, expect } from 'vitest';
import { escapeLinkTitle, escapeTitleDelimiters } from '../../src/core/link_titles';

describe('escapeLinkTitle', () => {
	it('escapes quotes inside a link title', () => {
		const title = '[a link](href "title with characters to escape "")';
		expect(escapeLinkTitle(title)).toBe('[a link](href "title with characters to escape \\"")');
	});

	it('escapes every title in the text', () => {
		const text = '[a](x "b "c"") and [d](y "e "f"")';
		expect(escapeLinkTitle(text)).toBe('[a](x "b \\"c\\"") and [d](y "e \\"f\\"")');
	});

	it('re-wraps single-quoted titles in double quotes', () => {
		expect(escapeLinkTitle("[a](x 'say \"hi\"')")).toBe('[a](x "say \\"hi\\"")');
	});

	it('returns text without titles unchanged', () => {
		const text = 'plain [a](b) text and (a parenthesis)';
		expect(escapeLinkTitle(text)).toBe(text);
		expect(escapeLinkTitle(escapeLinkTitle(text))).toBe(text);
	});

	it('does not read text after a link as its title', () => {
		const text = 'see [x](http://a.com) and "quoted" (more)';
		expect(escapeLinkTitle(text)).toBe(text);
	});

	it('accepts custom link delimiters', () => {
		expect(escapeLinkTitle('{a}(x "q"q")', '{', '}')).toBe('{a}(x "q\\"q")');
	});

	it('handles replacement-like sequences in titles literally', () => {
		expect(escapeLinkTitle('[a](x "$& "y"")')).toBe('[a](x "$& \\"y\\"")');
	});
});

describe('escapeTitleDelimiters', () => {
	it('escapes double quotes', () => {
		expect(escapeTitleDelimiters('a "quoted" word')).toBe('a \\"quoted\\" word');
	});

	it('leaves titles without quotes alone', () => {
		expect(escapeTitleDelimiters("it's fine")).toBe("it's fine");
	});
});
