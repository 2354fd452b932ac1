import { HARD_BREAK, parseMarkdownEvents } from '../parser/markdown_events';
import { escapeTitleDelimiters } from './link_titles';
import { escapeRegExp, minNotMaxCharsInARow, poEscapedString, trimEndChars } from './string_utils';
import type {
	BlockDetails,
	BlockKind,
	MarkdownEventHandlers,
	MarkdownEventParser,
	MarkdownExtension,
	SpanDetails,
	SpanKind,
	TextKind,
	WrapperOptions
} from '../types';

/** Share of the width usable by a word while inside a link, leaving room for the `](href)` tail. */
const LINK_WIDTH_FACTOR = 0.95;

interface LinkState {
	href: string;
	title: string | null;
	/** Set once the link has been written as `<href>`. */
	collapsed: boolean;
}

/**
 * How a text run is handled, checked in this order: code span, wikilink, autolink,
 * hard break, plain text.
 */
type TextMode =
	| { kind: 'code' }
	| { kind: 'wikilink'; target: string }
	| { kind: 'autolink'; link: LinkState }
	| { kind: 'hardBreak' }
	| { kind: 'plain'; escape: boolean };

/**
 * Re-flows the inline content of one Markdown block into lines of limited width,
 * writing every span back as Markdown.
 *
 * The wrapper is fed parser events; `wrap` drives the parser itself. Width is counted on
 * the rendered line including markup, while indentation is only added when a line is
 * emitted. Words are never split, so a word longer than the width yields a longer line.
 * Use one instance per block.
 */
export class MarkdownSpanWrapper implements MarkdownEventHandlers {
	readonly width: number;
	readonly firstLineWidth: number;
	readonly indent: string;
	readonly firstLineIndent: string;
	readonly extensions: readonly MarkdownExtension[];

	readonly boldStartString: string;
	readonly boldEndString: string;
	readonly italicStartString: string;
	readonly italicEndString: string;
	readonly codeStartString: string;
	readonly codeEndString: string;
	readonly linkStartString: string;
	readonly linkEndString: string;
	readonly wikilinkStartString: string;
	readonly wikilinkEndString: string;
	readonly strikethroughStartString: string;
	readonly strikethroughEndString: string;

	readonly italicStartStringEscaped: string;
	readonly italicEndStringEscaped: string;
	readonly codeStartStringEscaped: string;
	readonly codeEndStringEscaped: string;

	private readonly parser: MarkdownEventParser;
	private readonly delimiterEscapes = new Map<string, string>();
	private readonly delimiterPattern: RegExp | null;

	/** Completed lines, indented and newline-terminated. */
	private output: string[] = [];
	private currentLine = '';
	private currentLink: LinkState | null = null;
	private insideCodeSpan = false;
	private currentWikilinkTarget: string | null = null;

	constructor(options: WrapperOptions = {}) {
		this.width = options.width ?? 80;
		this.firstLineWidth = options.firstLineWidth ?? this.width;
		this.indent = options.indent ?? '';
		this.firstLineIndent = options.firstLineIndent ?? '';
		this.extensions = options.extensions ?? [];
		this.parser = options.parser ?? parseMarkdownEvents;

		this.boldStartString = options.boldStartString ?? '**';
		this.boldEndString = options.boldEndString ?? '**';
		this.italicStartString = options.italicStartString ?? '*';
		this.italicEndString = options.italicEndString ?? '*';
		// Fences are built by repeating the code delimiter, so only its first character counts.
		this.codeStartString = (options.codeStartString ?? '`').charAt(0);
		this.codeEndString = (options.codeEndString ?? '`').charAt(0);
		this.linkStartString = options.linkStartString ?? '[';
		this.linkEndString = options.linkEndString ?? ']';
		this.wikilinkStartString = options.wikilinkStartString ?? '[[';
		this.wikilinkEndString = options.wikilinkEndString ?? ']]';
		this.strikethroughStartString = options.strikethroughStartString ?? '~~';
		this.strikethroughEndString = options.strikethroughEndString ?? '~~';

		this.italicStartStringEscaped =
			options.italicStartStringEscaped ?? poEscapedString(this.italicStartString);
		this.italicEndStringEscaped = options.italicEndStringEscaped ?? poEscapedString(this.italicEndString);
		this.codeStartStringEscaped = options.codeStartStringEscaped ?? poEscapedString(this.codeStartString);
		this.codeEndStringEscaped = options.codeEndStringEscaped ?? poEscapedString(this.codeEndString);

		const escapes: Array<[string, string]> = [
			[this.italicStartString, this.italicStartStringEscaped],
			[this.italicEndString, this.italicEndStringEscaped],
			[this.codeStartString, this.codeStartStringEscaped],
			[this.codeEndString, this.codeEndStringEscaped]
		];
		escapes.forEach(([delimiter, escaped]) => {
			if (delimiter && !this.delimiterEscapes.has(delimiter)) {
				this.delimiterEscapes.set(delimiter, escaped);
			}
		});
		const alternatives = Array.from(this.delimiterEscapes.keys())
			.sort((a, b) => b.length - a.length)
			.map(escapeRegExp);
		this.delimiterPattern = alternatives.length > 0 ? new RegExp(alternatives.join('|'), 'g') : null;
	}

	enterBlock(_block: BlockKind, _details: BlockDetails): void {}

	leaveBlock(_block: BlockKind, _details: BlockDetails): void {}

	enterSpan(span: SpanKind, details: SpanDetails): void {
		switch (span) {
			case 'CODE':
				this.insideCodeSpan = true;
				this.currentLine += this.codeStartString;
				break;
			case 'LINK':
				this.currentLine += this.linkStartString;
				this.currentLink = { href: details.href ?? '', title: details.title || null, collapsed: false };
				break;
			case 'STRONG':
				this.currentLine += this.boldStartString;
				break;
			case 'EMPHASIS':
				this.currentLine += this.italicStartString;
				break;
			case 'STRIKETHROUGH':
				this.currentLine += this.strikethroughStartString;
				break;
			case 'WIKILINK':
				this.currentLine += this.wikilinkStartString;
				this.currentWikilinkTarget = details.target || null;
				break;
			case 'IMAGE':
				this.currentLine += `!${this.linkStartString}`;
				break;
		}
	}

	leaveSpan(span: SpanKind, details: SpanDetails): void {
		switch (span) {
			case 'CODE':
				this.insideCodeSpan = false;
				this.currentLine += this.codeEndString;
				break;
			case 'LINK':
				if (this.currentLink && !this.currentLink.collapsed) {
					this.currentLine += this.linkEndString + formatDestination(this.currentLink.href, this.currentLink.title);
				}
				this.currentLink = null;
				break;
			case 'STRONG':
				this.currentLine += this.boldEndString;
				break;
			case 'EMPHASIS':
				this.currentLine += this.italicEndString;
				break;
			case 'STRIKETHROUGH':
				this.currentLine += this.strikethroughEndString;
				break;
			case 'WIKILINK':
				this.currentLine += this.wikilinkEndString;
				this.currentWikilinkTarget = null;
				break;
			case 'IMAGE':
				this.currentLine += this.linkEndString + formatDestination(details.src ?? '', details.title || null);
				break;
		}
	}

	text(_block: BlockKind, text: string, kind: TextKind = 'NORMAL'): void {
		const mode = this.textMode(text, kind);
		switch (mode.kind) {
			case 'code':
				this.appendCode(text);
				break;
			case 'wikilink':
				this.currentLine += text !== mode.target ? `${mode.target}|${text}` : text;
				break;
			case 'autolink':
				this.collapseAutolink(mode.link, text);
				break;
			case 'hardBreak':
				this.appendHardBreak();
				break;
			case 'plain':
				this.appendPlain(mode.escape ? this.escapeDelimiters(text) : text);
				break;
		}
	}

	/**
	 * Parse `text` and return its inline content re-flowed.
	 *
	 * A trailing newline is added only when the first line has the same width as the
	 * others; a narrower first line means the caller (list item, blockquote) owns the
	 * line endings.
	 */
	wrap(text: string): string {
		this.output = [];
		this.currentLine = '';
		this.currentLink = null;
		this.insideCodeSpan = false;
		this.currentWikilinkTarget = null;

		this.parser(text, this, this.extensions);

		let result = this.output.join('');
		if (this.currentLine) {
			result += `${this.appliedIndent()}${this.currentLine}`;
		}
		if (this.firstLineWidth === this.width) {
			result += '\n';
		}
		return result;
	}

	private textMode(text: string, kind: TextKind): TextMode {
		if (this.insideCodeSpan) return { kind: 'code' };
		if (this.currentWikilinkTarget !== null) return { kind: 'wikilink', target: this.currentWikilinkTarget };
		const link = this.currentLink;
		if (link && !link.title && link.href === text && this.currentLine.endsWith(this.linkStartString)) {
			return { kind: 'autolink', link };
		}
		if (text === HARD_BREAK && kind === 'NORMAL') return { kind: 'hardBreak' };
		return { kind: 'plain', escape: kind === 'NORMAL' };
	}

	private appliedWidth(): number {
		return this.output.length > 0 ? this.width : this.firstLineWidth;
	}

	private appliedIndent(): string {
		return this.output.length > 0 ? this.indent : this.firstLineIndent;
	}

	private emitLine(line: string): void {
		const indent = this.appliedIndent();
		this.output.push(`${indent}${line}\n`);
	}

	private appendCode(text: string): void {
		if (this.currentLine.length + text.length + 1 > this.appliedWidth()) {
			const line = trimEndChars(trimEndChars(this.currentLine, this.codeStartString), ' ');
			if (line) {
				this.emitLine(line);
				this.currentLine = this.codeStartString;
			}
		}

		const fence = this.codeStartString.repeat(minNotMaxCharsInARow(this.codeStartString, text) - 1);
		this.currentLine += `${fence}${text}${fence}`;
	}

	private collapseAutolink(link: LinkState, text: string): void {
		const before = this.currentLine.slice(0, this.currentLine.length - this.linkStartString.length);
		const trimmed = trimEndChars(before, ' ');
		this.currentLine = `${trimmed}${trimmed.length < before.length ? ' ' : ''}<${text}>`;
		link.collapsed = true;
	}

	/** Ends the line with a backslash so the break survives re-flow. */
	private appendHardBreak(): void {
		this.emitLine(`${trimEndChars(this.currentLine, ' ')}\\`);
		this.currentLine = '';
	}

	private appendPlain(text: string): void {
		const words = text.split(' ');
		let width = this.appliedWidth();

		if (this.currentLink) {
			// Move a link that would overflow on its first word to the next line as a whole.
			if (
				this.currentLine.endsWith(this.linkStartString) &&
				this.currentLine.length + words[0].length + 1 > width
			) {
				const before = this.currentLine.slice(0, this.currentLine.length - this.linkStartString.length);
				const line = trimEndChars(before, ' ');
				if (line) {
					this.emitLine(line);
					this.currentLine = this.linkStartString;
					width = this.appliedWidth();
				}
			}
			width *= LINK_WIDTH_FACTOR;
		}

		words.forEach((word, i) => {
			if (this.currentLine.length + word.length + 1 > width) {
				// The first word of a run may continue a word started by the previous run.
				const atBoundary = i > 0 || this.currentLine.endsWith(' ');
				const line = trimEndChars(this.currentLine, ' ');
				if (atBoundary && line) {
					this.emitLine(line);
					this.currentLine = '';
					width = this.appliedWidth() * (this.currentLink ? LINK_WIDTH_FACTOR : 1);
				}
			} else if (i > 0) {
				this.currentLine += ' ';
			}
			this.currentLine += word;
		});
	}

	private escapeDelimiters(text: string): string {
		if (!this.delimiterPattern) return text;
		return text.replace(this.delimiterPattern, (match) => this.delimiterEscapes.get(match) ?? match);
	}
}

function formatDestination(href: string, title: string | null): string {
	return title ? `(${href} "${escapeTitleDelimiters(title)}")` : `(${href})`;
}
