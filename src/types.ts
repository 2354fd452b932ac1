/**
 * Inline Markdown constructs reported by the parser with a start and an end event.
 */
export type SpanKind = 'CODE' | 'LINK' | 'STRONG' | 'EMPHASIS' | 'WIKILINK' | 'IMAGE' | 'STRIKETHROUGH';

/**
 * Structural Markdown units. The wrapper only re-flows inline content inside one of them.
 */
export type BlockKind =
	| 'DOC'
	| 'P'
	| 'H'
	| 'QUOTE'
	| 'UL'
	| 'OL'
	| 'LI'
	| 'CODE'
	| 'HTML'
	| 'HR'
	| 'TABLE'
	| 'THEAD'
	| 'TBODY'
	| 'TR'
	| 'TH'
	| 'TD';

/**
 * Attributes attached to a block event.
 */
export interface BlockDetails {
	/** Heading level (1-6) for `H` blocks. */
	level?: number;
}

/**
 * Attributes attached to a span event. Which fields are set depends on the span kind.
 */
export interface SpanDetails {
	/** Link destination, for `LINK` spans. */
	href?: string;
	/** Image source, for `IMAGE` spans. */
	src?: string;
	/** Link or image title, null when the source has none. */
	title?: string | null;
	/** Page the wikilink points to, for `WIKILINK` spans. */
	target?: string;
}

/**
 * What a text run holds: prose, or raw HTML that must be written back untouched.
 */
export type TextKind = 'NORMAL' | 'HTML';

/**
 * Callbacks invoked by the parser in document order (depth-first).
 */
export interface MarkdownEventHandlers {
	enterBlock(block: BlockKind, details: BlockDetails): void;
	leaveBlock(block: BlockKind, details: BlockDetails): void;
	enterSpan(span: SpanKind, details: SpanDetails): void;
	leaveSpan(span: SpanKind, details: SpanDetails): void;
	text(block: BlockKind, text: string, kind?: TextKind): void;
}

/**
 * Optional Markdown syntax the parser can be asked to recognize.
 */
export type MarkdownExtension = 'strikethrough' | 'tables' | 'wikilinks' | 'permissive_autolinks';

/**
 * Drives a Markdown parser over `text`, calling `handlers` for every event.
 */
export type MarkdownEventParser = (
	text: string,
	handlers: MarkdownEventHandlers,
	extensions: readonly MarkdownExtension[]
) => void;

/**
 * Markup written back for each span kind.
 */
export interface DelimiterStrings {
	boldStartString: string;
	boldEndString: string;
	italicStartString: string;
	italicEndString: string;
	codeStartString: string;
	codeEndString: string;
	linkStartString: string;
	linkEndString: string;
	wikilinkStartString: string;
	wikilinkEndString: string;
	strikethroughStartString: string;
	strikethroughEndString: string;
}

/**
 * Replacements used when literal text collides with an emphasis or code delimiter.
 */
export interface EscapedDelimiterStrings {
	italicStartStringEscaped: string;
	italicEndStringEscaped: string;
	codeStartStringEscaped: string;
	codeEndStringEscaped: string;
}

/**
 * Options accepted by the span wrapper.
 */
export interface WrapperOptions extends Partial<DelimiterStrings>, Partial<EscapedDelimiterStrings> {
	/** Maximum length of continuation lines. */
	width?: number;
	/** Maximum length of the first line. Defaults to `width`. */
	firstLineWidth?: number;
	/** Prepended to every continuation line. */
	indent?: string;
	/** Prepended to the first line. */
	firstLineIndent?: string;
	/** Syntax extensions enabled in the parser. */
	extensions?: readonly MarkdownExtension[];
	/** Parser used by `wrap`. Defaults to the markdown-it event adapter. */
	parser?: MarkdownEventParser;
}

/**
 * Source text to target text, source text being the unique key.
 */
export type TranslationCatalog = Record<string, string>;

/**
 * A `[label]: target "title"` line.
 */
export interface LinkReferenceDefinition {
	label: string;
	target: string;
	title: string | null;
}

/**
 * A `[displayText][label]` shorthand link.
 */
export interface LinkReferenceUsage {
	displayText: string;
	label: string;
}
