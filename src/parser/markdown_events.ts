import MarkdownIt from 'markdown-it';
import { wikilinksPlugin } from './wikilinks';
import type {
	BlockDetails,
	BlockKind,
	MarkdownEventHandlers,
	MarkdownExtension,
	SpanDetails,
	SpanKind
} from '../types';

/** Text run reported for a hard line break, in its backslash form. */
export const HARD_BREAK = '\\\n';

type Token = ReturnType<MarkdownIt['parse']>[number];

const BLOCK_KINDS: Record<string, BlockKind> = {
	paragraph: 'P',
	heading: 'H',
	blockquote: 'QUOTE',
	bullet_list: 'UL',
	ordered_list: 'OL',
	list_item: 'LI',
	table: 'TABLE',
	thead: 'THEAD',
	tbody: 'TBODY',
	tr: 'TR',
	th: 'TH',
	td: 'TD',
	fence: 'CODE',
	code_block: 'CODE',
	html_block: 'HTML',
	hr: 'HR'
};

const SPAN_KINDS: Record<string, SpanKind> = {
	strong: 'STRONG',
	em: 'EMPHASIS',
	s: 'STRIKETHROUGH',
	link: 'LINK',
	wikilink: 'WIKILINK'
};

/**
 * Build a CommonMark markdown-it instance with the requested extensions.
 *
 * `text_join` stays disabled: escaped characters and entities must reach the handlers as
 * their own text runs, the way they appear in the source. Link normalization is turned off
 * so destinations and autolink text come back exactly as written.
 */
export function createMarkdownParser(extensions: readonly MarkdownExtension[] = []): MarkdownIt {
	const md = new MarkdownIt('commonmark');
	md.disable('text_join');
	md.normalizeLink = (url: string): string => url;
	md.normalizeLinkText = (url: string): string => url;

	if (extensions.includes('strikethrough')) md.enable('strikethrough');
	if (extensions.includes('tables')) md.enable('table');
	if (extensions.includes('permissive_autolinks')) {
		md.set({ linkify: true });
		md.enable('linkify');
		// Only URLs with a scheme; bare file names and email addresses stay text.
		md.linkify.set({ fuzzyLink: false, fuzzyEmail: false });
	}
	if (extensions.includes('wikilinks')) md.use(wikilinksPlugin);
	return md;
}

/**
 * Parse `text` and report its structure to `handlers`, depth-first and in document order.
 * The whole document is wrapped in a `DOC` block.
 */
export function parseMarkdownEvents(
	text: string,
	handlers: MarkdownEventHandlers,
	extensions: readonly MarkdownExtension[] = []
): void {
	const tokens = createMarkdownParser(extensions).parse(text, {});
	const blocks: BlockKind[] = ['DOC'];

	handlers.enterBlock('DOC', {});
	for (const token of tokens) {
		if (token.type === 'inline') {
			walkInline(token.children ?? [], blocks[blocks.length - 1] ?? 'DOC', handlers);
			continue;
		}

		const kind = BLOCK_KINDS[token.type.replace(/_(open|close)$/, '')];
		if (!kind) continue;
		const details = blockDetails(token);

		if (token.nesting === 1) {
			handlers.enterBlock(kind, details);
			blocks.push(kind);
		} else if (token.nesting === -1) {
			blocks.pop();
			handlers.leaveBlock(kind, details);
		} else {
			handlers.enterBlock(kind, details);
			if (token.content) handlers.text(kind, token.content);
			handlers.leaveBlock(kind, details);
		}
	}
	handlers.leaveBlock('DOC', {});
}

function blockDetails(token: Token): BlockDetails {
	if (token.type.startsWith('heading_')) {
		return { level: Number(token.tag.slice(1)) };
	}
	return {};
}

function walkInline(tokens: Token[], block: BlockKind, handlers: MarkdownEventHandlers): void {
	// Close events reuse the details captured on open, as the parser does not repeat them.
	const openSpans: SpanDetails[] = [];

	for (const token of tokens) {
		switch (token.type) {
			case 'text':
				handlers.text(block, token.content);
				break;
			case 'html_inline':
				handlers.text(block, token.content, 'HTML');
				break;
			case 'text_special':
				handlers.text(block, token.info === 'entity' ? token.markup : token.content);
				break;
			case 'softbreak':
				handlers.text(block, ' ');
				break;
			case 'hardbreak':
				handlers.text(block, HARD_BREAK);
				break;
			case 'code_inline':
				handlers.enterSpan('CODE', {});
				handlers.text(block, token.content);
				handlers.leaveSpan('CODE', {});
				break;
			case 'image': {
				const details: SpanDetails = {
					src: token.attrGet('src') ?? '',
					title: token.attrGet('title')
				};
				handlers.enterSpan('IMAGE', details);
				walkInline(token.children ?? [], block, handlers);
				handlers.leaveSpan('IMAGE', details);
				break;
			}
			default: {
				const kind = SPAN_KINDS[token.type.replace(/_(open|close)$/, '')];
				if (!kind) break;
				if (token.nesting === 1) {
					const details = spanDetails(kind, token);
					openSpans.push(details);
					handlers.enterSpan(kind, details);
				} else if (token.nesting === -1) {
					handlers.leaveSpan(kind, openSpans.pop() ?? {});
				}
			}
		}
	}
}

function spanDetails(kind: SpanKind, token: Token): SpanDetails {
	if (kind === 'LINK') {
		return { href: token.attrGet('href') ?? '', title: token.attrGet('title') };
	}
	if (kind === 'WIKILINK') {
		return { target: token.attrGet('target') ?? '' };
	}
	return {};
}
