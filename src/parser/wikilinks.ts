import type MarkdownIt from 'markdown-it';

type InlineRule = Parameters<MarkdownIt['inline']['ruler']['push']>[1];
type StateInline = Parameters<InlineRule>[0];

/**
 * Recognize `[[target]]` and `[[target|label]]`.
 * Emits wikilink_open (with a `target` attribute), a text token holding the label, and wikilink_close.
 */
function wikilinkRule(state: StateInline, silent: boolean): boolean {
	const src = state.src;
	const pos = state.pos;

	if (src.charCodeAt(pos) !== 0x5B || src.charCodeAt(pos + 1) !== 0x5B) return false;

	const end = src.indexOf(']]', pos + 2);
	if (end < 0 || end + 2 > state.posMax) return false;

	const raw = src.slice(pos + 2, end);
	if (!raw || raw.includes('\n') || raw.includes('[')) return false;

	const pipeIdx = raw.indexOf('|');
	const target = pipeIdx >= 0 ? raw.slice(0, pipeIdx) : raw;
	const label = pipeIdx >= 0 ? raw.slice(pipeIdx + 1) : raw;
	if (!target.trim()) return false;

	if (!silent) {
		const open = state.push('wikilink_open', '', 1);
		open.attrSet('target', target);
		const text = state.push('text', '', 0);
		text.content = label;
		state.push('wikilink_close', '', -1);
	}

	state.pos = end + 2;
	return true;
}

/**
 * markdown-it plugin adding wikilink spans. Runs before the standard link rule so `[[`
 * is never read as a nested link.
 */
export function wikilinksPlugin(md: MarkdownIt): void {
	md.inline.ruler.before('link', 'wikilink', wikilinkRule);
}
