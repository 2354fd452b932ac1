export { MarkdownSpanWrapper } from './core/span_wrapper';
export { escapeLinkTitle, escapeTitleDelimiters } from './core/link_titles';
export {
	LINK_REFERENCE_RE,
	LINK_REFERENCED_LINK_RE,
	findLinkReferenceUsages,
	parseLinkReference,
	parseLinkReferences,
	resolveLinkReferenceTargets
} from './core/link_references';
export { minNotMaxCharsInARow, poEscapedString } from './core/string_utils';
export { HARD_BREAK, createMarkdownParser, parseMarkdownEvents } from './parser/markdown_events';
export { wikilinksPlugin } from './parser/wikilinks';
export { DEFAULT_SETTINGS, loadSettings, normalizeSettings, settingsToWrapperOptions } from './config/settings';
export type { Settings } from './config/settings';
export { formatCatalog, mergeCatalog, parseCatalog, readCatalog, writeCatalog } from './data/catalog_file';
export type * from './types';
