import type { LinkReferenceDefinition, LinkReferenceUsage, TranslationCatalog } from '../types';

/** `[label]: target "title"`, indented by up to three spaces. */
export const LINK_REFERENCE_RE = /^\s{0,3}\[([^\]]+)\]:\s+<?([^\s>]+)>?\s*["'(]?([^"')]+)?/;

/** `[display text][label]` */
export const LINK_REFERENCED_LINK_RE = /\[([^\]]+)\]\[([^\]\s]+)\]/g;

/**
 * A definition found on both sides of one catalog entry.
 * Source and target labels are correlated through the entry they come from.
 */
interface DefinitionPair {
	source: LinkReferenceDefinition;
	target: LinkReferenceDefinition;
}

/**
 * A catalog entry holding reference usages on both sides, queued for rewriting.
 */
interface PendingEntry {
	source: string;
	target: string;
	sourceUsages: LinkReferenceUsage[];
	targetUsages: LinkReferenceUsage[];
}

/**
 * Parse a link reference definition at the start of a text blob.
 * @param text - Text that may start with `[label]: target "title"`.
 * @returns The definition, or null if the text does not start with one.
 */
export function parseLinkReference(text: string): LinkReferenceDefinition | null {
	const match = LINK_REFERENCE_RE.exec(text);
	if (!match || !match[1] || !match[2]) return null;
	return { label: match[1], target: match[2], title: match[3] ?? null };
}

/**
 * Parse every link reference definition of a Markdown document, line by line.
 *
 * @param content - Markdown content to be parsed.
 * @returns Definitions in document order.
 */
export function parseLinkReferences(content: string): LinkReferenceDefinition[] {
	const definitions: LinkReferenceDefinition[] = [];
	content.split(/\r?\n/).forEach((line) => {
		const stripped = line.trim();
		if (!stripped.startsWith('[')) return;
		const definition = parseLinkReference(stripped);
		if (definition) definitions.push(definition);
	});
	return definitions;
}

/**
 * Find all `[display text][label]` usages in a text blob.
 * @param text - Text to scan.
 * @returns Usages in the order they appear.
 */
export function findLinkReferenceUsages(text: string): LinkReferenceUsage[] {
	return Array.from(text.matchAll(LINK_REFERENCED_LINK_RE), (match) => ({
		displayText: match[1] ?? '',
		label: match[2] ?? ''
	}));
}

/**
 * Resolve link reference usages in a translation catalog.
 *
 * Definitions are collected from entries whose source and target both parse as a
 * definition. Every entry with usages on both sides is then rewritten: each
 * `[text][label]` becomes `[text](target)`, source usages being matched against source
 * labels and target usages against target labels. Usages without a matching definition
 * are left as they are; entries with usages on one side only are skipped.
 *
 * @param catalog - Source text to target text.
 * @returns One entry per rewritten catalog entry, keyed by the new source text. Callers
 *   merge it into the catalog. When two entries resolve to the same source text, the
 *   later one wins.
 */
export function resolveLinkReferenceTargets(catalog: TranslationCatalog): TranslationCatalog {
	const definitions: DefinitionPair[] = [];
	const pending: PendingEntry[] = [];

	Object.entries(catalog).forEach(([source, target]) => {
		const sourceDefinition = parseLinkReference(source);
		if (sourceDefinition) {
			const targetDefinition = parseLinkReference(target);
			if (targetDefinition) {
				definitions.push({ source: sourceDefinition, target: targetDefinition });
			}
		}

		const sourceUsages = findLinkReferenceUsages(source);
		if (sourceUsages.length === 0) return;
		const targetUsages = findLinkReferenceUsages(target);
		if (targetUsages.length === 0) return;
		pending.push({ source, target, sourceUsages, targetUsages });
	});

	const bySourceLabel = indexDefinitions(definitions, (pair) => pair.source.label);
	const byTargetLabel = indexDefinitions(definitions, (pair) => pair.target.label);

	const solutions: TranslationCatalog = {};
	pending.forEach((entry) => {
		const newSource = replaceUsages(entry.source, entry.sourceUsages, (label) => bySourceLabel.get(label)?.source);
		const newTarget = replaceUsages(entry.target, entry.targetUsages, (label) => byTargetLabel.get(label)?.target);
		solutions[newSource] = newTarget;
	});
	return solutions;
}

/**
 * Index definition pairs by label. The first definition of a label wins.
 */
function indexDefinitions(
	definitions: DefinitionPair[],
	labelOf: (pair: DefinitionPair) => string
): Map<string, DefinitionPair> {
	const index = new Map<string, DefinitionPair>();
	definitions.forEach((pair) => {
		const label = labelOf(pair);
		if (!index.has(label)) index.set(label, pair);
	});
	return index;
}

/**
 * Rewrite usages one after the other, each replacing the first remaining occurrence.
 */
function replaceUsages(
	text: string,
	usages: LinkReferenceUsage[],
	lookup: (label: string) => LinkReferenceDefinition | undefined
): string {
	let result = text;
	usages.forEach(({ displayText, label }) => {
		const definition = lookup(label);
		if (!definition) return;
		const replacement = `[${displayText}](${definition.target})`;
		result = result.replace(`[${displayText}][${label}]`, () => replacement);
	});
	return result;
}
