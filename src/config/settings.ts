import { existsSync, readFileSync } from 'node:fs';
import { isRecord } from '../core/string_utils';
import type { DelimiterStrings, MarkdownExtension, WrapperOptions } from '../types';

/** User-configurable settings for mdreflow. */
export type Settings = {
	/** Maximum length of continuation lines. */
	width: number;
	/** Maximum length of the first line; null follows `width`. */
	firstLineWidth: number | null;
	/** Prefix of continuation lines. */
	indent: string;
	/** Prefix of the first line. */
	firstLineIndent: string;
	/** Markdown extensions enabled in the parser. */
	extensions: MarkdownExtension[];
	/** Markup overrides, per delimiter. */
	delimiters: Partial<DelimiterStrings>;
};

/** Settings file looked up in the working directory when none is given. */
export const SETTINGS_FILE = '.mdreflowrc.json';

const KNOWN_EXTENSIONS: readonly MarkdownExtension[] = ['strikethrough', 'tables', 'wikilinks', 'permissive_autolinks'];

const DELIMITER_KEYS: ReadonlyArray<keyof DelimiterStrings> = [
	'boldStartString',
	'boldEndString',
	'italicStartString',
	'italicEndString',
	'codeStartString',
	'codeEndString',
	'linkStartString',
	'linkEndString',
	'wikilinkStartString',
	'wikilinkEndString',
	'strikethroughStartString',
	'strikethroughEndString'
];

/** Default settings applied when no settings file exists. */
export const DEFAULT_SETTINGS: Settings = {
	width: 80,
	firstLineWidth: null,
	indent: '',
	firstLineIndent: '',
	extensions: [...KNOWN_EXTENSIONS],
	delimiters: {}
};

/**
 * Load settings from a JSON file.
 * Values are merged over the defaults; invalid values fall back to their default.
 * A missing file yields the defaults; an unreadable or malformed one is reported and ignored.
 * @param path - Path of the settings file.
 * @returns The effective settings.
 */
export function loadSettings(path: string = SETTINGS_FILE): Settings {
	if (!existsSync(path)) return cloneDefaults();
	try {
		const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
		if (!isRecord(parsed)) {
			console.warn(`[mdreflow] Ignoring settings file ${path}: expected a JSON object.`);
			return cloneDefaults();
		}
		return normalizeSettings(parsed);
	} catch (err: unknown) {
		console.warn(`[mdreflow] Ignoring settings file ${path}`, err);
		return cloneDefaults();
	}
}

/**
 * Merge raw settings values over the defaults, keeping only valid ones.
 * @param raw - Parsed settings object.
 */
export function normalizeSettings(raw: Record<string, unknown>): Settings {
	const width = positiveInteger(raw.width) ?? DEFAULT_SETTINGS.width;
	const requested = raw.extensions;
	const extensions = Array.isArray(requested)
		? KNOWN_EXTENSIONS.filter((ext) => requested.includes(ext))
		: [...DEFAULT_SETTINGS.extensions];

	return {
		width,
		firstLineWidth: positiveInteger(raw.firstLineWidth),
		indent: typeof raw.indent === 'string' ? raw.indent : DEFAULT_SETTINGS.indent,
		firstLineIndent: typeof raw.firstLineIndent === 'string' ? raw.firstLineIndent : DEFAULT_SETTINGS.firstLineIndent,
		extensions,
		delimiters: normalizeDelimiters(raw.delimiters)
	};
}

/**
 * Convert settings into options understood by the span wrapper.
 * @param settings - mdreflow settings.
 */
export function settingsToWrapperOptions(settings: Settings): WrapperOptions {
	return {
		...settings.delimiters,
		width: settings.width,
		firstLineWidth: settings.firstLineWidth ?? settings.width,
		indent: settings.indent,
		firstLineIndent: settings.firstLineIndent,
		extensions: settings.extensions
	};
}

function cloneDefaults(): Settings {
	return { ...DEFAULT_SETTINGS, extensions: [...DEFAULT_SETTINGS.extensions], delimiters: {} };
}

function positiveInteger(value: unknown): number | null {
	return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null;
}

function normalizeDelimiters(value: unknown): Partial<DelimiterStrings> {
	if (!isRecord(value)) return {};
	const delimiters: Partial<DelimiterStrings> = {};
	DELIMITER_KEYS.forEach((key) => {
		const delimiter = value[key];
		if (typeof delimiter === 'string' && delimiter) delimiters[key] = delimiter;
	});
	return delimiters;
}
