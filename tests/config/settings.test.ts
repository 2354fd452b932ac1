import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
	DEFAULT_SETTINGS,
	loadSettings,
	normalizeSettings,
	settingsToWrapperOptions
} from '../../src/config/settings';

describe('loadSettings', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'mdreflow-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	it('returns the defaults when the file is missing', () => {
		expect(loadSettings(join(dir, 'missing.json'))).toEqual(DEFAULT_SETTINGS);
	});

	it('merges file values over the defaults', () => {
		const path = join(dir, 'settings.json');
		writeFileSync(path, JSON.stringify({ width: 60, indent: '  ', extensions: ['wikilinks'] }));

		expect(loadSettings(path)).toEqual({
			...DEFAULT_SETTINGS,
			width: 60,
			indent: '  ',
			extensions: ['wikilinks']
		});
	});

	it('warns and falls back to the defaults on malformed JSON', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const path = join(dir, 'broken.json');
		writeFileSync(path, '{ width: ');

		expect(loadSettings(path)).toEqual(DEFAULT_SETTINGS);
		expect(warn).toHaveBeenCalledTimes(1);
	});

	it('warns when the file does not hold an object', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const path = join(dir, 'array.json');
		writeFileSync(path, '[80]');

		expect(loadSettings(path)).toEqual(DEFAULT_SETTINGS);
		expect(warn).toHaveBeenCalledWith(`[mdreflow] Ignoring settings file ${path}: expected a JSON object.`);
	});

	it('does not share the default extension list', () => {
		const settings = loadSettings(join(dir, 'missing.json'));
		settings.extensions.pop();
		expect(DEFAULT_SETTINGS.extensions).toHaveLength(4);
	});
});

describe('normalizeSettings', () => {
	it('replaces invalid widths with defaults', () => {
		const settings = normalizeSettings({ width: -5, firstLineWidth: 1.5 });
		expect(settings.width).toBe(80);
		expect(settings.firstLineWidth).toBeNull();
	});

	it('drops unknown extensions', () => {
		expect(normalizeSettings({ extensions: ['tables', 'footnotes'] }).extensions).toEqual(['tables']);
	});

	it('keeps known non-empty delimiter overrides only', () => {
		const settings = normalizeSettings({
			delimiters: { boldStartString: '__', boldEndString: '', unknownString: '%', italicStartString: 3 }
		});
		expect(settings.delimiters).toEqual({ boldStartString: '__' });
	});
});

describe('settingsToWrapperOptions', () => {
	it('uses the width for the first line when none is set', () => {
		const options = settingsToWrapperOptions({ ...DEFAULT_SETTINGS, width: 60 });
		expect(options.width).toBe(60);
		expect(options.firstLineWidth).toBe(60);
	});

	it('passes delimiters and indentation through', () => {
		const options = settingsToWrapperOptions({
			...DEFAULT_SETTINGS,
			firstLineWidth: 40,
			firstLineIndent: '- ',
			indent: '  ',
			delimiters: { italicStartString: '_', italicEndString: '_' }
		});

		expect(options).toEqual({
			italicStartString: '_',
			italicEndString: '_',
			width: 80,
			firstLineWidth: 40,
			indent: '  ',
			firstLineIndent: '- ',
			extensions: DEFAULT_SETTINGS.extensions
		});
	});
});
