#!/usr/bin/env node
/**
 * mdreflow CLI.
 *
 * Subcommands: wrap, resolve
 */

import { defineCommand, runMain } from 'citty';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadSettings, settingsToWrapperOptions, SETTINGS_FILE } from './config/settings';
import { MarkdownSpanWrapper } from './core/span_wrapper';
import { resolveLinkReferenceTargets } from './core/link_references';
import { formatCatalog, mergeCatalog, readCatalog, writeCatalog } from './data/catalog_file';

function parseWidth(value: string | undefined, name: string): number | undefined {
	if (!value) return undefined;
	const width = Number.parseInt(value, 10);
	if (!Number.isInteger(width) || width <= 0) {
		throw new Error(`--${name} must be a positive integer, got ${JSON.stringify(value)}`);
	}
	return width;
}

// ── Wrap command ────────────────────────────────────────────────────

const wrapCmd = defineCommand({
	meta: { name: 'wrap', description: 'Re-flow the inline Markdown of a file as a single block' },
	args: {
		file: { type: 'positional', description: 'Markdown file to wrap', required: true },
		config: { type: 'string', description: 'Settings file', default: SETTINGS_FILE },
		width: { type: 'string', description: 'Maximum line width' },
		'first-line-width': { type: 'string', description: 'Maximum width of the first line' },
		indent: { type: 'string', description: 'Prefix of continuation lines' }
	},
	run({ args }) {
		const settings = loadSettings(resolve(args.config));
		const width = parseWidth(args.width, 'width') ?? settings.width;
		const options = settingsToWrapperOptions({
			...settings,
			width,
			firstLineWidth: parseWidth(args['first-line-width'], 'first-line-width') ?? settings.firstLineWidth,
			indent: args.indent ?? settings.indent
		});

		const text = readFileSync(resolve(args.file), 'utf8');
		process.stdout.write(new MarkdownSpanWrapper(options).wrap(text.trim()));
	}
});

// ── Resolve command ─────────────────────────────────────────────────

const resolveCmd = defineCommand({
	meta: { name: 'resolve', description: 'Expand [text][label] link references in a JSON translation catalog' },
	args: {
		catalog: { type: 'positional', description: 'JSON file mapping source text to target text', required: true },
		output: { type: 'string', description: 'Write the merged catalog here instead of stdout' },
		verbose: { type: 'boolean', description: 'Log resolution counts', default: false }
	},
	run({ args }) {
		const catalog = readCatalog(resolve(args.catalog));
		const resolved = resolveLinkReferenceTargets(catalog);
		const merged = mergeCatalog(catalog, resolved);

		if (args.verbose) {
			console.info('[mdreflow] Resolved link references', {
				entries: Object.keys(catalog).length,
				rewritten: Object.keys(resolved).length
			});
		}

		if (args.output) {
			writeCatalog(resolve(args.output), merged);
		} else {
			process.stdout.write(formatCatalog(merged));
		}
	}
});

// ── Main ────────────────────────────────────────────────────────────

const main = defineCommand({
	meta: { name: 'mdreflow', version: '0.1.0', description: 'Markdown re-flow and link reference tooling' },
	subCommands: {
		wrap: wrapCmd,
		resolve: resolveCmd
	}
});

void runMain(main);
