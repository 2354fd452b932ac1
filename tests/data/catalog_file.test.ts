import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { formatCatalog, mergeCatalog, parseCatalog, readCatalog, writeCatalog } from '../../src/data/catalog_file';

describe('parseCatalog', () => {
	it('parses an object of strings', () => {
		expect(parseCatalog('{"Hello": "Hola", "Bye": ""}')).toEqual({ Hello: 'Hola', Bye: '' });
	});

	it('rejects JSON that is not an object', () => {
		expect(() => parseCatalog('["Hello"]')).toThrow('Catalog must be a JSON object mapping source text to target text');
	});

	it('rejects non-string translations', () => {
		expect(() => parseCatalog('{"Hello": 1}')).toThrow('Catalog entry "Hello" has a non-string translation');
	});

	it('propagates JSON syntax errors', () => {
		expect(() => parseCatalog('{')).toThrow(SyntaxError);
	});
});

describe('formatCatalog', () => {
	it('writes indented JSON with a trailing newline', () => {
		expect(formatCatalog({ a: 'b' })).toBe('{\n  "a": "b"\n}\n');
	});
});

describe('mergeCatalog', () => {
	it('overwrites matching source texts and keeps the rest', () => {
		expect(mergeCatalog({ a: '1', b: '2' }, { b: 'two', c: 'three' })).toEqual({ a: '1', b: 'two', c: 'three' });
	});
});

describe('readCatalog and writeCatalog', () => {
	it('round-trips a catalog through a file', () => {
		const dir = mkdtempSync(join(tmpdir(), 'mdreflow-'));
		try {
			const path = join(dir, 'catalog.json');
			writeCatalog(path, { 'See [a][b].': 'Ver [a][b].' });
			expect(readFileSync(path, 'utf8')).toBe('{\n  "See [a][b].": "Ver [a][b]."\n}\n');
			expect(readCatalog(path)).toEqual({ 'See [a][b].': 'Ver [a][b].' });
		} finally {
			rmSync(dir, { recursive: true, force: true });
		}
	});
});
