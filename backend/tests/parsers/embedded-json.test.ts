import { describe, expect, it } from 'vitest';
import { extractArrayLiteral, parseEmbeddedArray } from '../../app/parsers/embedded-json.js';

describe('extractArrayLiteral', () => {
    it('stops at the matching bracket', () => {
        const html = 'var list = [[1, 2], {"a": [3]}]; var next = [4];';
        expect(extractArrayLiteral(html, 'list')).toEqual({ ok: true, text: '[[1, 2], {"a": [3]}]' });
    });

    it('reports what is missing', () => {
        expect(extractArrayLiteral('var other = [];', 'list')).toEqual({ ok: false, reason: 'variable list not found' });
        expect(extractArrayLiteral('var list = null;', 'list')).toEqual({ ok: false, reason: "no '[' after list assignment" });
        expect(extractArrayLiteral('var list = [1, [2];', 'list')).toEqual({ ok: false, reason: "no matching ']' for list" });
    });
});

describe('parseEmbeddedArray', () => {
    it('parses the list as JSON', () => {
        expect(parseEmbeddedArray('x = [{"id": 1}, {"id": 2}];', 'x')).toEqual({ ok: true, records: [{ id: 1 }, { id: 2 }] });
    });

    it('fails on invalid JSON', () => {
        const result = parseEmbeddedArray("x = [{id: 1}];", 'x');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.stage).toBe('payload');
            expect(result.reason.startsWith('invalid JSON in x: ')).toBe(true);
        }
    });
});
