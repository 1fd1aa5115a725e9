// tests/htmlRenderer.test.ts

import { describe, expect, it } from 'vitest';
import { computeCellSize, renderHtmlDocument } from '../src/core/rendering/htmlRenderer.ts';
import type { IConversionResult } from '../src/@types/index.ts';

describe('HTML renderer', () => {
    const result: IConversionResult = {
        cells: [
            { glyph: 'X', color: '#ff0000' },
            { glyph: '&lt;', color: '#00ff00' },
            { glyph: 'X', color: '#0000ff' },
        ],
        columns: 2,
        rows: 2,
        tileSize: 10,
        width: 20,
        height: 20,
    };

    it('should scale the font size down to the cell size', () => {
        expect(computeCellSize(24)).toBe(18);
        expect(computeCellSize(16)).toBe(12);
        expect(computeCellSize(10)).toBe(8);
    });

    it('should lay the cells out in a grid with one column per tile', () => {
        const lines = renderHtmlDocument(result, { background: '#262626', fontSize: 24, title: 'cat' }).split('\n');
        expect(lines).toContain(
            'body { margin: 0; line-height: 18px; background: #262626; display: grid; ' +
                'grid-template-columns: repeat(2, 18px); align-content: start; }',
        );
        expect(lines).toContain('span { font-size: 18px; text-align: center; }');
        expect(lines).toContain('<title>cat</title>');
    });

    it('should emit one span per cell in input order', () => {
        const html = renderHtmlDocument(result, { background: 'black', fontSize: 16, title: 'cat' });
        const spans = html.split('\n').filter((line) => line.startsWith('<span'));
        expect(spans).toEqual([
            '<span style="color: #ff0000;">X</span>',
            '<span style="color: #00ff00;">&lt;</span>',
            '<span style="color: #0000ff;">X</span>',
        ]);
    });

    it('should escape the document title', () => {
        const html = renderHtmlDocument(result, { background: 'black', fontSize: 16, title: 'a<b' });
        expect(html.split('\n')).toContain('<title>a&lt;b</title>');
    });
});
