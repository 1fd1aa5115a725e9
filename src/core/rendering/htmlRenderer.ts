// src/core/rendering/htmlRenderer.ts

import _ from 'lodash';
import type { IConversionResult, IDocumentStyle } from '../../@types/index.ts';
import { config } from '../../config/index.ts';

/**
 * Rendered glyph size in pixels: the requested font size scaled down and rounded up (24 -> 18).
 */
export function computeCellSize(fontSize: number): number {
    return Math.ceil(fontSize * config.document.fontScale);
}

/**
 * Builds the mosaic document: a CSS grid with `result.columns` cells per row and one span per
 * cell, in the order of `result.cells`. Glyphs are expected to be escaped already.
 */
export function renderHtmlDocument(result: IConversionResult, style: IDocumentStyle): string {
    const cellSize = computeCellSize(style.fontSize);
    const bodyStyle = `body { margin: 0; line-height: ${cellSize}px; background: ${style.background}; ` +
        `display: grid; grid-template-columns: repeat(${result.columns}, ${cellSize}px); align-content: start; }`;
    const spanStyle = `span { font-size: ${cellSize}px; text-align: center; }`;

    const spans = result.cells.map(({ glyph, color }) => `<span style="color: ${color};">${glyph}</span>`);

    return [
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        '<meta charset="utf-8">',
        `<title>${_.escape(style.title)}</title>`,
        '<style>',
        bodyStyle,
        spanStyle,
        '</style>',
        '</head>',
        '<body>',
        ...spans,
        '</body>',
        '</html>',
        '',
    ].join('\n');
}
