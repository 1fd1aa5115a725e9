// src/core/converter/lib/convertRaster.ts

import type {
    IColorSummarizer,
    IConversionResult,
    IConversionSettings,
    IGlyphCell,
    IGlyphMapper,
    IRasterImage,
    PixelColor,
} from '../../../@types/index.ts';
import { countColumns, enumerateTiles } from '../../tiling/tiler.ts';
import { assertSummarizable } from '../../color/histogramGuards.ts';
import { getColorSummarizer } from '../../color/colorSummarizerStrategies.ts';
import { createGlyphMapper } from '../../glyphs/glyphMapper.ts';

/**
 * Reduces every tile of `image` to one color, in row-major tile order.
 */
export function summarizeTiles(image: IRasterImage, tileSize: number, summarizer: IColorSummarizer): PixelColor[] {
    return enumerateTiles(image.width, image.height, tileSize).map((tile) => {
        const histogram = image.getColorHistogram(tile);
        const totalPixels = tile.width * tile.height;
        assertSummarizable(histogram, totalPixels);
        return summarizer.summarize(histogram, totalPixels);
    });
}

export function mapGlyphs(colors: readonly PixelColor[], mapper: IGlyphMapper): IGlyphCell[] {
    return colors.map((color) => mapper.map(color));
}

/**
 * Shapes mapped cells into a result; `columns` follows the row length the renderer uses.
 */
export function assembleResult(
    image: Pick<IRasterImage, 'width' | 'height'>,
    tileSize: number,
    cells: IGlyphCell[],
): IConversionResult {
    return {
        cells,
        columns: countColumns(image.width, tileSize),
        rows: Math.ceil(image.height / tileSize),
        tileSize,
        width: image.width,
        height: image.height,
    };
}

/**
 * Converts an in-memory image into mosaic cells with an already resolved tile size.
 */
export function convertRaster(image: IRasterImage, settings: IConversionSettings): IConversionResult {
    const summarizer = getColorSummarizer(settings.colorStrategy, settings.colorSpace);
    const mapper = createGlyphMapper(settings.glyphMode, settings);
    const colors = summarizeTiles(image, settings.tileSize, summarizer);
    return assembleResult(image, settings.tileSize, mapGlyphs(colors, mapper));
}
