// src/core/color/strategies/MostCommonColorSummarizer.ts

import _ from 'lodash';
import type { ColorHistogram, IColorSummarizer, PixelColor } from '../../../@types/index.ts';
import { assertSummarizable } from '../histogramGuards.ts';

/**
 * Picks the color covering the most pixels. Entries are stably sorted by ascending count and the
 * last one wins, so among equal counts the color met last in the tile is returned.
 */
export class MostCommonColorSummarizer implements IColorSummarizer {
    public summarize(histogram: ColorHistogram, totalPixels: number): PixelColor {
        assertSummarizable(histogram, totalPixels);

        const sorted = _.sortBy(histogram, (entry) => entry.count);
        return sorted[sorted.length - 1].color;
    }
}
