// src/core/color/strategies/MonochromeLuminanceSummarizer.ts

import type { ColorHistogram, IColorSummarizer, PixelColor } from '../../../@types/index.ts';
import { assertSummarizable } from '../histogramGuards.ts';

/**
 * Arithmetic mean of the first channel, truncated. Meant for single-channel (luminance) histograms.
 */
export class MonochromeLuminanceSummarizer implements IColorSummarizer {
    public summarize(histogram: ColorHistogram, totalPixels: number): PixelColor {
        assertSummarizable(histogram, totalPixels);

        let total = 0;
        for (const { count, color } of histogram) {
            total += color[0] * count;
        }
        return [Math.trunc(total / totalPixels)];
    }
}
