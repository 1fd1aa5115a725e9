// src/core/color/strategies/AverageColorSummarizer.ts

import type { ColorHistogram, IColorSummarizer, PixelColor } from '../../../@types/index.ts';
import { assertSummarizable } from '../histogramGuards.ts';

/**
 * Quadratic mean per channel: floor(sqrt(sum(count * value^2) / totalPixels)).
 *
 * Mixing saturated colors this way keeps perceived brightness closer to the source than a plain
 * arithmetic mean, see https://sighack.com/post/averaging-rgb-colors-the-right-way
 */
export class AverageColorSummarizer implements IColorSummarizer {
    public summarize(histogram: ColorHistogram, totalPixels: number): PixelColor {
        assertSummarizable(histogram, totalPixels);

        const sums = new Array<number>(histogram[0].color.length).fill(0);
        for (const { count, color } of histogram) {
            for (let channel = 0; channel < sums.length; channel++) {
                sums[channel] += color[channel] * color[channel] * count;
            }
        }
        return sums.map((sum) => Math.floor(Math.sqrt(sum / totalPixels)));
    }
}
