// src/core/color/histogramGuards.ts

import type { ColorHistogram } from '../../@types/index.ts';
import { InternalInvariantViolationError } from '../../utils/errors/errors.ts';

export function assertSummarizable(histogram: ColorHistogram | null, totalPixels: number): asserts histogram is ColorHistogram {
    if (histogram === null || histogram.length === 0 || totalPixels <= 0) {
        throw new InternalInvariantViolationError('Cannot summarize a tile without pixels.');
    }
}
