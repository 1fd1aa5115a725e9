// src/core/sizing/autoSizer.ts

import { InvalidConfigurationError } from '../../utils/errors/errors.ts';
import { config } from '../../config/index.ts';

function assertDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new InvalidConfigurationError(`Image dimensions must be positive integers, got ${width}x${height}.`);
    }
}

/**
 * Lists every integer that divides both `width` and `height`, in ascending order.
 *
 * @throws {InvalidConfigurationError} When a dimension is not a positive integer.
 */
export function computeCommonDivisors(width: number, height: number): number[] {
    assertDimensions(width, height);

    const divisors: number[] = [];
    const limit = Math.min(width, height);
    for (let candidate = 1; candidate <= limit; candidate++) {
        if (width % candidate === 0 && height % candidate === 0) {
            divisors.push(candidate);
        }
    }
    return divisors;
}

/**
 * Index of the first element of `sorted` that is not smaller than `value`.
 */
function lowerBound(sorted: readonly number[], value: number): number {
    let low = 0;
    let high = sorted.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (sorted[mid] < value) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    return low;
}

/**
 * Neighbours of `value` among the common divisors. `below` is undefined when `value` is at or below
 * the smallest divisor, `above` when it is at or beyond the largest.
 */
export function suggestTileSizes(width: number, height: number, value: number): { below?: number; above?: number } {
    const divisors = computeCommonDivisors(width, height);
    const index = lowerBound(divisors, value);
    const exact = divisors[index] === value;
    return {
        below: index > 0 ? divisors[index - 1] : undefined,
        above: exact ? divisors[index + 1] : divisors[index],
    };
}

/**
 * Picks a tile size near 2% of the image width that divides both dimensions, so every row of the
 * mosaic holds the same number of cells.
 *
 * When the target is not a divisor the closer of its two neighbouring divisors is used, the smaller
 * one on a tie. A target below every divisor takes the smallest, one above every divisor the largest.
 *
 * @throws {InvalidConfigurationError} When a dimension is not a positive integer.
 */
export function computeAutoTileSize(width: number, height: number): number {
    const divisors = computeCommonDivisors(width, height);
    const target = Math.floor(width * config.tiling.autoSizeRatio);

    const index = lowerBound(divisors, target);
    if (divisors[index] === target) {
        return target;
    }
    if (index === 0) {
        return divisors[0];
    }
    if (index === divisors.length) {
        return divisors[divisors.length - 1];
    }

    const previous = divisors[index - 1];
    const next = divisors[index];
    return target - previous <= next - target ? previous : next;
}
