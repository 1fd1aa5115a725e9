// src/core/imageProcessing/rasterImage.ts

import type { ColorHistogram, ColorSpace, IColorHistogramEntry, IRasterImage, IRegion } from '../../@types/index.ts';
import { InvalidConfigurationError } from '../../utils/errors/errors.ts';

/**
 * Decoded image held as interleaved raw bytes: three channels per pixel in RGB, one in monochrome.
 */
export class RasterImage implements IRasterImage {
    readonly channels: 1 | 3;

    constructor(
        readonly width: number,
        readonly height: number,
        readonly colorSpace: ColorSpace,
        private readonly data: Uint8Array,
    ) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new InvalidConfigurationError(`Image dimensions must be positive integers, got ${width}x${height}.`);
        }
        this.channels = colorSpace === 'rgb' ? 3 : 1;
        const expected = width * height * this.channels;
        if (data.length !== expected) {
            throw new InvalidConfigurationError(
                `Pixel buffer holds ${data.length} bytes, expected ${expected} for a ${width}x${height} ${colorSpace} image.`,
            );
        }
    }

    /**
     * Counts the pixels of every distinct color inside `region`, clipped to the image bounds.
     * Entries keep the order in which their color was first met, scanning row by row.
     *
     * @param region - Area to scan.
     * @param maxColors - Upper bound on distinct colors; defaults to the clipped region's pixel area.
     * @return The histogram, or null when the region holds more than `maxColors` distinct colors.
     */
    getColorHistogram(region: IRegion, maxColors?: number): ColorHistogram | null {
        const left = Math.max(0, region.x);
        const top = Math.max(0, region.y);
        const right = Math.min(this.width, region.x + region.width);
        const bottom = Math.min(this.height, region.y + region.height);
        const limit = maxColors ?? Math.max(0, right - left) * Math.max(0, bottom - top);

        const entries = new Map<number, IColorHistogramEntry>();
        for (let y = top; y < bottom; y++) {
            for (let x = left; x < right; x++) {
                const offset = (y * this.width + x) * this.channels;
                const key = this.channels === 3
                    ? (this.data[offset] << 16) | (this.data[offset + 1] << 8) | this.data[offset + 2]
                    : this.data[offset];
                const entry = entries.get(key);
                if (entry) {
                    entry.count += 1;
                    continue;
                }
                if (entries.size >= limit) {
                    return null;
                }
                const color = this.channels === 3
                    ? [this.data[offset], this.data[offset + 1], this.data[offset + 2]]
                    : [this.data[offset]];
                entries.set(key, { count: 1, color });
            }
        }
        return [...entries.values()];
    }
}
