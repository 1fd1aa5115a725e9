// src/core/converter/lib/resolveTileSize.ts

import type { ILogger } from '../../../@types/index.ts';
import { computeAutoTileSize, computeCommonDivisors, suggestTileSizes } from '../../sizing/autoSizer.ts';

/**
 * Returns the tile size to convert with. Without a requested size one is derived from the image;
 * a requested size that leaves partial tiles is kept, with a warning naming the closest sizes that would not.
 */
export function resolveTileSize(width: number, height: number, requested: number | undefined, logger: ILogger): number {
    if (requested === undefined) {
        const size = computeAutoTileSize(width, height);
        logger.debug(`Auto-selected tile size ${size} for a ${width}x${height} image.`);
        return size;
    }

    if (width % requested !== 0 || height % requested !== 0) {
        const { below, above } = suggestTileSizes(width, height, requested);
        const suggestions = [below, above].filter((size): size is number => size !== undefined).join(' or ');
        logger.warn(
            `Tile size ${requested} does not divide ${width}x${height}; the mosaic may look skewed. ` +
                `Closest sizes that fit: ${suggestions}.`,
        );
        logger.debug(`Sizes that divide both dimensions: ${computeCommonDivisors(width, height).join(', ')}`);
    }
    return requested;
}
