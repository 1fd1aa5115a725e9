// src/core/tiling/tiler.ts

import type { ITile } from '../../@types/index.ts';
import { InvalidConfigurationError } from '../../utils/errors/errors.ts';

function assertPositiveInteger(value: number, label: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidConfigurationError(`${label} must be a positive integer, got ${value}.`);
    }
}

/**
 * Splits a `width` x `height` image into square tiles of `size`, row by row.
 * Tiles on the right and bottom edges are clipped to the image when the size does not divide it.
 *
 * @throws {InvalidConfigurationError} When any argument is not a positive integer.
 */
export function enumerateTiles(width: number, height: number, size: number): ITile[] {
    assertPositiveInteger(size, 'Tile size');
    assertPositiveInteger(width, 'Image width');
    assertPositiveInteger(height, 'Image height');

    const tiles: ITile[] = [];
    for (let y = 0; y < height; y += size) {
        for (let x = 0; x < width; x += size) {
            tiles.push({
                x,
                y,
                size,
                width: Math.min(size, width - x),
                height: Math.min(size, height - y),
            });
        }
    }
    return tiles;
}

export function countTiles(width: number, height: number, size: number): number {
    return Math.ceil(height / size) * Math.ceil(width / size);
}

/**
 * Cells per rendered row. Floor division, so a partial last column is not counted.
 */
export function countColumns(width: number, size: number): number {
    return Math.floor(width / size);
}
