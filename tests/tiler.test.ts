// tests/tiler.test.ts

import { describe, expect, it } from 'vitest';
import { countColumns, countTiles, enumerateTiles } from '../src/core/tiling/tiler.ts';
import { InvalidConfigurationError } from '../src/utils/errors/errors.ts';

describe('Tiler', () => {
    it('should enumerate tile origins row by row', () => {
        const origins = enumerateTiles(4, 4, 2).map(({ x, y }) => [x, y]);
        expect(origins).toEqual([[0, 0], [2, 0], [0, 2], [2, 2]]);
    });

    it('should clip tiles on the right and bottom edges', () => {
        const tiles = enumerateTiles(5, 3, 2);
        expect(tiles).toHaveLength(6);
        expect(tiles[2]).toEqual({ x: 4, y: 0, size: 2, width: 1, height: 2 });
        expect(tiles[5]).toEqual({ x: 4, y: 2, size: 2, width: 1, height: 1 });
    });

    it('should produce ceil(H/S) * ceil(W/S) tiles', () => {
        const cases: Array<[number, number, number]> = [[20, 20, 10], [21, 20, 10], [7, 13, 3], [1, 1, 5], [100, 50, 7]];
        for (const [width, height, size] of cases) {
            const expected = Math.ceil(height / size) * Math.ceil(width / size);
            expect(enumerateTiles(width, height, size)).toHaveLength(expected);
            expect(countTiles(width, height, size)).toBe(expected);
        }
    });

    it('should count columns with floor division', () => {
        expect(countColumns(20, 10)).toBe(2);
        expect(countColumns(5, 2)).toBe(2);
        expect(countColumns(3, 5)).toBe(0);
    });

    it('should reject tile sizes that are not positive integers', () => {
        expect(() => enumerateTiles(10, 10, 0)).toThrow(InvalidConfigurationError);
        expect(() => enumerateTiles(10, 10, -3)).toThrow(InvalidConfigurationError);
        expect(() => enumerateTiles(10, 10, 1.5)).toThrow('Tile size must be a positive integer, got 1.5.');
    });

    it('should reject empty images', () => {
        expect(() => enumerateTiles(0, 10, 2)).toThrow('Image width must be a positive integer, got 0.');
    });
});
