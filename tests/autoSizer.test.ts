// tests/autoSizer.test.ts

import { describe, expect, it } from 'vitest';
import { computeAutoTileSize, computeCommonDivisors, suggestTileSizes } from '../src/core/sizing/autoSizer.ts';
import { InvalidConfigurationError } from '../src/utils/errors/errors.ts';

describe('AutoSizer', () => {
    describe('computeCommonDivisors', () => {
        it('should list the divisors shared by both dimensions', () => {
            expect(computeCommonDivisors(12, 18)).toEqual([1, 2, 3, 6]);
            expect(computeCommonDivisors(101, 53)).toEqual([1]);
        });

        it('should reject non-positive dimensions', () => {
            expect(() => computeCommonDivisors(0, 10)).toThrow(InvalidConfigurationError);
            expect(() => computeCommonDivisors(10, -1)).toThrow('Image dimensions must be positive integers, got 10x-1.');
        });
    });

    describe('computeAutoTileSize', () => {
        it('should keep the target when it divides both dimensions', () => {
            expect(computeAutoTileSize(100, 50)).toBe(2);
        });

        it('should fall back to the only common divisor', () => {
            expect(computeAutoTileSize(101, 53)).toBe(1);
        });

        it('should take the smallest divisor when the target is below all of them', () => {
            expect(computeAutoTileSize(40, 30)).toBe(1);
        });

        it('should pick the closer neighbouring divisor', () => {
            expect(computeAutoTileSize(200, 50)).toBe(5);
            expect(computeAutoTileSize(640, 480)).toBe(10);
            expect(computeAutoTileSize(1920, 1080)).toBe(40);
        });

        it('should favor the smaller divisor on a tie', () => {
            expect(computeAutoTileSize(150, 55)).toBe(1);
        });

        it('should always return a common divisor', () => {
            for (const [width, height] of [[300, 200], [333, 111], [1024, 768], [97, 89]]) {
                const size = computeAutoTileSize(width, height);
                expect(width % size).toBe(0);
                expect(height % size).toBe(0);
            }
        });
    });

    describe('suggestTileSizes', () => {
        it('should name the divisors around a requested size', () => {
            expect(suggestTileSizes(100, 50, 3)).toEqual({ below: 2, above: 5 });
            expect(suggestTileSizes(20, 20, 3)).toEqual({ below: 2, above: 4 });
        });

        it('should leave out a side without divisors', () => {
            expect(suggestTileSizes(20, 20, 30)).toEqual({ below: 20, above: undefined });
        });
    });
});
