// src/core/converter/lib/validateOptions.ts

import type { IConvertOptions } from '../../../@types/index.ts';
import { InvalidConfigurationError } from '../../../utils/errors/errors.ts';
import { isCssColor } from '../../../utils/color/colorUtils.ts';
import { splitCharList } from '../../glyphs/glyphMapper.ts';

/**
 * Rejects options the pipeline cannot run with. Called before the image is touched.
 *
 * @throws {InvalidConfigurationError} On the first invalid option found.
 */
export function validateConvertOptions(options: IConvertOptions): void {
    const { tileSize, fontSize, glyphMode, charList, background, asciiForeground } = options;

    if (tileSize !== undefined && (!Number.isInteger(tileSize) || tileSize <= 0)) {
        throw new InvalidConfigurationError(`Tile size must be a positive integer, got ${tileSize}.`);
    }
    if (!Number.isInteger(fontSize) || fontSize <= 0) {
        throw new InvalidConfigurationError(`Font size must be a positive integer, got ${fontSize}.`);
    }
    if (glyphMode === 'random') {
        splitCharList(charList);
    }
    if (!isCssColor(background)) {
        throw new InvalidConfigurationError(`Background "${background}" is not a hex color or CSS color name.`);
    }
    if (asciiForeground !== undefined && !isCssColor(asciiForeground)) {
        throw new InvalidConfigurationError(`Foreground "${asciiForeground}" is not a hex color or CSS color name.`);
    }
}
