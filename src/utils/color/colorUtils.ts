// src/utils/color/colorUtils.ts

import type { PixelColor, RGB } from '../../@types/index.ts';

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const COLOR_KEYWORD = /^[a-z]+$/i;

/**
 * Formats a color as `#rrggbb`, lower case and zero padded.
 */
export function rgbToHex([r, g, b]: RGB): string {
    return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}

/**
 * Widens a single luminance value to a grey RGB triple; RGB input is returned as is.
 */
export function toRGB(color: PixelColor): RGB {
    if (color.length === 1) {
        return [color[0], color[0], color[0]];
    }
    return [color[0], color[1], color[2]];
}

/**
 * Luminance of a pixel in 0..255. Single-channel values pass through; RGB uses the ITU-R 601-2
 * weights in integer arithmetic, so a grey triple maps back to its own value.
 */
export function luminanceOf(color: PixelColor): number {
    if (color.length === 1) {
        return color[0];
    }
    return Math.floor((color[0] * 299 + color[1] * 587 + color[2] * 114) / 1000);
}

/**
 * Accepts hex colors (#rgb, #rgba, #rrggbb, #rrggbbaa) and bare CSS color keywords such as `black`.
 */
export function isCssColor(value: string): boolean {
    return HEX_COLOR.test(value) || COLOR_KEYWORD.test(value);
}
