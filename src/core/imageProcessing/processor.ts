// src/core/imageProcessing/processor.ts

import type { ColorSpace, ImageDecoder, IRasterImage } from '../../@types/index.ts';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.ts';

const defaultDecoder: ImageDecoder = new SharpImageProcessor();

/**
 * Loads an image file in the requested color space.
 *
 * @param {string} imagePath - The file path of the image to be loaded.
 * @param {ColorSpace} colorSpace - 'rgb' for three channels, 'monochrome' for luminance only.
 * @param {ImageDecoder} decoder - Decoder to use; sharp unless another one is supplied.
 * @return {Promise<IRasterImage>} A promise that resolves to the decoded image.
 */
export async function loadRasterImage(
    imagePath: string,
    colorSpace: ColorSpace,
    decoder: ImageDecoder = defaultDecoder,
): Promise<IRasterImage> {
    return await decoder.loadRasterImage(imagePath, colorSpace);
}
