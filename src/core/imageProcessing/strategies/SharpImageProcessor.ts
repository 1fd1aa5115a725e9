// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ColorSpace, ImageDecoder } from '../../../@types/index.ts';
import { RasterImage } from '../rasterImage.ts';
import { DecodeError } from '../../../utils/errors/errors.ts';

export class SharpImageProcessor implements ImageDecoder {
    /**
     * Decodes an image file into raw pixels, dropping the alpha channel. RGB images are converted
     * to the sRGB color space, monochrome images to a single luminance channel.
     *
     * @param {string} imagePath - Path of the image to decode.
     * @param {ColorSpace} colorSpace - Requested pixel layout.
     * @return {Promise<RasterImage>} The decoded image.
     * @throws {DecodeError} When the file is missing, unreadable or in an unsupported format.
     */
    public async loadRasterImage(imagePath: string, colorSpace: ColorSpace): Promise<RasterImage> {
        const expectedChannels = colorSpace === 'rgb' ? 3 : 1;
        let decoded: { data: Buffer; info: sharp.OutputInfo };
        try {
            decoded = await sharp(imagePath)
                .removeAlpha()
                .toColourspace(colorSpace === 'rgb' ? 'srgb' : 'b-w')
                .raw()
                .toBuffer({ resolveWithObject: true });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new DecodeError(`Failed to decode "${imagePath}": ${reason}`, { cause: error });
        }

        const { data, info } = decoded;
        if (info.channels !== expectedChannels) {
            throw new DecodeError(
                `Decoder returned ${info.channels} channels for "${imagePath}", expected ${expectedChannels}.`,
            );
        }
        return new RasterImage(info.width, info.height, colorSpace, new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    }
}
