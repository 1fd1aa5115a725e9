// src/core/converter/index.ts

import type { IConversionResult, IConvertOptions } from '../../@types/index.ts';

import { ConvertStateMachine } from './stateMachine.ts';

export { convertRaster } from './lib/convertRaster.ts';

/**
 * Converts the image at `options.inputFile` into an HTML mosaic written to `options.outputFile`.
 *
 * @param {IConvertOptions} options - The options to configure the conversion.
 * @return {Promise<IConversionResult>} The cells and grid shape that were rendered.
 */
export async function convert(options: IConvertOptions): Promise<IConversionResult> {
    const stateMachine = new ConvertStateMachine(options);
    await stateMachine.run();
    return stateMachine.result;
}
