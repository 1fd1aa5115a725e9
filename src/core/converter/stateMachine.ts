// src/core/converter/stateMachine.ts

import path from 'node:path';
import type {
    IColorSummarizer,
    IConversionResult,
    IConvertOptions,
    IGlyphCell,
    IGlyphMapper,
    IRasterImage,
    PixelColor,
    RandomSource,
} from '../../@types/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { ConverterStates } from '../../stateMachine/definedStates.ts';
import { loadRasterImage } from '../imageProcessing/processor.ts';
import { getColorSummarizer, resolveSummarizerStrategy } from '../color/colorSummarizerStrategies.ts';
import { createGlyphMapper } from '../glyphs/glyphMapper.ts';
import { countColumns, countTiles } from '../tiling/tiler.ts';
import { renderHtmlDocument } from '../rendering/htmlRenderer.ts';
import { createRandomSource } from '../../utils/misc/random.ts';
import { fileStem, writeTextToFile } from '../../utils/storage/storageUtils.ts';
import { InternalInvariantViolationError } from '../../utils/errors/errors.ts';
import { config } from '../../config/index.ts';
import { assembleResult, mapGlyphs, summarizeTiles } from './lib/convertRaster.ts';
import { resolveTileSize } from './lib/resolveTileSize.ts';
import { validateConvertOptions } from './lib/validateOptions.ts';

export class ConvertStateMachine extends AbstractStateMachine<ConverterStates, IConvertOptions> {
    private image: IRasterImage | null = null;
    private tileSize = 0;
    private summarizer: IColorSummarizer | null = null;
    private mapper: IGlyphMapper | null = null;
    private colors: PixelColor[] = [];
    private cells: IGlyphCell[] = [];
    private document = '';
    private random: RandomSource;

    constructor(options: IConvertOptions) {
        super(ConverterStates.INIT, options);
        this.random = options.random ?? createRandomSource(options.seed);

        this.stateTransitions = [
            { state: ConverterStates.INIT, handler: this.init },
            { state: ConverterStates.VALIDATE_OPTIONS, handler: this.validateOptions },
            { state: ConverterStates.LOAD_IMAGE, handler: this.loadImage },
            { state: ConverterStates.RESOLVE_TILE_SIZE, handler: this.resolveTileSize },
            { state: ConverterStates.SUMMARIZE_TILES, handler: this.summarizeTiles },
            { state: ConverterStates.MAP_GLYPHS, handler: this.mapGlyphs },
            { state: ConverterStates.RENDER_DOCUMENT, handler: this.renderDocument },
            { state: ConverterStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    protected getCompletionState(): ConverterStates {
        return ConverterStates.COMPLETED;
    }

    protected getErrorState(): ConverterStates {
        return ConverterStates.ERROR;
    }

    /**
     * The mosaic built by the last successful run.
     *
     * @throws {InternalInvariantViolationError} When the machine has not completed.
     */
    get result(): IConversionResult {
        if (this.state !== ConverterStates.COMPLETED) {
            throw new InternalInvariantViolationError(`No conversion result in state "${this.state}".`);
        }
        return this.buildResult();
    }

    private init(): void {
        const { logger, verbose, inputFile, colorStrategy, colorSpace, glyphMode } = this.options;
        if (verbose) {
            logger.info(`Initializing conversion of "${inputFile}"...`);
        }
        logger.debug(`Color strategy "${colorStrategy}", color space "${colorSpace}", glyph mode "${glyphMode}".`);
    }

    private validateOptions(): void {
        validateConvertOptions(this.options);
        const { colorStrategy, colorSpace, glyphMode, charList, asciiForeground } = this.options;
        this.summarizer = getColorSummarizer(colorStrategy, colorSpace);
        this.mapper = createGlyphMapper(glyphMode, {
            charList,
            random: this.random,
            asciiForeground: asciiForeground ?? config.glyphs.asciiForeground,
        });
        this.options.logger.debug(`Summarizing tiles with "${resolveSummarizerStrategy(colorStrategy, colorSpace)}".`);
    }

    private async loadImage(): Promise<void> {
        const { inputFile, colorSpace, decoder, logger } = this.options;
        logger.debug(`Decoding "${inputFile}" as ${colorSpace}.`);
        this.image = await loadRasterImage(inputFile, colorSpace, decoder);
        logger.debug(`Decoded ${this.image.width}x${this.image.height} image.`);
    }

    private resolveTileSize(): void {
        const { width, height } = this.requireImage();
        this.tileSize = resolveTileSize(width, height, this.options.tileSize, this.options.logger);
        this.options.logger.info(
            `Using tile size ${this.tileSize}: ${countTiles(width, height, this.tileSize)} tiles, ` +
                `${countColumns(width, this.tileSize)} columns.`,
        );
    }

    private summarizeTiles(): void {
        if (!this.summarizer) {
            throw new InternalInvariantViolationError('Summarizer requested before options were validated.');
        }
        this.colors = summarizeTiles(this.requireImage(), this.tileSize, this.summarizer);
        this.options.logger.debug(`Summarized ${this.colors.length} tiles.`);
    }

    private mapGlyphs(): void {
        if (!this.mapper) {
            throw new InternalInvariantViolationError('Glyph mapper requested before options were validated.');
        }
        this.cells = mapGlyphs(this.colors, this.mapper);
    }

    private renderDocument(): void {
        const { background, fontSize, inputFile } = this.options;
        this.document = renderHtmlDocument(this.buildResult(), {
            background,
            fontSize,
            title: fileStem(inputFile),
        });
    }

    private async writeOutput(): Promise<void> {
        const { outputFile, logger } = this.options;
        const target = path.resolve(outputFile);
        await writeTextToFile(target, this.document);
        logger.success(`Mosaic written to "${target}".`);
    }

    private buildResult(): IConversionResult {
        return assembleResult(this.requireImage(), this.tileSize, this.cells);
    }

    private requireImage(): IRasterImage {
        if (!this.image) {
            throw new InternalInvariantViolationError(`No image loaded in state "${this.state}".`);
        }
        return this.image;
    }
}
