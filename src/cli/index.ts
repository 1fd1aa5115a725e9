// src/cli/index.ts

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import process from 'node:process';
import figlet from 'figlet';
import { rainbow } from 'gradient-string';
import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { IConvertOptions, IProgressBar } from '../@types/index.ts';
import { convert } from '../core/converter/index.ts';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';
import { config } from '../config/index.ts';
import { ConverterStates } from '../stateMachine/definedStates.ts';

export interface ICliOptions {
    size?: number;
    color: string;
    fontsize: number;
    useMonochrome?: boolean;
    useCommon?: boolean;
    ascii?: boolean;
    chars: string;
    seed?: string;
    output: string;
    log?: boolean;
    verbose?: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

/**
 * Maps parsed command line flags onto conversion options, without logger or progress bar.
 */
export function toConvertOptions(
    imagePath: string,
    options: ICliOptions,
): Omit<IConvertOptions, 'logger' | 'progressBar'> {
    return {
        inputFile: path.resolve(imagePath),
        outputFile: path.resolve(options.output),
        tileSize: options.size,
        colorStrategy: options.useCommon ? 'most-common' : 'average',
        colorSpace: options.useMonochrome ? 'monochrome' : 'rgb',
        glyphMode: options.ascii ? 'ascii' : 'random',
        charList: options.chars,
        background: options.color,
        fontSize: options.fontsize,
        seed: options.seed,
        verbose: options.verbose ?? false,
    };
}

export function createProgram(): Command {
    const program = new Command();
    program
        .name('glyph-mosaic')
        .description('Convert an image into an HTML mosaic of colored characters')
        .version('1.0.0')
        .argument('<image>', 'Path to the image file to convert')
        .option('-s, --size <number>', 'Size in pixels of the square area behind each character (Default: auto)', parseInteger)
        .option('-c, --color <css>', 'Background color; hex or CSS color name', config.document.background)
        .option('--fontsize <number>', "Characters' font size in px", parseInteger, config.document.fontSize)
        .option('--use-monochrome', 'Generate a black and white picture')
        .option('--use-common', 'Use the most common color of each area instead of the average')
        .option('--ascii', 'Pick characters by brightness instead of coloring them')
        .option('--chars <characters>', 'Characters to draw the mosaic with', config.glyphs.charList)
        .option('--seed <seed>', 'Seed for reproducible character selection')
        .option('-o, --output <file>', 'Output HTML file', config.outputFile)
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError()
        .action(async (imagePath: string, options: ICliOptions) => {
            const isLogging = options.log ?? false;
            const verbose = options.verbose ?? false;
            const logger = getLogger('converter', isLogging ? console : NoopLogFacility, verbose);

            let progressBar: IProgressBar | undefined;
            if (!isLogging) {
                const bar = new cliProgress.SingleBar({
                    format: config.progressBar.format,
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                }, cliProgress.Presets.shades_grey);
                bar.start(Object.keys(ConverterStates).length - 1, 0, { state: ConverterStates.INIT });
                progressBar = bar;
            }

            // The logger is shared by name, so only this run's warnings are replayed.
            const warningsBefore = logger.warnMessages.length;
            const replayWarnings = (): void => {
                if (isLogging) {
                    return;
                }
                for (const message of logger.warnMessages.slice(warningsBefore)) {
                    console.warn(chalk.yellow(`Warning: ${message}`));
                }
            };

            try {
                const result = await convert({ ...toConvertOptions(imagePath, options), logger, progressBar });
                progressBar?.stop();
                replayWarnings();
                console.log(`${result.cells.length} characters in ${result.columns} columns -> ${path.resolve(options.output)}`);
            } catch (error) {
                replayWarnings();
                console.error(`Conversion failed: ${error instanceof Error ? error.message : error}`);
                process.exitCode = 1;
            }
        });
    return program;
}

export function printBanner(): void {
    console.log(rainbow.multiline(
        figlet.textSync('Glyph Mosaic', {
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
}
