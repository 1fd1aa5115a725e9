// tests/cli.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import sharp from 'sharp';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram, type ICliOptions, toConvertOptions } from '../src/cli/index.ts';

function parseArgs(args: string[]): { imagePath: string; options: ICliOptions } {
    let captured: { imagePath: string; options: ICliOptions } | undefined;
    const program = createProgram().exitOverride();
    program.action((imagePath: string, options: ICliOptions) => {
        captured = { imagePath, options };
    });
    program.parse(['node', 'glyph-mosaic', ...args]);
    if (!captured) {
        throw new Error('Action was not invoked.');
    }
    return captured;
}

describe('CLI', () => {
    it('should fill in the documented defaults', () => {
        const { imagePath, options } = parseArgs(['cat.png']);
        expect(imagePath).toBe('cat.png');
        expect(options).toEqual({ color: '#262626', fontsize: 24, chars: 'X', output: 'output.html' });
    });

    it('should parse every flag', () => {
        const { options } = parseArgs([
            'cat.png', '-s', '8', '-c', 'black', '--fontsize', '16', '--use-monochrome', '--use-common',
            '--ascii', '--chars', 'ab', '--seed', 's1', '-o', 'out/cat.html', '-l', '-v',
        ]);
        expect(options).toEqual({
            size: 8,
            color: 'black',
            fontsize: 16,
            useMonochrome: true,
            useCommon: true,
            ascii: true,
            chars: 'ab',
            seed: 's1',
            output: 'out/cat.html',
            log: true,
            verbose: true,
        });
    });

    it('should reject a non-numeric size', () => {
        expect(() => parseArgs(['cat.png', '-s', 'big'])).toThrow();
    });

    it('should translate flags into conversion options', () => {
        const { imagePath, options } = parseArgs(['cat.png', '--use-common', '--ascii', '--seed', 's1']);
        expect(toConvertOptions(imagePath, options)).toEqual({
            inputFile: path.resolve('cat.png'),
            outputFile: path.resolve('output.html'),
            tileSize: undefined,
            colorStrategy: 'most-common',
            colorSpace: 'rgb',
            glyphMode: 'ascii',
            charList: 'X',
            background: '#262626',
            fontSize: 24,
            seed: 's1',
            verbose: false,
        });
    });
});

describe('CLI action', () => {
    const tempFolder = fs.mkdtempSync(path.join(os.tmpdir(), 'glyph-mosaic-cli-'));
    const imagePath = path.join(tempFolder, 'red.png');
    let previousExitCode: typeof process.exitCode;

    const run = (args: string[]) => createProgram().exitOverride().parseAsync(['node', 'glyph-mosaic', ...args]);

    beforeAll(async () => {
        const red = Buffer.alloc(20 * 20 * 3);
        for (let i = 0; i < red.length; i += 3) {
            red[i] = 255;
        }
        await sharp(red, { raw: { width: 20, height: 20, channels: 3 } }).png().toFile(imagePath);
    });

    beforeEach(() => {
        previousExitCode = process.exitCode;
    });

    afterEach(() => {
        process.exitCode = previousExitCode;
        vi.restoreAllMocks();
    });

    afterAll(() => {
        fs.rmSync(tempFolder, { recursive: true, force: true });
    });

    it('should write the mosaic and print a summary', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const output = path.join(tempFolder, 'success.html');

        await run([imagePath, '-s', '10', '-o', output]);

        expect(log).toHaveBeenCalledWith(`4 characters in 2 columns -> ${output}`);
        expect(error).not.toHaveBeenCalled();
        expect(process.exitCode).toBe(previousExitCode);
        expect(fs.readFileSync(output, 'utf-8')).toContain('color: #ff0000');
    });

    it('should report a missing input and set exit code 1', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const output = path.join(tempFolder, 'missing.html');

        await run([path.join(tempFolder, 'nope.png'), '-o', output]);

        expect(process.exitCode).toBe(1);
        expect(error).toHaveBeenCalledTimes(1);
        expect(String(error.mock.calls[0][0])).toMatch(/^Conversion failed: /);
        expect(fs.existsSync(output)).toBe(false);
    });

    it('should show the tile size warning without logging enabled', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const output = path.join(tempFolder, 'skewed.html');

        await run([imagePath, '-s', '3', '-o', output]);

        expect(warn).toHaveBeenCalledTimes(1);
        expect(String(warn.mock.calls[0][0])).toContain(
            'Tile size 3 does not divide 20x20; the mosaic may look skewed. Closest sizes that fit: 2 or 4.',
        );
        expect(log).toHaveBeenCalledWith(`49 characters in 6 columns -> ${output}`);
        expect(process.exitCode).toBe(previousExitCode);
    });
});
