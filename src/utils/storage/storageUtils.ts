// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 * @return {void}
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * Writes text to `filePath` as UTF-8, creating missing parent directories first.
 *
 * @param {string} filePath - Destination file.
 * @param {string} content - Text to write.
 * @return {Promise<void>}
 */
export async function writeTextToFile(filePath: string, content: string): Promise<void> {
    ensureOutputDirectory(path.dirname(filePath));
    await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Base name of `filePath` without its extension ("images/cat.png" -> "cat").
 */
export function fileStem(filePath: string): string {
    return path.basename(filePath, path.extname(filePath));
}
