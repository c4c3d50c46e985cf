// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 * @return {Promise<void>}
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    await fs.promises.mkdir(outputFolder, { recursive: true });
}

/**
 * Writes a buffer to a file at the specified path, creating the parent directory when needed.
 *
 * @param {string} filePath - The path of the file where the data will be written.
 * @param {Uint8Array} data - The bytes to write.
 * @return {Promise<void>}
 */
export async function writeBufferToFile(filePath: string, data: Uint8Array): Promise<void> {
    await ensureOutputDirectory(path.dirname(filePath));
    await fs.promises.writeFile(filePath, data);
}

/**
 * Reads the entire contents of a file into a buffer.
 *
 * @param {string} filePath - The file path of the file to be read.
 * @returns {Promise<Buffer>} - The contents of the file.
 */
export async function readBufferFromFile(filePath: string): Promise<Buffer> {
    return await fs.promises.readFile(filePath);
}
