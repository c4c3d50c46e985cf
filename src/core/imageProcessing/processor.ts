// src/core/imageProcessing/processor.ts

import path from 'node:path';
import type { ILogger, ImageFormat } from '../../@types';
import { BitloomError, InvalidImageError } from '../../utils/errors/errors';
import type { PixelBuffer } from '../image/pixelBuffer';
import { ImageProcessorStrategyMap, SupportedImageProcessorStrategies } from './imageProcessorStrategies';
import { isBmp } from './strategies/BmpImageProcessor';

const EXTENSION_FORMATS: Record<string, ImageFormat> = {
    '.png': 'png',
    '.jpg': 'jpeg',
    '.jpeg': 'jpeg',
    '.bmp': 'bmp',
};

/**
 * Decodes image bytes into an RGB raster. Bitmaps go to the BMP strategy, everything else to sharp.
 *
 * @param {Uint8Array} bytes - Encoded image.
 * @param {ILogger} [logger] - Optional logger for debug output.
 * @return {Promise<PixelBuffer>} The decoded raster.
 * @throws {InvalidImageError} When the bytes cannot be decoded.
 */
export async function loadImage(bytes: Uint8Array, logger?: ILogger): Promise<PixelBuffer> {
    const strategy = isBmp(bytes) ? SupportedImageProcessorStrategies.Bmp : SupportedImageProcessorStrategies.Sharp;
    try {
        const pixels = await ImageProcessorStrategyMap[strategy].loadImage(bytes);
        logger?.debug(`Loaded ${pixels.width}x${pixels.height} image using the ${strategy} processor.`);
        return pixels;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidImageError(`Could not decode image: ${reason}`, error);
    }
}

/**
 * Encodes a raster into the given container format.
 *
 * @param {PixelBuffer} pixels - Raster to encode.
 * @param {ImageFormat} format - Target format.
 * @param {ILogger} [logger] - Optional logger; warns when the format is lossy.
 * @return {Promise<Buffer>} The encoded image.
 */
export async function saveImage(pixels: PixelBuffer, format: ImageFormat, logger?: ILogger): Promise<Buffer> {
    if (format === 'jpeg') {
        logger?.warn('JPEG is lossy; re-compression will alter the embedded bits.');
    }
    const strategy = format === 'bmp' ? SupportedImageProcessorStrategies.Bmp : SupportedImageProcessorStrategies.Sharp;
    return await ImageProcessorStrategyMap[strategy].saveImage(pixels, format);
}

/**
 * Maps a file extension to an image format.
 *
 * @throws {BitloomError} `UnsupportedFormat` for unknown extensions.
 */
export function formatFromPath(filePath: string): ImageFormat {
    const extension = path.extname(filePath).toLowerCase();
    const format = EXTENSION_FORMATS[extension];
    if (!format) {
        throw new BitloomError(
            'UnsupportedFormat',
            `Cannot infer an image format from "${filePath}". Use .png, .jpg, .jpeg or .bmp.`,
        );
    }
    return format;
}
