// src/core/results/encodedResult.ts

import type { Writable } from 'node:stream';
import type { IByteEncodeMap, IChangeRecord, ILogger, ImageFormat, Rgb } from '../../@types';
import type { PixelBuffer } from '../image/pixelBuffer';
import { formatFromPath, saveImage } from '../imageProcessing/processor';
import { writeBufferToFile } from '../../utils/storage/storageUtils';

/**
 * Outcome of one embedding: the altered raster, the untouched original and one change map per payload byte.
 * The change maps are frozen on construction; callers get read-only views.
 */
export class EncodedResult {
    private readonly byteEncodeMaps: readonly IByteEncodeMap[];

    constructor(
        private readonly altered: PixelBuffer,
        private readonly original: PixelBuffer,
        byteEncodeMaps: readonly IByteEncodeMap[],
    ) {
        this.byteEncodeMaps = Object.freeze(
            byteEncodeMaps.map(({ sourceByte, changes }) =>
                Object.freeze({ sourceByte, changes: Object.freeze(changes.map(freezeRecord)) }),
            ),
        );
    }

    changes(): readonly IByteEncodeMap[] {
        return this.byteEncodeMaps;
    }

    /**
     * Number of pixel visits recorded while embedding.
     */
    pixelsTouched(): number {
        return this.byteEncodeMaps.reduce((sum, map) => sum + map.changes.length, 0);
    }

    /**
     * Number of visited pixels whose color actually differs from the original.
     */
    pixelsChanged(): number {
        return this.byteEncodeMaps.reduce(
            (sum, map) => sum + map.changes.filter((change) => colorDiffers(change)).length,
            0,
        );
    }

    alteredPixels(): PixelBuffer {
        return this.altered.clone();
    }

    originalPixels(): PixelBuffer {
        return this.original.clone();
    }

    /**
     * Serializes the altered raster into an image container.
     */
    async toBuffer(format: ImageFormat, logger?: ILogger): Promise<Buffer> {
        return await saveImage(this.altered, format, logger);
    }

    /**
     * Serializes the altered raster and writes it to a stream. The stream is left open.
     *
     * @param {Writable} target - Destination stream.
     * @param {ImageFormat} format - Container format.
     * @param {ILogger} [logger] - Optional logger.
     * @return {Promise<void>} Resolves once the stream has accepted the bytes.
     */
    async write(target: Writable, format: ImageFormat, logger?: ILogger): Promise<void> {
        const bytes = await this.toBuffer(format, logger);
        await new Promise<void>((resolve, reject) => {
            target.write(bytes, (error) => (error ? reject(error) : resolve()));
        });
        logger?.debug(`Wrote ${bytes.length} bytes of ${format} to a stream.`);
    }

    /**
     * Writes the altered raster to a file. The format defaults to the one matching the file extension.
     */
    async save(filePath: string, format: ImageFormat = formatFromPath(filePath), logger?: ILogger): Promise<void> {
        const bytes = await this.toBuffer(format, logger);
        await writeBufferToFile(filePath, bytes);
        logger?.debug(`Wrote ${bytes.length} bytes of ${format} to "${filePath}".`);
    }
}

function freezeRecord({ x, y, originalColor, newColor }: IChangeRecord): IChangeRecord {
    return Object.freeze({ x, y, originalColor: freezeColor(originalColor), newColor: freezeColor(newColor) });
}

function freezeColor([red, green, blue]: Rgb): Rgb {
    const copy: Rgb = [red, green, blue];
    return Object.freeze(copy);
}

function colorDiffers({ originalColor, newColor }: IChangeRecord): boolean {
    return originalColor.some((value, i) => value !== newColor[i]);
}
