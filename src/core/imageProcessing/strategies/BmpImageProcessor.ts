// src/core/imageProcessing/strategies/BmpImageProcessor.ts

import type { ImageFormat, ImageProcessor } from '../../../@types';
import { BitloomError } from '../../../utils/errors/errors';
import { PixelBuffer, RGB_CHANNELS } from '../../image/pixelBuffer';

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const BI_RGB = 0;
const BI_BITFIELDS = 3;
const BI_ALPHABITFIELDS = 6;
// red, green and blue masks follow the 40-byte info header, inside larger headers as well
const MASKS_OFFSET = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
const PIXELS_PER_METER = 2835; // 72 DPI

/**
 * Returns true when the bytes start with the `BM` signature.
 */
export function isBmp(bytes: Uint8Array): boolean {
    return bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;
}

/**
 * Reads and writes uncompressed Windows bitmaps, which sharp does not handle.
 * Reading accepts 24- and 32-bit rows stored bottom-up or top-down, and 32-bit bitfield rows whose
 * masks each cover one whole byte. Writing always produces 24-bit bottom-up rows.
 */
export class BmpImageProcessor implements ImageProcessor {
    public async loadImage(bytes: Uint8Array): Promise<PixelBuffer> {
        const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        if (!isBmp(buffer) || buffer.length < FILE_HEADER_SIZE + INFO_HEADER_SIZE) {
            throw new Error('Not a BMP file.');
        }

        const dataOffset = buffer.readUInt32LE(10);
        const width = buffer.readInt32LE(18);
        const rawHeight = buffer.readInt32LE(22);
        const bitsPerPixel = buffer.readUInt16LE(28);
        const compression = buffer.readUInt32LE(30);

        if (bitsPerPixel !== 24 && bitsPerPixel !== 32) {
            throw new Error(`Only 24- and 32-bit bitmaps are supported, got ${bitsPerPixel}-bit.`);
        }
        const layout = channelLayout(buffer, compression, bitsPerPixel);
        if (width <= 0 || rawHeight === 0) {
            throw new Error(`Invalid bitmap dimensions ${width}x${rawHeight}.`);
        }

        const topDown = rawHeight < 0;
        const height = Math.abs(rawHeight);
        const bytesPerPixel = bitsPerPixel / 8;
        const rowSize = rowStride(width, bitsPerPixel);
        if (dataOffset + rowSize * height > buffer.length) {
            throw new Error('Bitmap pixel data is truncated.');
        }

        const pixels = new PixelBuffer(width, height);
        for (let y = 0; y < height; y++) {
            const sourceRow = topDown ? y : height - 1 - y;
            const rowStart = dataOffset + sourceRow * rowSize;
            for (let x = 0; x < width; x++) {
                const source = rowStart + x * bytesPerPixel;
                const target = (y * width + x) * RGB_CHANNELS;
                pixels.data[target] = buffer[source + layout.red];
                pixels.data[target + 1] = buffer[source + layout.green];
                pixels.data[target + 2] = buffer[source + layout.blue];
            }
        }
        return pixels;
    }

    public async saveImage(pixels: PixelBuffer, format: ImageFormat): Promise<Buffer> {
        if (format !== 'bmp') {
            throw new BitloomError('UnsupportedFormat', `The bmp processor cannot write ${format} images.`);
        }
        const { width, height } = pixels;
        const rowSize = rowStride(width, 24);
        const imageSize = rowSize * height;
        const dataOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
        const output = Buffer.alloc(dataOffset + imageSize);

        output.write('BM', 0, 'ascii');
        output.writeUInt32LE(output.length, 2);
        output.writeUInt32LE(dataOffset, 10);
        output.writeUInt32LE(INFO_HEADER_SIZE, 14);
        output.writeInt32LE(width, 18);
        output.writeInt32LE(height, 22);
        output.writeUInt16LE(1, 26);
        output.writeUInt16LE(24, 28);
        output.writeUInt32LE(BI_RGB, 30);
        output.writeUInt32LE(imageSize, 34);
        output.writeInt32LE(PIXELS_PER_METER, 38);
        output.writeInt32LE(PIXELS_PER_METER, 42);

        for (let y = 0; y < height; y++) {
            const rowStart = dataOffset + (height - 1 - y) * rowSize;
            for (let x = 0; x < width; x++) {
                const source = (y * width + x) * RGB_CHANNELS;
                const target = rowStart + x * 3;
                output[target] = pixels.data[source + 2];
                output[target + 1] = pixels.data[source + 1];
                output[target + 2] = pixels.data[source];
            }
        }
        return output;
    }
}

interface IChannelLayout {
    red: number;
    green: number;
    blue: number;
}

// BGR(A) byte order
const DEFAULT_LAYOUT: IChannelLayout = { red: 2, green: 1, blue: 0 };

/**
 * Byte position of each color inside one stored pixel.
 *
 * @throws {Error} For compressed data, or masks that do not select exactly one byte.
 */
function channelLayout(buffer: Buffer, compression: number, bitsPerPixel: number): IChannelLayout {
    if (compression === BI_RGB) {
        return DEFAULT_LAYOUT;
    }
    if ((compression !== BI_BITFIELDS && compression !== BI_ALPHABITFIELDS) || bitsPerPixel !== 32) {
        throw new Error(`Compressed bitmaps are not supported (compression ${compression}, ${bitsPerPixel}-bit).`);
    }
    if (buffer.length < MASKS_OFFSET + 12) {
        throw new Error('Bitmap color masks are truncated.');
    }
    return {
        red: maskByte(buffer.readUInt32LE(MASKS_OFFSET), 'red'),
        green: maskByte(buffer.readUInt32LE(MASKS_OFFSET + 4), 'green'),
        blue: maskByte(buffer.readUInt32LE(MASKS_OFFSET + 8), 'blue'),
    };
}

function maskByte(mask: number, channel: string): number {
    for (let byte = 0; byte < 4; byte++) {
        if (mask === (0xff << (byte * 8)) >>> 0) {
            return byte;
        }
    }
    throw new Error(`Unsupported ${channel} mask 0x${mask.toString(16).padStart(8, '0')}.`);
}

function rowStride(width: number, bitsPerPixel: number): number {
    return Math.ceil((width * bitsPerPixel) / 32) * 4;
}
