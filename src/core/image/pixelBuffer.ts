// src/core/image/pixelBuffer.ts

import type { Rgb } from '../../@types';
import { RgbChannel } from '../../@types';
import { parseChannel } from '../rules/rules';

export const RGB_CHANNELS = 3;

/**
 * Row-major RGB raster, three bytes per pixel.
 */
export class PixelBuffer {
    readonly data: Uint8Array;

    constructor(
        readonly width: number,
        readonly height: number,
        data?: Uint8Array,
    ) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
            throw new RangeError(`Invalid image dimensions ${width}x${height}.`);
        }
        const expectedLength = width * height * RGB_CHANNELS;
        if (data && data.length !== expectedLength) {
            throw new RangeError(
                `Pixel data holds ${data.length} bytes, expected ${expectedLength} for ${width}x${height} RGB.`,
            );
        }
        this.data = data ?? new Uint8Array(expectedLength);
    }

    get pixelCount(): number {
        return this.width * this.height;
    }

    getChannelByte(x: number, y: number, channel: RgbChannel): number {
        return this.data[this.byteIndex(x, y, channel)];
    }

    setChannelByte(x: number, y: number, channel: RgbChannel, value: number): void {
        this.data[this.byteIndex(x, y, channel)] = value & 0xff;
    }

    getPixel(x: number, y: number): Rgb {
        const base = this.byteIndex(x, y, RgbChannel.Red);
        return [this.data[base], this.data[base + 1], this.data[base + 2]];
    }

    clone(): PixelBuffer {
        return new PixelBuffer(this.width, this.height, this.data.slice());
    }

    private byteIndex(x: number, y: number, channel: RgbChannel): number {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} image.`);
        }
        return (y * this.width + x) * RGB_CHANNELS + parseChannel(channel);
    }
}
