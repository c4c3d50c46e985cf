// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ImageFormat, ImageProcessor } from '../../../@types';
import { config } from '../../../config';
import { BitloomError } from '../../../utils/errors/errors';
import { PixelBuffer, RGB_CHANNELS } from '../../image/pixelBuffer';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes an image container, removes the alpha channel and converts it to the sRGB color space.
     *
     * @param {Uint8Array} bytes - Encoded image (JPEG, PNG or anything else sharp reads).
     * @return {Promise<PixelBuffer>} The decoded RGB raster.
     */
    public async loadImage(bytes: Uint8Array): Promise<PixelBuffer> {
        const { data, info } = await sharp(bytes)
            .removeAlpha()
            .toColourspace('srgb')
            .raw()
            .toBuffer({ resolveWithObject: true });
        if (info.channels !== RGB_CHANNELS) {
            throw new Error(`Expected ${RGB_CHANNELS} channels after conversion, got ${info.channels}.`);
        }
        return new PixelBuffer(info.width, info.height, new Uint8Array(data));
    }

    /**
     * Encodes a raster as PNG or JPEG.
     *
     * @param {PixelBuffer} pixels - The raster to encode.
     * @param {ImageFormat} format - Target container format.
     * @return {Promise<Buffer>} The encoded image.
     */
    public async saveImage(pixels: PixelBuffer, format: ImageFormat): Promise<Buffer> {
        const image = sharp(Buffer.from(pixels.data), {
            raw: {
                width: pixels.width,
                height: pixels.height,
                channels: RGB_CHANNELS,
            },
        });
        switch (format) {
            case 'png':
                return await image
                    .png({
                        compressionLevel: config.imageCompression.pngCompressionLevel,
                        adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                        palette: false,
                    })
                    .toBuffer();
            case 'jpeg':
                return await image.jpeg({ quality: config.imageCompression.jpegQuality }).toBuffer();
            default:
                throw new BitloomError('UnsupportedFormat', `The sharp processor cannot write ${format} images.`);
        }
    }
}
