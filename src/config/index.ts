// src/config/index.ts

import { RgbChannel } from '../@types';

export const config = {
    defaultRules: {
        bitsPerPixel: 1,
        channel: RgbChannel.Blue,
        pixelOffset: 0,
        pixelStride: 1,
        startPosition: 'top-left' as const,
        spread: false,
    },
    imageCompression: {
        pngCompressionLevel: 7,
        adaptiveFiltering: false,
        jpegQuality: 100,
    },
};
