// src/core/imageProcessing/imageProcessorStrategies.ts

import type { ImageProcessor } from '../../@types';
import { BmpImageProcessor } from './strategies/BmpImageProcessor';
import { SharpImageProcessor } from './strategies/SharpImageProcessor';

/**
 * Enumeration of supported image processor strategies.
 */
export enum SupportedImageProcessorStrategies {
    Sharp = 'sharp',
    Bmp = 'bmp',
}

/**
 * Mapping of image processor strategy identifiers to their corresponding implementations.
 */
export const ImageProcessorStrategyMap: Record<SupportedImageProcessorStrategies, ImageProcessor> = {
    [SupportedImageProcessorStrategies.Sharp]: new SharpImageProcessor(),
    [SupportedImageProcessorStrategies.Bmp]: new BmpImageProcessor(),
};
