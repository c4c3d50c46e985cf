// src/index.ts

export * from './@types';
export { config } from './config';
export { createRules, parseChannel, parseStartPosition, withoutMarker } from './core/rules/rules';
export { PixelBuffer } from './core/image/pixelBuffer';
export {
    availablePixelVisits,
    computeBaseOffset,
    countFirstPassVisits,
    traversePixels,
} from './core/traversal/cursor';
export {
    assertCapacity,
    checkCapacity,
    type ICapacityCheckResult,
    maxPayloadBytes,
    requiredPixelVisits,
} from './core/capacity/capacityChecker';
export { encodeBytes } from './core/encoder/lib/embedding';
export { decodeBytes } from './core/decoder/lib/extraction';
export { MarkerScanner, type MarkerScannerState } from './core/decoder/lib/markerScanner';
export { EncodedResult } from './core/results/encodedResult';
export { DecodedResult } from './core/results/decodedResult';
export { formatFromPath, loadImage, saveImage } from './core/imageProcessing/processor';
export { encodeFile } from './core/encoder';
export { decodeFile } from './core/decoder';
export { getBits, setBits } from './utils/bitManipulation/bitUtils';
export {
    BitloomError,
    type BitloomErrorKind,
    CapacityExceededError,
    InvalidImageError,
    isBitloomError,
} from './utils/errors/errors';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils';
