// src/core/decoder/lib/extraction.ts

import type { IEmbeddingRules, ILogger } from '../../../@types';
import { extractBits } from '../../../utils/bitManipulation/bitUtils';
import { stageLogger } from '../../../utils/logging/logUtils';
import type { PixelBuffer } from '../../image/pixelBuffer';
import { DecodedResult } from '../../results/decodedResult';
import { parseChannel } from '../../rules/rules';
import { traversePixels } from '../../traversal/cursor';
import { MarkerScanner } from './markerScanner';

/**
 * Reads the low bits of one channel along the traversal and reassembles them into bytes.
 *
 * Each visit contributes `bitsPerPixel` bits to an LSB-first bit stream; every 8 bits complete
 * one output byte. Extraction stops as soon as the configured marker has been assembled, or when
 * the traversal is exhausted. Bits of an incomplete trailing byte are dropped.
 *
 * @param {IEmbeddingRules} rules - Extraction rules, marker included.
 * @param {PixelBuffer} source - Raster to read from.
 * @param {ILogger} [logger] - Optional logger for debug output.
 * @return {DecodedResult} The assembled bytes and whether the marker was hit.
 */
export function decodeBytes(rules: IEmbeddingRules, source: PixelBuffer, logger?: ILogger): DecodedResult {
    const startedAt = performance.now();
    const channel = parseChannel(rules.channel);
    const scanner = new MarkerScanner(rules.marker);
    const output: number[] = [];

    let currentByte = 0;
    let iterCount = 0;
    let hitMarker = false;

    for (const { x, y } of traversePixels(rules, source.width, source.height)) {
        const bits = extractBits(source.getChannelByte(x, y, channel), 0, rules.bitsPerPixel);
        for (let b = 0; b < rules.bitsPerPixel && !hitMarker; b++) {
            currentByte |= extractBits(bits, b, 1) << iterCount;
            iterCount++;
            if (iterCount === 8) {
                output.push(currentByte);
                hitMarker = scanner.push(currentByte);
                currentByte = 0;
                iterCount = 0;
            }
        }
        if (hitMarker) {
            break;
        }
    }

    const elapsedMs = performance.now() - startedAt;
    stageLogger(logger, 'extract')?.debug(
        `Extracted ${output.length} bytes in ${elapsedMs.toFixed(2)} ms (marker ${hitMarker ? 'hit' : 'not hit'}).`,
    );

    return new DecodedResult(Uint8Array.from(output), hitMarker, elapsedMs, rules.marker);
}
