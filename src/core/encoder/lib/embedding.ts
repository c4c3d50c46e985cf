// src/core/encoder/lib/embedding.ts

import type { IByteEncodeMap, IChangeRecord, IEmbeddingRules, ILogger } from '../../../@types';
import { readBitChunk, setBits } from '../../../utils/bitManipulation/bitUtils';
import { CapacityExceededError, InvalidImageError } from '../../../utils/errors/errors';
import { stageLogger } from '../../../utils/logging/logUtils';
import { assertCapacity } from '../../capacity/capacityChecker';
import { PixelBuffer } from '../../image/pixelBuffer';
import { EncodedResult } from '../../results/encodedResult';
import { parseChannel } from '../../rules/rules';
import { traversePixels } from '../../traversal/cursor';

/**
 * Embeds a payload into the low bits of one channel of a raster.
 *
 * The payload is consumed as an LSB-first bit stream, `bitsPerPixel` bits per visited pixel; the
 * last visit may carry fewer bits. Capacity is checked before anything is written and the source
 * raster is never modified.
 *
 * @param {Uint8Array} payload - Bytes to embed.
 * @param {IEmbeddingRules} rules - Embedding rules; the marker is ignored.
 * @param {PixelBuffer} source - Raster to embed into.
 * @param {ILogger} [logger] - Optional logger for debug output.
 * @return {EncodedResult} The altered raster together with the per-byte change log.
 * @throws {CapacityExceededError} When the payload needs more visits than the traversal offers.
 */
export function encodeBytes(
    payload: Uint8Array,
    rules: IEmbeddingRules,
    source: PixelBuffer,
    logger?: ILogger,
): EncodedResult {
    if (source.pixelCount === 0) {
        throw new InvalidImageError('Source image has no pixels.');
    }
    const channel = parseChannel(rules.channel);
    const capacity = assertCapacity(payload.length, rules, source.width, source.height, logger);
    const log = stageLogger(logger, 'embed');
    if (capacity.usesSpread) {
        log?.debug(`Payload exceeds the first pass (${capacity.singlePassVisits} visits); wrapping around.`);
    }

    const altered = source.clone();
    const changesPerByte = Array.from(payload, (): IChangeRecord[] => []);
    const cursor = traversePixels(rules, source.width, source.height);
    const totalBits = payload.length * 8;

    for (let bitIndex = 0; bitIndex < totalBits; bitIndex += rules.bitsPerPixel) {
        const next = cursor.next();
        if (next.done) {
            throw new CapacityExceededError(capacity.requiredVisits, capacity.availableVisits);
        }
        const { x, y } = next.value;
        const chunkSize = Math.min(rules.bitsPerPixel, totalBits - bitIndex);
        const chunk = readBitChunk(payload, bitIndex, chunkSize);

        altered.setChannelByte(x, y, channel, setBits(source.getChannelByte(x, y, channel), 0, chunkSize, chunk));
        changesPerByte[bitIndex >> 3].push({
            x,
            y,
            originalColor: source.getPixel(x, y),
            newColor: altered.getPixel(x, y),
        });
    }

    log?.debug(
        `Embedded ${payload.length} bytes in ${capacity.requiredVisits} pixel visits at ${rules.bitsPerPixel} bits per pixel.`,
    );

    const byteEncodeMaps: IByteEncodeMap[] = Array.from(payload, (sourceByte, i) => ({
        sourceByte,
        changes: changesPerByte[i],
    }));
    return new EncodedResult(altered, source.clone(), byteEncodeMaps);
}
