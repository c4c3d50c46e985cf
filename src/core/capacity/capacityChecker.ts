// src/core/capacity/capacityChecker.ts

import type { IEmbeddingRules, ILogger } from '../../@types';
import { CapacityExceededError } from '../../utils/errors/errors';
import { availablePixelVisits, countFirstPassVisits } from '../traversal/cursor';

/**
 * Interface representing the result of the capacity check.
 */
export interface ICapacityCheckResult {
    requiredVisits: number;
    availableVisits: number;
    singlePassVisits: number;
    isSufficient: boolean;
    usesSpread: boolean;
}

/**
 * Number of pixel visits needed to carry `byteCount` bytes at `bitsPerPixel` bits per visit.
 */
export function requiredPixelVisits(byteCount: number, bitsPerPixel: number): number {
    return Math.ceil((byteCount * 8) / bitsPerPixel);
}

/**
 * Compares the visits a payload needs with the visits the traversal can make on an image of the given size.
 *
 * @param {number} byteCount - Payload size in bytes.
 * @param {IEmbeddingRules} rules - Rules the payload will be embedded with.
 * @param {number} width - Image width in pixels.
 * @param {number} height - Image height in pixels.
 * @param {ILogger} [logger] - Optional logger for debug output.
 * @return {ICapacityCheckResult} Required and available visits and whether the payload fits.
 */
export function checkCapacity(
    byteCount: number,
    rules: IEmbeddingRules,
    width: number,
    height: number,
    logger?: ILogger,
): ICapacityCheckResult {
    const requiredVisits = requiredPixelVisits(byteCount, rules.bitsPerPixel);
    const singlePassVisits = countFirstPassVisits(rules, width, height);
    const availableVisits = availablePixelVisits(rules, width, height);
    const isSufficient = requiredVisits <= availableVisits;

    logger?.debug(
        `Capacity check: ${byteCount} bytes need ${requiredVisits} visits, ${availableVisits} available (${singlePassVisits} in the first pass).`,
    );

    return {
        requiredVisits,
        availableVisits,
        singlePassVisits,
        isSufficient,
        usesSpread: rules.spread && requiredVisits > singlePassVisits,
    };
}

/**
 * Runs {@link checkCapacity} and throws when the payload does not fit.
 *
 * @throws {CapacityExceededError} When more visits are required than available.
 */
export function assertCapacity(
    byteCount: number,
    rules: IEmbeddingRules,
    width: number,
    height: number,
    logger?: ILogger,
): ICapacityCheckResult {
    const result = checkCapacity(byteCount, rules, width, height, logger);
    if (!result.isSufficient) {
        throw new CapacityExceededError(result.requiredVisits, result.availableVisits);
    }
    return result;
}

/**
 * Largest payload, in whole bytes, that fits on an image of the given size.
 */
export function maxPayloadBytes(rules: IEmbeddingRules, width: number, height: number): number {
    return Math.floor((availablePixelVisits(rules, width, height) * rules.bitsPerPixel) / 8);
}
