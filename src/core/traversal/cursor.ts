// src/core/traversal/cursor.ts

import type { IEmbeddingRules, IPixelAddress, StartPosition } from '../../@types';

/**
 * Coarse pixel offset derived from the start position. The value is added to the configured
 * pixel offset; it is not used as a coordinate.
 */
export function computeBaseOffset(position: StartPosition, width: number, height: number): number {
    switch (position) {
        case 'top-left':
            return 0;
        case 'top-right':
            return width;
        case 'bottom-left':
            return height;
        case 'bottom-right':
            return width + height;
        case 'center':
            return Math.floor((width + height) / 2);
        default:
            return position.x * position.y;
    }
}

/**
 * Row-major index of the first pixel visited by the first pass.
 */
export function computeStartSkip(rules: IEmbeddingRules, width: number, height: number): number {
    return computeBaseOffset(rules.startPosition, width, height) + rules.pixelOffset;
}

/**
 * Lazily yields the pixel addresses visited for the given rules and image size.
 *
 * The first pass starts at the start skip and visits every `pixelStride`-th pixel. With `spread`
 * the traversal wraps to index 0 without re-applying the skip; wrap pass `p` walks the stride
 * phase `p - 1` and passes over pixels the first pass already visited, so no pixel is visited
 * twice. The total number of visits never exceeds the pixel count.
 *
 * @param {IEmbeddingRules} rules - Traversal related rules.
 * @param {number} width - Image width in pixels.
 * @param {number} height - Image height in pixels.
 * @return {Generator<IPixelAddress>} The visit order.
 */
export function* traversePixels(
    rules: IEmbeddingRules,
    width: number,
    height: number,
): Generator<IPixelAddress, void, undefined> {
    const totalPixels = width * height;
    const stride = rules.pixelStride;
    const skip = computeStartSkip(rules, width, height);
    let visits = 0;

    for (let index = skip; index < totalPixels; index += stride) {
        yield toAddress(index, width);
        visits++;
    }

    if (!rules.spread) {
        return;
    }

    // After `stride` wrap passes every phase is covered, so the visit count has reached the pixel count.
    for (let pass = 1; pass <= stride && visits < totalPixels; pass++) {
        const phase = pass - 1;
        for (let index = phase; index < totalPixels && visits < totalPixels; index += stride) {
            if (visitedByFirstPass(index, skip, stride)) {
                continue;
            }
            yield toAddress(index, width);
            visits++;
        }
    }
}

/**
 * Exact number of addresses {@link traversePixels} yields for the given rules and image size.
 */
export function availablePixelVisits(rules: IEmbeddingRules, width: number, height: number): number {
    const totalPixels = width * height;
    if (rules.spread) {
        return totalPixels;
    }
    return countFirstPassVisits(rules, width, height);
}

/**
 * Number of visits made before the traversal would wrap.
 */
export function countFirstPassVisits(rules: IEmbeddingRules, width: number, height: number): number {
    const totalPixels = width * height;
    const skip = computeStartSkip(rules, width, height);
    if (skip >= totalPixels) {
        return 0;
    }
    return Math.ceil((totalPixels - skip) / rules.pixelStride);
}

function visitedByFirstPass(index: number, skip: number, stride: number): boolean {
    return index >= skip && (index - skip) % stride === 0;
}

function toAddress(index: number, width: number): IPixelAddress {
    return { x: index % width, y: Math.floor(index / width), index };
}
