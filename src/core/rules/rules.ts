// src/core/rules/rules.ts

import type { AnchorPosition, IEmbeddingRules, IEmbeddingRulesInput, StartPosition } from '../../@types';
import { RgbChannel } from '../../@types';
import { config } from '../../config';
import { BitloomError } from '../../utils/errors/errors';

const ANCHOR_POSITIONS: readonly AnchorPosition[] = ['top-left', 'top-right', 'bottom-left', 'bottom-right', 'center'];

const CHANNEL_NAMES: Record<string, RgbChannel> = {
    r: RgbChannel.Red,
    red: RgbChannel.Red,
    g: RgbChannel.Green,
    green: RgbChannel.Green,
    b: RgbChannel.Blue,
    blue: RgbChannel.Blue,
};

/**
 * Builds a frozen rules value from a partial input, filling in defaults and validating every field.
 * A stride below 1 is clamped to 1. An empty marker disables marker detection.
 *
 * @param {IEmbeddingRulesInput} input - Rule values supplied by the caller.
 * @return {IEmbeddingRules} The validated, immutable rules.
 * @throws {BitloomError} `InvalidRules` or `InvalidChannel` when a value is outside its domain.
 */
export function createRules(input: IEmbeddingRulesInput = {}): IEmbeddingRules {
    const defaults = config.defaultRules;

    const bitsPerPixel = input.bitsPerPixel ?? defaults.bitsPerPixel;
    if (!Number.isInteger(bitsPerPixel) || bitsPerPixel < 1 || bitsPerPixel > 8) {
        throw new BitloomError('InvalidRules', `bitsPerPixel must be an integer between 1 and 8, got ${bitsPerPixel}.`);
    }

    const pixelOffset = input.pixelOffset ?? defaults.pixelOffset;
    if (!Number.isInteger(pixelOffset) || pixelOffset < 0) {
        throw new BitloomError('InvalidRules', `pixelOffset must be a non-negative integer, got ${pixelOffset}.`);
    }

    const pixelStride = Math.max(1, input.pixelStride ?? defaults.pixelStride);
    if (!Number.isInteger(pixelStride)) {
        throw new BitloomError('InvalidRules', `pixelStride must be an integer, got ${pixelStride}.`);
    }

    const startPosition = validateStartPosition(input.startPosition ?? defaults.startPosition);
    const marker = toMarkerBytes(input.marker);

    return Object.freeze({
        bitsPerPixel,
        channel: parseChannel(input.channel ?? defaults.channel),
        pixelOffset,
        pixelStride,
        startPosition,
        spread: input.spread ?? defaults.spread,
        ...(marker ? { marker } : {}),
    });
}

/**
 * Resolves a channel given as enum member, raw index or name (`red`, `g`, ...).
 *
 * @throws {BitloomError} `InvalidChannel` for anything outside Red, Green and Blue.
 */
export function parseChannel(value: RgbChannel | number | string): RgbChannel {
    if (typeof value === 'string') {
        const channel = CHANNEL_NAMES[value.trim().toLowerCase()];
        if (channel === undefined) {
            throw new BitloomError('InvalidChannel', `Unknown channel "${value}". Use red, green or blue.`);
        }
        return channel;
    }
    switch (value) {
        case RgbChannel.Red:
            return RgbChannel.Red;
        case RgbChannel.Green:
            return RgbChannel.Green;
        case RgbChannel.Blue:
            return RgbChannel.Blue;
        default:
            throw new BitloomError('InvalidChannel', `Channel index ${value} is not part of an RGB pixel.`);
    }
}

/**
 * Parses a start position from its textual form: an anchor name or `x,y`.
 */
export function parseStartPosition(value: string): StartPosition {
    const normalized = value.trim().toLowerCase();
    const anchor = ANCHOR_POSITIONS.find((position) => position === normalized);
    if (anchor) {
        return anchor;
    }
    const match = /^(\d+)\s*,\s*(\d+)$/.exec(normalized);
    if (!match) {
        throw new BitloomError(
            'InvalidRules',
            `Unknown start position "${value}". Use ${ANCHOR_POSITIONS.join(', ')} or x,y.`,
        );
    }
    return { x: Number(match[1]), y: Number(match[2]) };
}

/**
 * Returns the rules without a marker, as used when reading back a payload of known length.
 */
export function withoutMarker(rules: IEmbeddingRules): IEmbeddingRules {
    const { marker: _marker, ...rest } = rules;
    return Object.freeze(rest);
}

function validateStartPosition(position: StartPosition): StartPosition {
    if (typeof position === 'string') {
        if (!ANCHOR_POSITIONS.includes(position)) {
            throw new BitloomError('InvalidRules', `Unknown start position "${position}".`);
        }
        return position;
    }
    const { x, y } = position;
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0) {
        throw new BitloomError('InvalidRules', `Start position coordinates must be non-negative integers, got ${x},${y}.`);
    }
    return Object.freeze({ x, y });
}

function toMarkerBytes(marker: Uint8Array | string | undefined): Uint8Array | undefined {
    if (marker === undefined) {
        return undefined;
    }
    const bytes = typeof marker === 'string' ? new TextEncoder().encode(marker) : Uint8Array.from(marker);
    return bytes.length > 0 ? bytes : undefined;
}
