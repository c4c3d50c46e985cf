// src/cli/options.ts

import type { IEmbeddingRules } from '../@types';
import { createRules, parseStartPosition } from '../core/rules/rules';
import { BitloomError } from '../utils/errors/errors';

/**
 * Rule related options shared by every command, as commander hands them over.
 */
export interface IRuleCliOptions {
    bits?: string;
    channel?: string;
    offset?: string;
    stride?: string;
    position?: string;
    spread?: boolean;
    marker?: string;
}

/**
 * Turns raw command line option values into validated embedding rules.
 *
 * @param {IRuleCliOptions} options - Option values as parsed by commander.
 * @return {IEmbeddingRules} The rules.
 */
export function rulesFromCliOptions(options: IRuleCliOptions): IEmbeddingRules {
    return createRules({
        bitsPerPixel: parseInteger(options.bits, 'bits'),
        channel: options.channel,
        pixelOffset: parseInteger(options.offset, 'offset'),
        pixelStride: parseInteger(options.stride, 'stride'),
        startPosition: options.position === undefined ? undefined : parseStartPosition(options.position),
        spread: options.spread,
        marker: options.marker,
    });
}

function parseInteger(value: string | undefined, optionName: string): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (!/^-?\d+$/.test(value.trim())) {
        throw new BitloomError('InvalidRules', `--${optionName} expects an integer, got "${value}".`);
    }
    return Number(value);
}
