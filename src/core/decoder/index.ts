// src/core/decoder/index.ts

import type { IDecodeFileOptions } from '../../@types';
import type { DecodedResult } from '../results/decodedResult';
import { DecodeStateMachine } from './stateMachine';

/**
 * Extracts an embedded payload from an image file using a state machine based on provided options.
 *
 * @param {IDecodeFileOptions} options - The options to configure the decoding process.
 * @return {Promise<DecodedResult>} The extracted data.
 */
export async function decodeFile(options: IDecodeFileOptions): Promise<DecodedResult> {
    const stateMachine = new DecodeStateMachine(options);
    return await stateMachine.run();
}
