// src/core/encoder/index.ts

import type { IEncodeFileOptions } from '../../@types';
import type { EncodedResult } from '../results/encodedResult';
import { EncodeStateMachine } from './stateMachine';

/**
 * Embeds a file or message into a carrier image file using a state machine based on provided options.
 *
 * @param {IEncodeFileOptions} options - The options to configure the encoding process.
 * @return {Promise<EncodedResult>} The result of the embedding once the output has been written.
 */
export async function encodeFile(options: IEncodeFileOptions): Promise<EncodedResult> {
    const stateMachine = new EncodeStateMachine(options);
    return await stateMachine.run();
}
