// src/core/decoder/stateMachine.ts

import type { IDecodeFileOptions } from '../../@types';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { DecoderStates } from '../../stateMachine/definedStates';
import { readBufferFromFile, writeBufferToFile } from '../../utils/storage/storageUtils';
import type { PixelBuffer } from '../image/pixelBuffer';
import { loadImage } from '../imageProcessing/processor';
import type { DecodedResult } from '../results/decodedResult';
import { decodeBytes } from './lib/extraction';

export class DecodeStateMachine extends AbstractStateMachine<DecoderStates, IDecodeFileOptions, DecodedResult> {
    private pixels: PixelBuffer | null = null;
    private decoded: DecodedResult | null = null;

    constructor(options: IDecodeFileOptions) {
        super(DecoderStates.INIT, options);
        this.stateTransitions = [
            { state: DecoderStates.INIT, handler: this.init },
            { state: DecoderStates.LOAD_IMAGE, handler: this.loadImage },
            { state: DecoderStates.EXTRACT_PAYLOAD, handler: this.extractPayload },
            { state: DecoderStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    protected getCompletionState(): DecoderStates {
        return DecoderStates.COMPLETED;
    }

    protected getErrorState(): DecoderStates {
        return DecoderStates.ERROR;
    }

    protected getResult(): DecodedResult {
        return this.requireState(this.decoded, 'Decoded result');
    }

    private init(): void {
        const { logger, verbose } = this.options;
        if (verbose) logger.info('Initializing decoding process...');
    }

    private async loadImage(): Promise<void> {
        const { imageFile, logger } = this.options;
        logger.debug(`Loading image "${imageFile}".`);
        this.pixels = await loadImage(await readBufferFromFile(imageFile), logger);
    }

    private extractPayload(): void {
        const { rules, logger } = this.options;
        const decoded = decodeBytes(rules, this.requireState(this.pixels, 'Image'), logger);
        this.decoded = decoded;
        if (rules.marker && !decoded.hitMarker()) {
            logger.warn('Marker not found; returning every byte the traversal could read.');
        }
        logger.info(`Extracted ${decoded.embeddedData().length} bytes.`);
    }

    /**
     * Writes the extracted bytes, without the marker when `trimMarker` is set.
     */
    private async writeOutput(): Promise<void> {
        const { outputFile, trimMarker, logger } = this.options;
        if (outputFile === undefined) {
            logger.debug('No output file given; skipping write.');
            return;
        }
        const decoded = this.requireState(this.decoded, 'Decoded result');
        await writeBufferToFile(outputFile, trimMarker ? decoded.payload() : decoded.embeddedData());
        logger.success(`Decoded data written to "${outputFile}".`);
    }
}
