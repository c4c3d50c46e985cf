// src/core/encoder/stateMachine.ts

import path from 'node:path';
import type { IEncodeFileOptions } from '../../@types';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { EncoderStates } from '../../stateMachine/definedStates';
import { readBufferFromFile } from '../../utils/storage/storageUtils';
import { checkCapacity } from '../capacity/capacityChecker';
import { decodeBytes } from '../decoder/lib/extraction';
import type { PixelBuffer } from '../image/pixelBuffer';
import { formatFromPath, loadImage } from '../imageProcessing/processor';
import type { EncodedResult } from '../results/encodedResult';
import { withoutMarker } from '../rules/rules';
import { CapacityExceededError } from '../../utils/errors/errors';
import { encodeBytes } from './lib/embedding';

export class EncodeStateMachine extends AbstractStateMachine<EncoderStates, IEncodeFileOptions, EncodedResult> {
    private payload: Uint8Array | null = null;
    private pixels: PixelBuffer | null = null;
    private encoded: EncodedResult | null = null;

    constructor(options: IEncodeFileOptions) {
        super(EncoderStates.INIT, options);
        this.stateTransitions = [
            { state: EncoderStates.INIT, handler: this.init },
            { state: EncoderStates.READ_PAYLOAD, handler: this.readPayload },
            { state: EncoderStates.LOAD_IMAGE, handler: this.loadImage },
            { state: EncoderStates.CHECK_CAPACITY, handler: this.checkCapacity },
            { state: EncoderStates.EMBED_PAYLOAD, handler: this.embedPayload },
            { state: EncoderStates.WRITE_OUTPUT, handler: this.writeOutput },
            { state: EncoderStates.VERIFY_ENCODING, handler: this.verifyEncoding },
        ];
    }

    protected getCompletionState(): EncoderStates {
        return EncoderStates.COMPLETED;
    }

    protected getErrorState(): EncoderStates {
        return EncoderStates.ERROR;
    }

    protected getResult(): EncodedResult {
        return this.requireState(this.encoded, 'Encoded result');
    }

    /**
     * Validates the options before any file is touched. The output format is resolved here so an
     * unsupported extension fails before the work is done.
     */
    private init(): void {
        const { logger, verbose, inputFile, message, outputFile } = this.options;
        if (verbose) logger.info('Initializing encoding process...');
        if ((inputFile === undefined) === (message === undefined)) {
            throw new Error('Exactly one of an input file or a message must be given.');
        }
        formatFromPath(outputFile);
    }

    /**
     * Reads the payload from the input file or the message and appends the marker when requested.
     */
    private async readPayload(): Promise<void> {
        const { inputFile, message, rules, appendMarker, logger } = this.options;
        const content = inputFile !== undefined
            ? new Uint8Array(await readBufferFromFile(inputFile))
            : new TextEncoder().encode(message ?? '');

        if (appendMarker && rules.marker) {
            const payload = new Uint8Array(content.length + rules.marker.length);
            payload.set(content, 0);
            payload.set(rules.marker, content.length);
            this.payload = payload;
            logger.debug(`Appended ${rules.marker.length} marker bytes to the payload.`);
        } else {
            this.payload = content;
        }
        logger.info(`Payload is ${this.payload.length} bytes.`);
    }

    private async loadImage(): Promise<void> {
        const { imageFile, logger } = this.options;
        logger.debug(`Loading carrier image "${imageFile}".`);
        this.pixels = await loadImage(await readBufferFromFile(imageFile), logger);
        logger.info(`Carrier image is ${this.pixels.width}x${this.pixels.height}.`);
    }

    /**
     * Checks up front that the payload fits; nothing is written when it does not.
     */
    private checkCapacity(): void {
        const { rules, logger } = this.options;
        const payload = this.requireState(this.payload, 'Payload');
        const pixels = this.requireState(this.pixels, 'Carrier image');
        const capacity = checkCapacity(payload.length, rules, pixels.width, pixels.height, logger);
        if (!capacity.isSufficient) {
            throw new CapacityExceededError(capacity.requiredVisits, capacity.availableVisits);
        }
        if (capacity.usesSpread) {
            logger.warn('Payload does not fit in a single pass; spreading across the image.');
        }
        logger.success(`Capacity check passed (${capacity.requiredVisits}/${capacity.availableVisits} pixel visits).`);
    }

    private embedPayload(): void {
        const { rules, logger } = this.options;
        const encoded = encodeBytes(
            this.requireState(this.payload, 'Payload'),
            rules,
            this.requireState(this.pixels, 'Carrier image'),
            logger,
        );
        this.encoded = encoded;
        logger.info(`Embedded payload touching ${encoded.pixelsTouched()} pixels (${encoded.pixelsChanged()} changed).`);
    }

    private async writeOutput(): Promise<void> {
        const { outputFile, logger } = this.options;
        await this.requireState(this.encoded, 'Encoded result').save(outputFile, formatFromPath(outputFile), logger);
        logger.info(`Output written to "${path.basename(outputFile)}".`);
    }

    /**
     * Reloads the written image and reads the payload back with the same rules.
     */
    private async verifyEncoding(): Promise<void> {
        const { verify, outputFile, rules, logger } = this.options;
        if (verify === false) {
            logger.info('Verification step skipped.');
            return;
        }
        logger.info('Starting verification step...');
        const payload = this.requireState(this.payload, 'Payload');
        const written = await loadImage(await readBufferFromFile(outputFile), logger);
        const decoded = decodeBytes(withoutMarker(rules), written, logger).embeddedData();
        const matches = decoded.length >= payload.length && payload.every((byte, i) => decoded[i] === byte);
        if (!matches) {
            throw new Error('Verification failed: Decoded data does not match original data.');
        }
        logger.success('Verification successful: Decoded data matches original data.');
    }
}
