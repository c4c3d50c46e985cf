// src/core/results/decodedResult.ts

import { BitloomError } from '../../utils/errors/errors';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Outcome of one extraction. The raw bytes include the marker when it was hit.
 */
export class DecodedResult {
    private readonly bytes: Uint8Array;
    private readonly marker: Uint8Array;

    constructor(
        bytes: Uint8Array,
        private readonly markerHit: boolean,
        readonly elapsedMs: number,
        marker?: Uint8Array,
    ) {
        this.bytes = Uint8Array.from(bytes);
        this.marker = marker ? Uint8Array.from(marker) : new Uint8Array(0);
    }

    /**
     * Raw extracted bytes, marker included.
     */
    embeddedData(): Uint8Array {
        return this.bytes.slice();
    }

    /**
     * Extracted bytes without the trailing marker. Identical to {@link embeddedData} when the marker was not hit.
     */
    payload(): Uint8Array {
        if (!this.markerHit) {
            return this.embeddedData();
        }
        return this.bytes.slice(0, this.bytes.length - this.marker.length);
    }

    hitMarker(): boolean {
        return this.markerHit;
    }

    /**
     * UTF-8 view of the raw bytes; invalid sequences become U+FFFD.
     */
    asRawText(): string {
        return Buffer.from(this.bytes).toString('utf8');
    }

    /**
     * Strict UTF-8 view of the raw bytes.
     *
     * @throws {BitloomError} `InvalidUtf8` when the bytes are not valid UTF-8.
     */
    asText(): string {
        try {
            return utf8Decoder.decode(this.bytes);
        } catch (error) {
            throw new BitloomError('InvalidUtf8', 'Embedded data is not valid UTF-8.', { cause: error });
        }
    }
}
