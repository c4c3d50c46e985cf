// tests/extraction.test.ts

import type { IEmbeddingRulesInput } from '../src/@types';
import { RgbChannel } from '../src/@types';
import { decodeBytes } from '../src/core/decoder/lib/extraction';
import { encodeBytes } from '../src/core/encoder/lib/embedding';
import { PixelBuffer } from '../src/core/image/pixelBuffer';
import { DecodedResult } from '../src/core/results/decodedResult';
import { createRules } from '../src/core/rules/rules';
import { BitloomError } from '../src/utils/errors/errors';
import { bytesOf, patternedPixels } from './helpers/pixelFixtures';

function concat(...parts: Uint8Array[]): Uint8Array {
    return Uint8Array.from(parts.flatMap((part) => Array.from(part)));
}

describe('Extraction engine', () => {
    it('should read back the single byte of the blank 4x4 scenario', () => {
        const encoded = encodeBytes(Uint8Array.from([0x41]), createRules(), new PixelBuffer(4, 4));
        const decoded = decodeBytes(createRules(), encoded.alteredPixels());
        expect(decoded.embeddedData()[0]).toBe(0x41);
        expect(decoded.embeddedData()).toEqual(Uint8Array.from([0x41, 0x00]));
        expect(decoded.hitMarker()).toBe(false);
    });

    describe('round trip with a marker', () => {
        const payload = bytesOf('Hello, world');
        const marker = bytesOf('--');
        const configurations: IEmbeddingRulesInput[] = [
            { bitsPerPixel: 2 },
            { bitsPerPixel: 3, channel: RgbChannel.Red, pixelOffset: 5, pixelStride: 2 },
            { bitsPerPixel: 1, channel: RgbChannel.Green, startPosition: 'top-right' },
            { bitsPerPixel: 7, startPosition: { x: 4, y: 4 }, pixelStride: 3 },
        ];

        it.each(configurations)('should stop right after the marker (%o)', (input) => {
            const encoded = encodeBytes(concat(payload, marker), createRules(input), patternedPixels(12, 12));
            const decoded = decodeBytes(createRules({ ...input, marker }), encoded.alteredPixels());

            expect(decoded.hitMarker()).toBe(true);
            expect(decoded.embeddedData()).toEqual(concat(payload, marker));
            expect(decoded.payload()).toEqual(payload);
            expect(decoded.asText()).toBe('Hello, world--');
        });
    });

    it('should return floor(availableBits / 8) bytes without a marker', () => {
        const pixels = patternedPixels(4, 4);
        expect(decodeBytes(createRules({ bitsPerPixel: 3 }), pixels).embeddedData()).toHaveLength(6);
        expect(decodeBytes(createRules({ pixelOffset: 3 }), pixels).embeddedData()).toHaveLength(1);
        expect(decodeBytes(createRules({ bitsPerPixel: 8, pixelStride: 5 }), pixels).embeddedData()).toHaveLength(4);
    });

    it('should run to exhaustion when the marker never appears', () => {
        const pixels = new PixelBuffer(4, 4);
        const decoded = decodeBytes(createRules({ bitsPerPixel: 2, marker: 'END' }), pixels);
        expect(decoded.hitMarker()).toBe(false);
        expect(decoded.embeddedData()).toEqual(new Uint8Array(4));
        expect(decoded.payload()).toEqual(new Uint8Array(4));
    });

    it('should read a spread payload back with the same rules', () => {
        const payload = bytesOf('twenty bytes of data');
        const rules = createRules({ bitsPerPixel: 8, pixelStride: 2, spread: true });
        const encoded = encodeBytes(payload, rules, patternedPixels(6, 4));
        const decoded = decodeBytes(rules, encoded.alteredPixels()).embeddedData();
        expect(decoded).toHaveLength(24);
        expect(decoded.slice(0, payload.length)).toEqual(payload);
    });

    it('should return nothing for an image without pixels', () => {
        const decoded = decodeBytes(createRules(), new PixelBuffer(0, 0));
        expect(decoded.embeddedData()).toEqual(new Uint8Array(0));
        expect(decoded.elapsedMs).toBeGreaterThanOrEqual(0);
    });

    describe('decoded result views', () => {
        it('should replace invalid UTF-8 in the raw text view', () => {
            const decoded = new DecodedResult(Uint8Array.from([0xff, 0x41]), false, 0);
            expect(decoded.asRawText()).toBe('�A');
        });

        it('should fail lazily on invalid UTF-8 in the strict text view', () => {
            const decoded = new DecodedResult(Uint8Array.from([0xff, 0x41]), false, 0);
            expect(() => decoded.asText()).toThrow(BitloomError);
            try {
                decoded.asText();
            } catch (error) {
                expect(error).toMatchObject({ kind: 'InvalidUtf8' });
            }
        });

        it('should hand out copies of the bytes', () => {
            const decoded = new DecodedResult(Uint8Array.from([1, 2]), false, 0);
            decoded.embeddedData()[0] = 9;
            expect(decoded.embeddedData()).toEqual(Uint8Array.from([1, 2]));
        });
    });
});
