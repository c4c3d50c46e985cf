// tests/imageProcessing.test.ts

import { PassThrough } from 'node:stream';
import { encodeBytes } from '../src/core/encoder/lib/embedding';
import { formatFromPath, loadImage, saveImage } from '../src/core/imageProcessing/processor';
import { BmpImageProcessor } from '../src/core/imageProcessing/strategies/BmpImageProcessor';
import { SharpImageProcessor } from '../src/core/imageProcessing/strategies/SharpImageProcessor';
import { PixelBuffer } from '../src/core/image/pixelBuffer';
import { createRules } from '../src/core/rules/rules';
import { BitloomError, InvalidImageError } from '../src/utils/errors/errors';
import { MockLogger } from './helpers/mockLogger';
import { patternedPixels } from './helpers/pixelFixtures';

function topDown32BitBmp(): Uint8Array {
    const output = Buffer.alloc(54 + 8);
    output.write('BM', 0, 'ascii');
    output.writeUInt32LE(output.length, 2);
    output.writeUInt32LE(54, 10);
    output.writeUInt32LE(40, 14);
    output.writeInt32LE(2, 18);
    output.writeInt32LE(-1, 22);
    output.writeUInt16LE(1, 26);
    output.writeUInt16LE(32, 28);
    // BGRA
    output.set([0x03, 0x02, 0x01, 0xff, 0x30, 0x20, 0x10, 0x00], 54);
    return new Uint8Array(output);
}

function bitfieldBmp(redMask: number, greenMask: number, blueMask: number): Uint8Array {
    const headerSize = 56;
    const dataOffset = 14 + headerSize;
    const output = Buffer.alloc(dataOffset + 8);
    output.write('BM', 0, 'ascii');
    output.writeUInt32LE(output.length, 2);
    output.writeUInt32LE(dataOffset, 10);
    output.writeUInt32LE(headerSize, 14);
    output.writeInt32LE(2, 18);
    output.writeInt32LE(-1, 22);
    output.writeUInt16LE(1, 26);
    output.writeUInt16LE(32, 28);
    output.writeUInt32LE(3, 30);
    output.writeUInt32LE(redMask, 54);
    output.writeUInt32LE(greenMask, 58);
    output.writeUInt32LE(blueMask, 62);
    output.writeUInt32LE(0xff000000, 66);
    output.set([0x03, 0x02, 0x01, 0xff, 0x30, 0x20, 0x10, 0x00], dataOffset);
    return new Uint8Array(output);
}

describe('Image processing', () => {
    describe('BMP', () => {
        it('should write 24-bit rows padded to four bytes', async () => {
            const bytes = await saveImage(patternedPixels(3, 2), 'bmp');
            expect(bytes).toHaveLength(78);
            expect(bytes.toString('ascii', 0, 2)).toBe('BM');
            expect(bytes.readUInt16LE(28)).toBe(24);
            expect(bytes.readInt32LE(22)).toBe(2);
        });

        it('should read back exactly the pixels it wrote', async () => {
            const pixels = patternedPixels(3, 2);
            const decoded = await loadImage(await saveImage(pixels, 'bmp'));
            expect(decoded.width).toBe(3);
            expect(decoded.height).toBe(2);
            expect(decoded.data).toEqual(pixels.data);
        });

        it('should read top-down 32-bit bitmaps and drop the alpha byte', async () => {
            const decoded = await new BmpImageProcessor().loadImage(topDown32BitBmp());
            expect(decoded.getPixel(0, 0)).toEqual([1, 2, 3]);
            expect(decoded.getPixel(1, 0)).toEqual([0x10, 0x20, 0x30]);
        });

        it('should read 32-bit bitfield bitmaps with the standard masks', async () => {
            const decoded = await loadImage(bitfieldBmp(0x00ff0000, 0x0000ff00, 0x000000ff));
            expect(decoded.width).toBe(2);
            expect(decoded.height).toBe(1);
            expect(decoded.getPixel(0, 0)).toEqual([1, 2, 3]);
            expect(decoded.getPixel(1, 0)).toEqual([0x10, 0x20, 0x30]);
        });

        it('should follow byte-aligned masks in any order', async () => {
            const decoded = await loadImage(bitfieldBmp(0x000000ff, 0x0000ff00, 0x00ff0000));
            expect(decoded.getPixel(0, 0)).toEqual([3, 2, 1]);
        });

        it('should reject masks that do not cover a whole byte', async () => {
            await expect(loadImage(bitfieldBmp(0x00f80000, 0x0000ff00, 0x000000ff))).rejects.toThrow(
                'Unsupported red mask 0x00f80000.',
            );
        });

        it('should reject truncated pixel data', async () => {
            const truncated = topDown32BitBmp().slice(0, 58);
            await expect(loadImage(truncated)).rejects.toThrow(InvalidImageError);
        });
    });

    describe('sharp', () => {
        it('should round trip a raster through PNG without loss', async () => {
            const pixels = patternedPixels(5, 4);
            const decoded = await loadImage(await saveImage(pixels, 'png'));
            expect(decoded.data).toEqual(pixels.data);
        });

        it('should warn that JPEG output is lossy', async () => {
            const logger = new MockLogger();
            await saveImage(new PixelBuffer(2, 2), 'jpeg', logger);
            expect(logger.warnMessages).toEqual(['JPEG is lossy; re-compression will alter the embedded bits.']);
        });

        it('should refuse to write bitmaps', async () => {
            await expect(new SharpImageProcessor().saveImage(new PixelBuffer(1, 1), 'bmp')).rejects.toMatchObject({
                kind: 'UnsupportedFormat',
            });
        });
    });

    it('should report undecodable bytes as an invalid image', async () => {
        await expect(loadImage(Uint8Array.from([1, 2, 3, 4]))).rejects.toMatchObject({ kind: 'InvalidImage' });
    });

    it('should map file extensions to formats', () => {
        expect(formatFromPath('out/secret.PNG')).toBe('png');
        expect(formatFromPath('a.jpg')).toBe('jpeg');
        expect(formatFromPath('a.jpeg')).toBe('jpeg');
        expect(formatFromPath('a.bmp')).toBe('bmp');
        expect(() => formatFromPath('a.gif')).toThrow(BitloomError);
    });

    describe('encoded result output', () => {
        it('should write the same bytes to a stream as to a buffer', async () => {
            const result = encodeBytes(Uint8Array.from([0x41]), createRules(), patternedPixels(3, 3));
            const target = new PassThrough();
            const chunks: Buffer[] = [];
            target.on('data', (chunk: Buffer) => chunks.push(chunk));

            await result.write(target, 'bmp');

            const expected = await result.toBuffer('bmp');
            expect(Buffer.concat(chunks)).toEqual(expected);
            expect((await loadImage(expected)).data).toEqual(result.alteredPixels().data);
        });
    });
});
