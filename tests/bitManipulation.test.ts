// tests/bitManipulation.test.ts

import { extractBits, getBits, insertBits, readBitChunk, setBits } from '../src/utils/bitManipulation/bitUtils';

describe('Bit manipulation Utilities', () => {
    describe('extractBits', () => {
        it('should extract correct bits', () => {
            const byte = 0b10101100; // 172
            expect(extractBits(byte, 0, 4)).toBe(0b1100);
            expect(extractBits(byte, 4, 4)).toBe(0b1010);
            expect(extractBits(byte, 2, 3)).toBe(0b011);
        });
    });

    describe('insertBits', () => {
        it('should insert bits correctly', () => {
            expect(insertBits(0b00000000, 0b101, 2, 3)).toBe(0b0010100); // 20
        });

        it('should overwrite existing bits', () => {
            expect(insertBits(0b11111111, 0b000, 4, 3)).toBe(0b10001111); // 143
        });

        it('should handle inserting bits at the boundaries', () => {
            expect(insertBits(0, 0b11, 0, 2)).toBe(0b00000011);
            expect(insertBits(0, 0b11, 6, 2)).toBe(0b11000000);
            expect(insertBits(0b10101010, 0b01010101, 0, 8)).toBe(0b01010101);
        });
    });

    describe('getBits', () => {
        it('should return low-order bits least significant first', () => {
            expect(getBits(0x41, 8)).toEqual([1, 0, 0, 0, 0, 0, 1, 0]);
            expect(getBits(0b110, 2)).toEqual([0, 1]);
        });
    });

    describe('setBits', () => {
        it('should only move the targeted bit positions', () => {
            expect(setBits(0b11110000, 0, 2, 0b11)).toBe(0b11110011);
            expect(setBits(0xff, 2, 3, 0)).toBe(0b11100011);
        });

        it('should take only the low count bits of the source', () => {
            expect(setBits(0, 0, 2, 0b111)).toBe(0b11);
        });
    });

    describe('readBitChunk', () => {
        it('should read across byte boundaries as one LSB-first stream', () => {
            const data = Uint8Array.from([0x41, 0xff]);
            // bits 6,7 of 0x41 are 1,0; bits 0,1 of 0xff are 1,1
            expect(readBitChunk(data, 6, 4)).toBe(0b1101);
            expect(readBitChunk(data, 0, 3)).toBe(0b001);
            expect(readBitChunk(data, 8, 8)).toBe(0xff);
        });
    });
});
