// src/utils/bitManipulation/bitUtils.ts

/**
 * Extracts a specific number of bits from a given byte, starting from a specified bit position.
 *
 * @param {number} byte - The byte from which bits are to be extracted.
 * @param {number} startBit - The starting bit position for extraction.
 * @param {number} bitCount - The number of bits to be extracted.
 * @return {number} - The extracted bits as a number.
 */
export function extractBits(byte: number, startBit: number, bitCount: number): number {
    const mask = (1 << bitCount) - 1;
    return (byte >> startBit) & mask;
}

/**
 * Inserts a specified number of bits into a given byte at a specified starting position.
 *
 * @param {number} byte - The original byte where bits will be inserted.
 * @param {number} bits - The bits to insert into the original byte.
 * @param {number} startBit - The starting position (0-indexed) within the byte to insert the bits.
 * @param {number} bitCount - The number of bits to insert.
 * @return {number} - The byte resulting from inserting the specified bits at the given position.
 */
export function insertBits(byte: number, bits: number, startBit: number, bitCount: number): number {
    const mask = ((1 << bitCount) - 1) << startBit;
    return ((byte & ~mask) | ((bits << startBit) & mask)) & 0xff;
}

/**
 * Returns the `count` low-order bits of a byte, least significant bit first.
 */
export function getBits(byte: number, count: number): number[] {
    const bits: number[] = [];
    for (let i = 0; i < count; i++) {
        bits.push(extractBits(byte, i, 1));
    }
    return bits;
}

/**
 * Replaces bits `[bitOffset, bitOffset + count)` of `byte` with the low `count` bits of `sourceBits`.
 * Every other bit of the byte is left as it was.
 */
export function setBits(byte: number, bitOffset: number, count: number, sourceBits: number): number {
    return insertBits(byte, sourceBits, bitOffset, count);
}

/**
 * Reads `bitCount` bits from a byte sequence treated as one LSB-first bit stream.
 * Bit `n` of the stream is bit `n % 8` of byte `floor(n / 8)`.
 *
 * @param {Uint8Array} data - Source bytes.
 * @param {number} streamOffset - Position of the first bit in the stream.
 * @param {number} bitCount - Number of bits to read (at most 8).
 * @return {number} - The bits packed with the first stream bit in position 0.
 */
export function readBitChunk(data: Uint8Array, streamOffset: number, bitCount: number): number {
    let chunk = 0;
    for (let b = 0; b < bitCount; b++) {
        const position = streamOffset + b;
        chunk |= extractBits(data[position >> 3], position & 7, 1) << b;
    }
    return chunk;
}
