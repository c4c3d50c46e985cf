// src/core/decoder/lib/markerScanner.ts

export type MarkerScannerState = 'disabled' | 'filling' | 'full' | 'matched';

/**
 * Sliding window over the most recently completed output bytes, compared byte for byte with a
 * terminator sequence. An absent or empty marker disables the scanner.
 */
export class MarkerScanner {
    private readonly marker: Uint8Array;
    private readonly window: number[] = [];
    private currentState: MarkerScannerState;

    constructor(marker?: Uint8Array) {
        this.marker = marker ?? new Uint8Array(0);
        this.currentState = this.marker.length === 0 ? 'disabled' : 'filling';
    }

    get state(): MarkerScannerState {
        return this.currentState;
    }

    get length(): number {
        return this.marker.length;
    }

    /**
     * Feeds one completed byte to the window.
     *
     * @return {boolean} true once the window equals the marker; stays true afterwards.
     */
    push(byte: number): boolean {
        if (this.currentState === 'disabled') {
            return false;
        }
        if (this.currentState === 'matched') {
            return true;
        }

        this.window.push(byte);
        if (this.window.length > this.marker.length) {
            this.window.shift();
        }
        if (this.window.length < this.marker.length) {
            return false;
        }

        this.currentState = this.windowMatches() ? 'matched' : 'full';
        return this.currentState === 'matched';
    }

    private windowMatches(): boolean {
        return this.window.every((byte, i) => byte === this.marker[i]);
    }
}
