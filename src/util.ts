/** ============================
 * Terminal Utilities (ANSI escape helpers)
 * ============================ */
import { type Color, Palette } from "./types";

const ESC = "\u001b[";

/**
 * Moves the cursor to a screen cell.
 * @param col zero-based column
 * @param row zero-based row
 */
export const moveTo = (col: number, row: number): string =>
    `${ESC}${row + 1};${col + 1}H`;

/** Sets the foreground colour (24-bit) */
export const fg = (color: Color): string => {
    const [r, g, b] = Palette[color];
    return `${ESC}38;2;${r};${g};${b}m`;
};

/** Sets the background colour (24-bit) */
export const bg = (color: Color): string => {
    const [r, g, b] = Palette[color];
    return `${ESC}48;2;${r};${g};${b}m`;
};

export const clearScreen = `${ESC}2J`;
export const resetStyle = `${ESC}0m`;
export const hideCursor = `${ESC}?25l`;
export const showCursor = `${ESC}?25h`;

/**
 * A random number generator which provides two pure functions
 * `hash` and `scale`. Call `hash` repeatedly to generate the
 * sequence of hashes.
 */
abstract class RNG {
    private static m = 0x80000000; // 2^31
    private static a = 1103515245;
    private static c = 12345;

    // split on the high 16 bits so every product stays an exact double
    public static hash = (seed: number): number =>
        (((RNG.a * (seed >>> 16)) % RNG.m) * 0x10000 +
            RNG.a * (seed & 0xffff) +
            RNG.c) %
        RNG.m;
    public static scale = (hash: number): number =>
        (2 * hash) / (RNG.m - 1) - 1; // [-1,1]
}

export const rand = (seed: number) => {
    const next = RNG.hash(seed);
    const value01 = (RNG.scale(next) + 1) / 2;
    return { value: value01, seed: next };
};

/**
 * Uniform integer in [min, max), taken from the high bits of the hash
 * (the low bits of this LCG alternate). `value` can be exactly 1.
 */
export const randInt = (seed: number, min: number, max: number) => {
    const r = rand(seed);
    const span = max - min;
    return {
        v: min + Math.min(span - 1, Math.floor(span * r.value)),
        seed: r.seed,
    };
};
