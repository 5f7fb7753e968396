/** ============================
 * View (Terminal Renderer)
 *
 * Draw commands in → ANSI escape output out. All terminal writes are
 * contained here so the reducers stay free of IO.
 * ============================ */
import { type DrawCommand, Screen } from "./types";
import {
    bg,
    clearScreen,
    fg,
    hideCursor,
    moveTo,
    resetStyle,
    showCursor,
} from "./util";

const onScreen = (col: number, row: number): boolean =>
    col >= 0 && col < Screen.WIDTH && row >= 0 && row < Screen.HEIGHT;

/** Text is clipped at the right edge; rows outside the screen are dropped */
const print = (col: number, row: number, value: string): string =>
    onScreen(col, row)
        ? `${moveTo(col, row)}${fg("White")}${bg("Black")}${value.slice(0, Screen.WIDTH - col)}`
        : "";

const toAnsiCommand = (c: DrawCommand): string => {
    switch (c.kind) {
        case "clear":
            return `${bg(c.background)}${clearScreen}`;
        case "glyph":
            return onScreen(c.col, c.row)
                ? `${moveTo(c.col, c.row)}${fg(c.fg)}${bg(c.bg)}${c.glyph}`
                : "";
        case "text":
            return print(c.col, c.row, c.text);
        case "centered":
            return print(
                Math.max(0, Math.floor((Screen.WIDTH - c.text.length) / 2)),
                c.row,
                c.text,
            );
    }
};

/** One frame of commands as a single ANSI string (pure) */
export const toAnsi = (commands: readonly DrawCommand[]): string =>
    `${hideCursor}${commands.map(toAnsiCommand).join("")}${resetStyle}`;

type Output = Readonly<{ write: (chunk: string) => unknown }>;

export const render =
    (out: Output) =>
    (commands: readonly DrawCommand[]): void => {
        out.write(toAnsi(commands));
    };

/** Put the terminal back the way we found it */
export const restore = (out: Output): void => {
    out.write(`${resetStyle}${clearScreen}${moveTo(0, 0)}${showCursor}`);
};
