/**
 * Terminal flappy game.
 *
 * Keys: SPACE flaps, P starts (or restarts), Q quits from the menus,
 * Ctrl-C quits at any time.
 *
 * Environment:
 *   FLAPPY_SEED  RNG seed (non-negative integer), default from the clock
 *   FLAPPY_FPS   frames per second, 1..240, default 60
 *   FLAPPY_LOG   "1" to write diagnostics to stderr
 */
import { pathToFileURL } from "node:url";
import {
    buffer,
    filter,
    fromEvent,
    interval,
    map,
    share,
    takeUntil,
    takeWhile,
    tap,
    timeInterval,
    zip,
} from "rxjs";
import { session$ } from "./observable";
import { createBestScore } from "./score";
import { describePlayerError } from "./state";
import { type Frame, type Key, Timing } from "./types";
import { render, restore } from "./view";

// Re-exports for tests and consumers
export * from "./types";
export * from "./state";
export * from "./generator";
export * from "./score";
export { session$, type Step, type SessionDeps } from "./observable";
export { toAnsi } from "./view";

export type Options = Readonly<{
    seed: number;
    fps: number;
    log: boolean;
}>;

const CTRL_C = "\u0003";

const intOption = (
    env: NodeJS.ProcessEnv,
    name: string,
    min: number,
    max: number,
): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === "") return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new Error(
            `${name} must be an integer in [${min}, ${max}], got "${raw}"`,
        );
    }
    return value;
};

/** Read run options from the environment; `now` seeds the default RNG */
export const readOptions = (
    env: NodeJS.ProcessEnv,
    now: number = Date.now(),
): Options => ({
    seed: intOption(env, "FLAPPY_SEED", 0, 0x7fffffff) ?? now % 0x80000000,
    fps: intOption(env, "FLAPPY_FPS", 1, 240) ?? Timing.DEFAULT_FPS,
    log: env.FLAPPY_LOG === "1",
});

const keyOf = (char: string): Key | null => {
    switch (char) {
        case " ":
            return "Flap";
        case "p":
        case "P":
            return "Start";
        case "q":
        case "Q":
            return "Quit";
        default:
            return null;
    }
};

/**
 * Map a raw stdin chunk to a game key. A chunk can carry several presses
 * (key repeat, fast taps); the first recognised one counts. Escape
 * sequences (arrows, function keys) are ignored.
 */
export const parseKey = (chunk: string): Key | null => {
    if (chunk.startsWith("\u001b")) return null;
    for (const char of chunk) {
        const key = keyOf(char);
        if (key !== null) return key;
    }
    return null;
};

export const main = (): void => {
    const { stdin, stdout } = process;

    const options = (() => {
        try {
            return readOptions(process.env);
        } catch (err: unknown) {
            console.error("Invalid options:", err);
            return null;
        }
    })();
    if (options === null) {
        process.exitCode = 1;
        return;
    }
    if (!stdin.isTTY) {
        console.error("This game needs an interactive terminal.");
        process.exitCode = 1;
        return;
    }

    stdin.setRawMode(true);
    stdin.resume();

    const chunk$ = fromEvent(stdin, "data").pipe(
        filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk)),
        map(chunk => chunk.toString("utf8")),
        share(),
    );
    const interrupt$ = chunk$.pipe(filter(chunk => chunk === CTRL_C));
    const key$ = chunk$.pipe(
        map(parseKey),
        filter((key): key is Key => key !== null),
    );

    // One frame per clock tick; keys pressed in between, first one wins
    const clock$ = interval(1000 / options.fps).pipe(share());
    const frame$ = zip(
        clock$.pipe(timeInterval()),
        key$.pipe(buffer(clock$)),
    ).pipe(
        map(
            ([t, keys]): Frame => ({
                elapsedMs: t.interval,
                key: keys.length > 0 ? keys[0] : null,
            }),
        ),
    );
    const draw = render(stdout);

    const shutdown = (): void => {
        restore(stdout);
        stdin.setRawMode(false);
        stdin.pause();
    };

    session$(frame$, { best: createBestScore(), seed: options.seed })
        .pipe(
            takeWhile(({ state }) => !state.quit),
            takeUntil(interrupt$),
            tap(({ state, commands }) => {
                if (options.log && commands !== null && state.notice !== null)
                    console.warn(describePlayerError(state.notice));
            }),
        )
        .subscribe({
            next: ({ commands }) => {
                if (commands !== null) draw(commands);
            },
            error: (err: unknown) => {
                shutdown();
                console.error("Game loop failed:", err);
                process.exitCode = 1;
            },
            complete: shutdown,
        });
};

// Run when executed directly, not when imported by tests
const entry = process.argv[1];
if (entry && pathToFileURL(entry).href === import.meta.url) {
    main();
}
