/** ============================
 * State (Reducers)
 *
 * Deterministic functions over the immutable State. No terminal, IO or
 * time APIs: elapsed time and keys arrive as a Frame, and draw output
 * leaves as DrawCommands. The only effect is the best-score submit made
 * when a run ends.
 * ============================ */
import { initialObstacles } from "./generator";
import type { BestScore } from "./score";
import {
    type Advanced,
    type Color,
    type DrawCommand,
    type Flapped,
    type Frame,
    type Key,
    type Obstacle,
    Physics,
    type Player,
    type PlayerError,
    Screen,
    Spawn,
    type State,
    type Tick,
    Timing,
} from "./types";
import { rand } from "./util";

/** ============================
 * Player
 * ============================ */
export const createPlayer = (x: number, y: number): Player => ({
    x,
    y,
    velocity: 0,
    alive: true,
});

export const position = (p: Player): readonly [number, number] => [p.x, p.y];

export const isAlive = (p: Player): boolean => p.alive;

export const killPlayer = (p: Player): Player => ({ ...p, alive: false });

/**
 * One physics step (pure)
 *
 * Gravity accumulates only while below terminal velocity; a flap may later
 * pull the velocity back under it. Crossing the top edge clamps to row 0,
 * kills the player and reports the move as blocked. A dead player does not
 * move at all.
 */
export const advance = (p: Player): Advanced => {
    if (!p.alive) return { player: p, moved: false };
    const velocity =
        p.velocity < Physics.TERMINAL_VELOCITY
            ? p.velocity + Physics.GRAVITY
            : p.velocity;
    const x = p.x + 1;
    const y = p.y + Math.trunc(velocity);
    return y < 0
        ? { player: { x, y: 0, velocity, alive: false }, moved: false }
        : { player: { x, y, velocity, alive: true }, moved: true };
};

/** Upward impulse: sets (never adds to) the velocity */
export const flap = (p: Player): Flapped => {
    if (!p.alive) return { ok: false, error: "AlreadyDead" };
    if (p.velocity > Physics.MAX_FLAP_VELOCITY)
        return { ok: false, error: "FallingTooFast" };
    return { ok: true, player: { ...p, velocity: Physics.FLAP_VELOCITY } };
};

const playerErrorMessages: Record<PlayerError, string> = {
    AlreadyDead: "Player is already dead",
    FallingTooFast: "Can't flap while falling too fast",
};

export const describePlayerError = (e: PlayerError): string =>
    playerErrorMessages[e];

/** ============================
 * Obstacles
 * ============================ */
/** Rows the wall occupies: [0, topEnd) and [bottomStart, HEIGHT) */
export const obstacleBounds = (o: Obstacle) => {
    const half = Math.trunc(o.size / 2);
    return { topEnd: o.gapY - half, bottomStart: o.gapY + half };
};

/**
 * A wall is only solid in its own column, so the player (one column per
 * step) meets each obstacle exactly once.
 */
export const hitObstacle = (o: Obstacle, p: Player): boolean => {
    const { topEnd, bottomStart } = obstacleBounds(o);
    return p.x === o.x && (p.y < topEnd || p.y > bottomStart);
};

const range = (from: number, to: number): number[] =>
    Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i);

const glyph = (
    col: number,
    row: number,
    fg: Color,
    bg: Color,
    char: string,
): DrawCommand => ({ kind: "glyph", col, row, fg, bg, glyph: char });

const text = (col: number, row: number, value: string): DrawCommand => ({
    kind: "text",
    col,
    row,
    text: value,
});

const centered = (row: number, value: string): DrawCommand => ({
    kind: "centered",
    row,
    text: value,
});

const clear = (background: Color): DrawCommand => ({
    kind: "clear",
    background,
});

/** Wall glyphs relative to the player's column; nothing when off screen */
export const obstacleGlyphs = (o: Obstacle, playerX: number): DrawCommand[] => {
    const col = o.x - playerX;
    if (col < 0 || col >= Screen.WIDTH) return [];
    const { topEnd, bottomStart } = obstacleBounds(o);
    return [...range(0, topEnd), ...range(bottomStart, Screen.HEIGHT)].map(
        row => glyph(col, row, "Red", "Black", "|"),
    );
};

/** ============================
 * Session
 * ============================ */
/** Fields a run starts with; the generator seed is split off the batch seed */
const newRun = (seed: number, epoch: number) => {
    const { obstacles, next } = initialObstacles(seed);
    return {
        player: createPlayer(Spawn.START_X, Spawn.START_Y),
        obstacles,
        inbox: [],
        frameTime: 0,
        score: 0,
        epoch,
        spawn: { x: next.x, seed: rand(next.seed + 1).seed },
        seed: next.seed,
        notice: null,
    };
};

/** Initial immutable state: main menu, epoch 0 */
export const createState = (seed: number): State => ({
    mode: "Menu",
    quit: false,
    ...newRun(seed, 0),
});

/** Fresh run, next generator epoch; the best score lives elsewhere */
export const restartGame = (s: State): State => ({
    ...s,
    ...newRun(s.seed, s.epoch + 1),
    mode: "Playing",
});

/**
 * Queue a generated obstacle for the next drain. Deliveries from an
 * earlier epoch are dropped.
 */
export const deliverObstacle =
    (epoch: number, o: Obstacle) =>
    (s: State): State =>
        s.epoch === epoch ? { ...s, inbox: [...s.inbox, o] } : s;

const menuKey = (s: State, key: Key | null): State =>
    key === "Start"
        ? restartGame(s)
        : key === "Quit"
          ? { ...s, quit: true, notice: null }
          : { ...s, notice: null };

const mainMenu = (s: State, key: Key | null): Tick => ({
    state: menuKey(s, key),
    commands: [
        clear("Black"),
        centered(15, "■ WELCOME TO FLAPPY BIRD! ■"),
        centered(40, "Avoid obstacles and press SPACE to flap your wings"),
        centered(20, "(P) Play Game"),
        centered(22, "(Q) Quit Game"),
    ],
});

const dead = (s: State, key: Key | null, best: BestScore): Tick => ({
    state: menuKey(s, key),
    commands: [
        clear("Black"),
        centered(15, "You're dead! >.<"),
        centered(
            20,
            `You earned ${s.score} points! (Highest: ${best.read()})`,
        ),
        centered(25, "(P) Play Again"),
        centered(27, "(Q) Quit Game"),
    ],
});

/**
 * One Playing frame. The order is fixed: physics, input, draw, cull,
 * score, drain, then the death check. Drawing happens before culling, so
 * an obstacle is still shown on the frame it is removed.
 */
const play = (s: State, frame: Frame, best: BestScore): Tick => {
    // Physics runs on its own clock; input does not wait for it
    const accumulated = s.frameTime + frame.elapsedMs;
    const stepped = accumulated > Timing.FRAME_DURATION_MS;
    const moved: Advanced = stepped
        ? advance(s.player)
        : { player: s.player, moved: true };

    const flapped = frame.key === "Flap" ? flap(moved.player) : null;
    const player =
        flapped !== null && flapped.ok ? flapped.player : moved.player;
    const notice = flapped !== null && !flapped.ok ? flapped.error : null;

    const commands: DrawCommand[] = [
        clear("LightBlue"),
        ...(isAlive(player)
            ? [glyph(0, player.y, "Yellow", "Black", "@")]
            : []),
        text(0, 1, `Score: ${s.score}`),
        ...s.obstacles.flatMap(o => obstacleGlyphs(o, player.x)),
    ];

    const kept = s.obstacles.filter(
        o => o.x - player.x > -Spawn.CULL_MARGIN,
    );
    const passed = kept.length > 0 && player.x > kept[0].x;
    const obstacles = [...(passed ? kept.slice(1) : kept), ...s.inbox];
    const score = passed ? s.score + 1 : s.score;

    const crashed =
        !moved.moved ||
        player.y > Screen.HEIGHT ||
        obstacles.some(o => hitObstacle(o, player));
    if (crashed) best.submit(score);

    return {
        state: {
            ...s,
            mode: crashed ? "Ended" : "Playing",
            player,
            obstacles,
            inbox: [],
            frameTime: stepped ? 0 : accumulated,
            score,
            notice,
        },
        commands,
    };
};

/** Per-frame entry point: dispatch on the current mode */
export const update = (s: State, frame: Frame, best: BestScore): Tick => {
    switch (s.mode) {
        case "Menu":
            return mainMenu(s, frame.key);
        case "Playing":
            return play(s, frame, best);
        case "Ended":
            return dead(s, frame.key, best);
    }
};
