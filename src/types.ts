/** ============================
 * Constants
 * ============================ */
export const Screen = {
    WIDTH: 80,
    HEIGHT: 50,
} as const;

export const Physics = {
    GRAVITY: 0.2,
    TERMINAL_VELOCITY: 2.0, // gravity stops accumulating at this speed
    FLAP_VELOCITY: -2.0,
    MAX_FLAP_VELOCITY: 5.0, // above this the player falls too fast to flap
} as const;

export const Timing = {
    FRAME_DURATION_MS: 75, // one physics step per accumulated 75ms
    SPAWN_INTERVAL_MS: 1500,
    DEFAULT_FPS: 60,
} as const;

export const Gap = {
    Y_MIN: 10,
    Y_MAX: 40, // exclusive
    SIZE_MIN: 10,
    SIZE_MAX: 20, // exclusive
} as const;

export const Spawn = {
    START_X: 5,
    START_Y: 25,
    INITIAL_OBSTACLES: 3,
    SPACING: Screen.WIDTH / 2,
    CULL_MARGIN: 20,
} as const;

/** RGB triples used by the terminal renderer */
export const Palette = {
    Black: [0, 0, 0],
    White: [255, 255, 255],
    Yellow: [255, 255, 0],
    Red: [255, 0, 0],
    LightBlue: [173, 216, 230],
} as const;

export type Color = keyof typeof Palette;

/** ============================
 * Core Game Types
 * ============================ */
/** Player: falls under gravity, flaps upward */
export type Player = Readonly<{
    x: number; // world distance travelled
    y: number;
    velocity: number;
    alive: boolean;
}>;

/** Obstacle: vertical wall with a gap of `size` rows centred on `gapY` */
export type Obstacle = Readonly<{
    x: number;
    gapY: number;
    size: number;
}>;

/** Where the next generated obstacle goes, and the RNG seed to build it */
export type SpawnPoint = Readonly<{
    x: number;
    seed: number;
}>;

export type PlayerError = "AlreadyDead" | "FallingTooFast";

/** Result of one physics step; `moved: false` means the move was blocked */
export type Advanced = Readonly<{
    player: Player;
    moved: boolean;
}>;

export type Flapped =
    | Readonly<{ ok: true; player: Player }>
    | Readonly<{ ok: false; error: PlayerError }>;

export type Mode = "Menu" | "Playing" | "Ended";

export type Key = "Flap" | "Start" | "Quit";

/** Frame: what the driver hands the session once per rendered frame */
export type Frame = Readonly<{
    elapsedMs: number;
    key: Key | null;
}>;

/** State: immutable session model */
export type State = Readonly<{
    mode: Mode;
    player: Player;
    obstacles: readonly Obstacle[]; // ascending x, front is next to score
    inbox: readonly Obstacle[]; // delivered by the generator, not yet drained
    frameTime: number;
    score: number;
    epoch: number; // generator generation, bumped on every restart
    spawn: SpawnPoint; // start of this epoch's generator
    seed: number;
    notice: PlayerError | null; // flap rejected during this tick
    quit: boolean;
}>;

/** ============================
 * Draw Commands
 * ============================ */
export type DrawCommand =
    | Readonly<{ kind: "clear"; background: Color }>
    | Readonly<{
          kind: "glyph";
          col: number;
          row: number;
          fg: Color;
          bg: Color;
          glyph: string;
      }>
    | Readonly<{ kind: "text"; col: number; row: number; text: string }>
    | Readonly<{ kind: "centered"; row: number; text: string }>;

/** Tick: output of the per-frame update */
export type Tick = Readonly<{
    state: State;
    commands: readonly DrawCommand[];
}>;
