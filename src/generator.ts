/** ============================
 * Obstacle Generation
 *
 * Pure spawning plus the background producer stream. The producer knows
 * nothing about the session; it only emits obstacles until unsubscribed.
 * ============================ */
import { type Observable, map, scan, timer } from "rxjs";
import {
    Gap,
    type Obstacle,
    Screen,
    Spawn,
    type SpawnPoint,
    Timing,
} from "./types";
import { randInt } from "./util";

type Spawned = Readonly<{ obstacle: Obstacle; next: SpawnPoint }>;

/**
 * Build one obstacle at `spawn.x` with a random gap, and the spawn point
 * for the one after it (half a screen further on).
 */
export const spawnObstacle = (spawn: SpawnPoint): Spawned => {
    const gapY = randInt(spawn.seed, Gap.Y_MIN, Gap.Y_MAX);
    const size = randInt(gapY.seed, Gap.SIZE_MIN, Gap.SIZE_MAX);
    return {
        obstacle: { x: spawn.x, gapY: gapY.v, size: size.v },
        next: { x: spawn.x + Spawn.SPACING, seed: size.seed },
    };
};

/**
 * The synchronous batch a run starts with, so there is something on screen
 * before the producer catches up. Starts at the right edge.
 */
export const initialObstacles = (
    seed: number,
): Readonly<{ obstacles: Obstacle[]; next: SpawnPoint }> =>
    Array.from({ length: Spawn.INITIAL_OBSTACLES }).reduce<{
        obstacles: Obstacle[];
        next: SpawnPoint;
    }>(
        acc => {
            const { obstacle, next } = spawnObstacle(acc.next);
            return { obstacles: [...acc.obstacles, obstacle], next };
        },
        { obstacles: [], next: { x: Screen.WIDTH, seed } },
    );

/**
 * Background producer: one obstacle straight away, then one every
 * `periodMs`, each half a screen beyond the last. Never completes;
 * unsubscribing is the only way to stop it.
 */
export const obstacle$ = (
    from: SpawnPoint,
    periodMs: number = Timing.SPAWN_INTERVAL_MS,
): Observable<Obstacle> =>
    timer(0, periodMs).pipe(
        scan<number, Spawned, null>(
            acc => spawnObstacle(acc ? acc.next : from),
            null,
        ),
        map(({ obstacle }) => obstacle),
    );
