import { describe, it, expect } from "vitest";
import { take } from "rxjs";
import { TestScheduler } from "rxjs/testing";
import {
    type Frame,
    type Step,
    createBestScore,
    initialObstacles,
    obstacle$,
    session$,
    spawnObstacle,
} from "../src/main";

const mkScheduler = () =>
    new TestScheduler((actual, expected) => expect(actual).toEqual(expected));

describe("spawnObstacle / initialObstacles", () => {
    it("places the initial batch at the right edge, half a screen apart", () => {
        const { obstacles, next } = initialObstacles(42);
        expect(obstacles.map(o => o.x)).toEqual([80, 120, 160]);
        expect(next.x).toBe(200);
    });

    it("draws gaps from [10, 40) and sizes from [10, 20)", () => {
        const { obstacles } = initialObstacles(987654);
        obstacles.forEach(o => {
            expect(Number.isInteger(o.gapY)).toBe(true);
            expect(o.gapY).toBeGreaterThanOrEqual(10);
            expect(o.gapY).toBeLessThan(40);
            expect(o.size).toBeGreaterThanOrEqual(10);
            expect(o.size).toBeLessThan(20);
        });
    });

    it("covers every gap centre and size over a long stream", () => {
        const spawned = Array.from({ length: 300 }).reduce<{
            gaps: number[];
            sizes: number[];
            next: { x: number; seed: number };
        }>(
            acc => {
                const { obstacle, next } = spawnObstacle(acc.next);
                return {
                    gaps: [...acc.gaps, obstacle.gapY],
                    sizes: [...acc.sizes, obstacle.size],
                    next,
                };
            },
            { gaps: [], sizes: [], next: { x: 80, seed: 1 } },
        );
        expect(new Set(spawned.gaps.map(g => g % 2))).toEqual(new Set([0, 1]));
        expect(new Set(spawned.gaps).size).toBe(30);
        expect(new Set(spawned.sizes).size).toBe(10);
        expect(Math.min(...spawned.gaps)).toBe(10);
        expect(Math.max(...spawned.gaps)).toBe(39);
        expect(Math.min(...spawned.sizes)).toBe(10);
        expect(Math.max(...spawned.sizes)).toBe(19);
    });

    it("is deterministic for a seed", () => {
        expect(spawnObstacle({ x: 200, seed: 7 })).toEqual(
            spawnObstacle({ x: 200, seed: 7 }),
        );
        expect(spawnObstacle({ x: 200, seed: 7 }).next.x).toBe(240);
    });
});

describe("obstacle$ (background producer)", () => {
    it("emits straight away, then every 1500ms, continuing x", () => {
        const from = { x: 200, seed: 99 };
        const a = spawnObstacle(from);
        const b = spawnObstacle(a.next);
        const c = spawnObstacle(b.next);
        expect([a, b, c].map(s => s.obstacle.x)).toEqual([200, 240, 280]);

        mkScheduler().run(({ expectObservable }) => {
            expectObservable(obstacle$(from).pipe(take(3))).toBe(
                "a 1499ms b 1499ms (c|)",
                { a: a.obstacle, b: b.obstacle, c: c.obstacle },
            );
        });
    });

    it("stops producing once unsubscribed", () => {
        const from = { x: 200, seed: 99 };
        const a = spawnObstacle(from);
        const b = spawnObstacle(a.next);

        mkScheduler().run(({ expectObservable }) => {
            expectObservable(obstacle$(from), "^ 2000ms !").toBe(
                "a 1499ms b",
                { a: a.obstacle, b: b.obstacle },
            );
        });
    });
});

describe("session$", () => {
    const start: Frame = { elapsedMs: 0, key: "Start" };
    const idle: Frame = { elapsedMs: 10, key: null };

    it("drains generated obstacles into the run on the next frame", () => {
        const steps: Step[] = [];
        mkScheduler().run(({ cold }) => {
            const frame$ = cold<Frame>("a 9ms b", { a: start, b: idle });
            session$(frame$, { best: createBestScore(), seed: 42 })
                .pipe(take(4))
                .subscribe(s => steps.push(s));
        });

        expect(steps).toHaveLength(4);
        expect(steps[0].state.mode).toBe("Menu");
        expect(steps[0].commands).toBeNull();

        expect(steps[1].state.mode).toBe("Playing");
        expect(steps[1].state.epoch).toBe(1);

        // delivery: queued, nothing drawn
        expect(steps[2].commands).toBeNull();
        expect(steps[2].state.inbox.map(o => o.x)).toEqual([200]);

        expect(steps[3].state.obstacles.map(o => o.x)).toEqual([
            80, 120, 160, 200,
        ]);
        expect(steps[3].state.inbox).toEqual([]);
    });

    it("discards the previous run's generator on restart", () => {
        const steps: Step[] = [];
        mkScheduler().run(({ cold }) => {
            const frame$ = cold<Frame>("5ms a 1496ms b", {
                a: start,
                b: { elapsedMs: 0, key: null },
            });
            session$(frame$, { best: createBestScore(), seed: 42 })
                .pipe(take(5))
                .subscribe(s => steps.push(s));
        });

        // epoch 0 delivers while still in the menu
        expect(steps[1].state.mode).toBe("Menu");
        expect(steps[1].state.inbox.map(o => o.x)).toEqual([200]);

        // restart at 5ms clears the inbox; epoch 1 delivers its first obstacle
        expect(steps[2].state.epoch).toBe(1);
        expect(steps[2].state.inbox).toEqual([]);
        expect(steps[3].state.inbox.map(o => o.x)).toEqual([200]);

        // at 1502ms the old producer would have sent x=240 at 1500ms
        expect(steps[4].state.obstacles.map(o => o.x)).toEqual([
            80, 120, 160, 200,
        ]);
    });
});
