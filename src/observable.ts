/** ============================
 * Observable Wiring (session$)
 *
 * Stream composition only: maps frames and generator output to reducers
 * folded by scan into the Step stream. No terminal here.
 * ============================ */
import {
    Observable,
    Subject,
    distinctUntilChanged,
    map,
    merge,
    scan,
    shareReplay,
    startWith,
    switchMap,
} from "rxjs";
import { obstacle$ } from "./generator";
import type { BestScore } from "./score";
import { createState, deliverObstacle, update } from "./state";
import type { DrawCommand, Frame, Obstacle, State } from "./types";

/** Step: latest state, plus the frame's draw commands (null for deliveries) */
export type Step = Readonly<{
    state: State;
    commands: readonly DrawCommand[] | null;
}>;

type Reducer = (step: Step) => Step;

export type SessionDeps = Readonly<{
    best: BestScore;
    seed: number;
    spawnIntervalMs?: number;
}>;

/** frameR: run the per-frame update */
const frameR =
    (frame: Frame, best: BestScore): Reducer =>
    ({ state }) =>
        update(state, frame, best);

/** deliverR: queue a generated obstacle; no frame is drawn for it */
const deliverR =
    (epoch: number, o: Obstacle): Reducer =>
    ({ state }) => ({
        state: deliverObstacle(epoch, o)(state),
        commands: null,
    });

/**
 * Create the Step stream for a session driven by `frame$`.
 *
 * Each generator epoch gets exactly one producer. switchMap on the epoch
 * unsubscribes the old producer as soon as a restart is folded in, and
 * unsubscribing from the result stops whichever producer is running.
 */
export const session$ = (
    frame$: Observable<Frame>,
    deps: SessionDeps,
): Observable<Step> =>
    new Observable<Step>(subscriber => {
        const base: Step = { state: createState(deps.seed), commands: null };

        // Generator deliveries are fed back into the same fold
        const extraReducers$ = new Subject<Reducer>();
        const frameReducers$ = frame$.pipe(map(f => frameR(f, deps.best)));

        const step$ = merge(frameReducers$, extraReducers$).pipe(
            scan((step: Step, reducer: Reducer) => reducer(step), base),
            startWith(base),
            shareReplay({ bufferSize: 1, refCount: true }),
        );

        const deliveryReducers$ = step$.pipe(
            map(({ state }) => state),
            distinctUntilChanged((a, b) => a.epoch === b.epoch),
            switchMap(({ epoch, spawn }) =>
                obstacle$(spawn, deps.spawnIntervalMs).pipe(
                    map(o => deliverR(epoch, o)),
                ),
            ),
        );

        const subscription = step$.subscribe(subscriber);
        subscription.add(deliveryReducers$.subscribe(extraReducers$));
        return subscription;
    });
