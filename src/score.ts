/** ============================
 * Best Score
 *
 * The one piece of mutable state that outlives a run. Created once per
 * process and handed to the session; restarts never touch it.
 * ============================ */

export interface BestScore {
    /** Current best */
    read(): number;
    /** Record a finished run's score; returns the best after recording */
    submit(score: number): number;
}

export const createBestScore = (initial = 0): BestScore => {
    let best = initial;
    return {
        read: () => best,
        submit: score => {
            // read-compare-write runs to completion on the event loop
            best = score > best ? score : best;
            return best;
        },
    };
};
