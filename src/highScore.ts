/** ============================
 * High score persistence
 *
 * Works against any Web Storage-like key/value store. Storage failures
 * are reported and never reach the simulation.
 * ============================ */

/** Minimal subset of the Web Storage API (localStorage fits) */
export interface KeyValueStore {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
}

export const HIGH_SCORE_KEY = "cows-in-the-ditch.highScore";

export type HighScoreResult = Readonly<{
    highScore: number;
    isNewHighScore: boolean;
}>;

/** In-memory store, used when the host has no persistent storage */
export const createMemoryStore = (
    initial: Record<string, string> = {},
): KeyValueStore => {
    const entries = new Map(Object.entries(initial));
    return {
        getItem: key => entries.get(key) ?? null,
        setItem: (key, value) => {
            entries.set(key, value);
        },
    };
};

const parseScore = (raw: string | null): number => {
    const n = raw === null ? NaN : Number.parseInt(raw, 10);
    return Number.isFinite(n) && n > 0 ? n : 0;
};

/** Stored best score; missing, corrupt or unreadable entries count as 0 */
export const readHighScore = (store: KeyValueStore): number => {
    try {
        return parseScore(store.getItem(HIGH_SCORE_KEY));
    } catch (err: unknown) {
        console.error("Error reading the high score:", err);
        return 0;
    }
};

/**
 * Record a final score, replacing the stored best only when beaten.
 */
export const recordFinalScore = (
    store: KeyValueStore,
    finalScore: number,
): HighScoreResult => {
    const previous = readHighScore(store);
    const isNewHighScore = finalScore > previous;
    if (isNewHighScore) {
        try {
            store.setItem(HIGH_SCORE_KEY, String(finalScore));
        } catch (err: unknown) {
            console.error("Error saving the high score:", err);
        }
    }
    return { highScore: Math.max(previous, finalScore), isNewHighScore };
};
