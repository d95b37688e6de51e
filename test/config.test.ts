import { describe, it, expect, vi, afterEach } from "vitest";
import {
    HIGH_SCORE_KEY,
    advanceClock,
    chance,
    clamp,
    createConfig,
    createMemoryStore,
    defaultConfig,
    initialClock,
    normaliseSeed,
    rand,
    randBetween,
    readHighScore,
    recordFinalScore,
    type KeyValueStore,
} from "../src/main";

describe("config", () => {
    it("derives the fence and gate position from the field", () => {
        expect(defaultConfig.field.fenceY).toBe(544);
        expect(defaultConfig.gate.centerX).toBe(200);
        const wide = createConfig({ field: { width: 600 } });
        expect(wide.gate.centerX).toBe(300);
        expect(wide.field.fenceY).toBe(544);
    });

    it("keeps explicit overrides", () => {
        const cfg = createConfig({
            field: { fenceY: 500 },
            gate: { openDuration: 1 },
            startingLives: 5,
        });
        expect(cfg.field.fenceY).toBe(500);
        expect(cfg.gate.openDuration).toBe(1);
        expect(cfg.gate.closeDuration).toBe(2.5);
        expect(cfg.startingLives).toBe(5);
    });

    it("is frozen", () => {
        expect(Object.isFrozen(defaultConfig)).toBe(true);
    });

    it("rejects non-positive durations", () => {
        expect(() => createConfig({ gate: { openDuration: 0 } })).toThrow(
            RangeError,
        );
        expect(() => createConfig({ gate: { stayClosedDuration: -1 } })).toThrow(
            "gate.stayClosedDuration must be a positive number, got -1",
        );
        expect(() =>
            createConfig({ difficulty: { stepSeconds: Number.NaN } }),
        ).toThrow(RangeError);
    });

    it("rejects inconsistent geometry and floors", () => {
        expect(() =>
            createConfig({ difficulty: { minSpawnInterval: 3 } }),
        ).toThrow(RangeError);
        expect(() => createConfig({ field: { width: 50 } })).toThrow(RangeError);
        expect(() => createConfig({ field: { fenceY: 100 } })).toThrow(
            RangeError,
        );
        expect(() => createConfig({ gate: { centerX: 30 } })).toThrow(
            "gate does not fit inside the field",
        );
        expect(() => createConfig({ startingLives: 0 })).toThrow(RangeError);
    });
});

describe("random source", () => {
    it("repeats for the same seed", () => {
        expect(rand(99)).toEqual(rand(99));
        expect(rand(99).seed).not.toBe(99);
    });

    it("draws within range", () => {
        let seed = 7;
        for (let i = 0; i < 500; i++) {
            const f = randBetween(seed, -15, 15);
            expect(f.v).toBeGreaterThanOrEqual(-15);
            expect(f.v).toBeLessThan(15);
            seed = f.seed;
        }
    });

    it("treats chance 0 and 1 as never and always", () => {
        expect(chance(5, 0).hit).toBe(false);
        expect(chance(5, 1).hit).toBe(true);
    });

    it("normalises seeds into the generator's range", () => {
        expect(normaliseSeed(-5)).toBe(5);
        expect(normaliseSeed(3.9)).toBe(3);
        expect(normaliseSeed(Number.NaN)).toBe(0);
        expect(normaliseSeed(0x80000001)).toBe(1);
    });

    it("clamps", () => {
        expect(clamp(-1, 0, 10)).toBe(0);
        expect(clamp(11, 0, 10)).toBe(10);
        expect(clamp(4, 0, 10)).toBe(4);
    });
});

describe("frame clock", () => {
    it("primes on the first frame and measures afterwards", () => {
        const first = advanceClock(initialClock, 10);
        expect(first.dt).toBe(0);
        const second = advanceClock(first.clock, 10.5);
        expect(second.dt).toBe(0.5);
    });

    it("never yields a negative delta", () => {
        const { clock } = advanceClock(initialClock, 10);
        expect(advanceClock(clock, 9).dt).toBe(0);
    });
});

describe("high score store", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("reads missing or corrupt entries as zero", () => {
        expect(readHighScore(createMemoryStore())).toBe(0);
        expect(readHighScore(createMemoryStore({ [HIGH_SCORE_KEY]: "12" }))).toBe(12);
        expect(readHighScore(createMemoryStore({ [HIGH_SCORE_KEY]: "abc" }))).toBe(0);
    });

    it("only replaces the stored score when it is beaten", () => {
        const store = createMemoryStore();
        expect(recordFinalScore(store, 5)).toEqual({
            highScore: 5,
            isNewHighScore: true,
        });
        expect(store.getItem(HIGH_SCORE_KEY)).toBe("5");
        expect(recordFinalScore(store, 3)).toEqual({
            highScore: 5,
            isNewHighScore: false,
        });
        expect(recordFinalScore(store, 5)).toEqual({
            highScore: 5,
            isNewHighScore: false,
        });
        expect(store.getItem(HIGH_SCORE_KEY)).toBe("5");
    });

    it("reports storage failures without throwing", () => {
        const errors = vi.spyOn(console, "error").mockImplementation(() => {});
        const broken: KeyValueStore = {
            getItem: () => {
                throw new Error("storage unavailable");
            },
            setItem: () => {
                throw new Error("storage unavailable");
            },
        };
        expect(recordFinalScore(broken, 9)).toEqual({
            highScore: 9,
            isNewHighScore: true,
        });
        expect(errors).toHaveBeenCalledTimes(2);
    });
});
