/** ============================
 * Pure helpers (random source, vectors, clamping)
 * ============================ */
import { type Vector2 } from "./types";

/**
 * Linear congruential generator. `hash` maps a seed to the next seed,
 * `scale` turns a seed into a float in [0, 1).
 */
abstract class RNG {
    private static m = 0x80000000; // 2^31
    private static a = 1103515245;
    private static c = 12345;

    // imul keeps the product exact in 32 bits; masking is mod 2^31
    public static hash = (seed: number): number =>
        (Math.imul(RNG.a, seed) + RNG.c) & (RNG.m - 1);
    public static scale = (hash: number): number => hash / RNG.m; // [0,1)
}

/** Fold any number into the generator's 31-bit seed space */
export const normaliseSeed = (seed: number): number =>
    Number.isFinite(seed) ? Math.abs(Math.trunc(seed)) % 0x80000000 : 0;

export const rand = (seed: number) => {
    const next = RNG.hash(seed);
    return { value: RNG.scale(next), seed: next };
};

/** Uniform float in [min, max) */
export const randBetween = (seed: number, min: number, max: number) => {
    const r = rand(seed);
    return { v: min + (max - min) * r.value, seed: r.seed };
};

/** Bernoulli draw: hit with probability p */
export const chance = (seed: number, p: number) => {
    const r = rand(seed);
    return { hit: r.value < p, seed: r.seed };
};

/** ============================
 * Vector math
 * ============================ */
export const vecAdd = (v1: Vector2, v2: Vector2): Vector2 => ({
    x: v1.x + v2.x,
    y: v1.y + v2.y,
});
export const vecSub = (v1: Vector2, v2: Vector2): Vector2 => ({
    x: v1.x - v2.x,
    y: v1.y - v2.y,
});
export const dist = (v1: Vector2, v2: Vector2): number =>
    Math.hypot(v2.x - v1.x, v2.y - v1.y);

export const clamp = (value: number, min: number, max: number): number =>
    min > value ? min : max < value ? max : value;

export const clamp01 = (value: number): number => clamp(value, 0, 1);
