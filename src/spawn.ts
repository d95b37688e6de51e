/** ============================
 * Spawner
 * ============================ */
import { cowSpeed } from "./difficulty";
import { Cattle, type GameConfig, type WanderingCow } from "./types";
import { randBetween } from "./util";

/**
 * Accumulate dt towards the next spawn. When the interval is reached the
 * accumulator restarts from zero (leftover time is dropped).
 */
export const advanceSpawner = (
    accumulator: number,
    dt: number,
    interval: number,
): { accumulator: number; due: boolean } => {
    const next = accumulator + dt;
    return next >= interval
        ? { accumulator: 0, due: true }
        : { accumulator: next, due: false };
};

/** Fresh cow just below the fence, drifting towards the ditch */
export const spawnCow = (
    id: number,
    seed: number,
    level: number,
    cfg: GameConfig,
): { cow: WanderingCow; seed: number } => {
    const r = cfg.cow.radius;
    const x = randBetween(seed, r * 2, cfg.field.width - r * 2);
    const vx = randBetween(x.seed, -Cattle.SPAWN_JITTER, Cattle.SPAWN_JITTER);
    return {
        cow: {
            id,
            lifecycle: "wandering",
            pos: { x: x.v, y: cfg.field.fenceY - r - Cattle.SPAWN_DROP },
            vel: { x: vx.v, y: -cowSpeed(level, cfg) },
            radius: r,
            wanderTimer: 0,
        },
        seed: vx.seed,
    };
};
