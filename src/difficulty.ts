/** ============================
 * Difficulty curve
 *
 * The level is a step function of elapsed time; every tuning value is
 * derived from the level and floored so the game stays playable.
 * ============================ */
import { type GameConfig } from "./types";

export const difficultyLevelAt = (elapsed: number, cfg: GameConfig): number =>
    Math.max(0, Math.floor(elapsed / cfg.difficulty.stepSeconds));

/** Never recomputed downward */
export const nextDifficultyLevel = (
    previous: number,
    elapsed: number,
    cfg: GameConfig,
): number => Math.max(previous, difficultyLevelAt(elapsed, cfg));

/** Seconds between cow spawns */
export const spawnInterval = (level: number, cfg: GameConfig): number =>
    Math.max(
        cfg.difficulty.minSpawnInterval,
        cfg.difficulty.initialSpawnInterval -
            level * cfg.difficulty.spawnIntervalStep,
    );

/** Downward drift speed of a fresh cow */
export const cowSpeed = (level: number, cfg: GameConfig): number =>
    cfg.difficulty.initialCowSpeed + level * cfg.difficulty.cowSpeedStep;

/** Seconds a cow survives in the ditch */
export const drowningDuration = (level: number, cfg: GameConfig): number =>
    Math.max(
        cfg.difficulty.minDrowningDuration,
        cfg.difficulty.initialDrowningDuration -
            level * cfg.difficulty.drowningDurationStep,
    );
