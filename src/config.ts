/** ============================
 * Configuration (defaults, overrides, validation)
 *
 * Tuning lives in the constant groups of types.ts; createConfig folds
 * caller overrides onto them and rejects out-of-range values up front.
 * ============================ */
import {
    Cattle,
    type ConfigOverrides,
    Constants,
    Difficulty,
    Field,
    type GameConfig,
    GateTiming,
    Herding,
} from "./types";

const fenceYFor = (height: number): number => height * Field.FENCE_RATIO;

const requirePositive = (name: string, value: number): void => {
    if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`${name} must be a positive number, got ${value}`);
    }
};

const requireNonNegative = (name: string, value: number): void => {
    if (!Number.isFinite(value) || value < 0) {
        throw new RangeError(
            `${name} must be a non-negative number, got ${value}`,
        );
    }
};

/**
 * Check a config for values that would make the simulation ill-defined.
 * @throws RangeError on the first offending value
 */
export const validateConfig = (cfg: GameConfig): GameConfig => {
    const { field, cow, farmer, herding, gate, difficulty } = cfg;

    requirePositive("field.width", field.width);
    requirePositive("field.height", field.height);
    requirePositive("field.ditchHeight", field.ditchHeight);
    requirePositive("field.fenceY", field.fenceY);
    requirePositive("cow.radius", cow.radius);
    requirePositive("farmer.radius", farmer.radius);
    requirePositive("herding.radius", herding.radius);
    requireNonNegative("herding.force", herding.force);
    requireNonNegative("herding.lassoRange", herding.lassoRange);
    requirePositive("gate.fullWidth", gate.fullWidth);
    requirePositive("gate.openDuration", gate.openDuration);
    requirePositive("gate.closeDuration", gate.closeDuration);
    requirePositive("gate.stayOpenDuration", gate.stayOpenDuration);
    requirePositive("gate.stayClosedDuration", gate.stayClosedDuration);
    requirePositive("gate.initialWait", gate.initialWait);
    requirePositive("difficulty.stepSeconds", difficulty.stepSeconds);
    requirePositive(
        "difficulty.initialSpawnInterval",
        difficulty.initialSpawnInterval,
    );
    requirePositive("difficulty.minSpawnInterval", difficulty.minSpawnInterval);
    requireNonNegative(
        "difficulty.spawnIntervalStep",
        difficulty.spawnIntervalStep,
    );
    requirePositive("difficulty.initialCowSpeed", difficulty.initialCowSpeed);
    requireNonNegative("difficulty.cowSpeedStep", difficulty.cowSpeedStep);
    requirePositive(
        "difficulty.initialDrowningDuration",
        difficulty.initialDrowningDuration,
    );
    requirePositive(
        "difficulty.minDrowningDuration",
        difficulty.minDrowningDuration,
    );
    requireNonNegative(
        "difficulty.drowningDurationStep",
        difficulty.drowningDurationStep,
    );

    if (!Number.isInteger(cfg.startingLives) || cfg.startingLives < 1) {
        throw new RangeError(
            `startingLives must be a positive integer, got ${cfg.startingLives}`,
        );
    }
    if (difficulty.minSpawnInterval > difficulty.initialSpawnInterval) {
        throw new RangeError(
            "difficulty.minSpawnInterval exceeds initialSpawnInterval",
        );
    }
    if (difficulty.minDrowningDuration > difficulty.initialDrowningDuration) {
        throw new RangeError(
            "difficulty.minDrowningDuration exceeds initialDrowningDuration",
        );
    }
    // The field band between ditch and fence must hold a farmer and a cow
    const band = field.fenceY - field.ditchHeight;
    if (field.fenceY >= field.height || band <= 2 * farmer.radius) {
        throw new RangeError(
            `fence at y=${field.fenceY} leaves no playable field above the ditch`,
        );
    }
    if (field.width <= 4 * cow.radius || field.width <= 2 * farmer.radius) {
        throw new RangeError(`field.width ${field.width} is too narrow`);
    }
    const gateLeft = gate.centerX - gate.fullWidth / 2;
    const gateRight = gate.centerX + gate.fullWidth / 2;
    if (!Number.isFinite(gate.centerX) || gateLeft < 0 || gateRight > field.width) {
        throw new RangeError("gate does not fit inside the field");
    }
    return cfg;
};

/**
 * Build a validated, frozen config from the default tuning plus overrides.
 * fenceY and gate.centerX follow the field size unless given explicitly.
 */
export const createConfig = (overrides: ConfigOverrides = {}): GameConfig => {
    const width = overrides.field?.width ?? Field.WIDTH;
    const height = overrides.field?.height ?? Field.HEIGHT;

    const cfg: GameConfig = {
        field: {
            width,
            height,
            ditchHeight: Field.DITCH_HEIGHT,
            fenceY: fenceYFor(height),
            ...overrides.field,
        },
        cow: { radius: Cattle.COW_RADIUS, ...overrides.cow },
        farmer: { radius: Cattle.FARMER_RADIUS, ...overrides.farmer },
        herding: {
            radius: Herding.RADIUS,
            force: Herding.FORCE,
            lassoRange: Herding.LASSO_RANGE,
            ...overrides.herding,
        },
        gate: {
            centerX: width / 2,
            fullWidth: GateTiming.FULL_WIDTH,
            openDuration: GateTiming.OPEN_DURATION,
            closeDuration: GateTiming.CLOSE_DURATION,
            stayOpenDuration: GateTiming.STAY_OPEN_DURATION,
            stayClosedDuration: GateTiming.STAY_CLOSED_DURATION,
            initialWait: GateTiming.INITIAL_WAIT,
            ...overrides.gate,
        },
        difficulty: {
            stepSeconds: Difficulty.STEP_SECONDS,
            initialSpawnInterval: Difficulty.INITIAL_SPAWN_INTERVAL,
            minSpawnInterval: Difficulty.MIN_SPAWN_INTERVAL,
            spawnIntervalStep: Difficulty.SPAWN_INTERVAL_STEP,
            initialCowSpeed: Difficulty.INITIAL_COW_SPEED,
            cowSpeedStep: Difficulty.COW_SPEED_STEP,
            initialDrowningDuration: Difficulty.INITIAL_DROWNING_DURATION,
            minDrowningDuration: Difficulty.MIN_DROWNING_DURATION,
            drowningDurationStep: Difficulty.DROWNING_DURATION_STEP,
            ...overrides.difficulty,
        },
        startingLives: overrides.startingLives ?? Constants.STARTING_LIVES,
    };

    return Object.freeze(validateConfig(cfg));
};

/** Default tuning: 400x800 field, fence at y=544 */
export const defaultConfig: GameConfig = createConfig();
