/** ============================
 * Constants
 * ============================ */
export const Field = {
    WIDTH: 400,
    HEIGHT: 800,
    DITCH_HEIGHT: 80,
    FENCE_RATIO: 0.68, // fence y as a fraction of field height
} as const;

export const Cattle = {
    COW_RADIUS: 20,
    FARMER_RADIUS: 25,
    SPAWN_DROP: 20, // spawn this far below the fence
    SPAWN_JITTER: 15,
    WANDER_PERIOD: 1.5,
    WANDER_JITTER_X: 20,
    WANDER_JITTER_Y_MIN: -10,
    WANDER_JITTER_Y_MAX: 5,
    MOO_CHANCE: 0.15,
    GATE_FIT: 0.8, // fraction of the radius that must clear the posts
} as const;

export const Herding = {
    RADIUS: 70,
    FORCE: 3.0,
    FORCE_SCALE: 60,
    LASSO_RANGE: 100,
    LASSO_REACH: 3, // in cow radii
    GRAB_REACH: 2.5, // in farmer radii
} as const;

export const GateTiming = {
    FULL_WIDTH: 160,
    OPEN_DURATION: 2.5,
    CLOSE_DURATION: 2.5,
    STAY_OPEN_DURATION: 3.0,
    STAY_CLOSED_DURATION: 3.0,
    INITIAL_WAIT: 1.0,
} as const;

export const Difficulty = {
    STEP_SECONDS: 30,
    INITIAL_SPAWN_INTERVAL: 2.5,
    MIN_SPAWN_INTERVAL: 0.8,
    SPAWN_INTERVAL_STEP: 0.3,
    INITIAL_COW_SPEED: 40,
    COW_SPEED_STEP: 8,
    INITIAL_DROWNING_DURATION: 10.0,
    MIN_DROWNING_DURATION: 1.0,
    DROWNING_DURATION_STEP: 1.5,
} as const;

export const Constants = {
    STARTING_LIVES: 3,
    SAFE_BONUS: 1,
    RESCUE_BONUS: 3,
    DEFAULT_SEED: 123456789,
    TICK_RATE_MS: 16, // ~60 fps
    GIDDY_UP_COOLDOWN_MS: 4000,
} as const;

/** ============================
 * Configuration
 * ============================ */
export type GameConfig = Readonly<{
    field: Readonly<{
        width: number;
        height: number;
        ditchHeight: number;
        fenceY: number;
    }>;
    cow: Readonly<{ radius: number }>;
    farmer: Readonly<{ radius: number }>;
    herding: Readonly<{
        radius: number;
        force: number;
        lassoRange: number;
    }>;
    gate: Readonly<{
        centerX: number;
        fullWidth: number;
        openDuration: number;
        closeDuration: number;
        stayOpenDuration: number;
        stayClosedDuration: number;
        initialWait: number;
    }>;
    difficulty: Readonly<{
        stepSeconds: number;
        initialSpawnInterval: number;
        minSpawnInterval: number;
        spawnIntervalStep: number;
        initialCowSpeed: number;
        cowSpeedStep: number;
        initialDrowningDuration: number;
        minDrowningDuration: number;
        drowningDurationStep: number;
    }>;
    startingLives: number;
}>;

/** Deep-partial overrides accepted by createConfig */
export type ConfigOverrides = {
    [K in keyof GameConfig]?: GameConfig[K] extends Readonly<
        Record<string, number>
    >
        ? Partial<GameConfig[K]>
        : GameConfig[K];
};

/** ============================
 * Core Game Types
 * ============================ */
export type Vector2 = Readonly<{ x: number; y: number }>;

export type GateState = "closed" | "opening" | "open" | "closing";

/** Gate: timer-driven barrier opening */
export type Gate = Readonly<{
    state: GateState;
    timer: number; // countdown within the current state
    openAmount: number; // 0 closed .. 1 fully open
}>;

/** Farmer: the player's avatar, moved by dragging */
export type Farmer = Readonly<{
    pos: Vector2;
    radius: number;
    isDragging: boolean;
    dragOffset: Vector2;
}>;

type CowBase = Readonly<{
    id: number;
    pos: Vector2;
    vel: Vector2;
    radius: number;
    wanderTimer: number;
}>;

export type WanderingCow = CowBase & Readonly<{ lifecycle: "wandering" }>;

export type DrowningCow = CowBase &
    Readonly<{
        lifecycle: "drowning";
        drownTimer: number; // seconds left before the cow is lost
    }>;

/** Cow: a live entity, either wandering the field or stuck in the ditch */
export type Cow = WanderingCow | DrowningCow;

/** GameEvent: fire-and-forget notifications for audio/particle layers */
export type GameEvent =
    | Readonly<{ type: "cowSpawned"; cowId: number }>
    | Readonly<{ type: "cowMooed"; cowId: number }>
    | Readonly<{ type: "splashOccurred"; cowId: number; position: Vector2 }>
    | Readonly<{ type: "cowRescued"; cowId: number; bonus: number }>
    | Readonly<{ type: "cowReachedSafety"; cowId: number; bonus: number }>
    | Readonly<{ type: "cowDrowned"; cowId: number; livesRemaining: number }>
    | Readonly<{ type: "gameOver"; finalScore: number }>
    | Readonly<{ type: "giddyUp" }>
    | Readonly<{ type: "gateChanged"; state: GateState }>
    | Readonly<{ type: "difficultyIncreased"; level: number }>;

export type GameEventType = GameEvent["type"];

/** State: immutable session model */
export type State = Readonly<{
    score: number;
    lives: number;
    gameOver: boolean;
    paused: boolean;
    elapsedTime: number;
    difficultyLevel: number;
    spawnTimer: number; // seconds accumulated towards the next spawn
    nextCowId: number;
    rngSeed: number;
    tickCount: number;
    gate: Gate;
    farmer: Farmer;
    cows: readonly Cow[]; // spawn order
    events: readonly GameEvent[]; // raised by the latest reducer only
}>;

/** ============================
 * Read-only projections
 * ============================ */
export type CowView = Readonly<{
    id: number;
    position: Vector2;
    radius: number;
    state: Cow["lifecycle"];
    remainingDrownTime?: number;
}>;

export type GateView = Readonly<{ state: GateState; openAmount: number }>;

export type SessionView = Readonly<{
    score: number;
    lives: number;
    gameOver: boolean;
    elapsedTime: number;
    difficultyLevel: number;
}>;
