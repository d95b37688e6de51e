/** ============================
 * Pure State (Session Reducers & Projections)
 *
 * Holds only pure, deterministic functions that transform the immutable
 * State. No DOM, IO, or time APIs; randomness is threaded through rngSeed.
 * ============================ */
import { defaultConfig } from "./config";
import {
    type WanderContext,
    drownCow,
    findLassoTarget,
    rescueCow,
    wanderCow,
} from "./cow";
import {
    cowSpeed,
    drowningDuration,
    nextDifficultyLevel,
    spawnInterval,
} from "./difficulty";
import {
    beginDrag,
    canGrab,
    clampToField,
    dragTo,
    endDrag,
    initialFarmer,
} from "./farmer";
import { advanceGate, gateOpening, initialGate } from "./gate";
import { advanceSpawner, spawnCow } from "./spawn";
import {
    Constants,
    type Cow,
    type CowView,
    type GameConfig,
    type GameEvent,
    type GateView,
    type SessionView,
    type State,
    type Vector2,
} from "./types";
import { normaliseSeed } from "./util";

/**
 * Fresh session: full lives, closed gate, farmer mid-field, no cows.
 */
export const createInitialState = (
    cfg: GameConfig = defaultConfig,
    seed: number = Constants.DEFAULT_SEED,
): State => ({
    score: 0,
    lives: cfg.startingLives,
    gameOver: false,
    paused: false,
    elapsedTime: 0,
    difficultyLevel: 0,
    spawnTimer: 0,
    nextCowId: 1,
    rngSeed: normaliseSeed(seed),
    tickCount: 0,
    gate: initialGate(cfg),
    farmer: initialFarmer(cfg),
    cows: [],
    events: [],
});

/**
 * Initial immutable state (default tuning and seed)
 */
export const initialState: State = createInitialState();

const withEvents = (s: State, ...events: GameEvent[]): State =>
    events.length === 0 ? s : { ...s, events: [...s.events, ...events] };

/** Drop the previous reducer's events; every reducer starts from here */
const quiet = (s: State): State =>
    s.events.length === 0 ? s : { ...s, events: [] };

const isFinitePoint = (x: number, y: number): boolean =>
    Number.isFinite(x) && Number.isFinite(y);

/**
 * Clock and difficulty (pure)
 * Elapsed time only grows; the level follows it and never drops.
 */
export const advanceTime = (s: State, dt: number, cfg: GameConfig): State => {
    const elapsedTime = s.elapsedTime + dt;
    const difficultyLevel = nextDifficultyLevel(
        s.difficultyLevel,
        elapsedTime,
        cfg,
    );
    const next = { ...s, elapsedTime, difficultyLevel };
    return difficultyLevel > s.difficultyLevel
        ? withEvents(next, { type: "difficultyIncreased", level: difficultyLevel })
        : next;
};

/** Gate step, announcing state changes (pure) */
export const moveGate = (s: State, dt: number, cfg: GameConfig): State => {
    const gate = advanceGate(s.gate, dt, cfg);
    const next = { ...s, gate };
    return gate.state !== s.gate.state
        ? withEvents(next, { type: "gateChanged", state: gate.state })
        : next;
};

/** Accumulate spawn time and add a cow when one is due (pure) */
export const runSpawner = (s: State, dt: number, cfg: GameConfig): State => {
    const { accumulator, due } = advanceSpawner(
        s.spawnTimer,
        dt,
        spawnInterval(s.difficultyLevel, cfg),
    );
    if (!due) return { ...s, spawnTimer: accumulator };
    const spawned = spawnCow(s.nextCowId, s.rngSeed, s.difficultyLevel, cfg);
    return withEvents(
        {
            ...s,
            spawnTimer: accumulator,
            nextCowId: s.nextCowId + 1,
            rngSeed: spawned.seed,
            cows: [...s.cows, spawned.cow],
        },
        { type: "cowSpawned", cowId: spawned.cow.id },
    );
};

/**
 * Cow movement, scoring and lives (pure)
 *
 * Each live cow is stepped in spawn order:
 * - Wandering → may reach safety (+1, removed) or fall into the ditch.
 * - Drowning  → countdown; at zero the cow is removed and a life is lost.
 *
 * Losing the last life latches gameOver; cows after that one are left as
 * they were for the rest of the tick.
 */
export const updateCows = (s: State, dt: number, cfg: GameConfig): State => {
    type Acc = Readonly<{
        cows: Cow[];
        score: number;
        lives: number;
        gameOver: boolean;
        rngSeed: number;
        events: GameEvent[];
    }>;

    const ctx: WanderContext = {
        dt,
        farmer: s.farmer.pos,
        gateOpening: gateOpening(s.gate, cfg),
        cowSpeed: cowSpeed(s.difficultyLevel, cfg),
        drowningDuration: drowningDuration(s.difficultyLevel, cfg),
    };

    const start: Acc = {
        cows: [],
        score: s.score,
        lives: s.lives,
        gameOver: s.gameOver,
        rngSeed: s.rngSeed,
        events: [],
    };

    const settled = s.cows.reduce<Acc>((acc, cow) => {
        if (acc.gameOver) return { ...acc, cows: [...acc.cows, cow] };

        const step =
            cow.lifecycle === "wandering"
                ? wanderCow(cow, ctx, acc.rngSeed, cfg)
                : drownCow(cow, dt, acc.rngSeed);

        switch (step.outcome) {
            case "alive":
                return {
                    ...acc,
                    cows: [...acc.cows, step.cow],
                    rngSeed: step.seed,
                    events: [...acc.events, ...step.events],
                };
            case "safe": {
                const bonus = Constants.SAFE_BONUS;
                return {
                    ...acc,
                    score: acc.score + bonus,
                    rngSeed: step.seed,
                    events: [
                        ...acc.events,
                        ...step.events,
                        { type: "cowReachedSafety", cowId: step.cow.id, bonus },
                    ],
                };
            }
            case "dead": {
                const lives = Math.max(0, acc.lives - 1);
                const gameOver = lives === 0;
                const drowned: GameEvent = {
                    type: "cowDrowned",
                    cowId: step.cow.id,
                    livesRemaining: lives,
                };
                const over: GameEvent[] = gameOver
                    ? [{ type: "gameOver", finalScore: acc.score }]
                    : [];
                return {
                    ...acc,
                    lives,
                    gameOver,
                    events: [...acc.events, drowned, ...over],
                };
            }
        }
    }, start);

    return withEvents(
        {
            ...s,
            cows: settled.cows,
            score: settled.score,
            lives: settled.lives,
            gameOver: settled.gameOver,
            rngSeed: settled.rngSeed,
        },
        ...settled.events,
    );
};

/** Frame deltas are seconds of simulated time; anything else is misuse */
export const assertFrameDelta = (dt: number): void => {
    if (!Number.isFinite(dt) || dt < 0) {
        throw new Error(`tick: dt must be a finite, non-negative number, got ${dt}`);
    }
};

/**
 * One discrete time-step of dt seconds composed of pure sub-reducers:
 * time/difficulty → gate → spawner → cows.
 */
export const tick = (
    s: State,
    dt: number,
    cfg: GameConfig = defaultConfig,
): State => {
    assertFrameDelta(dt);
    const start = quiet(s);
    if (start.gameOver || start.paused) return start;
    const afterCows = updateCows(
        runSpawner(moveGate(advanceTime(start, dt, cfg), dt, cfg), dt, cfg),
        dt,
        cfg,
    );
    return { ...afterCows, tickCount: s.tickCount + 1 };
};

/** ============================
 * Pointer input
 * ============================ */

/**
 * Press: a lasso rescue takes priority (+3, cow back to mid-field);
 * otherwise a press near the farmer starts a drag.
 * Non-finite coordinates are ignored.
 */
export const pointerDown = (
    prev: State,
    x: number,
    y: number,
    cfg: GameConfig = defaultConfig,
): State => {
    const s = quiet(prev);
    if (s.gameOver || s.paused || !isFinitePoint(x, y)) return s;
    const point = clampToField({ x, y }, cfg);

    const target = findLassoTarget(s.cows, point, s.farmer.pos, cfg);
    if (target) {
        const rescued = rescueCow(target, s.rngSeed, s.difficultyLevel, cfg);
        const bonus = Constants.RESCUE_BONUS;
        return withEvents(
            {
                ...s,
                cows: s.cows.map(c => (c.id === target.id ? rescued.cow : c)),
                score: s.score + bonus,
                rngSeed: rescued.seed,
            },
            { type: "cowRescued", cowId: target.id, bonus },
        );
    }

    return canGrab(s.farmer, point)
        ? withEvents(
              { ...s, farmer: beginDrag(s.farmer, point) },
              { type: "giddyUp" },
          )
        : s;
};

/** Drag the farmer, keeping it on the field */
export const pointerMove = (
    prev: State,
    x: number,
    y: number,
    cfg: GameConfig = defaultConfig,
): State => {
    const s = quiet(prev);
    if (s.gameOver || s.paused || !s.farmer.isDragging) return s;
    if (!isFinitePoint(x, y)) return s;
    return { ...s, farmer: dragTo(s.farmer, clampToField({ x, y }, cfg), cfg) };
};

/** Release (or cancel) ends any drag */
export const pointerUp = (prev: State): State => {
    const s = quiet(prev);
    return s.farmer.isDragging ? { ...s, farmer: endDrag(s.farmer) } : s;
};

/** Toggle the paused flag (tick() early-returns when paused) */
export const togglePause = (prev: State): State => {
    const s = quiet(prev);
    return s.gameOver ? s : { ...s, paused: !s.paused };
};

/** Reset to a fresh session, continuing the random stream */
export const restartGame = (
    s: State,
    cfg: GameConfig = defaultConfig,
): State => createInitialState(cfg, s.rngSeed);

/** ============================
 * Read-only projections
 * ============================ */
export const farmerView = (s: State): Vector2 => s.farmer.pos;

export const cowViews = (s: State): CowView[] =>
    s.cows.map(c =>
        c.lifecycle === "drowning"
            ? {
                  id: c.id,
                  position: c.pos,
                  radius: c.radius,
                  state: c.lifecycle,
                  remainingDrownTime: c.drownTimer,
              }
            : { id: c.id, position: c.pos, radius: c.radius, state: c.lifecycle },
    );

export const gateView = (s: State): GateView => ({
    state: s.gate.state,
    openAmount: s.gate.openAmount,
});

export const sessionView = (s: State): SessionView => ({
    score: s.score,
    lives: s.lives,
    gameOver: s.gameOver,
    elapsedTime: s.elapsedTime,
    difficultyLevel: s.difficultyLevel,
});
