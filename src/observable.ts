/** ============================
 * Observable Wiring (session, events, frame loop)
 *
 * Stream composition only: every input call becomes a pure reducer folded
 * by scan into the immutable State stream, so ticks and pointer input are
 * applied one at a time and never interleave. No rendering or audio here.
 * ============================ */
import {
    BehaviorSubject,
    Observable,
    Subject,
    Subscription,
    filter,
    interval,
    map,
    merge,
    mergeMap,
    scan,
    share,
    skip,
    takeWhile,
    throttleTime,
} from "rxjs";
import { advanceClock, initialClock } from "./clock";
import { defaultConfig } from "./config";
import {
    type HighScoreResult,
    type KeyValueStore,
    createMemoryStore,
    readHighScore,
    recordFinalScore,
} from "./highScore";
import {
    assertFrameDelta,
    createInitialState,
    pointerDown,
    pointerMove,
    pointerUp,
    restartGame,
    tick,
    togglePause,
} from "./state";
import {
    Constants,
    type GameConfig,
    type GameEvent,
    type GameEventType,
    type State,
} from "./types";

type Reducer = (s: State) => State;

export type SessionOptions = Readonly<{
    config?: GameConfig;
    seed?: number;
    highScores?: KeyValueStore;
}>;

/** Public surface consumed by rendering, audio and menu layers */
export type GameSession = Readonly<{
    tick: (dt: number) => void;
    onPointerDown: (x: number, y: number) => void;
    onPointerMove: (x: number, y: number) => void;
    onPointerUp: () => void;
    togglePause: () => void;
    restart: () => void;
    snapshot: () => State;
    bestScore: () => number;
    state$: Observable<State>;
    events$: Observable<GameEvent>;
    highScore$: Observable<HighScoreResult>;
    dispose: () => void;
}>;

/** Narrow an event stream to one event type */
export const ofType = <T extends GameEventType>(type: T) =>
    filter((e: GameEvent): e is Extract<GameEvent, { type: T }> => e.type === type);

/** Create a session whose state and events are observable */
export const createGameSession = (opts: SessionOptions = {}): GameSession => {
    const cfg = opts.config ?? defaultConfig;
    const scores = opts.highScores ?? createMemoryStore();
    const baseState = createInitialState(cfg, opts.seed);

    // Unified reducer bus → State. Each reducer sees an empty event list,
    // so State.events holds exactly what that reducer raised.
    const reducers$ = new Subject<Reducer>();
    const store$ = new BehaviorSubject<State>(baseState);
    const fold = reducers$
        .pipe(
            scan(
                (s: State, reducer: Reducer) => reducer({ ...s, events: [] }),
                baseState,
            ),
        )
        .subscribe(store$);

    const events$ = store$.pipe(
        skip(1),
        mergeMap(s => s.events),
        share(),
    );

    // Final scores go to the high-score store once per game
    const highScore$ = new Subject<HighScoreResult>();
    const recorder = events$
        .pipe(
            ofType("gameOver"),
            map(e => recordFinalScore(scores, e.finalScore)),
        )
        .subscribe(highScore$);

    const dispatch = (reducer: Reducer): void => reducers$.next(reducer);

    return {
        tick: dt => {
            assertFrameDelta(dt);
            dispatch(s => tick(s, dt, cfg));
        },
        onPointerDown: (x, y) => dispatch(s => pointerDown(s, x, y, cfg)),
        onPointerMove: (x, y) => dispatch(s => pointerMove(s, x, y, cfg)),
        onPointerUp: () => dispatch(pointerUp),
        togglePause: () => dispatch(togglePause),
        restart: () => dispatch(s => restartGame(s, cfg)),
        snapshot: () => store$.getValue(),
        bestScore: () => readHighScore(scores),
        state$: store$.asObservable(),
        events$,
        highScore$: highScore$.asObservable(),
        dispose: () => {
            recorder.unsubscribe();
            fold.unsubscribe();
            reducers$.complete();
            store$.complete();
            highScore$.complete();
        },
    };
};

/** ============================
 * Frame loop
 * ============================ */

/** Map host timestamps (ms) to per-frame deltas (s) through the frame clock */
export const frameDeltas = (timestamps$: Observable<number>): Observable<number> =>
    timestamps$.pipe(
        scan(
            (acc, now: number) => advanceClock(acc.clock, now / 1000),
            { clock: initialClock, dt: 0 },
        ),
        map(({ dt }) => dt),
    );

/**
 * Drive a session at a fixed rate until the game is over.
 * The first frame only primes the clock (dt = 0). The loop completes at
 * game over, so call startLoop again after `session.restart()`.
 */
export const startLoop = (
    session: GameSession,
    tickRateMs: number = Constants.TICK_RATE_MS,
): Subscription =>
    frameDeltas(interval(tickRateMs).pipe(map(() => Date.now())))
        .pipe(takeWhile(() => !session.snapshot().gameOver))
        .subscribe(dt => session.tick(dt));

/** ============================
 * Audio cues
 * ============================ */
export type AudioCue =
    | "moo"
    | "splash"
    | "giddyUp"
    | "rescue"
    | "safe"
    | "drown"
    | "gameOver";

const CUES: Partial<Record<GameEventType, AudioCue>> = {
    cowMooed: "moo",
    splashOccurred: "splash",
    giddyUp: "giddyUp",
    cowRescued: "rescue",
    cowReachedSafety: "safe",
    cowDrowned: "drown",
    gameOver: "gameOver",
};

/**
 * Sounds an audio layer should play. The spoken "giddy up" is throttled
 * so repeated grabs don't stack speech.
 */
export const audioCues = (
    events$: Observable<GameEvent>,
    giddyUpCooldownMs: number = Constants.GIDDY_UP_COOLDOWN_MS,
): Observable<AudioCue> => {
    const cue$ = events$.pipe(
        map(e => CUES[e.type]),
        filter((c): c is AudioCue => c !== undefined),
    );
    return merge(
        cue$.pipe(filter(c => c !== "giddyUp")),
        cue$.pipe(
            filter(c => c === "giddyUp"),
            throttleTime(giddyUpCooldownMs),
        ),
    );
};
