/** ============================
 * Gate (timer-driven state machine)
 *
 * closed → opening → open → closing → closed, one transition per step at
 * most. The timer is decremented first; crossing zero snaps openAmount to
 * its exact bound so float error never leaves the gate "almost" open.
 * ============================ */
import { Cattle, type GameConfig, type Gate } from "./types";
import { clamp01 } from "./util";

export const initialGate = (cfg: GameConfig): Gate => ({
    state: "closed",
    timer: cfg.gate.initialWait,
    openAmount: 0,
});

/** Advance the gate by dt seconds (pure) */
export const advanceGate = (gate: Gate, dt: number, cfg: GameConfig): Gate => {
    const timer = gate.timer - dt;
    const g = cfg.gate;

    switch (gate.state) {
        case "closed":
            return timer <= 0
                ? { state: "opening", timer: g.openDuration, openAmount: 0 }
                : { ...gate, timer, openAmount: 0 };
        case "opening":
            return timer <= 0
                ? { state: "open", timer: g.stayOpenDuration, openAmount: 1 }
                : {
                      ...gate,
                      timer,
                      openAmount: clamp01(1 - timer / g.openDuration),
                  };
        case "open":
            return timer <= 0
                ? { state: "closing", timer: g.closeDuration, openAmount: 1 }
                : { ...gate, timer, openAmount: 1 };
        case "closing":
            return timer <= 0
                ? { state: "closed", timer: g.stayClosedDuration, openAmount: 0 }
                : {
                      ...gate,
                      timer,
                      openAmount: clamp01(timer / g.closeDuration),
                  };
    }
};

/** Passable width of the gap in distance units */
export const gateOpening = (gate: Gate, cfg: GameConfig): number =>
    cfg.gate.fullWidth * gate.openAmount;

/**
 * Whether a cow of radius r centred at x fits through the current opening.
 * Only GATE_FIT of the radius has to clear the posts.
 */
export const canPassGate = (
    x: number,
    radius: number,
    opening: number,
    cfg: GameConfig,
): boolean => {
    const half = opening / 2;
    const left = cfg.gate.centerX - half;
    const right = cfg.gate.centerX + half;
    const cowHalf = radius * Cattle.GATE_FIT;
    return x - cowHalf >= left && x + cowHalf <= right;
};
