/** ============================
 * Cow lifecycle (pure)
 *
 * wandering → drowning → dead, wandering → safe, and the one way back:
 * drowning → wandering through a lasso rescue. Each step returns the cow
 * together with its outcome and the events it raised; scoring and lives
 * are settled by the session.
 * ============================ */
import { cowSpeed } from "./difficulty";
import { canPassGate } from "./gate";
import {
    Cattle,
    type Cow,
    type DrowningCow,
    type GameConfig,
    type GameEvent,
    Herding,
    type Vector2,
    type WanderingCow,
} from "./types";
import { chance, clamp, dist, randBetween } from "./util";

/** Per-tick inputs shared by every wandering cow */
export type WanderContext = Readonly<{
    dt: number;
    farmer: Vector2;
    gateOpening: number;
    cowSpeed: number;
    drowningDuration: number;
}>;

export type CowStep =
    | Readonly<{
          outcome: "alive";
          cow: Cow;
          seed: number;
          events: readonly GameEvent[];
      }>
    | Readonly<{
          outcome: "safe";
          cow: WanderingCow;
          seed: number;
          events: readonly GameEvent[];
      }>
    | Readonly<{ outcome: "dead"; cow: DrowningCow }>;

/**
 * Re-randomise the heading (meander). Occasionally moos.
 */
const redrawHeading = (seed: number, speed: number) => {
    const vx = randBetween(seed, -Cattle.WANDER_JITTER_X, Cattle.WANDER_JITTER_X);
    const vy = randBetween(
        vx.seed,
        Cattle.WANDER_JITTER_Y_MIN,
        Cattle.WANDER_JITTER_Y_MAX,
    );
    const moo = chance(vy.seed, Cattle.MOO_CHANCE);
    return {
        vel: { x: vx.v, y: -speed + vy.v },
        mooed: moo.hit,
        seed: moo.seed,
    };
};

/**
 * Herding repulsion: a push away from the farmer that fades linearly to
 * zero at the herding radius. A cow exactly on the farmer gets no push.
 */
export const herdingPush = (
    pos: Vector2,
    vel: Vector2,
    farmer: Vector2,
    cfg: GameConfig,
): Vector2 => {
    const dx = pos.x - farmer.x;
    const dy = pos.y - farmer.y;
    const d = Math.hypot(dx, dy);
    if (!(d > 0 && d < cfg.herding.radius)) return vel;
    const strength =
        cfg.herding.force * (1 - d / cfg.herding.radius) * Herding.FORCE_SCALE;
    return { x: vel.x + (dx / d) * strength, y: vel.y + (dy / d) * strength };
};

/** Enter the ditch: snap into the water and start the countdown */
export const startDrowning = (
    cow: Cow,
    duration: number,
    cfg: GameConfig,
): { cow: DrowningCow; event: GameEvent } => {
    const pos = { x: cow.pos.x, y: cfg.field.ditchHeight / 2 };
    return {
        cow: {
            id: cow.id,
            pos,
            vel: cow.vel,
            radius: cow.radius,
            wanderTimer: cow.wanderTimer,
            lifecycle: "drowning",
            drownTimer: duration,
        },
        event: { type: "splashOccurred", cowId: cow.id, position: pos },
    };
};

/**
 * One wandering step:
 * meander, herding push, integrate, bounce off the side walls, then the
 * fence (through the gate or bounced back) and finally the ditch.
 */
export const wanderCow = (
    cow: WanderingCow,
    ctx: WanderContext,
    seed: number,
    cfg: GameConfig,
): CowStep => {
    const r = cow.radius;
    const { width, fenceY, ditchHeight } = cfg.field;

    const elapsed = cow.wanderTimer + ctx.dt;
    const redraw = elapsed > Cattle.WANDER_PERIOD;
    const heading = redraw
        ? redrawHeading(seed, ctx.cowSpeed)
        : { vel: cow.vel, mooed: false, seed };
    const wanderTimer = redraw ? 0 : elapsed;
    const events: GameEvent[] = heading.mooed
        ? [{ type: "cowMooed", cowId: cow.id }]
        : [];

    const pushed = herdingPush(cow.pos, heading.vel, ctx.farmer, cfg);
    const movedX = cow.pos.x + pushed.x * ctx.dt;
    const movedY = cow.pos.y + pushed.y * ctx.dt;

    // Side walls
    const x = clamp(movedX, r, width - r);
    const vx =
        movedX < r
            ? Math.abs(pushed.x)
            : movedX > width - r
              ? -Math.abs(pushed.x)
              : pushed.x;

    // Fence: only a cow coming from the field side can reach it
    const atFence = cow.pos.y < fenceY && movedY >= fenceY - r;
    if (atFence && canPassGate(x, r, ctx.gateOpening, cfg)) {
        return {
            outcome: "safe",
            cow: {
                ...cow,
                pos: { x, y: fenceY + r + 5 },
                vel: { x: vx, y: pushed.y },
                wanderTimer,
            },
            seed: heading.seed,
            events,
        };
    }
    const y = atFence ? fenceY - r - 1 : movedY;
    const vy = atFence ? -Math.abs(pushed.y) * 0.5 : pushed.y;

    const moved: WanderingCow = {
        ...cow,
        pos: { x, y },
        vel: { x: vx, y: vy },
        wanderTimer,
    };

    if (y <= ditchHeight + r) {
        const drowning = startDrowning(moved, ctx.drowningDuration, cfg);
        return {
            outcome: "alive",
            cow: drowning.cow,
            seed: heading.seed,
            events: [...events, drowning.event],
        };
    }
    return { outcome: "alive", cow: moved, seed: heading.seed, events };
};

/** Count down a drowning cow; at zero it is lost */
export const drownCow = (cow: DrowningCow, dt: number, seed: number): CowStep => {
    const drownTimer = cow.drownTimer - dt;
    return drownTimer <= 0
        ? { outcome: "dead", cow: { ...cow, drownTimer: 0 } }
        : { outcome: "alive", cow: { ...cow, drownTimer }, seed, events: [] };
};

/**
 * Pull a drowning cow back to mid-field as if freshly spawned.
 */
export const rescueCow = (
    cow: DrowningCow,
    seed: number,
    level: number,
    cfg: GameConfig,
): { cow: WanderingCow; seed: number } => {
    const { width, ditchHeight, fenceY } = cfg.field;
    const x = randBetween(seed, width * 0.2, width * 0.8);
    const vx = randBetween(x.seed, -Cattle.SPAWN_JITTER, Cattle.SPAWN_JITTER);
    return {
        cow: {
            id: cow.id,
            lifecycle: "wandering",
            pos: {
                x: clamp(x.v, cow.radius, width - cow.radius),
                y: (ditchHeight + fenceY) / 2,
            },
            vel: { x: vx.v, y: -cowSpeed(level, cfg) },
            radius: cow.radius,
            wanderTimer: 0,
        },
        seed: vx.seed,
    };
};

/** Lasso works only while the farmer stands near the ditch */
export const canLasso = (farmer: Vector2, cfg: GameConfig): boolean =>
    farmer.y < cfg.field.ditchHeight + cfg.herding.lassoRange;

/**
 * First drowning cow (in spawn order) within reach of the point, or
 * undefined. First match wins even when a later cow is nearer.
 */
export const findLassoTarget = (
    cows: readonly Cow[],
    point: Vector2,
    farmer: Vector2,
    cfg: GameConfig,
): DrowningCow | undefined => {
    if (!canLasso(farmer, cfg)) return undefined;
    const reach = (c: Cow) => c.radius * Herding.LASSO_REACH;
    return cows.find(
        (c): c is DrowningCow =>
            c.lifecycle === "drowning" && dist(point, c.pos) < reach(c),
    );
};
