import { describe, it, expect } from "vitest";
import {
    defaultConfig,
    drownCow,
    findLassoTarget,
    herdingPush,
    rescueCow,
    startDrowning,
    wanderCow,
    type DrowningCow,
    type WanderContext,
    type WanderingCow,
} from "../src/main";

const cfg = defaultConfig; // 400x800, ditch 80, fence 544, gate centred at 200

// Helpers
const mkCow = (over: Partial<WanderingCow> = {}): WanderingCow => ({
    id: 1,
    lifecycle: "wandering",
    pos: { x: 100, y: 300 },
    vel: { x: 0, y: -40 },
    radius: 20,
    wanderTimer: 0,
    ...over,
});

const mkDrowning = (over: Partial<DrowningCow> = {}): DrowningCow => ({
    id: 1,
    lifecycle: "drowning",
    pos: { x: 100, y: 40 },
    vel: { x: 0, y: -40 },
    radius: 20,
    wanderTimer: 0,
    drownTimer: 5,
    ...over,
});

const mkCtx = (over: Partial<WanderContext> = {}): WanderContext => ({
    dt: 0.5,
    farmer: { x: 1000, y: 1000 }, // out of herding range
    gateOpening: 0,
    cowSpeed: 40,
    drowningDuration: 10,
    ...over,
});

describe("wandering movement", () => {
    it("integrates velocity over dt", () => {
        const step = wanderCow(
            mkCow({ vel: { x: 10, y: -40 } }),
            mkCtx(),
            42,
            cfg,
        );
        expect(step.outcome).toBe("alive");
        if (step.outcome !== "alive") return;
        expect(step.cow.pos).toEqual({ x: 105, y: 280 });
        expect(step.cow.wanderTimer).toBe(0.5);
        expect(step.seed).toBe(42);
        expect(step.events).toEqual([]);
    });

    it("keeps its heading until the wander period is strictly exceeded", () => {
        const step = wanderCow(mkCow({ wanderTimer: 1.0 }), mkCtx(), 42, cfg);
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.wanderTimer).toBe(1.5);
        expect(step.cow.vel).toEqual({ x: 0, y: -40 });
    });

    it("redraws its heading after the wander period", () => {
        const step = wanderCow(
            mkCow({ wanderTimer: 1.4 }),
            mkCtx({ dt: 0.2 }),
            42,
            cfg,
        );
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.wanderTimer).toBe(0);
        expect(step.seed).not.toBe(42);
        expect(step.cow.vel.x).toBeGreaterThanOrEqual(-20);
        expect(step.cow.vel.x).toBeLessThanOrEqual(20);
        expect(step.cow.vel.y).toBeGreaterThanOrEqual(-50);
        expect(step.cow.vel.y).toBeLessThanOrEqual(-35);
    });

    it("bounces off the left wall", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 25, y: 300 }, vel: { x: -20, y: 0 } }),
            mkCtx(),
            42,
            cfg,
        );
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.pos.x).toBe(20);
        expect(step.cow.vel.x).toBe(20);
    });

    it("bounces off the right wall", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 375, y: 300 }, vel: { x: 20, y: 0 } }),
            mkCtx(),
            42,
            cfg,
        );
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.pos.x).toBe(380);
        expect(step.cow.vel.x).toBe(-20);
    });
});

describe("herding", () => {
    it("pushes a cow above the farmer further up", () => {
        // d = 50: strength = 3 * (1 - 50/70) * 60 = 360/7
        const v = herdingPush(
            { x: 100, y: 150 },
            { x: 0, y: -40 },
            { x: 100, y: 100 },
            cfg,
        );
        expect(v.x).toBe(0);
        expect(v.y).toBeCloseTo(-40 + 360 / 7, 6);
    });

    it("pushes along the farmer-to-cow direction", () => {
        // d = 50 along (0.6, 0.8)
        const v = herdingPush(
            { x: 130, y: 140 },
            { x: 0, y: 0 },
            { x: 100, y: 100 },
            cfg,
        );
        expect(v.x).toBeCloseTo((0.6 * 360) / 7, 6);
        expect(v.y).toBeCloseTo((0.8 * 360) / 7, 6);
    });

    it("does nothing at or beyond the herding radius", () => {
        const vel = { x: 3, y: -40 };
        expect(herdingPush({ x: 170, y: 100 }, vel, { x: 100, y: 100 }, cfg)).toBe(vel);
        expect(herdingPush({ x: 300, y: 100 }, vel, { x: 100, y: 100 }, cfg)).toBe(vel);
    });

    it("skips the push when cow and farmer coincide", () => {
        const vel = { x: 3, y: -40 };
        expect(herdingPush({ x: 100, y: 100 }, vel, { x: 100, y: 100 }, cfg)).toBe(vel);
    });

    it("raises vy of a wandering cow near the farmer", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 100, y: 150 } }),
            mkCtx({ dt: 0.016, farmer: { x: 100, y: 100 } }),
            42,
            cfg,
        );
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.vel.y).toBeGreaterThan(-40);
    });
});

describe("fence and gate", () => {
    it("bounces off the closed fence at half speed", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 100, y: 520 }, vel: { x: 0, y: 20 } }),
            mkCtx({ gateOpening: 0 }),
            42,
            cfg,
        );
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.pos.y).toBe(523); // fence 544 - radius 20 - 1
        expect(step.cow.vel.y).toBe(-10);
    });

    it("reaches safety through the open gate", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 200, y: 520 }, vel: { x: 0, y: 20 } }),
            mkCtx({ gateOpening: 160 }),
            42,
            cfg,
        );
        expect(step.outcome).toBe("safe");
        expect(step.cow.pos).toEqual({ x: 200, y: 569 });
    });

    it("is blocked when the gap is too narrow for the cow", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 200, y: 520 }, vel: { x: 0, y: 20 } }),
            mkCtx({ gateOpening: 30 }),
            42,
            cfg,
        );
        expect(step.outcome).toBe("alive");
        expect(step.cow.pos.y).toBe(523);
    });
});

describe("ditch", () => {
    it("starts drowning on reaching the ditch edge", () => {
        const step = wanderCow(
            mkCow({ pos: { x: 100, y: 120 } }),
            mkCtx({ drowningDuration: 7 }),
            42,
            cfg,
        );
        if (step.outcome !== "alive") throw new Error("expected alive");
        expect(step.cow.lifecycle).toBe("drowning");
        expect(step.cow.pos).toEqual({ x: 100, y: 40 });
        if (step.cow.lifecycle !== "drowning") return;
        expect(step.cow.drownTimer).toBe(7);
        expect(step.events).toEqual([
            { type: "splashOccurred", cowId: 1, position: { x: 100, y: 40 } },
        ]);
    });

    it("snaps into the water and keeps its identity", () => {
        const { cow, event } = startDrowning(mkCow({ id: 9 }), 10, cfg);
        expect(cow.id).toBe(9);
        expect(cow.pos.y).toBe(40);
        expect(cow.drownTimer).toBe(10);
        expect(event.type).toBe("splashOccurred");
    });

    it("counts down while drowning", () => {
        const step = drownCow(mkDrowning({ drownTimer: 5 }), 1, 7);
        expect(step.outcome).toBe("alive");
        if (step.outcome !== "alive" || step.cow.lifecycle !== "drowning") return;
        expect(step.cow.drownTimer).toBe(4);
    });

    it("is lost when the countdown reaches zero", () => {
        expect(drownCow(mkDrowning({ drownTimer: 0.5 }), 0.5, 7).outcome).toBe(
            "dead",
        );
    });

    it("never leaves the ditch by itself except as dead", () => {
        let cow = mkDrowning({ drownTimer: 3 });
        for (let i = 0; i < 100; i++) {
            const step = drownCow(cow, 0.1, 7);
            expect(step.outcome).not.toBe("safe");
            if (step.outcome === "dead") return;
            if (step.cow.lifecycle !== "drowning") throw new Error("left ditch");
            cow = step.cow;
        }
        throw new Error("never drowned");
    });
});

describe("lasso", () => {
    it("rescues to mid-field as a fresh wandering cow", () => {
        const { cow } = rescueCow(mkDrowning({ id: 4 }), 99, 0, cfg);
        expect(cow.id).toBe(4);
        expect(cow.lifecycle).toBe("wandering");
        expect("drownTimer" in cow).toBe(false);
        expect(cow.pos.x).toBeGreaterThanOrEqual(80);
        expect(cow.pos.x).toBeLessThanOrEqual(320);
        expect(cow.pos.y).toBe(312);
        expect(cow.vel.y).toBe(-40);
        expect(cow.wanderTimer).toBe(0);
    });

    it("uses the current cow speed for the rescued cow", () => {
        expect(rescueCow(mkDrowning(), 99, 2, cfg).cow.vel.y).toBe(-56);
    });

    // First match in spawn order wins, even when a later cow is nearer
    it("picks the first drowning cow within reach", () => {
        const a = mkDrowning({ id: 1, pos: { x: 100, y: 40 } });
        const b = mkDrowning({ id: 2, pos: { x: 130, y: 40 } });
        const farmer = { x: 200, y: 150 };
        expect(findLassoTarget([a, b], { x: 125, y: 40 }, farmer, cfg)).toBe(a);
        expect(findLassoTarget([b, a], { x: 125, y: 40 }, farmer, cfg)).toBe(b);
    });

    it("ignores cows out of reach and wandering cows", () => {
        const far = mkDrowning({ id: 1, pos: { x: 300, y: 40 } });
        const dry = mkCow({ id: 2, pos: { x: 100, y: 40 } });
        const farmer = { x: 200, y: 150 };
        const target = findLassoTarget([far, dry], { x: 100, y: 40 }, farmer, cfg);
        expect(target).toBeUndefined();
    });

    it("needs the farmer near the ditch", () => {
        const cow = mkDrowning();
        expect(findLassoTarget([cow], cow.pos, { x: 200, y: 179 }, cfg)).toBe(cow);
        expect(findLassoTarget([cow], cow.pos, { x: 200, y: 180 }, cfg)).toBeUndefined();
    });
});
