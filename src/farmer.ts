/** ============================
 * Farmer (pointer-driven avatar)
 * ============================ */
import { type Farmer, type GameConfig, Herding, type Vector2 } from "./types";
import { clamp, dist, vecAdd, vecSub } from "./util";

/** Keep the farmer on the grass between the ditch and the fence */
export const clampFarmer = (pos: Vector2, cfg: GameConfig): Vector2 => {
    const r = cfg.farmer.radius;
    const { width, ditchHeight, fenceY } = cfg.field;
    return {
        x: clamp(pos.x, r, width - r),
        y: clamp(pos.y, ditchHeight + r, fenceY - r),
    };
};

/** Pointer coordinates outside the field are pulled back onto it */
export const clampToField = (point: Vector2, cfg: GameConfig): Vector2 => ({
    x: clamp(point.x, 0, cfg.field.width),
    y: clamp(point.y, 0, cfg.field.height),
});

export const initialFarmer = (cfg: GameConfig): Farmer => ({
    pos: {
        x: cfg.field.width / 2,
        y: (cfg.field.ditchHeight + cfg.field.fenceY) / 2,
    },
    radius: cfg.farmer.radius,
    isDragging: false,
    dragOffset: { x: 0, y: 0 },
});

/** Whether a press at point grabs the farmer */
export const canGrab = (farmer: Farmer, point: Vector2): boolean =>
    dist(farmer.pos, point) < farmer.radius * Herding.GRAB_REACH;

/** Start dragging, remembering where on the farmer the press landed */
export const beginDrag = (farmer: Farmer, point: Vector2): Farmer => ({
    ...farmer,
    isDragging: true,
    dragOffset: vecSub(farmer.pos, point),
});

export const dragTo = (
    farmer: Farmer,
    point: Vector2,
    cfg: GameConfig,
): Farmer =>
    farmer.isDragging
        ? { ...farmer, pos: clampFarmer(vecAdd(point, farmer.dragOffset), cfg) }
        : farmer;

export const endDrag = (farmer: Farmer): Farmer => ({
    ...farmer,
    isDragging: false,
});
