/**
 * Cows in the Ditch: simulation core.
 *
 * Herd wandering cows away from the ditch and through the gate. The core
 * is headless: a renderer reads the projections in state.ts, an audio
 * layer listens to events$/audioCues, and the host feeds pointer input
 * and frame deltas (or lets startLoop drive the clock).
 */

// Re-exports for tests and consumers
export * from "./types";
export * from "./config";
export * from "./util";
export * from "./clock";
export * from "./gate";
export * from "./difficulty";
export * from "./spawn";
export * from "./cow";
export * from "./farmer";
export * from "./state";
export * from "./highScore";
export * from "./observable";
