/** ============================
 * Frame clock
 *
 * Turns host timestamps into per-frame deltas. The first frame only
 * primes the clock, so the simulation never sees a jump from zero.
 * ============================ */

export type Clock = Readonly<{ lastTimestamp: number | null }>;

export const initialClock: Clock = { lastTimestamp: null };

/**
 * Advance the clock to `now` (seconds).
 * @returns the new clock and the elapsed time since the previous frame
 */
export const advanceClock = (
    clock: Clock,
    now: number,
): { clock: Clock; dt: number } => {
    const last = clock.lastTimestamp;
    const dt = last === null ? 0 : Math.max(0, now - last);
    return { clock: { lastTimestamp: now }, dt };
};
