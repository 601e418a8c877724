import type { AvoidRange, MinuteInterval } from "../types";
import { hoursToMinutes } from "./timeOfDay";

/**
 * Enumerate the start times a slot may take within one day
 *
 * Algorithm:
 * 1. Start at the window start
 * 2. Step forward by the increment
 * 3. Stop once a slot starting there would end after the window end
 *
 * Example: window 09:00-12:00, duration 60min, increment 30min:
 * - 09:00, 09:30, 10:00, 10:30, 11:00
 *
 * Works on whole minutes since midnight so the last start is reached exactly.
 *
 * @param windowStart - Earliest start, minutes since midnight
 * @param windowEnd - Latest end, minutes since midnight
 * @param duration - Slot length in minutes
 * @param increment - Step between candidates in minutes (positive)
 * @returns Ascending candidate starts; empty when the slot does not fit the window
 */
export const enumerateCandidates = (
    windowStart: number,
    windowEnd: number,
    duration: number,
    increment: number
): number[] => {
    const candidates: number[] = [];
    const lastStart = windowEnd - duration;

    for (let current = windowStart; current <= lastStart; current += increment) {
        candidates.push(current);
    }

    return candidates;
}

/**
 * Half-open overlap test: intervals that only touch do not overlap
 */
export const overlaps = (a: MinuteInterval, b: MinuteInterval): boolean =>
    a.start < b.end && a.end > b.start;

/**
 * Convert avoid ranges given in fractional hours to minute intervals
 */
export const toMinuteIntervals = (ranges: readonly AvoidRange[]): MinuteInterval[] =>
    ranges.map(range => ({ start: hoursToMinutes(range.start), end: hoursToMinutes(range.end) }));

/**
 * Pick one candidate uniformly at random
 *
 * @param candidates - Non-empty candidate list
 * @param random - Uniform generator in [0, 1)
 */
export const pickCandidate = (candidates: readonly number[], random: () => number): number => {
    const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length));
    const candidate = candidates[index];
    if (candidate === undefined) {
        throw new RangeError('Cannot pick from an empty candidate list');
    }
    return candidate;
}
