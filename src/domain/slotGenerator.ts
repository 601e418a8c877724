import type * as types from "../types";
import { addDays, addMinutes, compareAsc, set, startOfDay } from "date-fns";
import { enumerateCandidates, overlaps, pickCandidate, toMinuteIntervals } from './candidates';
import {
    DEFAULT_MAX_ATTEMPTS_PER_DAY,
    DEFAULT_MAX_SCAN_DAYS,
    validateConfiguration,
    weekdayOf
} from './configuration';
import { InvalidConfigurationError } from './errors';
import { hoursToMinutes } from './timeOfDay';

/**
 * Sort slots by start date-time, earliest first
 */
export const sortSlots = (slots: types.TimeSlot[]): types.TimeSlot[] =>
    [...slots].sort((a, b) => compareAsc(a.start, b.start));

/**
 * Place up to `maxSlotsPerDay` non-overlapping slots on one calendar date
 *
 * Bounded random search:
 * 1. Draw a candidate start uniformly (repeats are possible)
 * 2. Reject it if the slot meets an avoid range for this weekday
 * 3. Reject it if the slot meets a slot already accepted today
 * 4. Otherwise accept it
 *
 * Every draw counts as one attempt. Once `maxAttemptsPerDay` draws are spent the day keeps
 * whatever it has, so a tightly packed window may end up with fewer slots than the cap.
 *
 * @param day - Calendar date (any time of day; normalized to midnight)
 * @param candidates - Candidate starts in minutes since midnight, non-empty
 * @param config - Validated configuration
 * @param random - Uniform generator in [0, 1)
 * @returns Accepted slots sorted by start time
 */
export function placeDay(
    day: Date,
    candidates: readonly number[],
    config: types.Configuration,
    random: () => number
): types.TimeSlot[] {
    const date = startOfDay(day);
    const avoided = toMinuteIntervals(config.avoidRanges[weekdayOf(date)] ?? []);
    const maxAttempts = config.maxAttemptsPerDay ?? DEFAULT_MAX_ATTEMPTS_PER_DAY;

    const accepted: types.MinuteInterval[] = [];
    let attempts = 0;

    while (accepted.length < config.maxSlotsPerDay && attempts < maxAttempts) {
        attempts++;
        const start = pickCandidate(candidates, random);
        const slot = { start, end: start + config.slotDurationMinutes };

        if (avoided.some(range => overlaps(slot, range))) continue;
        if (accepted.some(other => overlaps(slot, other))) continue;

        accepted.push(slot);
    }

    return accepted
        .sort((a, b) => a.start - b.start)
        .map(({ start }) => {
            const slotStart = set(date, { hours: Math.floor(start / 60), minutes: start % 60, seconds: 0, milliseconds: 0 });
            return { date, start: slotStart, end: addMinutes(slotStart, config.slotDurationMinutes) };
        });
}

/**
 * Generate randomized, non-overlapping time slots
 *
 * Day walk:
 * 1. Start at today + `daysFromToday`, midnight
 * 2. Skip avoided weekdays entirely
 * 3. Place the day's slots, merge them into the result, re-sort and truncate to `slotCount`
 * 4. Stop once `slotCount` slots exist or `maxScanDays` days have been walked
 *
 * Returning fewer slots than requested is not an error: it means the configuration could not
 * be satisfied within the scanned days (e.g. every weekday avoided).
 *
 * @param config - Generation settings
 * @param options - Reference date and random source
 * @returns Slots sorted by start, at most `slotCount` of them
 *
 * @throws {InvalidConfigurationError} Invalid settings, or no start time fits the window
 */
export function generate(config: types.Configuration, options: types.GenerateOptions = {}): types.TimeSlot[] {
    validateConfiguration(config);

    const candidates = enumerateCandidates(
        hoursToMinutes(config.windowStart),
        hoursToMinutes(config.windowEnd),
        config.slotDurationMinutes,
        config.incrementMinutes
    );
    if (candidates.length === 0) {
        throw new InvalidConfigurationError('Slot duration does not fit between window start and window end', 'slotDurationMinutes');
    }

    const random = options.random ?? Math.random;
    const firstDay = startOfDay(addDays(options.now ?? new Date(), config.daysFromToday));
    const maxScanDays = config.maxScanDays ?? DEFAULT_MAX_SCAN_DAYS;

    let slots: types.TimeSlot[] = [];

    for (let offset = 0; offset < maxScanDays && slots.length < config.slotCount; offset++) {
        const day = addDays(firstDay, offset);
        if (config.avoidWeekdays.includes(weekdayOf(day))) continue;

        const daily = placeDay(day, candidates, config, random);
        slots = sortSlots([...slots, ...daily]).slice(0, config.slotCount);
    }

    return slots;
}
