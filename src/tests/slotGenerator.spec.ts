import { describe, it, expect } from 'vitest';
import { enumerateCandidates, overlaps } from '../domain/candidates';
import { generate, placeDay } from '../domain/slotGenerator';
import { weekdayOf } from '../domain/configuration';
import { InvalidConfigurationError } from '../domain/errors';
import type { Configuration, TimeSlot } from '../types';

// Monday, local time
const now = new Date(2026, 9, 19, 15, 42);

const base: Configuration = {
    slotCount: 1,
    slotDurationMinutes: 60,
    windowStart: 9,
    windowEnd: 10,
    incrementMinutes: 30,
    daysFromToday: 0,
    avoidWeekdays: [],
    avoidRanges: {},
    maxSlotsPerDay: 1,
};

/** Random source replaying the given values in a loop */
const sequence = (...values: number[]) => {
    let i = 0;
    return () => values[i++ % values.length] ?? 0;
};

const minuteOfDay = (date: Date) => date.getHours() * 60 + date.getMinutes();

describe('Candidate enumeration', () => {
    it('should step from window start up to the last start that fits', () => {
        // 09:00-16:30, 150min, every 30min
        const candidates = enumerateCandidates(540, 990, 150, 30);

        expect(candidates).toHaveLength(11);
        expect(candidates[0]).toBe(540);
        expect(candidates[10]).toBe(840);
    });

    it('should include the window start only when the slot fills the window exactly', () => {
        expect(enumerateCandidates(540, 600, 60, 30)).toEqual([540]);
    });

    it('should be empty when the slot does not fit', () => {
        expect(enumerateCandidates(540, 590, 60, 30)).toEqual([]);
    });

    it('should treat touching intervals as non-overlapping', () => {
        expect(overlaps({ start: 540, end: 600 }, { start: 600, end: 660 })).toBe(false);
        expect(overlaps({ start: 540, end: 601 }, { start: 600, end: 660 })).toBe(true);
        expect(overlaps({ start: 600, end: 660 }, { start: 540, end: 720 })).toBe(true);
    });
});

describe('Day placement', () => {
    it('should not place more than maxSlotsPerDay slots', () => {
        const config = { ...base, windowEnd: 18, maxSlotsPerDay: 3 };
        const candidates = enumerateCandidates(540, 1080, 60, 30);

        const slots = placeDay(now, candidates, config, Math.random);

        expect(slots.length).toBeLessThanOrEqual(3);
        expect(slots.length).toBeGreaterThan(0);
    });

    it('should give up after maxAttemptsPerDay draws', () => {
        const config = { ...base, windowEnd: 11, incrementMinutes: 60, maxSlotsPerDay: 2, maxAttemptsPerDay: 2 };

        // both draws hit 10:00
        const slots = placeDay(now, [540, 600], config, sequence(0.9));

        expect(slots).toHaveLength(1);
        expect(slots[0]!.start).toEqual(new Date(2026, 9, 19, 10, 0));
    });

    it('should retry when a draw meets an avoided range', () => {
        const config: Configuration = {
            ...base,
            windowEnd: 12,
            incrementMinutes: 60,
            avoidRanges: { 0: [{ start: 9, end: 10.5 }] }
        };

        // 09:00 rejected, 10:00 rejected, 11:00 accepted
        const slots = placeDay(now, [540, 600, 660], config, sequence(0, 0.5, 0.9));

        expect(slots).toHaveLength(1);
        expect(slots[0]!.start).toEqual(new Date(2026, 9, 19, 11, 0));
        expect(slots[0]!.date).toEqual(new Date(2026, 9, 19));
    });

    it('should accept a slot that only touches an avoided range', () => {
        const config: Configuration = { ...base, windowEnd: 12, avoidRanges: { 0: [{ start: 10, end: 11 }] } };

        const slots = placeDay(now, [540, 600, 660], config, sequence(0));

        expect(slots[0]!.start).toEqual(new Date(2026, 9, 19, 9, 0));
        expect(slots[0]!.end).toEqual(new Date(2026, 9, 19, 10, 0));
    });
});

describe('Slot generation', () => {
    it('should always start at 9:00 when the window holds one slot', () => {
        const slots = generate(base, { now });

        expect(slots).toHaveLength(1);
        expect(slots[0]!.date).toEqual(new Date(2026, 9, 19));
        expect(slots[0]!.start).toEqual(new Date(2026, 9, 19, 9, 0));
        expect(slots[0]!.end).toEqual(new Date(2026, 9, 19, 10, 0));
    });

    it('should place one slot per eligible day', () => {
        const slots = generate({ ...base, slotCount: 5 }, { now });

        expect(slots.map(slot => slot.start)).toEqual([19, 20, 21, 22, 23].map(day => new Date(2026, 9, day, 9, 0)));
    });

    it('should always choose the only candidate when duration equals the window', () => {
        const config = { ...base, slotCount: 3, slotDurationMinutes: 150, windowEnd: 11.5 };

        const slots = generate(config, { now, random: sequence(0.999) });

        expect(slots).toHaveLength(3);
        for (const slot of slots) {
            expect(minuteOfDay(slot.start)).toBe(540);
            expect(minuteOfDay(slot.end)).toBe(690);
        }
    });

    it('should return two adjacent slots in start order', () => {
        const config = { ...base, slotCount: 2, windowEnd: 11, incrementMinutes: 60, maxSlotsPerDay: 2 };

        // 10:00 drawn first, then 09:00
        const slots = generate(config, { now, random: sequence(0.9, 0.1) });

        expect(slots.map(slot => slot.start)).toEqual([new Date(2026, 9, 19, 9, 0), new Date(2026, 9, 19, 10, 0)]);
        expect(slots.map(slot => slot.end)).toEqual([new Date(2026, 9, 19, 10, 0), new Date(2026, 9, 19, 11, 0)]);
    });

    it('should move to the next day once the attempt budget is spent', () => {
        const config = { ...base, slotCount: 2, windowEnd: 11, incrementMinutes: 60, maxSlotsPerDay: 2, maxAttemptsPerDay: 2 };

        const slots = generate(config, { now, random: sequence(0.9) });

        expect(slots.map(slot => slot.start)).toEqual([new Date(2026, 9, 19, 10, 0), new Date(2026, 9, 20, 10, 0)]);
    });

    it('should start daysFromToday days after now', () => {
        const slots = generate({ ...base, daysFromToday: 7 }, { now });

        expect(slots[0]!.date).toEqual(new Date(2026, 9, 26));
    });

    it('should skip avoided weekdays', () => {
        const slots = generate({ ...base, slotCount: 2, avoidWeekdays: [0, 1] }, { now });

        expect(slots.map(slot => slot.date)).toEqual([new Date(2026, 9, 21), new Date(2026, 9, 22)]);
    });

    it('should return no slots when every weekday is avoided', () => {
        const slots = generate({ ...base, avoidWeekdays: [0, 1, 2, 3, 4, 5, 6] }, { now });

        expect(slots).toEqual([]);
    });

    it('should return fewer slots than requested when the day walk runs out', () => {
        const slots = generate({ ...base, slotCount: 10, maxScanDays: 3 }, { now });

        expect(slots.map(slot => slot.date)).toEqual([19, 20, 21].map(day => new Date(2026, 9, day)));
    });

    it('should stop the day walk after 90 days by default', () => {
        const slots = generate({ ...base, slotCount: 200 }, { now });

        expect(slots).toHaveLength(90);
        expect(slots[0]!.date).toEqual(new Date(2026, 9, 19));
        expect(slots[89]!.date).toEqual(new Date(2026, 9, 19 + 89));
    });

    it('should fail when the slot is longer than the window', () => {
        expect(() => generate({ ...base, slotDurationMinutes: 120 }, { now })).toThrow(InvalidConfigurationError);
    });

    it('should fail when the window start is after the window end', () => {
        expect(() => generate({ ...base, windowStart: 10, windowEnd: 9 }, { now })).toThrow(InvalidConfigurationError);
    });

    it.each([
        ['slotCount', { slotCount: 0 }],
        ['maxSlotsPerDay', { maxSlotsPerDay: 0 }],
        ['incrementMinutes', { incrementMinutes: -30 }],
        ['slotDurationMinutes', { slotDurationMinutes: 0 }],
        ['windowStart', { windowStart: 10 }],
        ['daysFromToday', { daysFromToday: -1 }],
    ])('should report %s as the invalid field', (field, override) => {
        let error: unknown;
        try {
            generate({ ...base, ...override }, { now });
        } catch (err) {
            error = err;
        }

        expect(error).toBeInstanceOf(InvalidConfigurationError);
        expect(error).toMatchObject({ code: 'invalid_configuration', field });
    });
});

describe('Generated slot properties', () => {
    const config: Configuration = {
        slotCount: 25,
        slotDurationMinutes: 45,
        windowStart: 8,
        windowEnd: 18,
        incrementMinutes: 15,
        daysFromToday: 1,
        avoidWeekdays: [6],
        avoidRanges: {
            2: [{ start: 12, end: 13 }],
            4: [{ start: 8, end: 9.5 }, { start: 15, end: 16 }]
        },
        maxSlotsPerDay: 3,
    };

    const runs: TimeSlot[][] = Array.from({ length: 20 }, () => generate(config, { now }));

    it('should produce exactly the requested count', () => {
        for (const slots of runs) {
            expect(slots).toHaveLength(25);
        }
    });

    it('should keep every slot exactly one duration long', () => {
        for (const slot of runs.flat()) {
            expect(slot.end.getTime() - slot.start.getTime()).toBe(45 * 60_000);
        }
    });

    it('should return slots in ascending start order', () => {
        for (const slots of runs) {
            const starts = slots.map(slot => slot.start.getTime());
            expect(starts).toEqual([...starts].sort((a, b) => a - b));
        }
    });

    it('should respect avoided days, avoided ranges and the window', () => {
        for (const slot of runs.flat()) {
            const weekday = weekdayOf(slot.start);
            const start = minuteOfDay(slot.start);
            const end = start + 45;

            expect(weekday).not.toBe(6);
            expect(start).toBeGreaterThanOrEqual(480);
            expect(end).toBeLessThanOrEqual(1080);
            for (const range of config.avoidRanges[weekday] ?? []) {
                expect(overlaps({ start, end }, { start: range.start * 60, end: range.end * 60 })).toBe(false);
            }
        }
    });

    it('should neither overlap nor exceed the cap within a day', () => {
        for (const slots of runs) {
            const byDate = new Map<number, TimeSlot[]>();
            for (const slot of slots) {
                byDate.set(slot.date.getTime(), [...(byDate.get(slot.date.getTime()) ?? []), slot]);
            }

            for (const daily of byDate.values()) {
                expect(daily.length).toBeLessThanOrEqual(3);
                for (let i = 1; i < daily.length; i++) {
                    expect(daily[i]!.start.getTime()).toBeGreaterThanOrEqual(daily[i - 1]!.end.getTime());
                }
            }
        }
    });
});
