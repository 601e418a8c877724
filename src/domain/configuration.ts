import { z } from 'zod';
import type { Configuration, DayName, Weekday } from '../types';
import { InvalidConfigurationError } from './errors';

/** Random draws per day before the day is left with fewer slots */
export const DEFAULT_MAX_ATTEMPTS_PER_DAY = 50;

/** Calendar days walked before giving up on reaching the slot count: offsets 0..89 from the first day */
export const DEFAULT_MAX_SCAN_DAYS = 90;

export const DAY_NAMES: readonly DayName[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

export const WEEKDAY_BY_NAME: Readonly<Record<DayName, Weekday>> = { Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6 };

// Date#getDay() is Sunday-first
const BY_JS_DAY = [6, 0, 1, 2, 3, 4, 5] as const;

const WeekdaySchema = z.number().int().min(0).max(6);

const AvoidRangeSchema = z.object({
    start: z.number().min(0).max(24),
    end: z.number().min(0).max(24),
}).refine(range => range.start < range.end, { message: 'Avoid range start must be before its end', path: ['start'] });

/**
 * Validation schema for a {@link Configuration}
 */
export const ConfigurationSchema = z.object({
    slotCount: z.number().int().positive(),
    slotDurationMinutes: z.number().int().positive(),
    /** Fractional hours, 0-24 */
    windowStart: z.number().min(0).max(24),
    windowEnd: z.number().min(0).max(24),
    incrementMinutes: z.number().int().positive(),
    daysFromToday: z.number().int().nonnegative(),
    avoidWeekdays: z.array(WeekdaySchema),
    /** Keys are weekday indices */
    avoidRanges: z.record(z.string().regex(/^[0-6]$/, 'Weekday must be 0-6'), z.array(AvoidRangeSchema)),
    maxSlotsPerDay: z.number().int().positive(),
    maxAttemptsPerDay: z.number().int().positive().optional(),
    maxScanDays: z.number().int().positive().optional(),
}).refine(config => config.windowStart < config.windowEnd, {
    message: 'Window start must be before window end',
    path: ['windowStart'],
});

/**
 * Check a configuration before any slot is generated
 *
 * @throws {InvalidConfigurationError} Naming the first offending field
 */
export const validateConfiguration = (config: Configuration): void => {
    const result = ConfigurationSchema.safeParse(config);
    if (result.success) return;

    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? '';
    throw new InvalidConfigurationError(`${field}: ${issue?.message ?? 'Invalid configuration'}`, field);
}

/**
 * Map a JavaScript date to a Monday-first weekday index
 */
export const weekdayOf = (date: Date): Weekday => BY_JS_DAY[date.getDay()] ?? 6;

/**
 * Settings the editor starts from
 */
export const defaultConfiguration: Configuration = {
    slotCount: 10,
    slotDurationMinutes: 150,
    windowStart: 9,
    windowEnd: 16.5,
    incrementMinutes: 30,
    daysFromToday: 7,
    avoidWeekdays: [5, 6],
    avoidRanges: {},
    maxSlotsPerDay: 1,
};
