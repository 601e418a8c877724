import type { AvoidRange, Configuration, SettingsForm, Weekday } from './types';
import { DAY_NAMES, WEEKDAY_BY_NAME, defaultConfiguration } from './domain/configuration';
import { InvalidConfigurationError } from './domain/errors';
import { formatHour24, parseTime } from './domain/timeOfDay';

/**
 * Labels of the editor fields, used in error messages
 */
export const FIELD_LABELS = {
    numSlots: 'Number of slots',
    duration: 'Duration (hours)',
    startTime: 'Start time',
    endTime: 'End time',
    increment: 'Increment (minutes)',
    daysAhead: 'Days from today to start',
    slotsPerDay: 'Max slots per day',
    avoidTimes: 'Avoid specific times',
} as const;

// plain digits, optional fraction; no sign, exponent or radix prefix
const DECIMAL = /^\d+(\.\d+)?$/;

type NumericField = 'numSlots' | 'duration' | 'increment' | 'daysAhead' | 'slotsPerDay';

const readNumber = (form: SettingsForm, field: NumericField, accept: (n: number) => boolean, expected: string): number => {
    const text = form[field].trim();
    const value = Number(text);
    if (!DECIMAL.test(text) || !accept(value)) {
        throw new InvalidConfigurationError(`${FIELD_LABELS[field]} must be ${expected}`, field);
    }
    return value;
}

const positiveInteger = (form: SettingsForm, field: NumericField): number =>
    readNumber(form, field, n => Number.isInteger(n) && n > 0, 'a positive whole number');

/**
 * Convert the editor's text fields into a generator configuration
 *
 * Fields are parsed in form order; the first one that fails is reported.
 *
 * @throws {InvalidConfigurationError} A numeric field is not a positive (or, for days ahead, non-negative) number
 * @throws {InvalidTimeFormatError} A time field is not HH:MM
 */
export const parseForm = (form: SettingsForm): Configuration => {
    const slotCount = positiveInteger(form, 'numSlots');
    const durationHours = readNumber(form, 'duration', n => n > 0, 'a positive number of hours');
    const windowStart = parseTime(form.startTime, 'startTime', FIELD_LABELS.startTime);
    const windowEnd = parseTime(form.endTime, 'endTime', FIELD_LABELS.endTime);
    const incrementMinutes = positiveInteger(form, 'increment');
    const daysFromToday = readNumber(form, 'daysAhead', n => Number.isInteger(n) && n >= 0, 'zero or a positive whole number');
    const maxSlotsPerDay = positiveInteger(form, 'slotsPerDay');

    const slotDurationMinutes = Math.round(durationHours * 60);
    if (slotDurationMinutes <= 0) {
        throw new InvalidConfigurationError(`${FIELD_LABELS.duration} must be at least one minute`, 'duration');
    }

    const avoidRanges: Partial<Record<Weekday, AvoidRange[]>> = {};
    for (const entry of form.avoidTimes) {
        const weekday = WEEKDAY_BY_NAME[entry.day];
        const range = { start: parseTime(entry.start, 'avoidTimes', FIELD_LABELS.avoidTimes), end: parseTime(entry.end, 'avoidTimes', FIELD_LABELS.avoidTimes) };
        avoidRanges[weekday] = [...(avoidRanges[weekday] ?? []), range];
    }

    return {
        slotCount,
        slotDurationMinutes,
        windowStart,
        windowEnd,
        incrementMinutes,
        daysFromToday,
        avoidWeekdays: form.avoidDays.map(day => WEEKDAY_BY_NAME[day]),
        avoidRanges,
        maxSlotsPerDay,
    };
}

/**
 * Editor form pre-filled from the default configuration
 */
export const defaultForm = (): SettingsForm => ({
    numSlots: String(defaultConfiguration.slotCount),
    duration: String(defaultConfiguration.slotDurationMinutes / 60),
    startTime: formatHour24(defaultConfiguration.windowStart),
    endTime: formatHour24(defaultConfiguration.windowEnd),
    increment: String(defaultConfiguration.incrementMinutes),
    daysAhead: String(defaultConfiguration.daysFromToday),
    slotsPerDay: String(defaultConfiguration.maxSlotsPerDay),
    avoidDays: defaultConfiguration.avoidWeekdays.map(day => DAY_NAMES[day] ?? 'Mon'),
    avoidTimes: [],
});

/**
 * Overlay changed fields on a form without modifying it
 *
 * @param patch - Fields to replace; undefined fields keep their current value
 */
export const applyPatch = (form: SettingsForm, patch: Partial<SettingsForm>): SettingsForm => ({
    numSlots: patch.numSlots ?? form.numSlots,
    duration: patch.duration ?? form.duration,
    startTime: patch.startTime ?? form.startTime,
    endTime: patch.endTime ?? form.endTime,
    increment: patch.increment ?? form.increment,
    daysAhead: patch.daysAhead ?? form.daysAhead,
    slotsPerDay: patch.slotsPerDay ?? form.slotsPerDay,
    avoidDays: [...(patch.avoidDays ?? form.avoidDays)],
    avoidTimes: (patch.avoidTimes ?? form.avoidTimes).map(entry => ({ ...entry })),
});
