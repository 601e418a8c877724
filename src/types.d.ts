/**
 * Weekday index, Monday first: 0 = Monday ... 6 = Sunday
 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Short weekday names as shown by the editor, indexed by {@link Weekday}
 */
export type DayName = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri' | 'Sat' | 'Sun';

/**
 * Forbidden time-of-day interval, in fractional hours (9.5 = 09:30)
 *
 * Half-open: a slot ending exactly at `start` or starting exactly at `end` does not conflict.
 */
export interface AvoidRange {
    start: number;
    end: number;
}

/**
 * Immutable input of the slot generator
 */
export interface Configuration {
    /** Number of slots to produce */
    readonly slotCount: number;
    /** Length of every slot in minutes */
    readonly slotDurationMinutes: number;
    /** Earliest start of a slot, fractional hours */
    readonly windowStart: number;
    /** Latest end of a slot, fractional hours */
    readonly windowEnd: number;
    /** Granularity of candidate start times */
    readonly incrementMinutes: number;
    /** Offset of the first candidate date from today */
    readonly daysFromToday: number;
    /** Weekdays excluded entirely */
    readonly avoidWeekdays: readonly Weekday[];
    /** Per-weekday forbidden intervals */
    readonly avoidRanges: Readonly<Partial<Record<Weekday, readonly AvoidRange[]>>>;
    /** Cap on slots placed on one calendar date */
    readonly maxSlotsPerDay: number;
    /** Random draws allowed per day before giving up on it (default: 50) */
    readonly maxAttemptsPerDay?: number;
    /** Calendar days walked before returning what was collected (default: 90) */
    readonly maxScanDays?: number;
}

/**
 * Caller-supplied sources of time and randomness
 */
export interface GenerateOptions {
    /** Reference "today" (default: current time) */
    now?: Date;
    /** Uniform generator in [0, 1) (default: Math.random) */
    random?: () => number;
}

/**
 * Generated appointment slot
 *
 * `end - start` always equals the configured duration.
 */
export interface TimeSlot {
    /** Calendar date, local midnight */
    readonly date: Date;
    readonly start: Date;
    readonly end: Date;
}

/**
 * Interval in minutes since midnight
 */
export interface MinuteInterval {
    start: number;
    end: number;
}

/**
 * Avoided time range as typed into the editor
 */
export interface AvoidTimeEntry {
    day: DayName;
    /** HH:MM */
    start: string;
    /** HH:MM */
    end: string;
}

/**
 * Raw state of the settings editor
 *
 * Scalar fields hold text exactly as entered; they are only parsed when slots are generated.
 */
export interface SettingsForm {
    numSlots: string;
    /** Hours, decimals allowed */
    duration: string;
    /** HH:MM */
    startTime: string;
    /** HH:MM */
    endTime: string;
    /** Minutes */
    increment: string;
    daysAhead: string;
    slotsPerDay: string;
    avoidDays: DayName[];
    avoidTimes: AvoidTimeEntry[];
}

/**
 * Slot as returned by the HTTP API
 */
export interface SerializedSlot {
    /** yyyy-MM-dd */
    date: string;
    /** yyyy-MM-ddTHH:mm, local */
    start: string;
    /** yyyy-MM-ddTHH:mm, local */
    end: string;
    /** Human-readable line */
    label: string;
}
