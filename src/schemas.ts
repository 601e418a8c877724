import { z } from 'zod';

const DayNameSchema = z.enum(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);

/** Editor text field; numbers are accepted and kept as text */
const FieldSchema = z.coerce.string();

/**
 * One avoided time range as entered in the editor
 *
 * Times stay unparsed here so a malformed one is reported as `invalid_time_format`.
 */
export const AvoidTimeSchema = z.object({
    day: DayNameSchema,
    /** Start time (HH:mm format) */
    start: z.string(),
    /** End time (HH:mm format) */
    end: z.string(),
});

/**
 * Validation schema for PATCH /slots/settings and the optional POST /slots/generate body
 *
 * Every field is optional: omitted fields keep their current value.
 */
export const SettingsPatchSchema = z.object({
    /** Number of slots to generate */
    numSlots: FieldSchema.optional(),
    /** Slot duration in hours (decimals allowed) */
    duration: FieldSchema.optional(),
    /** Window start (HH:mm format) */
    startTime: FieldSchema.optional(),
    /** Window end (HH:mm format) */
    endTime: FieldSchema.optional(),
    /** Candidate start granularity in minutes */
    increment: FieldSchema.optional(),
    /** Days from today to the first candidate date */
    daysAhead: FieldSchema.optional(),
    /** Maximum slots placed on one day */
    slotsPerDay: FieldSchema.optional(),
    /** Weekdays excluded entirely */
    avoidDays: z.array(DayNameSchema).optional(),
    /** Replaces the whole avoided time list */
    avoidTimes: z.array(AvoidTimeSchema).optional(),
}).strict();

/**
 * Validation schema for DELETE /slots/settings/avoid-times/:index path parameters
 */
export const AvoidTimeParamsSchema = z.object({
    /** Position in the avoided time list (0-based) */
    index: z.coerce.number().int().nonnegative(),
});
