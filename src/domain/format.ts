import { format } from "date-fns";
import type { AvoidRange, Configuration, SerializedSlot, TimeSlot, Weekday } from "../types";
import { DAY_NAMES } from "./configuration";
import { formatHour, formatHour24 } from "./timeOfDay";

/**
 * Render a slot as one human-readable line
 *
 * Example: "Monday, October 26, from 9:00 AM – 11:30 AM"
 */
export const formatSlot = (slot: TimeSlot): string =>
    `${format(slot.date, 'EEEE, MMMM d')}, from ${format(slot.start, 'h:mm a')} – ${format(slot.end, 'h:mm a')}`;

/**
 * Render an avoided range as shown in the editor list, e.g. "Mon 09:00 – 10:30"
 */
export const formatAvoidTime = (weekday: Weekday, range: AvoidRange): string =>
    `${DAY_NAMES[weekday]} ${formatHour24(range.start)} – ${formatHour24(range.end)}`;

const formatDuration = (minutes: number): string => `${Math.floor(minutes / 60)}h ${minutes % 60}m`;

/**
 * Settings summary printed by the console front end before the slot list
 */
export const formatSettings = (config: Configuration): string => {
    const avoidDays = config.avoidWeekdays.map(day => DAY_NAMES[day]).join(', ') || 'none';

    const avoidTimes: string[] = [];
    for (const [day, ranges] of Object.entries(config.avoidRanges)) {
        const name = DAY_NAMES[Number(day)];
        for (const range of ranges ?? []) {
            avoidTimes.push(`${name} ${formatHour(range.start)} – ${formatHour(range.end)}`);
        }
    }

    return [
        'Randomly generated time slots!',
        '',
        'Settings:',
        `- Time slots: ${config.slotCount}`,
        `- Duration: ${formatDuration(config.slotDurationMinutes)}`,
        `- Generate between ${formatHour(config.windowStart)} and ${formatHour(config.windowEnd)}`,
        `- Increment: ${config.incrementMinutes}m`,
        `- Start ${config.daysFromToday} days from today`,
        `- Max slots per day: ${config.maxSlotsPerDay}`,
        `- Avoid entire days: ${avoidDays}`,
        `- Avoid specific times: ${avoidTimes.join(', ') || 'none'}`,
    ].join('\n');
}

/**
 * Convert a slot to its JSON form (local, naive date-times)
 */
export const serializeSlot = (slot: TimeSlot): SerializedSlot => ({
    date: format(slot.date, 'yyyy-MM-dd'),
    start: format(slot.start, "yyyy-MM-dd'T'HH:mm"),
    end: format(slot.end, "yyyy-MM-dd'T'HH:mm"),
    label: formatSlot(slot)
});
