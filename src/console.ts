/**
 * Console front end: fixed settings, printed summary, one generated slot per line.
 */

import type { Configuration } from "./types";
import { generate } from "./domain/slotGenerator";
import { formatSettings, formatSlot } from "./domain/format";

export const consoleConfiguration: Configuration = {
    slotCount: 10,
    slotDurationMinutes: 150,
    windowStart: 9,
    windowEnd: 16.5,
    incrementMinutes: 30,
    daysFromToday: 7,
    // weekends
    avoidWeekdays: [5, 6],
    avoidRanges: {
        0: [{ start: 9, end: 10.5 }],
        1: [{ start: 14, end: 15.5 }]
    },
    maxSlotsPerDay: 1
};

/**
 * Print the settings summary, then generate and print one line per slot
 *
 * The summary is written before generation, so it still appears when the configuration is rejected.
 *
 * @param write - Receives each chunk of output
 * @returns How many slots were produced
 * @throws {InvalidConfigurationError} After the summary, if the configuration is invalid
 */
export const printListing = (config: Configuration, write: (text: string) => void, now: Date = new Date()): number => {
    write(`\n${formatSettings(config)}\n\n`);
    const slots = generate(config, { now });
    for (const slot of slots) {
        write(`${formatSlot(slot)}\n`);
    }
    return slots.length;
}
