import { InvalidTimeFormatError } from './errors';

const HHMM = /^(\d{1,2}):(\d{2})$/;

/**
 * Parse a 24-hour HH:MM string into fractional hours
 *
 * Example: "09:30" => 9.5
 *
 * @param text - Time string, hour 0-23 and minute 0-59
 * @param field - Name of the input the text came from, reported on failure
 * @param label - How the input is named in the error message (default: `field`)
 * @throws {InvalidTimeFormatError} If the text is not a valid HH:MM time
 */
export const parseTime = (text: string, field?: string, label: string | undefined = field): number => {
    const match = HHMM.exec(text.trim());
    const hours = Number(match?.[1]);
    const minutes = Number(match?.[2]);

    if (!match || hours > 23 || minutes > 59) {
        const prefix = label ? `${label}: ` : '';
        throw new InvalidTimeFormatError(`${prefix}Time must be in HH:MM format, e.g., 09:30`, field);
    }

    return hours + minutes / 60;
}

/**
 * Convert fractional hours to whole minutes since midnight
 */
export const hoursToMinutes = (hours: number): number => Math.round(hours * 60);

const split = (hours: number): { h: number; m: number } => {
    const total = hoursToMinutes(hours);
    return { h: Math.floor(total / 60), m: total % 60 };
}

/**
 * Format fractional hours as H:MM, hour unpadded (16.5 => "16:30", 9 => "9:00")
 */
export const formatHour = (hours: number): string => {
    const { h, m } = split(hours);
    return `${h}:${String(m).padStart(2, '0')}`;
}

/**
 * Format fractional hours as zero-padded HH:MM (9 => "09:00")
 */
export const formatHour24 = (hours: number): string => {
    const { h, m } = split(hours);
    return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}
