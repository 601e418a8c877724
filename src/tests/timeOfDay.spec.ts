import { describe, it, expect } from 'vitest';
import { formatHour, formatHour24, hoursToMinutes, parseTime } from '../domain/timeOfDay';
import { InvalidTimeFormatError } from '../domain/errors';

describe('HH:MM parsing', () => {
    it('should convert to fractional hours', () => {
        expect(parseTime('09:30')).toBe(9.5);
        expect(parseTime('16:30')).toBe(16.5);
        expect(parseTime('0:00')).toBe(0);
        expect(parseTime(' 23:45 ')).toBe(23.75);
    });

    it.each(['9.30', '', '24:00', '12:60', 'ab:cd', '9:5', '09:30:00'])('should reject "%s"', text => {
        expect(() => parseTime(text)).toThrow(InvalidTimeFormatError);
    });

    it('should name the field in the error', () => {
        expect(() => parseTime('9am', 'startTime', 'Start time')).toThrow('Start time: Time must be in HH:MM format, e.g., 09:30');

        try {
            parseTime('9am', 'startTime', 'Start time');
        } catch (err) {
            expect(err).toMatchObject({ code: 'invalid_time_format', field: 'startTime' });
        }
    });
});

describe('Hour formatting', () => {
    it('should round fractional hours to whole minutes', () => {
        expect(hoursToMinutes(9.5)).toBe(570);
        expect(hoursToMinutes(1 / 3)).toBe(20);
    });

    it('should leave the hour unpadded in H:MM', () => {
        expect(formatHour(9)).toBe('9:00');
        expect(formatHour(16.5)).toBe('16:30');
    });

    it('should zero-pad HH:MM', () => {
        expect(formatHour24(9)).toBe('09:00');
        expect(formatHour24(9.25)).toBe('09:15');
        expect(formatHour24(14)).toBe('14:00');
    });
});
