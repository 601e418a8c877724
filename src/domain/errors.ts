/**
 * Base class for failures raised by the slot generator and its input parsers
 *
 * `code` is the machine-readable error returned by the API, `field` the input it concerns (if any).
 */
export class SlotGeneratorError extends Error {
    readonly code: string;
    readonly field: string | undefined;

    constructor(code: string, message: string, field?: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.field = field;
    }
}

/**
 * The configuration cannot produce any slot (bad counts, empty window, no candidate start time)
 */
export class InvalidConfigurationError extends SlotGeneratorError {
    constructor(message: string, field?: string) {
        super('invalid_configuration', message, field);
    }
}

/**
 * A time-of-day string is not in HH:MM form
 */
export class InvalidTimeFormatError extends SlotGeneratorError {
    constructor(message: string, field?: string) {
        super('invalid_time_format', message, field);
    }
}
