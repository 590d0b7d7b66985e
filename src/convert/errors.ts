/**
 * Errors raised while converting source records into timesheet lines
 */
export class ConversionError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConversionError';
    }
}

/**
 * No rule of a chain accepted the record
 */
export class NoMatchError extends ConversionError {
    readonly recordId: number;

    constructor(chainName: string, recordId: number) {
        super(`No rule in chain "${chainName}" matches record #${recordId}`);
        this.name = 'NoMatchError';
        this.recordId = recordId;
    }
}

/**
 * A description did not carry the structured "[id: short] rest" prefix a rule requires
 */
export class ExtractionError extends ConversionError {
    constructor(recordId: number, description: string) {
        super(`Couldn't extract task info from record #${recordId}: "${description}"`);
        this.name = 'ExtractionError';
    }
}

/**
 * A rule was asked to convert a record it must never produce a line for
 */
export class ForbiddenRecordError extends ConversionError {
    constructor(message: string) {
        super(message);
        this.name = 'ForbiddenRecordError';
    }
}

export class ChainConflictError extends Error {
    constructor(name: string) {
        super(`A conversion chain named "${name}" is already registered`);
        this.name = 'ChainConflictError';
    }
}

export class ChainNotFoundError extends Error {
    constructor(name: string, available: string[]) {
        super(`No conversion chain found with name "${name}" (available: ${available.join(', ') || 'none'})`);
        this.name = 'ChainNotFoundError';
    }
}
