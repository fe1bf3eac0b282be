/**
 * A required input file does not exist. Fatal: raised before any processing.
 */
export class MissingInputError extends Error {
    constructor(public readonly path: string, hint?: string) {
        super(hint ? `${path} not found - ${hint}` : `${path} not found`);
        this.name = 'MissingInputError';
    }
}

/**
 * An input file exists but cannot be used at all.
 */
export class InvalidInputError extends Error {
    constructor(public readonly path: string, reason: string) {
        super(`${path}: ${reason}`);
        this.name = 'InvalidInputError';
    }
}
