/**
 * Raised when a caller passes a parameter that breaks the notify contract.
 * Thrown before any request leaves the process.
 */
export class ValidationError extends Error {
    constructor(
        public readonly field: string,
        message: string
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}
