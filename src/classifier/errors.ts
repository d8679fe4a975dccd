/**
 * Machine-readable classifier error codes.
 */
export type ClassifierErrorCode = 'EMPTY_INPUT' | 'NO_MATCH' | 'INVALID_OPTION' | 'PIPELINE_CANCELLED';

/**
 * Base class for every error raised by the classifier and its pipeline.
 */
export class ClassifierError extends Error {
    constructor(
        message: string,
        public readonly code: ClassifierErrorCode
    ) {
        super(message);
        this.name = 'ClassifierError';
    }
}

/**
 * Raised by `classify` when the document is an empty string.
 */
export class EmptyInputError extends ClassifierError {
    constructor() {
        super('Cannot classify an empty document', 'EMPTY_INPUT');
        this.name = 'EmptyInputError';
    }
}

/**
 * Raised by `classify` when no category scored above zero.
 */
export class NoMatchError extends ClassifierError {
    constructor(message = 'No category matched the document') {
        super(message, 'NO_MATCH');
        this.name = 'NoMatchError';
    }
}

export class InvalidOptionError extends ClassifierError {
    constructor(
        public readonly option: string,
        message: string
    ) {
        super(`Invalid option "${option}": ${message}`, 'INVALID_OPTION');
        this.name = 'InvalidOptionError';
    }
}

/**
 * Raised to readers and writers of a token stream that was cancelled.
 */
export class PipelineCancelledError extends ClassifierError {
    constructor() {
        super('Token stream was cancelled', 'PIPELINE_CANCELLED');
        this.name = 'PipelineCancelledError';
    }
}
