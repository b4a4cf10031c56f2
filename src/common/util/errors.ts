/**
 * @module Errors
 *
 * Base class for every error thrown by this project.
 */

/**
 * This class helps in the creation of custom errors.
 *
 * @class CustomError
 * @extends {Error}
 */
class CustomError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Returns a printable message for any thrown value.
 */
function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Wraps any thrown value that is not an Error.
 */
function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

export {
    CustomError,
    errorMessage,
    toError
};
