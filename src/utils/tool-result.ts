/**
 * Uniform envelope for every lookup, mutator and validator result.
 *
 * Expected failures (unknown name, bad filter, rule violation) travel
 * through this type; only broken reference data is thrown.
 */

export interface ToolSuccess<T> {
    status: 'success';
    result: T;
    /** Advisory text, such as a mutator's confirmation */
    message?: string;
}

export interface ToolFailure<E = never> {
    status: 'failure';
    message: string;
    /** Structured detail; only the validator's report uses it */
    result?: E;
}

export type ToolResult<T, E = never> = ToolSuccess<T> | ToolFailure<E>;

export function success<T>(result: T, message?: string): ToolSuccess<T> {
    return message === undefined
        ? { status: 'success', result }
        : { status: 'success', result, message };
}

export function failure(message: string): ToolFailure;
export function failure<E>(message: string, result: E): ToolFailure<E>;
export function failure<E>(message: string, result?: E): ToolFailure<E> {
    return result === undefined
        ? { status: 'failure', message }
        : { status: 'failure', message, result };
}

/**
 * Chain a follow-up onto a success; failures pass through unchanged.
 */
export function andThen<T, U, E>(
    outcome: ToolResult<T, E>,
    next: (value: T, message?: string) => ToolResult<U, E>
): ToolResult<U, E> {
    return outcome.status === 'success' ? next(outcome.result, outcome.message) : outcome;
}
