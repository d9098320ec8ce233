/**
 * @fileoverview Result Contract
 *
 * Explicit success/failure values for calls into unreliable collaborators.
 * Stages return a Result instead of throwing so the cascade can branch on
 * outcomes without catching exceptions.
 *
 * @module @legal-cascade/engine/contracts/Result
 */

/**
 * Successful outcome carrying a value.
 */
export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed outcome carrying an error.
 */
export interface Err<E> {
    readonly ok: false;
    readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
    return Object.freeze({ ok: true as const, value });
}

export function err<E>(error: E): Err<E> {
    return Object.freeze({ ok: false as const, error });
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
    return !result.ok;
}

/**
 * Normalize any thrown value into a message string.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
