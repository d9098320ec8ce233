/**
 * @fileoverview Bounded waits for external calls
 *
 * @module domain/utils/timeout
 */

import { ModelCallError } from "../errors.js";

/**
 * Reject with a `timeout` ModelCallError when `promise` does not settle
 * within `timeoutMs`. The underlying call is not cancelled.
 *
 * @example
 * ```typescript
 * const text = await withTimeout(model.complete(request), 30_000, "primary");
 * ```
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, service: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ModelCallError("timeout", service, `no response within ${timeoutMs}ms`));
        }, timeoutMs);
    });

    return Promise.race([promise, timeout]).finally(() => {
        clearTimeout(timer);
    });
}
