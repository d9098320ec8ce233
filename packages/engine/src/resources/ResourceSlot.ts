/**
 * @fileoverview ResourceSlot
 *
 * Holds one expensive handle (a loaded model, a client with warm weights)
 * behind a single-slot queue. At most one task uses the handle at a time;
 * concurrent callers wait their turn instead of loading a second copy.
 *
 * Lifecycle operations (load, unload, reload) are queued behind in-flight
 * work, so unloading never pulls a handle out from under a running task.
 *
 * @module @legal-cascade/engine/resources/ResourceSlot
 */

import pLimit from "p-limit";
import type { Logger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";

export interface ResourceSlotOptions<T> {
    /** Name used in logs and errors */
    readonly name: string;

    /** Create the handle */
    readonly load: () => Promise<T>;

    /** Release the handle (optional) */
    readonly unload?: (handle: T) => Promise<void> | void;

    /**
     * Load on first use (default: true). When false, `run()` on an unloaded
     * slot fails with ResourceUnavailableError until `load()` is called.
     */
    readonly autoLoad?: boolean;

    readonly logger?: Logger;
}

/**
 * Raised when a task needs a handle the slot does not hold.
 */
export class ResourceUnavailableError extends Error {
    constructor(readonly resource: string, reason: string) {
        super(`Resource ${resource} unavailable: ${reason}`);
        this.name = "ResourceUnavailableError";
    }
}

interface Loaded<T> {
    readonly handle: T;
}

/**
 * Single-slot holder for an expensive handle.
 *
 * @example
 * ```typescript
 * const slot = new ResourceSlot({
 *     name: "fallback-local",
 *     load: async () => new OpenAICompatibleModel({ id: "fallback-local", baseURL, model }),
 * });
 *
 * const text = await slot.run(model => model.complete(request));
 * await slot.unload();
 * ```
 */
export class ResourceSlot<T> {
    readonly name: string;

    private readonly options: ResourceSlotOptions<T>;
    private readonly limit = pLimit(1);
    private loaded: Loaded<T> | null = null;
    private readonly logger: Logger;

    constructor(options: ResourceSlotOptions<T>) {
        this.name = options.name;
        this.options = options;
        this.logger = options.logger ?? silentLogger;
    }

    get isLoaded(): boolean {
        return this.loaded !== null;
    }

    /**
     * Tasks queued or running against this slot.
     */
    get pendingCount(): number {
        return this.limit.activeCount + this.limit.pendingCount;
    }

    /**
     * Run a task with exclusive use of the handle.
     */
    run<R>(task: (handle: T) => Promise<R>): Promise<R> {
        return this.limit(async () => {
            const handle = await this.acquire(this.options.autoLoad ?? true);
            return task(handle);
        });
    }

    /**
     * Load the handle now if not already held.
     */
    load(): Promise<void> {
        return this.limit(async () => {
            await this.acquire(true);
        });
    }

    /**
     * Release the handle once queued work has finished.
     */
    unload(): Promise<void> {
        return this.limit(() => this.release());
    }

    /**
     * Release and load a fresh handle.
     */
    reload(): Promise<void> {
        return this.limit(async () => {
            await this.release();
            await this.acquire(true);
        });
    }

    private async acquire(allowLoad: boolean): Promise<T> {
        if (this.loaded) {
            return this.loaded.handle;
        }
        if (!allowLoad) {
            throw new ResourceUnavailableError(this.name, "not loaded");
        }

        const startTime = Date.now();
        const handle = await this.options.load();
        this.loaded = { handle };
        this.logger.info("Resource loaded", { resource: this.name, durationMs: Date.now() - startTime });
        return handle;
    }

    private async release(): Promise<void> {
        const current = this.loaded;
        if (!current) {
            return;
        }
        this.loaded = null;
        if (this.options.unload) {
            await this.options.unload(current.handle);
        }
        this.logger.info("Resource unloaded", { resource: this.name });
    }
}
