/**
 * @fileoverview ResourceHost
 *
 * Groups the resource slots a host process owns so they can be loaded before
 * a batch and released between batches.
 *
 * @module @legal-cascade/engine/resources/ResourceHost
 */

import type { Logger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/Result.js";

/**
 * Lifecycle surface shared by every slot, whatever its handle type.
 */
export interface ManagedResource {
    readonly name: string;
    readonly isLoaded: boolean;
    load(): Promise<void>;
    unload(): Promise<void>;
    reload(): Promise<void>;
}

export interface LoadReport {
    readonly loaded: readonly string[];
    readonly failed: readonly { readonly name: string; readonly error: string }[];
}

export class ResourceHost {
    private readonly resources: Map<string, ManagedResource> = new Map();

    constructor(private readonly logger: Logger = silentLogger) {}

    /**
     * @throws Error if a resource with the same name is already registered
     */
    register(resource: ManagedResource): void {
        if (this.resources.has(resource.name)) {
            throw new Error(`Resource already registered: ${resource.name}`);
        }
        this.resources.set(resource.name, resource);
    }

    get names(): readonly string[] {
        return [...this.resources.keys()];
    }

    get(name: string): ManagedResource | undefined {
        return this.resources.get(name);
    }

    /**
     * Load every resource. A resource that fails to load is reported and
     * left unloaded; the others still load.
     */
    async loadAll(): Promise<LoadReport> {
        const entries = [...this.resources.values()];
        const settled = await Promise.allSettled(entries.map(resource => resource.load()));

        const loaded: string[] = [];
        const failed: { name: string; error: string }[] = [];

        settled.forEach((outcome, index) => {
            const name = entries[index]?.name ?? "unknown";
            if (outcome.status === "fulfilled") {
                loaded.push(name);
            }
            else {
                const error = describeError(outcome.reason);
                failed.push({ name, error });
                this.logger.warn("Resource failed to load", { resource: name, error });
            }
        });

        return { loaded, failed };
    }

    /**
     * Release every loaded resource once its queued work completes.
     */
    async unloadAll(): Promise<void> {
        const settled = await Promise.allSettled([...this.resources.values()].map(resource => resource.unload()));
        for (const outcome of settled) {
            if (outcome.status === "rejected") {
                this.logger.error("Resource failed to unload", { error: describeError(outcome.reason) });
            }
        }
    }
}
