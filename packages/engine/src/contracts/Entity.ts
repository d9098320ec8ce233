/**
 * Entity Contract
 *
 * What a cascade classifies: an identified piece of content plus whatever
 * metadata the domain attaches. Entities are read-only once created.
 */

/**
 * @typeParam TMetadata - Domain metadata, e.g. the source filename
 *
 * @example
 * ```typescript
 * interface DocumentMetadata {
 *     filename: string;
 *     receivedAt: Date;
 * }
 *
 * interface DocumentEntity extends Entity<DocumentMetadata> {}
 * ```
 */
export interface Entity<TMetadata extends object = Record<string, unknown>> {
    readonly id: string;

    /** Text the stages classify */
    readonly content: string;

    readonly metadata: TMetadata;

    readonly traceId?: string;
}

/**
 * Generate a trace ID for correlating logs and events of one run.
 */
export function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}
