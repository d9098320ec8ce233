/**
 * SQLite similarity store
 *
 * Embedded vector store on better-sqlite3. Vectors and payloads are stored
 * as JSON and scored by brute-force cosine similarity, which is plenty for
 * the taxonomy, the curated examples and a few thousand classified
 * documents. Use `:memory:` for an ephemeral store.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { Payload, SimilarityHit, SimilarityPoint, SimilarityStore } from "@legal-cascade/engine";
import { SimilarityStoreError } from "../../domain/errors.js";
import { cosineSimilarity, rankByScore } from "../../domain/utils/vectors.js";

const collectionRowSchema = z.object({
    dimensions: z.number().int(),
});

const pointRowSchema = z.object({
    id     : z.string(),
    vector : z.string(),
    payload: z.string(),
});

const countRowSchema = z.object({
    total: z.number().int(),
});

const vectorSchema = z.array(z.number());
const payloadSchema = z.record(z.unknown());

/**
 * SQLite-backed SimilarityStore
 */
export class SqliteSimilarityStore implements SimilarityStore {
    private db: Database.Database | null = null;
    private dbPath: string;

    constructor(dbPath: string = ":memory:") {
        this.dbPath = dbPath;
    }

    /**
     * Open the database and create the schema
     */
    open(): void {
        if (this.db) {
            return;
        }

        if (this.dbPath !== ":memory:") {
            mkdirSync(dirname(this.dbPath), { recursive: true });
        }

        const db = new Database(this.dbPath);
        db.pragma("journal_mode = WAL");
        db.exec(`
            CREATE TABLE IF NOT EXISTS collections (
                name       TEXT PRIMARY KEY,
                dimensions INTEGER NOT NULL
            );
            CREATE TABLE IF NOT EXISTS points (
                collection TEXT NOT NULL REFERENCES collections(name),
                id         TEXT NOT NULL,
                vector     TEXT NOT NULL,
                payload    TEXT NOT NULL,
                UNIQUE (collection, id)
            );
        `);
        this.db = db;
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    private ensureOpen(): Database.Database {
        if (!this.db) {
            this.open();
        }
        if (!this.db) {
            throw new SimilarityStoreError(`Cannot open similarity store at ${this.dbPath}`);
        }
        return this.db;
    }

    private dimensionsOf(collection: string): number | undefined {
        const row = this.ensureOpen()
            .prepare("SELECT dimensions FROM collections WHERE name = ?")
            .get(collection);
        return row === undefined ? undefined : collectionRowSchema.parse(row).dimensions;
    }

    async ensureCollection(collection: string, dimensions: number): Promise<void> {
        const existing = this.dimensionsOf(collection);
        if (existing === undefined) {
            this.ensureOpen()
                .prepare("INSERT INTO collections (name, dimensions) VALUES (?, ?)")
                .run(collection, dimensions);
            return;
        }
        if (existing !== dimensions) {
            throw new SimilarityStoreError(
                `Collection ${collection} holds ${existing}-dimensional vectors, not ${dimensions}`
            );
        }
    }

    async upsert(collection: string, points: readonly SimilarityPoint[]): Promise<void> {
        const dimensions = this.dimensionsOf(collection);
        if (dimensions === undefined) {
            throw new SimilarityStoreError(`Unknown collection: ${collection}`);
        }

        for (const point of points) {
            if (point.vector.length !== dimensions) {
                throw new SimilarityStoreError(
                    `Point ${point.id} has ${point.vector.length} dimensions, collection ${collection} expects ${dimensions}`
                );
            }
        }

        const db = this.ensureOpen();
        const stmt = db.prepare(`
            INSERT INTO points (collection, id, vector, payload)
            VALUES (?, ?, ?, ?)
            ON CONFLICT (collection, id) DO UPDATE SET
                vector  = excluded.vector,
                payload = excluded.payload
        `);

        const insertAll = db.transaction((batch: readonly SimilarityPoint[]) => {
            for (const point of batch) {
                stmt.run(collection, point.id, JSON.stringify(point.vector), JSON.stringify(point.payload));
            }
        });
        insertAll(points);
    }

    async search(
        collection: string,
        vector: readonly number[],
        limit: number,
        minScore: number = 0
    ): Promise<SimilarityHit[]> {
        const dimensions = this.dimensionsOf(collection);
        if (dimensions === undefined || limit <= 0) {
            return [];
        }
        if (vector.length !== dimensions) {
            throw new SimilarityStoreError(
                `Query has ${vector.length} dimensions, collection ${collection} expects ${dimensions}`
            );
        }

        const rows = this.ensureOpen()
            .prepare("SELECT id, vector, payload FROM points WHERE collection = ? ORDER BY rowid")
            .all(collection);

        const hits: SimilarityHit[] = [];
        for (const raw of rows) {
            const row = pointRowSchema.parse(raw);
            const score = cosineSimilarity(vector, vectorSchema.parse(JSON.parse(row.vector)));
            if (score >= minScore) {
                const payload: Payload = payloadSchema.parse(JSON.parse(row.payload));
                hits.push({ id: row.id, score, payload });
            }
        }

        return rankByScore(hits).slice(0, limit);
    }

    async count(collection: string): Promise<number> {
        const row = this.ensureOpen()
            .prepare("SELECT COUNT(*) AS total FROM points WHERE collection = ?")
            .get(collection);
        return countRowSchema.parse(row).total;
    }
}
