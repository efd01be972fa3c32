/**
 * SQLite Checkpointer implementation (better-sqlite3).
 *
 * **Node.js only**: loads a native module. Exported from the `node` entry.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { SqliteCheckpointer } from 'checkpoint-graph/node';
 *
 * const state = z.object({ count: z.number() });
 * const checkpointer = new SqliteCheckpointer({
 *     databasePath: './checkpoints.db',
 *     codec: { values: state, writes: state.partial() },
 * });
 * ```
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseInstance, Statement } from 'better-sqlite3';
import { z } from 'zod';
import { GraphConfigError } from '../lib/errors';
import { normalizeLimit, type Checkpointer, type LoadHistoryOptions } from './checkpointer';
import { decodeSnapshot, encodeSnapshot, type SnapshotCodec } from './serde';
import type { Snapshot } from './types';

export interface SqliteCheckpointerConfig<S> {
    /** Opened when `database` is not given */
    databasePath?: string;
    /** Existing connection; the caller keeps ownership */
    database?: DatabaseInstance;
    /** Table name (default: 'graph_checkpoints') */
    tableName?: string;
    codec: SnapshotCodec<S>;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const payloadRowSchema = z.object({
    checkpoint_id: z.string(),
    payload: z.string(),
});

const countRowSchema = z.object({ count: z.number() });

interface PreparedStatements {
    insert: Statement;
    latest: Statement;
    byId: Statement;
    history: Statement;
    historyLimited: Statement;
    count: Statement;
    clear: Statement;
}

export class SqliteCheckpointer<S> implements Checkpointer<S> {
    private readonly db: DatabaseInstance;
    private readonly ownsDatabase: boolean;
    private readonly tableName: string;
    private readonly codec: SnapshotCodec<S>;
    private readonly statements: PreparedStatements;

    constructor(config: SqliteCheckpointerConfig<S>) {
        this.tableName = config.tableName ?? 'graph_checkpoints';
        if (!TABLE_NAME_PATTERN.test(this.tableName)) {
            throw new GraphConfigError('tableName', `Invalid table name: ${this.tableName}`);
        }

        if (config.database) {
            this.db = config.database;
            this.ownsDatabase = false;
        } else if (config.databasePath) {
            this.db = new Database(config.databasePath);
            this.ownsDatabase = true;
        } else {
            throw new GraphConfigError('databasePath', 'SqliteCheckpointer requires databasePath or database instance');
        }

        this.codec = config.codec;
        this.initSchema();
        this.statements = this.prepareStatements();
    }

    async appendSnapshot(snapshot: Snapshot<S>): Promise<void> {
        this.statements.insert.run(
            snapshot.checkpointId,
            snapshot.threadId,
            snapshot.parentId,
            snapshot.step,
            snapshot.createdAt,
            encodeSnapshot(snapshot),
        );
    }

    async loadLatest(threadId: string): Promise<Snapshot<S> | null> {
        return this.decodeRow(this.statements.latest.get(threadId));
    }

    async loadSnapshot(threadId: string, checkpointId: string): Promise<Snapshot<S> | null> {
        return this.decodeRow(this.statements.byId.get(threadId, checkpointId));
    }

    async loadHistory(threadId: string, options?: LoadHistoryOptions): Promise<Snapshot<S>[]> {
        // bound as INTEGER; SQLite rejects a REAL limit
        const limit = normalizeLimit(options?.limit);
        if (limit === 0) return [];

        const rows = limit !== undefined
            ? this.statements.historyLimited.all(threadId, limit)
            : this.statements.history.all(threadId);

        return rows.map(row => this.decode(row));
    }

    async clear(threadId: string): Promise<number> {
        const result = this.statements.clear.run(threadId);
        return result.changes;
    }

    /** Number of stored snapshots for a thread */
    count(threadId: string): number {
        return countRowSchema.parse(this.statements.count.get(threadId)).count;
    }

    /** Close the connection if this checkpointer opened it */
    close(): void {
        if (this.ownsDatabase) {
            this.db.close();
        }
    }

    private initSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ${this.tableName} (
                seq INTEGER PRIMARY KEY AUTOINCREMENT,
                checkpoint_id TEXT NOT NULL UNIQUE,
                thread_id TEXT NOT NULL,
                parent_id TEXT,
                step INTEGER NOT NULL,
                created_at INTEGER NOT NULL,
                payload TEXT NOT NULL
            )
        `);

        this.db.exec(`
            CREATE INDEX IF NOT EXISTS idx_${this.tableName}_thread_seq
            ON ${this.tableName} (thread_id, seq DESC)
        `);
    }

    private prepareStatements(): PreparedStatements {
        const table = this.tableName;
        return {
            insert: this.db.prepare(
                `INSERT INTO ${table} (checkpoint_id, thread_id, parent_id, step, created_at, payload)
                 VALUES (?, ?, ?, ?, ?, ?)`
            ),
            latest: this.db.prepare(
                `SELECT checkpoint_id, payload FROM ${table} WHERE thread_id = ? ORDER BY seq DESC LIMIT 1`
            ),
            byId: this.db.prepare(
                `SELECT checkpoint_id, payload FROM ${table} WHERE thread_id = ? AND checkpoint_id = ?`
            ),
            history: this.db.prepare(
                `SELECT checkpoint_id, payload FROM ${table} WHERE thread_id = ? ORDER BY seq DESC`
            ),
            historyLimited: this.db.prepare(
                `SELECT checkpoint_id, payload FROM ${table} WHERE thread_id = ? ORDER BY seq DESC LIMIT ?`
            ),
            count: this.db.prepare(`SELECT COUNT(*) AS count FROM ${table} WHERE thread_id = ?`),
            clear: this.db.prepare(`DELETE FROM ${table} WHERE thread_id = ?`),
        };
    }

    private decodeRow(row: unknown): Snapshot<S> | null {
        return row === undefined ? null : this.decode(row);
    }

    private decode(row: unknown): Snapshot<S> {
        const { checkpoint_id, payload } = payloadRowSchema.parse(row);
        return decodeSnapshot(payload, this.codec, checkpoint_id);
    }
}
