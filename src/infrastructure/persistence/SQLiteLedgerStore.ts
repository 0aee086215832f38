import Database from 'better-sqlite3';
import { z } from 'zod';
import type { LedgerEntry } from '../../kernel-core/L0/Ontology.js';
import { appendConflict } from '../../kernel-core/L5/Ledger.js';
import type { ILedgerStore } from '../../kernel-core/L5/Ledger.js';
import { ErrorCode, KernelError } from '../../kernel-core/Errors.js';

const LedgerRowSchema = z.object({
    sequence: z.number().int().positive(),
    hash: z.string(),
    prev_hash: z.string(),
    actor: z.string(),
    action_kind: z.string(),
    payload: z.string(),
    payload_digest: z.string(),
    timestamp: z.number(),
    outcome: z.enum(['INTENT', 'COMMITTED', 'FAILED']),
});

const PayloadSchema = z.record(z.unknown());

type LedgerRow = z.infer<typeof LedgerRowSchema>;

const TailSchema = z.object({ tail: z.number().int().nullable() });

/**
 * SQLite ledger store. The compare-and-set on the tail runs inside an
 * IMMEDIATE transaction, so a second process writing the same file loses
 * the race with CONCURRENT_APPEND_CONFLICT instead of forking the chain.
 */
export class SQLiteLedgerStore implements ILedgerStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ledger (
                sequence INTEGER PRIMARY KEY,
                hash TEXT UNIQUE NOT NULL,
                prev_hash TEXT NOT NULL,
                actor TEXT NOT NULL,
                action_kind TEXT NOT NULL,
                payload TEXT NOT NULL,
                payload_digest TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                outcome TEXT NOT NULL
            )
        `);
    }

    async append(entry: LedgerEntry, expectedTail: number): Promise<void> {
        const insert = this.db.prepare(`
            INSERT INTO ledger (
                sequence, hash, prev_hash, actor, action_kind, payload, payload_digest, timestamp, outcome
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        const appendIfTail = this.db.transaction(() => {
            const actual = this.tailSequence();
            if (actual !== expectedTail || entry.sequence !== expectedTail + 1) {
                throw appendConflict(expectedTail, actual);
            }
            insert.run(
                entry.sequence,
                entry.hash,
                entry.prevHash,
                entry.actor,
                entry.actionKind,
                JSON.stringify(entry.payload),
                entry.payloadDigest,
                entry.timestamp,
                entry.outcome
            );
        });

        appendIfTail.immediate();
    }

    async getTail(): Promise<LedgerEntry | null> {
        const row = this.db.prepare('SELECT * FROM ledger ORDER BY sequence DESC LIMIT 1').get();
        return row === undefined ? null : this.mapRowToEntry(row);
    }

    async getEntry(sequence: number): Promise<LedgerEntry | null> {
        const row = this.db.prepare('SELECT * FROM ledger WHERE sequence = ?').get(sequence);
        return row === undefined ? null : this.mapRowToEntry(row);
    }

    async getRange(from: number, to: number): Promise<LedgerEntry[]> {
        const rows = this.db.prepare('SELECT * FROM ledger WHERE sequence BETWEEN ? AND ? ORDER BY sequence ASC').all(from, to);
        return rows.map(row => this.mapRowToEntry(row));
    }

    private tailSequence(): number {
        const parsed = TailSchema.parse(this.db.prepare('SELECT MAX(sequence) AS tail FROM ledger').get());
        return parsed.tail ?? 0;
    }

    private mapRowToEntry(raw: unknown): LedgerEntry {
        const parsed = LedgerRowSchema.safeParse(raw);
        if (!parsed.success) {
            throw new KernelError(ErrorCode.REPLAY_FAILURE, `Malformed ledger row: ${parsed.error.message}`);
        }
        const row: LedgerRow = parsed.data;
        return {
            sequence: row.sequence,
            hash: row.hash,
            prevHash: row.prev_hash,
            actor: row.actor,
            actionKind: row.action_kind,
            payload: PayloadSchema.parse(JSON.parse(row.payload)),
            payloadDigest: row.payload_digest,
            timestamp: row.timestamp,
            outcome: row.outcome,
        };
    }

    public close() {
        this.db.close();
    }
}
