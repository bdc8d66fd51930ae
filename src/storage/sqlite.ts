import { open, type Database } from 'sqlite';
import sqlite3 from 'sqlite3';
import { isErrorKind } from '../domain/errors.js';
import { type ISettlementRecord, type ISettlementStorage, isSettlementStatus, type SettlementStatus } from '../domain/storage.js';

const TERMINAL_STATUSES = ['confirmed', 'failed', 'expired'];

interface SettlementRow {
    id: string;
    status: string;
    txSignature: string | null;
    attempts: number;
    payer: string;
    payTo: string;
    asset: string;
    amount: string;
    network: string;
    error: string | null;
    firstSeenAt: number;
    deadlineAt: number;
    updatedAt: number;
}

function toRecord(row: SettlementRow): ISettlementRecord {
    if (!isSettlementStatus(row.status)) {
        throw new Error(`Settlement ${row.id} has unknown status ${row.status}`);
    }
    return {
        id: row.id,
        status: row.status,
        txSignature: row.txSignature ?? undefined,
        attempts: row.attempts,
        payer: row.payer,
        payTo: row.payTo,
        asset: row.asset,
        amount: row.amount,
        network: row.network,
        error: isErrorKind(row.error) ? row.error : undefined,
        firstSeenAt: row.firstSeenAt,
        deadlineAt: row.deadlineAt,
        updatedAt: row.updatedAt,
    };
}

export class SqliteSettlementStorage implements ISettlementStorage {
    private db?: Promise<Database>;

    constructor(private dbPath: string) { }

    init(): Promise<Database> {
        if (!this.db) {
            this.db = this.connect().catch((error: unknown) => {
                this.db = undefined;
                throw error;
            });
        }
        return this.db;
    }

    private async connect(): Promise<Database> {
        const db = await open({
            filename: this.dbPath,
            driver: sqlite3.Database
        });

        await db.exec(`
            CREATE TABLE IF NOT EXISTS settlements (
                id TEXT PRIMARY KEY,
                status TEXT NOT NULL,
                txSignature TEXT,
                attempts INTEGER NOT NULL DEFAULT 0,
                payer TEXT NOT NULL,
                payTo TEXT NOT NULL,
                asset TEXT NOT NULL,
                amount TEXT NOT NULL,
                network TEXT NOT NULL,
                error TEXT,
                firstSeenAt INTEGER NOT NULL,
                deadlineAt INTEGER NOT NULL,
                updatedAt INTEGER NOT NULL
            )
        `);
        await db.exec('CREATE INDEX IF NOT EXISTS settlements_deadline ON settlements(deadlineAt)');
        return db;
    }

    async get(id: string): Promise<ISettlementRecord | null> {
        const db = await this.init();
        const row = await db.get<SettlementRow>('SELECT * FROM settlements WHERE id = ?', id);
        return row ? toRecord(row) : null;
    }

    async insert(record: ISettlementRecord): Promise<boolean> {
        const db = await this.init();
        const result = await db.run(
            `INSERT OR IGNORE INTO settlements(id, status, txSignature, attempts, payer, payTo, asset, amount, network, error, firstSeenAt, deadlineAt, updatedAt)
            VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            record.id, record.status, record.txSignature ?? null, record.attempts, record.payer, record.payTo,
            record.asset, record.amount, record.network, record.error ?? null, record.firstSeenAt, record.deadlineAt,
            record.updatedAt,
        );
        return result.changes === 1;
    }

    async transition(id: string, expected: SettlementStatus, next: ISettlementRecord): Promise<boolean> {
        const db = await this.init();
        const placeholders = TERMINAL_STATUSES.map(() => '?').join(',');
        const result = await db.run(
            `UPDATE settlements SET status = ?, txSignature = ?, attempts = ?, error = ?, updatedAt = ?
            WHERE id = ? AND status = ? AND status NOT IN(${placeholders})`,
            next.status, next.txSignature ?? null, next.attempts, next.error ?? null, next.updatedAt,
            id, expected, ...TERMINAL_STATUSES,
        );
        return result.changes === 1;
    }

    async deleteExpired(now: number, graceMs: number): Promise<number> {
        const db = await this.init();
        const result = await db.run('DELETE FROM settlements WHERE deadlineAt + ? < ?', graceMs, now);
        return result.changes ?? 0;
    }

    async close(): Promise<void> {
        if (this.db) {
            const db = await this.db;
            this.db = undefined;
            await db.close();
        }
    }
}
