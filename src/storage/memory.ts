import { type ISettlementRecord, type ISettlementStorage, isTerminal, type SettlementStatus } from '../domain/storage.js';

export class MemorySettlementStorage implements ISettlementStorage {
    private records: Map<string, ISettlementRecord> = new Map();

    async get(id: string): Promise<ISettlementRecord | null> {
        const record = this.records.get(id);
        return record ? { ...record } : null;
    }

    async insert(record: ISettlementRecord): Promise<boolean> {
        if (this.records.has(record.id)) {
            return false;
        }
        this.records.set(record.id, { ...record });
        return true;
    }

    async transition(id: string, expected: SettlementStatus, next: ISettlementRecord): Promise<boolean> {
        const current = this.records.get(id);
        if (!current || current.status !== expected || isTerminal(current.status)) {
            return false;
        }
        this.records.set(id, { ...next, id });
        return true;
    }

    async deleteExpired(now: number, graceMs: number): Promise<number> {
        let deleted = 0;
        for (const [id, record] of this.records) {
            if (record.deadlineAt + graceMs < now) {
                this.records.delete(id);
                deleted++;
            }
        }
        return deleted;
    }

    get size(): number {
        return this.records.size;
    }
}
