import type { ErrorKind } from './errors.js';

export const SETTLEMENT_STATUSES = ['pending', 'submitted', 'confirmed', 'failed', 'expired'] as const;
export type SettlementStatus = (typeof SETTLEMENT_STATUSES)[number];

const TERMINAL: ReadonlySet<SettlementStatus> = new Set<SettlementStatus>(['confirmed', 'failed', 'expired']);

const ALLOWED_TRANSITIONS: Record<SettlementStatus, readonly SettlementStatus[]> = {
    pending: ['pending', 'submitted', 'failed', 'expired'],
    submitted: ['submitted', 'confirmed', 'failed', 'expired'],
    confirmed: [],
    failed: [],
    expired: [],
};

export interface ISettlementRecord {
    id: string; // Proof fingerprint
    status: SettlementStatus;
    txSignature?: string;
    attempts: number;
    payer: string;
    payTo: string;
    asset: string;
    amount: string;
    network: string;
    error?: ErrorKind;
    firstSeenAt: number; // ms
    deadlineAt: number; // ms
    updatedAt: number; // ms
}

export interface ISettlementStorage {
    get(id: string): Promise<ISettlementRecord | null>;
    /** Inserts only when no record exists for `record.id`. */
    insert(record: ISettlementRecord): Promise<boolean>;
    /** Replaces the record only while its stored status still equals `expected`. */
    transition(id: string, expected: SettlementStatus, next: ISettlementRecord): Promise<boolean>;
    /**
     * Evicts records whose deadline plus grace lies before `now`. Non-terminal ones are
     * included: past that point their blockhash has expired and no process still drives them.
     */
    deleteExpired(now: number, graceMs: number): Promise<number>;
}

export function isSettlementStatus(value: unknown): value is SettlementStatus {
    return SETTLEMENT_STATUSES.some((status) => status === value);
}

export function isTerminal(status: SettlementStatus): boolean {
    return TERMINAL.has(status);
}

export function canTransition(from: SettlementStatus, to: SettlementStatus): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}
