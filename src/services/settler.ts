import {
    getBase64EncodedWireTransaction,
    getSignatureFromTransaction,
    type Transaction,
} from '@solana/kit';
import { pino } from 'pino';
import { config } from '../config.js';
import { type ErrorKind, PaymentError, errorMessage } from '../domain/errors.js';
import type { ILedgerClient, SignatureState } from '../domain/network.js';
import { canTransition, type ISettlementRecord, type ISettlementStorage, isTerminal, type SettlementStatus } from '../domain/storage.js';
import type { PaymentProof, PaymentRequirements, SettleResponse } from '../domain/types.js';
import { backoffDelay, DeadlineExceededError, deadlineSignal, raceAbort, sleep } from '../utils/deadline.js';
import { KeyedMutex } from '../utils/keyed_mutex.js';
import { toPaymentError } from '../utils/rpcErrors.js';
import { decodePaymentHeader, fingerprintProof } from './decoder.js';
import type { FeePayerSigner } from './fee_payer.js';
import type { Verifier } from './verifier.js';

const logger = pino({ name: 'settler', level: config.logLevel });

export interface SettlerOptions {
    pollIntervalMs: number;
    maxPollIntervalMs: number;
    maxSubmitAttempts: number;
    now?: () => number;
}

/** A settlement record plus whether this call found it already terminal in storage. */
export interface SettlementOutcome {
    record: ISettlementRecord;
    replayed: boolean;
}

export interface SettleResult {
    response: SettleResponse;
    replayed: boolean;
}

export class Settler {
    private locks = new KeyedMutex();
    private now: () => number;

    constructor(
        private storage: ISettlementStorage,
        private ledger: ILedgerClient,
        private verifier: Verifier,
        private feePayer: FeePayerSigner | undefined,
        private options: SettlerOptions,
    ) {
        this.now = options.now ?? Date.now;
    }

    /** Settles an X-PAYMENT header. Rejections become responses; only `InternalFault` is thrown. */
    async settle(paymentHeader: string, requirements: PaymentRequirements): Promise<SettleResponse> {
        const { response } = await this.settleWithOutcome(paymentHeader, requirements);
        return response;
    }

    /** Like `settle`, but also says whether the result was replayed from an earlier call. */
    async settleWithOutcome(paymentHeader: string, requirements: PaymentRequirements): Promise<SettleResult> {
        let proof: PaymentProof;
        try {
            proof = decodePaymentHeader(paymentHeader);
        } catch (error) {
            return { response: this.failure(error, requirements), replayed: false };
        }

        try {
            const { record, replayed } = await this.execute(proof, requirements);
            return {
                response: {
                    success: record.status === 'confirmed',
                    txHash: record.txSignature,
                    error: record.error,
                    network: record.network,
                    payer: record.payer,
                },
                replayed,
            };
        } catch (error) {
            return { response: this.failure(error, requirements), replayed: false };
        }
    }

    /**
     * Drives a payment to a terminal settlement record. Repeated calls with the same
     * proof return the same record; at most one submission per proof reaches the ledger
     * from this process. `replayed` is set when the record was already terminal.
     */
    async execute(proof: PaymentProof, requirements: PaymentRequirements): Promise<SettlementOutcome> {
        const local = await this.verifier.checkStructure(proof, requirements);
        if (!local.valid) {
            throw new PaymentError(local.reason, local.message);
        }

        const id = fingerprintProof(proof);
        return this.locks.runExclusive(id, async () => {
            const existing = await this.storage.get(id);
            if (existing && isTerminal(existing.status)) {
                logger.info({ settlementId: id, status: existing.status }, 'Settlement already terminal, returning record');
                return { record: existing, replayed: true };
            }
            if (existing) {
                return { record: await this.resume(existing, proof), replayed: false };
            }

            try {
                await this.verifier.assertFresh(proof);
            } catch (error) {
                throw toPaymentError(error);
            }

            const signed = await this.sign(proof, requirements);
            const now = this.now();
            const record: ISettlementRecord = {
                id,
                status: 'pending',
                txSignature: getSignatureFromTransaction(signed),
                attempts: 0,
                payer: local.payer,
                payTo: requirements.payTo,
                asset: requirements.asset,
                amount: local.normalizedAmount,
                network: requirements.network,
                firstSeenAt: now,
                deadlineAt: now + requirements.maxTimeoutSeconds * 1000,
                updatedAt: now,
            };

            if (!(await this.storage.insert(record))) {
                // Another process claimed the fingerprint between get and insert.
                const claimed = await this.storage.get(id);
                if (!claimed) {
                    throw new PaymentError('InternalFault', `Settlement ${id} vanished after insert conflict`);
                }
                if (isTerminal(claimed.status)) {
                    return { record: claimed, replayed: true };
                }
                return { record: await this.resume(claimed, proof), replayed: false };
            }

            logger.info({ settlementId: id, txSignature: record.txSignature, payer: record.payer }, 'Settlement recorded');
            return { record: await this.driveToTerminal(record, signed), replayed: false };
        });
    }

    private async resume(record: ISettlementRecord, proof: PaymentProof): Promise<ISettlementRecord> {
        logger.info({ settlementId: record.id, status: record.status }, 'Resuming unfinished settlement');
        if (this.now() >= record.deadlineAt) {
            return this.transition(record, 'expired', { error: 'SettlementExpired' });
        }
        // Fee-payer signatures are deterministic, so re-signing yields identical bytes.
        const signer = this.requireFeePayer();
        const signed = await signer.sign(proof.transaction);
        // A pending record from an earlier run may have been sent before that run stopped.
        return this.driveToTerminal(record, signed, true);
    }

    private requireFeePayer(): FeePayerSigner {
        if (!this.feePayer) {
            throw new PaymentError('InternalFault', 'Facilitator fee payer is not configured');
        }
        return this.feePayer;
    }

    private async sign(proof: PaymentProof, requirements: PaymentRequirements): Promise<Transaction> {
        const signer = this.requireFeePayer();
        if (signer.address !== requirements.extra.feePayer) {
            throw new PaymentError(
                'UnexpectedFeePayer',
                `Requirements name fee payer ${requirements.extra.feePayer}, facilitator is ${signer.address}`,
            );
        }
        return signer.sign(proof.transaction);
    }

    private async driveToTerminal(
        initial: ISettlementRecord,
        signed: Transaction,
        mayHaveLanded = false,
    ): Promise<ISettlementRecord> {
        const { signal, clear } = deadlineSignal(initial.deadlineAt, this.now());
        let record = initial;
        try {
            if (record.status === 'pending') {
                record = await this.submit(record, signed, signal, mayHaveLanded);
            }
            if (record.status === 'submitted') {
                record = await this.poll(record, signal);
            }
            return record;
        } catch (error) {
            if (error instanceof DeadlineExceededError) {
                logger.warn({ settlementId: record.id, txSignature: record.txSignature }, 'Settlement deadline elapsed');
                return this.transition(record, 'expired', { error: 'SettlementExpired' });
            }
            throw error;
        } finally {
            clear();
        }
    }

    private async submit(
        record: ISettlementRecord,
        signed: Transaction,
        signal: AbortSignal,
        mayHaveLanded: boolean,
    ): Promise<ISettlementRecord> {
        const wire = getBase64EncodedWireTransaction(signed);
        let current = record;
        let sawTransportFailure = mayHaveLanded;

        for (let attempt = 0; attempt < this.options.maxSubmitAttempts; attempt++) {
            try {
                const txSignature = await raceAbort(this.ledger.sendTransaction(wire), signal);
                logger.info({ settlementId: record.id, txSignature }, 'Transaction submitted');
                return this.transition(current, 'submitted', { txSignature });
            } catch (error) {
                if (error instanceof DeadlineExceededError) {
                    throw error;
                }
                const failure = toPaymentError(error);
                if (failure.kind !== 'NetworkTransient' && sawTransportFailure) {
                    // An earlier attempt may have landed ("already processed"); let the poll decide.
                    logger.warn(
                        { settlementId: record.id, reason: failure.kind, error: failure.message },
                        'Resubmission rejected after an uncertain send, polling for the signature',
                    );
                    return this.transition(current, 'submitted');
                }
                if (failure.kind !== 'NetworkTransient') {
                    logger.warn({ settlementId: record.id, reason: failure.kind, error: failure.message }, 'Ledger rejected transaction');
                    return this.transition(current, 'failed', { error: 'LedgerRejected' });
                }
                sawTransportFailure = true;
                current = await this.transition(current, 'pending', { attempts: current.attempts + 1 });
                if (current.status !== 'pending') {
                    return current;
                }
                logger.warn({ settlementId: record.id, attempt: attempt + 1, error: failure.message }, 'Submission failed, retrying');
                if (attempt + 1 < this.options.maxSubmitAttempts) {
                    await sleep(backoffDelay(attempt, this.options.pollIntervalMs, this.options.maxPollIntervalMs), signal);
                }
            }
        }

        // A transport error does not prove the transaction never reached a leader.
        logger.warn({ settlementId: record.id }, 'Submission retries exhausted, polling for the signature');
        return this.transition(current, 'submitted');
    }

    private async poll(record: ISettlementRecord, signal: AbortSignal): Promise<ISettlementRecord> {
        const txSignature = record.txSignature;
        if (!txSignature) {
            throw new PaymentError('InternalFault', `Settlement ${record.id} has no transaction signature`);
        }

        let current = record;
        for (let round = 0; ; round++) {
            const inFlight = this.ledger.getSignatureStatus(txSignature);
            try {
                const status = await raceAbort(inFlight, signal);
                if (status.state === 'confirmed') {
                    logger.info({ settlementId: record.id, txSignature, slot: status.slot.toString() }, 'Settlement confirmed');
                    return this.transition(current, 'confirmed');
                }
                if (status.state === 'failed') {
                    logger.warn({ settlementId: record.id, txSignature, error: status.error }, 'Transaction failed on chain');
                    return this.transition(current, 'failed', { error: 'LedgerRejected' });
                }
            } catch (error) {
                if (error instanceof DeadlineExceededError) {
                    this.observeLateResult(current, inFlight);
                    throw error;
                }
                const failure = toPaymentError(error);
                current = await this.transition(current, 'submitted', { attempts: current.attempts + 1 });
                if (current.status !== 'submitted') {
                    return current;
                }
                logger.warn({ settlementId: record.id, reason: failure.kind, error: failure.message }, 'Status poll failed');
            }
            await sleep(backoffDelay(round, this.options.pollIntervalMs, this.options.maxPollIntervalMs), signal);
        }
    }

    // The record is already terminal by the time this resolves; only the log changes.
    private observeLateResult(record: ISettlementRecord, inFlight: Promise<SignatureState>) {
        void inFlight.then(
            (status) => {
                if (status.state === 'confirmed') {
                    logger.warn(
                        { settlementId: record.id, txSignature: record.txSignature },
                        'Transaction confirmed after settlement deadline',
                    );
                }
            },
            (error: unknown) => {
                logger.debug({ settlementId: record.id, error: errorMessage(error) }, 'Late status poll failed');
            },
        );
    }

    private async transition(
        record: ISettlementRecord,
        status: SettlementStatus,
        changes: Partial<Pick<ISettlementRecord, 'txSignature' | 'attempts' | 'error'>> = {},
    ): Promise<ISettlementRecord> {
        if (!canTransition(record.status, status)) {
            throw new PaymentError('InternalFault', `Illegal settlement transition ${record.status} -> ${status}`);
        }
        const next: ISettlementRecord = { ...record, ...changes, status, updatedAt: this.now() };
        if (await this.storage.transition(record.id, record.status, next)) {
            return next;
        }

        // Someone else moved the record; report whatever it holds now.
        const stored = await this.storage.get(record.id);
        if (!stored) {
            throw new PaymentError('InternalFault', `Settlement ${record.id} disappeared during ${status} transition`);
        }
        logger.warn({ settlementId: record.id, wanted: status, found: stored.status }, 'Settlement transition lost a race');
        return stored;
    }

    private failure(error: unknown, requirements: PaymentRequirements): SettleResponse {
        const kind: ErrorKind = error instanceof PaymentError ? error.kind : 'InternalFault';
        if (kind === 'InternalFault') {
            throw error instanceof PaymentError ? error : new PaymentError('InternalFault', errorMessage(error));
        }
        logger.info({ reason: kind, error: errorMessage(error) }, 'Settlement refused');
        return { success: false, error: kind, network: requirements.network };
    }
}
