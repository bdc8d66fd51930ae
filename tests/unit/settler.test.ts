import { describe, it, expect, beforeEach } from 'vitest';
import { getBase64EncodedWireTransaction, getSignatureFromTransaction, getTransactionDecoder } from '@solana/kit';
import { Settler } from '../../src/services/settler.js';
import { Verifier } from '../../src/services/verifier.js';
import { FeePayerSigner } from '../../src/services/fee_payer.js';
import { decodePaymentHeader, fingerprintProof } from '../../src/services/decoder.js';
import { MemorySettlementStorage } from '../../src/storage/memory.js';
import { PaymentError } from '../../src/domain/errors.js';
import type { ISettlementRecord } from '../../src/domain/storage.js';
import { createFakeLedger, type FakeLedger, signatureOfWire } from '../helpers/fakeLedger.js';
import { buildPaymentHeader, createPaymentFixture, type PaymentFixture, testSecretKey } from '../helpers/proof.js';

describe('Settler Service', () => {
    let fixture: PaymentFixture;
    let ledger: FakeLedger;
    let storage: MemorySettlementStorage;
    let verifier: Verifier;
    let settler: Settler;

    const settlerOptions = { pollIntervalMs: 5, maxPollIntervalMs: 20, maxSubmitAttempts: 3 };

    const recordFor = async (header: string): Promise<ISettlementRecord | null> =>
        storage.get(fingerprintProof(decodePaymentHeader(header)));

    beforeEach(async () => {
        fixture = await createPaymentFixture();
        ledger = createFakeLedger();
        storage = new MemorySettlementStorage();
        verifier = new Verifier(ledger, {
            network: 'solana-devnet',
            decimals: 6,
            maxComputeUnitPrice: 5n,
            blockhashCacheMs: 2000,
        });
        settler = new Settler(storage, ledger, verifier, fixture.feePayer, settlerOptions);
    });

    it('should settle a valid payment and report the transaction signature', async () => {
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
        const submitted = ledger.sendTransaction.mock.calls[0][0];
        expect(result).toEqual({
            success: true,
            txHash: signatureOfWire(submitted),
            network: 'solana-devnet',
            payer: fixture.payer.address,
        });
    });

    it('should submit the transaction with the fee payer signature added', async () => {
        const header = await buildPaymentHeader(fixture);

        await settler.settle(header, fixture.requirements);

        const submitted = ledger.sendTransaction.mock.calls[0][0];
        const transaction = getTransactionDecoder().decode(Buffer.from(submitted, 'base64'));
        expect(transaction.signatures[fixture.feePayer.address]).toBeInstanceOf(Uint8Array);
        expect(transaction.signatures[fixture.payer.address]).toBeInstanceOf(Uint8Array);
    });

    it('should never submit a payment that fails verification', async () => {
        const header = await buildPaymentHeader(fixture, { amount: 9999n });

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toEqual({ success: false, error: 'InsufficientAmount', network: 'solana-devnet' });
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
        expect(ledger.isBlockhashValid).not.toHaveBeenCalled();
        expect(storage.size).toBe(0);
    });

    it('should reject a stale blockhash before recording anything', async () => {
        ledger.isBlockhashValid.mockResolvedValue(false);
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toEqual({ success: false, error: 'StaleTransaction', network: 'solana-devnet' });
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
        expect(storage.size).toBe(0);
    });

    it('should return the stored result for a repeated settle', async () => {
        const header = await buildPaymentHeader(fixture);

        const first = await settler.settle(header, fixture.requirements);
        const second = await settler.settle(header, fixture.requirements);

        expect(second).toEqual(first);
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
        expect(ledger.getSignatureStatus).toHaveBeenCalledTimes(1);
    });

    it('should submit once when the same payment is settled concurrently', async () => {
        const header = await buildPaymentHeader(fixture);

        const results = await Promise.all(
            Array.from({ length: 5 }, () => settler.settle(header, fixture.requirements)),
        );

        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
        for (const result of results) {
            expect(result).toEqual(results[0]);
        }
        expect(results[0].success).toBe(true);
    });

    it('should still check a cached proof against the requirements it is replayed for', async () => {
        const header = await buildPaymentHeader(fixture);
        await settler.settle(header, fixture.requirements);

        const result = await settler.settle(header, { ...fixture.requirements, maxAmountRequired: '20000' });

        expect(result).toEqual({ success: false, error: 'InsufficientAmount', network: 'solana-devnet' });
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
    });

    it('should retry a transient submission failure', async () => {
        ledger.sendTransaction.mockRejectedValueOnce(new PaymentError('NetworkTransient', 'socket hang up'));
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(result.success).toBe(true);
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(2);
        expect(await recordFor(header)).toMatchObject({ status: 'confirmed', attempts: 1 });
    });

    it('should mark the settlement failed when the ledger rejects the transaction', async () => {
        ledger.sendTransaction.mockRejectedValue(new PaymentError('LedgerRejected', 'insufficient funds'));
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);
        const again = await settler.settle(header, fixture.requirements);

        expect(result).toMatchObject({ success: false, error: 'LedgerRejected' });
        expect(again).toEqual(result);
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
        expect(ledger.getSignatureStatus).not.toHaveBeenCalled();
    });

    it('should mark the settlement failed when the transaction fails on chain', async () => {
        ledger.getSignatureStatus.mockResolvedValue({ state: 'failed', error: '{"InstructionError":[2,"Custom"]}' });
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toMatchObject({ success: false, error: 'LedgerRejected' });
        expect(await recordFor(header)).toMatchObject({ status: 'failed', error: 'LedgerRejected' });
    });

    it('should keep polling until the transaction confirms', async () => {
        ledger.getSignatureStatus
            .mockResolvedValueOnce({ state: 'pending' })
            .mockRejectedValueOnce(new PaymentError('NetworkTransient', 'timeout'))
            .mockResolvedValueOnce({ state: 'pending' });
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(result.success).toBe(true);
        expect(ledger.getSignatureStatus).toHaveBeenCalledTimes(4);
        expect(await recordFor(header)).toMatchObject({ status: 'confirmed', attempts: 1 });
    });

    it('should expire a settlement that does not confirm before its deadline', async () => {
        ledger.getSignatureStatus.mockResolvedValue({ state: 'pending' });
        const requirements = { ...fixture.requirements, maxTimeoutSeconds: 1 };
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, requirements);
        const polls = ledger.getSignatureStatus.mock.calls.length;
        const again = await settler.settle(header, requirements);

        expect(result).toMatchObject({ success: false, error: 'SettlementExpired' });
        expect(again).toEqual(result);
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
        expect(ledger.getSignatureStatus).toHaveBeenCalledTimes(polls);
        expect(await recordFor(header)).toMatchObject({ status: 'expired', error: 'SettlementExpired' });
    });

    it('should resume polling a settlement left unfinished by an earlier process', async () => {
        const header = await buildPaymentHeader(fixture);
        const proof = decodePaymentHeader(header);
        const now = Date.now();
        await storage.insert({
            id: fingerprintProof(proof),
            status: 'submitted',
            txSignature: 'earlier-signature',
            attempts: 0,
            payer: fixture.payer.address,
            payTo: fixture.payTo,
            asset: fixture.mint,
            amount: '10000',
            network: 'solana-devnet',
            firstSeenAt: now,
            deadlineAt: now + 60_000,
            updatedAt: now,
        });

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toMatchObject({ success: true, txHash: 'earlier-signature' });
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
        expect(ledger.getSignatureStatus).toHaveBeenCalledWith('earlier-signature');
    });

    it('should expire an unfinished settlement whose deadline already passed', async () => {
        const header = await buildPaymentHeader(fixture);
        const now = Date.now();
        await storage.insert({
            id: fingerprintProof(decodePaymentHeader(header)),
            status: 'pending',
            attempts: 2,
            payer: fixture.payer.address,
            payTo: fixture.payTo,
            asset: fixture.mint,
            amount: '10000',
            network: 'solana-devnet',
            firstSeenAt: now - 120_000,
            deadlineAt: now - 60_000,
            updatedAt: now - 60_000,
        });

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toMatchObject({ success: false, error: 'SettlementExpired' });
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
    });

    it('should refuse to settle when the facilitator holds a different fee payer key', async () => {
        const otherFeePayer = await FeePayerSigner.fromBytes(await testSecretKey(8));
        settler = new Settler(storage, ledger, verifier, otherFeePayer, settlerOptions);
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toEqual({ success: false, error: 'UnexpectedFeePayer', network: 'solana-devnet' });
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
        expect(storage.size).toBe(0);
    });

    it('should fail closed without a fee payer key', async () => {
        settler = new Settler(storage, ledger, verifier, undefined, settlerOptions);
        const header = await buildPaymentHeader(fixture);

        await expect(settler.settle(header, fixture.requirements)).rejects.toMatchObject({ kind: 'InternalFault' });
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
    });

    it('should flag a settle answered from an earlier terminal record as replayed', async () => {
        const header = await buildPaymentHeader(fixture);

        const first = await settler.settleWithOutcome(header, fixture.requirements);
        const second = await settler.settleWithOutcome(header, fixture.requirements);

        expect(first.replayed).toBe(false);
        expect(second.replayed).toBe(true);
        expect(second.response).toEqual(first.response);
    });

    it('should poll for the signature once submission retries run out', async () => {
        ledger.sendTransaction.mockRejectedValue(new PaymentError('NetworkTransient', 'socket hang up'));
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(ledger.sendTransaction).toHaveBeenCalledTimes(3);
        expect(ledger.getSignatureStatus).toHaveBeenCalledTimes(1);
        expect(result).toMatchObject({ success: true });
        expect(await recordFor(header)).toMatchObject({ status: 'confirmed', attempts: 3 });
    });

    it('should poll rather than fail when a resend is rejected after a transport failure', async () => {
        ledger.sendTransaction
            .mockRejectedValueOnce(new PaymentError('NetworkTransient', 'socket hang up'))
            .mockRejectedValueOnce(new PaymentError('LedgerRejected', 'This transaction has already been processed'));
        const header = await buildPaymentHeader(fixture);

        const result = await settler.settle(header, fixture.requirements);

        expect(ledger.sendTransaction).toHaveBeenCalledTimes(2);
        expect(ledger.getSignatureStatus).toHaveBeenCalledTimes(1);
        expect(result.success).toBe(true);
        expect(await recordFor(header)).toMatchObject({ status: 'confirmed', attempts: 1 });
    });

    it('should resubmit the re-signed transaction when resuming a pending settlement', async () => {
        const header = await buildPaymentHeader(fixture);
        const proof = decodePaymentHeader(header);
        const signed = await fixture.feePayer.sign(proof.transaction);
        const wire = getBase64EncodedWireTransaction(signed);
        const now = Date.now();
        await storage.insert({
            id: fingerprintProof(proof),
            status: 'pending',
            txSignature: getSignatureFromTransaction(signed),
            attempts: 0,
            payer: fixture.payer.address,
            payTo: fixture.payTo,
            asset: fixture.mint,
            amount: '10000',
            network: 'solana-devnet',
            firstSeenAt: now,
            deadlineAt: now + 60_000,
            updatedAt: now,
        });

        const result = await settler.settle(header, fixture.requirements);

        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
        expect(ledger.sendTransaction).toHaveBeenCalledWith(wire);
        expect(result).toMatchObject({ success: true, txHash: signatureOfWire(wire) });
    });

    it('should poll a resumed pending settlement whose resend is already processed', async () => {
        ledger.sendTransaction.mockRejectedValue(new PaymentError('LedgerRejected', 'This transaction has already been processed'));
        const header = await buildPaymentHeader(fixture);
        const proof = decodePaymentHeader(header);
        const signed = await fixture.feePayer.sign(proof.transaction);
        const now = Date.now();
        await storage.insert({
            id: fingerprintProof(proof),
            status: 'pending',
            txSignature: getSignatureFromTransaction(signed),
            attempts: 0,
            payer: fixture.payer.address,
            payTo: fixture.payTo,
            asset: fixture.mint,
            amount: '10000',
            network: 'solana-devnet',
            firstSeenAt: now,
            deadlineAt: now + 60_000,
            updatedAt: now,
        });

        const result = await settler.settle(header, fixture.requirements);

        expect(result).toMatchObject({ success: true, txHash: getSignatureFromTransaction(signed) });
        expect(ledger.getSignatureStatus).toHaveBeenCalledWith(getSignatureFromTransaction(signed));
    });
});
