import request from 'supertest';
import express, { type Express } from 'express';
import { describe, it, expect, beforeEach } from 'vitest';
import { requirePayment } from '../../src/middleware/x402.js';
import { RequirementsBuilder } from '../../src/services/requirements.js';
import { Settler } from '../../src/services/settler.js';
import { Verifier } from '../../src/services/verifier.js';
import { MemorySettlementStorage } from '../../src/storage/memory.js';
import { createFakeLedger, type FakeLedger } from '../helpers/fakeLedger.js';
import { buildPaymentHeader, createPaymentFixture, type PaymentFixture } from '../helpers/proof.js';

describe('Payment middleware', () => {
    let app: Express;
    let ledger: FakeLedger;
    let served: number;
    let fixture: PaymentFixture;

    beforeEach(async () => {
        fixture = await createPaymentFixture();
        ledger = createFakeLedger();
        const verifier = new Verifier(ledger, {
            network: 'solana-devnet',
            decimals: 6,
            maxComputeUnitPrice: 5n,
            blockhashCacheMs: 2000,
        });
        const settler = new Settler(new MemorySettlementStorage(), ledger, verifier, fixture.feePayer, {
            pollIntervalMs: 5,
            maxPollIntervalMs: 20,
            maxSubmitAttempts: 3,
        });
        const builder = new RequirementsBuilder({
            network: 'solana-devnet',
            asset: fixture.mint,
            decimals: 6,
            defaultTimeoutSeconds: 60,
            feePayer: fixture.feePayer.address,
        });

        served = 0;
        app = express();
        app.get(
            '/weather',
            requirePayment({ builder, settler, price: '$0.01', payTo: fixture.payTo, description: 'Weather report' }),
            (_req, res) => {
                served++;
                res.json({ forecast: 'sunny' });
            },
        );
        app.get(
            '/report',
            requirePayment({ builder, settler, price: '$0.01', payTo: fixture.payTo, description: 'Daily report' }),
            (_req, res) => {
                served++;
                res.json({ report: 'ok' });
            },
        );
    });

    it('should answer an unpaid request with a 402 challenge', async () => {
        const response = await request(app).get('/weather');

        expect(response.status).toBe(402);
        expect(response.body.error).toBe('X-PAYMENT header is required');
        expect(response.body.accepts[0]).toMatchObject({
            maxAmountRequired: '10000',
            payTo: fixture.payTo,
            asset: fixture.mint,
            description: 'Weather report',
        });
        expect(response.body.accepts[0].resource).toMatch(/\/weather$/);
    });

    it('should serve the resource once the payment settles', async () => {
        const payment = await buildPaymentHeader(fixture);

        const response = await request(app).get('/weather').set('X-PAYMENT', payment);

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ forecast: 'sunny' });
        const settlement = JSON.parse(Buffer.from(response.headers['x-payment-response'], 'base64').toString('utf8'));
        expect(settlement).toMatchObject({ success: true, network: 'solana-devnet', payer: fixture.payer.address });
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
    });

    it('should answer an underpayment with a 402 naming the reason', async () => {
        const payment = await buildPaymentHeader(fixture, { amount: 9999n });

        const response = await request(app).get('/weather').set('X-PAYMENT', payment);

        expect(response.status).toBe(402);
        expect(response.body.error).toBe('InsufficientAmount');
        expect(ledger.sendTransaction).not.toHaveBeenCalled();
    });

    it('should serve a settled payment only once', async () => {
        const payment = await buildPaymentHeader(fixture);

        const first = await request(app).get('/weather').set('X-PAYMENT', payment);
        const replay = await request(app).get('/weather').set('X-PAYMENT', payment);
        const otherRoute = await request(app).get('/report').set('X-PAYMENT', payment);

        expect(first.status).toBe(200);
        expect(replay.status).toBe(402);
        expect(replay.body.error).toBe('PaymentAlreadyRedeemed');
        expect(otherRoute.status).toBe(402);
        expect(otherRoute.body.error).toBe('PaymentAlreadyRedeemed');
        expect(served).toBe(1);
        expect(ledger.sendTransaction).toHaveBeenCalledTimes(1);
    });

    it('should serve one of several concurrent requests carrying the same payment', async () => {
        const payment = await buildPaymentHeader(fixture);

        const responses = await Promise.all(
            Array.from({ length: 3 }, () => request(app).get('/weather').set('X-PAYMENT', payment)),
        );

        expect(responses.map((response) => response.status).sort()).toEqual([200, 402, 402]);
        expect(served).toBe(1);
    });
});
