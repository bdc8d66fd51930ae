import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { pino } from 'pino';
import { config } from '../config.js';
import { PaymentError, errorMessage } from '../domain/errors.js';
import type { PaymentRequirements } from '../domain/types.js';
import type { RequirementsBuilder } from '../services/requirements.js';
import type { Settler } from '../services/settler.js';

const logger = pino({ name: 'x402-middleware', level: config.logLevel });

export interface PaymentGateOptions {
    builder: RequirementsBuilder;
    settler: Settler;
    price: string | number;
    payTo?: string;
    description?: string;
    mimeType?: string;
    maxTimeoutSeconds?: number;
}

/**
 * Gates a route behind an x402 payment. Requests without `X-PAYMENT` get a 402
 * challenge; a payment that settles lets the handler run once with `X-PAYMENT-RESPONSE` set.
 */
export function requirePayment(options: PaymentGateOptions): RequestHandler {
    const { builder, settler } = options;

    const requirementsFor = (req: Request): PaymentRequirements =>
        builder.build({
            resource: `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`,
            price: options.price,
            payTo: options.payTo,
            description: options.description,
            mimeType: options.mimeType,
            maxTimeoutSeconds: options.maxTimeoutSeconds,
        });

    return async (req: Request, res: Response, next: NextFunction) => {
        let requirements: PaymentRequirements;
        try {
            requirements = requirementsFor(req);
        } catch (error) {
            next(error);
            return;
        }

        const payment = req.header('X-PAYMENT');
        if (!payment) {
            res.status(402).json(builder.challenge(requirements, 'X-PAYMENT header is required'));
            return;
        }

        try {
            const { response: result, replayed } = await settler.settleWithOutcome(payment, requirements);
            if (!result.success) {
                logger.info({ resource: requirements.resource, reason: result.error }, 'Payment not accepted');
                res.status(402).json(builder.challenge(requirements, result.error ?? 'SettlementFailed'));
                return;
            }
            // A confirmed payment grants one request, on the call that settled it.
            if (replayed) {
                logger.info({ resource: requirements.resource, txHash: result.txHash }, 'Payment already redeemed');
                res.status(402).json(builder.challenge(requirements, 'PaymentAlreadyRedeemed'));
                return;
            }
            res.setHeader('X-PAYMENT-RESPONSE', Buffer.from(JSON.stringify(result)).toString('base64'));
        } catch (error) {
            logger.error({ resource: requirements.resource, error: errorMessage(error) }, 'Payment settlement fault');
            const kind = error instanceof PaymentError ? error.kind : 'InternalFault';
            res.status(500).json({ error: kind });
            return;
        }
        next();
    };
}
