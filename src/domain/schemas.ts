import { z } from 'zod';
import { isAddress } from '@solana/kit';
import { SCHEME, SUPPORTED_NETWORKS } from './types.js';

const AddressSchema = z.string().refine((value) => isAddress(value), { message: 'Invalid Solana address' });

const PriceSchema = z.union([z.string().min(1), z.number()]);

export const PaymentRequirementsSchema = z.object({
    scheme: z.literal(SCHEME),
    network: z.enum(SUPPORTED_NETWORKS),
    maxAmountRequired: z.string().regex(/^\d+$/, 'Amount must be a non-negative integer string'),
    asset: AddressSchema,
    payTo: AddressSchema,
    resource: z.string().url(),
    description: z.string().default(''),
    mimeType: z.string().default('application/json'),
    outputSchema: z.record(z.unknown()).nullable().optional(),
    maxTimeoutSeconds: z.number().int().positive(),
    extra: z.object({
        feePayer: AddressSchema,
        decimals: z.number().int().min(0).max(18).optional(),
    }),
});

// X-PAYMENT header body when the client sends the full x402 payload rather than a bare transaction.
export const PaymentEnvelopeSchema = z.object({
    x402Version: z.number().int(),
    scheme: z.string(),
    network: z.string(),
    payload: z.object({
        transaction: z.string().min(1),
    }),
});

export const PaymentRequestSchema = z
    .object({
        x402Version: z.number().int().optional(),
        payment: z.string().min(1).optional(),
        paymentHeader: z.string().min(1).optional(),
        requirements: PaymentRequirementsSchema.optional(),
        paymentRequirements: PaymentRequirementsSchema.optional(),
    })
    .transform((body, ctx) => {
        const payment = body.payment ?? body.paymentHeader;
        const requirements = body.requirements ?? body.paymentRequirements;
        if (!payment) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['payment'], message: 'payment is required' });
            return z.NEVER;
        }
        if (!requirements) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['requirements'], message: 'requirements are required' });
            return z.NEVER;
        }
        return { payment, requirements };
    });

export const VerifyRequestSchema = PaymentRequestSchema;
export const SettleRequestSchema = PaymentRequestSchema;

export const RequirementsRequestSchema = z
    .object({
        resource: z.string().url(),
        amount: PriceSchema.optional(),
        price: PriceSchema.optional(),
        description: z.string().optional(),
        payTo: AddressSchema.optional(),
        mimeType: z.string().optional(),
        maxTimeoutSeconds: z.number().int().positive().max(3600).optional(),
    })
    .refine((body) => body.amount !== undefined || body.price !== undefined, {
        path: ['amount'],
        message: 'amount is required',
    });

export type RequirementsRequest = z.infer<typeof RequirementsRequestSchema>;
export type PaymentRequest = z.infer<typeof PaymentRequestSchema>;
