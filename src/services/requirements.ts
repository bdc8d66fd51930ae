import { pino } from 'pino';
import { config } from '../config.js';
import { PaymentError } from '../domain/errors.js';
import {
    type PaymentRequired,
    type PaymentRequirements,
    SCHEME,
    type SolanaNetwork,
    X402_VERSION,
} from '../domain/types.js';

const logger = pino({ name: 'requirements', level: config.logLevel });

const U64_MAX = 2n ** 64n - 1n;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export interface RequirementsBuilderOptions {
    network: SolanaNetwork;
    asset: string;
    decimals: number;
    defaultTimeoutSeconds: number;
    feePayer?: string;
}

export interface RequirementsInput {
    resource: string;
    price: string | number;
    payTo?: string;
    description?: string;
    mimeType?: string;
    maxTimeoutSeconds?: number;
    outputSchema?: Record<string, unknown> | null;
}

/**
 * Converts a decimal currency amount ("0.01", "$1.50") into atomic units of an
 * asset with `decimals` fractional digits, without going through floating point.
 */
export function toAtomicUnits(price: string | number, decimals: number): bigint {
    if (typeof price === 'number' && !Number.isFinite(price)) {
        throw new PaymentError('InvalidAmount', `Price ${price} is not a finite number`);
    }
    const text = String(price).trim().replace(/^\$/, '');
    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
        throw new PaymentError('InvalidAmount', `Price "${price}" is not a positive decimal amount`);
    }
    const whole = match[1];
    const fraction = (match[2] ?? '').replace(/0+$/, '');
    if (fraction.length > decimals) {
        throw new PaymentError('InvalidAmount', `Price "${price}" has more than ${decimals} decimal places`);
    }
    const atomic = BigInt(whole + fraction.padEnd(decimals, '0'));
    if (atomic <= 0n) {
        throw new PaymentError('InvalidAmount', 'Price must be greater than zero');
    }
    if (atomic > U64_MAX) {
        throw new PaymentError('InvalidAmount', `Price "${price}" exceeds the token amount range`);
    }
    return atomic;
}

export class RequirementsBuilder {
    constructor(private options: RequirementsBuilderOptions) { }

    build(input: RequirementsInput): PaymentRequirements {
        const { feePayer } = this.options;
        if (!feePayer) {
            throw new PaymentError('InternalFault', 'Facilitator fee payer is not configured');
        }

        const amount = toAtomicUnits(input.price, this.options.decimals);
        const requirements: PaymentRequirements = {
            scheme: SCHEME,
            network: this.options.network,
            maxAmountRequired: amount.toString(),
            asset: this.options.asset,
            payTo: input.payTo ?? feePayer,
            resource: input.resource,
            description: input.description ?? '',
            mimeType: input.mimeType ?? 'application/json',
            outputSchema: input.outputSchema ?? null,
            maxTimeoutSeconds: input.maxTimeoutSeconds ?? this.options.defaultTimeoutSeconds,
            extra: Object.freeze({ feePayer, decimals: this.options.decimals }),
        };

        logger.debug({ resource: input.resource, amount: requirements.maxAmountRequired }, 'Issued payment requirements');
        return Object.freeze(requirements);
    }

    challenge(requirements: PaymentRequirements, error = ''): PaymentRequired {
        return { x402Version: X402_VERSION, accepts: [requirements], error };
    }
}
