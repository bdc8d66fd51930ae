import { getCompiledTransactionMessageDecoder, getTransactionDecoder } from '@solana/kit';
import { createHash } from 'crypto';
import { pino } from 'pino';
import { config } from '../config.js';
import { PaymentError, errorMessage } from '../domain/errors.js';
import { PaymentEnvelopeSchema } from '../domain/schemas.js';
import type { PaymentEnvelope, PaymentProof } from '../domain/types.js';

const logger = pino({ name: 'decoder', level: config.logLevel });

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const OPEN_BRACE = 0x7b;

function decodeBase64(value: string, what: string): Buffer {
    const trimmed = value.trim();
    if (trimmed.length === 0 || !BASE64_PATTERN.test(trimmed)) {
        throw new PaymentError('MalformedProof', `${what} is not valid base64`);
    }
    return Buffer.from(trimmed, 'base64');
}

function parseEnvelope(bytes: Buffer): { envelope: PaymentEnvelope; transaction: string } {
    let json: unknown;
    try {
        json = JSON.parse(bytes.toString('utf8'));
    } catch {
        throw new PaymentError('MalformedProof', 'Payment payload is not valid JSON');
    }
    const parsed = PaymentEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
        throw new PaymentError('MalformedProof', 'Payment payload does not match the x402 payload shape');
    }
    const { x402Version, scheme, network, payload } = parsed.data;
    return { envelope: { x402Version, scheme, network }, transaction: payload.transaction };
}

function decodeTransactionBytes(wireBytes: Uint8Array, envelope?: PaymentEnvelope): PaymentProof {
    try {
        const transaction = getTransactionDecoder().decode(wireBytes);
        // The message runs to the end of the wire bytes, so anything it does not consume is trailing junk.
        const [message, messageEnd] = getCompiledTransactionMessageDecoder().read(transaction.messageBytes, 0);
        if (messageEnd !== transaction.messageBytes.length) {
            throw new Error(`${transaction.messageBytes.length - messageEnd} trailing bytes after transaction`);
        }
        const feePayer = message.staticAccounts[0];
        if (!feePayer) {
            throw new Error('Transaction has no accounts');
        }
        return {
            transaction,
            message,
            wireBytes,
            feePayer,
            recentBlockhash: message.lifetimeToken,
            envelope,
        };
    } catch (error) {
        throw new PaymentError('MalformedProof', `Transaction could not be decoded: ${errorMessage(error)}`);
    }
}

/**
 * Decodes an X-PAYMENT header into a partially signed transaction.
 *
 * The header is either a bare base64 wire transaction or a base64 JSON x402 payload
 * whose `payload.transaction` holds one. Nothing about amounts or addresses is checked here.
 */
export function decodePaymentHeader(header: string): PaymentProof {
    const bytes = decodeBase64(header, 'Payment header');
    if (bytes[0] === OPEN_BRACE) {
        const { envelope, transaction } = parseEnvelope(bytes);
        logger.debug({ scheme: envelope.scheme, network: envelope.network }, 'Decoded x402 payment payload');
        return decodeTransactionBytes(new Uint8Array(decodeBase64(transaction, 'Payload transaction')), envelope);
    }
    return decodeTransactionBytes(new Uint8Array(bytes));
}

/** Deterministic id of a proof, taken over the client's transaction bytes before the fee payer signs. */
export function fingerprintProof(proof: PaymentProof): string {
    return createHash('sha256').update(proof.wireBytes).digest('hex');
}
