import {
    isSolanaError,
    SOLANA_ERROR__JSON_RPC__INTERNAL_ERROR,
    SOLANA_ERROR__JSON_RPC__SERVER_ERROR_MIN_CONTEXT_SLOT_NOT_REACHED,
    SOLANA_ERROR__JSON_RPC__SERVER_ERROR_NODE_UNHEALTHY,
    SOLANA_ERROR__JSON_RPC__SERVER_ERROR_SEND_TRANSACTION_PREFLIGHT_FAILURE,
    SOLANA_ERROR__RPC__TRANSPORT_HTTP_ERROR,
} from '@solana/kit';
import { type ErrorKind, PaymentError, errorMessage } from '../domain/errors.js';

/**
 * Maps a failure from the Solana RPC layer onto the facilitator's error taxonomy.
 *
 * Transport failures, unhealthy nodes and anything that never reached a validator
 * are `NetworkTransient`. Preflight failures and other JSON-RPC errors carry a
 * verdict about the transaction itself and are `LedgerRejected`.
 */
export function classifyRpcError(error: unknown): ErrorKind {
    if (error instanceof PaymentError) {
        return error.kind;
    }
    if (isSolanaError(error, SOLANA_ERROR__JSON_RPC__SERVER_ERROR_SEND_TRANSACTION_PREFLIGHT_FAILURE)) {
        return 'LedgerRejected';
    }
    if (
        isSolanaError(error, SOLANA_ERROR__RPC__TRANSPORT_HTTP_ERROR) ||
        isSolanaError(error, SOLANA_ERROR__JSON_RPC__SERVER_ERROR_NODE_UNHEALTHY) ||
        isSolanaError(error, SOLANA_ERROR__JSON_RPC__SERVER_ERROR_MIN_CONTEXT_SLOT_NOT_REACHED) ||
        isSolanaError(error, SOLANA_ERROR__JSON_RPC__INTERNAL_ERROR)
    ) {
        return 'NetworkTransient';
    }
    if (isSolanaError(error)) {
        return 'LedgerRejected';
    }
    // fetch failures, socket resets, DNS errors
    return 'NetworkTransient';
}

export function toPaymentError(error: unknown): PaymentError {
    if (error instanceof PaymentError) {
        return error;
    }
    return new PaymentError(classifyRpcError(error), errorMessage(error));
}

/** JSON rendering of an on-chain `TransactionError`, which may contain bigints. */
export function describeTransactionError(err: unknown): string {
    if (typeof err === 'string') {
        return err;
    }
    return JSON.stringify(err, (_, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
}
