import type { Base64EncodedWireTransaction } from '@solana/kit';

export type SignatureState =
    | { state: 'pending' }
    | { state: 'confirmed'; slot: bigint }
    | { state: 'failed'; error: string };

/**
 * Ledger operations the facilitator needs. Implementations raise `PaymentError`
 * with `NetworkTransient` for connectivity problems and `LedgerRejected` when the
 * cluster refuses the transaction.
 */
export interface ILedgerClient {
    sendTransaction(wireTransaction: Base64EncodedWireTransaction): Promise<string>;
    getSignatureStatus(signature: string): Promise<SignatureState>;
    isBlockhashValid(blockhash: string): Promise<boolean>;
}
