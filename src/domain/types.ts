import type { Address, CompiledTransactionMessage, Transaction } from '@solana/kit';
import type { ErrorKind } from './errors.js';

export const X402_VERSION = 1;
export const SCHEME = 'exact';

export const SUPPORTED_NETWORKS = ['solana', 'solana-devnet'] as const;
export type SolanaNetwork = (typeof SUPPORTED_NETWORKS)[number];

export interface PaymentRequirementsExtra {
    feePayer: string; // Base58 address of the facilitator
    decimals?: number;
}

export interface PaymentRequirements {
    scheme: typeof SCHEME;
    network: SolanaNetwork;
    maxAmountRequired: string; // Atomic units, equality required
    asset: string; // Mint address
    payTo: string; // Wallet owning the destination token account
    resource: string;
    description: string;
    mimeType: string;
    outputSchema?: Record<string, unknown> | null;
    maxTimeoutSeconds: number;
    extra: PaymentRequirementsExtra;
}

export interface PaymentRequired {
    x402Version: number;
    accepts: PaymentRequirements[];
    error: string;
}

/** x402 payment payload, as carried base64-encoded in the X-PAYMENT header. */
export interface PaymentEnvelope {
    x402Version: number;
    scheme: string;
    network: string;
}

export interface PaymentProof {
    readonly transaction: Transaction;
    readonly message: CompiledTransactionMessage;
    /** Wire bytes of the transaction as submitted by the client. */
    readonly wireBytes: Uint8Array;
    readonly feePayer: Address;
    readonly recentBlockhash: string;
    readonly envelope?: PaymentEnvelope;
}

export type VerificationResult =
    | {
          readonly valid: true;
          readonly payer: string;
          readonly payee: string;
          readonly normalizedAmount: string;
      }
    | {
          readonly valid: false;
          readonly reason: ErrorKind;
          readonly message: string;
          readonly payer?: string;
      };

export interface VerifyResponse {
    isValid: boolean;
    reason?: ErrorKind;
    invalidReason?: string;
    payer?: string;
}

export interface SettleResponse {
    success: boolean;
    txHash?: string;
    error?: ErrorKind;
    network: string;
    payer?: string;
}

export interface SupportedResponse {
    schemes: string[];
    networks: string[];
    kinds: { x402Version: number; scheme: string; network: string }[];
}
