import {
    type Base64EncodedWireTransaction,
    blockhash,
    type Commitment,
    createSolanaRpc,
    type Rpc,
    signature,
    type SolanaRpcApi,
} from '@solana/kit';
import { pino } from 'pino';
import { config } from '../config.js';
import type { ILedgerClient, SignatureState } from '../domain/network.js';
import { describeTransactionError, toPaymentError } from '../utils/rpcErrors.js';

const logger = pino({ name: 'ledger', level: config.logLevel });

const CONFIRMED: ReadonlySet<string> = new Set(['confirmed', 'finalized']);

/** The RPC methods the facilitator calls. */
export type LedgerRpc = Pick<Rpc<SolanaRpcApi>, 'sendTransaction' | 'getSignatureStatuses' | 'isBlockhashValid'>;

export class SolanaRpcLedger implements ILedgerClient {
    constructor(
        private rpc: LedgerRpc,
        private commitment: Commitment = 'confirmed',
    ) { }

    static fromUrl(url: string, commitment: Commitment = 'confirmed'): SolanaRpcLedger {
        return new SolanaRpcLedger(createSolanaRpc(url), commitment);
    }

    async sendTransaction(wireTransaction: Base64EncodedWireTransaction): Promise<string> {
        try {
            return await this.rpc
                .sendTransaction(wireTransaction, {
                    encoding: 'base64',
                    skipPreflight: false,
                    preflightCommitment: this.commitment,
                })
                .send();
        } catch (error) {
            const failure = toPaymentError(error);
            logger.warn({ kind: failure.kind, error: failure.message }, 'sendTransaction failed');
            throw failure;
        }
    }

    async getSignatureStatus(txSignature: string): Promise<SignatureState> {
        const statuses = await this.rpc
            .getSignatureStatuses([signature(txSignature)])
            .send()
            .catch((error: unknown) => {
                throw toPaymentError(error);
            });
        const status = statuses.value[0];
        if (!status) {
            return { state: 'pending' };
        }
        if (status.err) {
            return { state: 'failed', error: describeTransactionError(status.err) };
        }
        if (status.confirmationStatus && CONFIRMED.has(status.confirmationStatus)) {
            if (this.commitment === 'finalized' && status.confirmationStatus !== 'finalized') {
                return { state: 'pending' };
            }
            return { state: 'confirmed', slot: status.slot };
        }
        return { state: 'pending' };
    }

    async isBlockhashValid(recentBlockhash: string): Promise<boolean> {
        try {
            const { value } = await this.rpc
                .isBlockhashValid(blockhash(recentBlockhash), { commitment: this.commitment })
                .send();
            return value;
        } catch (error) {
            throw toPaymentError(error);
        }
    }
}
