import * as ed25519 from '@noble/ed25519';
import {
    COMPUTE_BUDGET_PROGRAM_ADDRESS,
    getSetComputeUnitPriceInstructionDataDecoder,
    SET_COMPUTE_UNIT_LIMIT_DISCRIMINATOR,
    SET_COMPUTE_UNIT_PRICE_DISCRIMINATOR,
} from '@solana-program/compute-budget';
import {
    getTransferCheckedInstructionDataDecoder,
    TOKEN_PROGRAM_ADDRESS,
    TRANSFER_CHECKED_DISCRIMINATOR,
} from '@solana-program/token';
import { findAssociatedTokenPda, TOKEN_2022_PROGRAM_ADDRESS } from '@solana-program/token-2022';
import { address, type Address, type CompiledTransactionMessage, getAddressEncoder } from '@solana/kit';
import { pino } from 'pino';
import { config } from '../config.js';
import { PaymentError, errorMessage } from '../domain/errors.js';
import type { ILedgerClient } from '../domain/network.js';
import { type PaymentProof, type PaymentRequirements, SCHEME, type SolanaNetwork, type VerificationResult } from '../domain/types.js';
import { toPaymentError } from '../utils/rpcErrors.js';
import { decodePaymentHeader } from './decoder.js';

const logger = pino({ name: 'verifier', level: config.logLevel });

type CompiledInstruction = CompiledTransactionMessage['instructions'][number];

// Instruction data lengths: discriminator byte plus the encoded arguments.
const COMPUTE_UNIT_LIMIT_DATA_LENGTH = 5; // u32 units
const COMPUTE_UNIT_PRICE_DATA_LENGTH = 9; // u64 micro-lamports
const TRANSFER_CHECKED_DATA_LENGTH = 10; // u64 amount, u8 decimals
// TransferChecked accounts: [source, mint, destination, authority]
const TRANSFER_CHECKED_ACCOUNTS = 4;

export interface VerifierOptions {
    network: SolanaNetwork;
    decimals: number;
    maxComputeUnitPrice: bigint;
    blockhashCacheMs: number;
    now?: () => number;
}

export interface TransferDetails {
    tokenProgram: Address;
    source: Address;
    mint: Address;
    destination: Address;
    authority: Address;
    amount: bigint;
    decimals: number;
}

export class Verifier {
    private blockhashCache: Map<string, { valid: boolean; checkedAt: number }> = new Map();
    private now: () => number;

    constructor(
        private ledger: ILedgerClient | undefined,
        private options: VerifierOptions,
    ) {
        this.now = options.now ?? Date.now;
    }

    /** Decodes a payment header and runs every check, including the ledger freshness query. */
    async verify(paymentHeader: string, requirements: PaymentRequirements): Promise<VerificationResult> {
        let proof: PaymentProof;
        try {
            proof = decodePaymentHeader(paymentHeader);
        } catch (error) {
            return this.reject(error);
        }
        return this.verifyProof(proof, requirements);
    }

    async verifyProof(proof: PaymentProof, requirements: PaymentRequirements): Promise<VerificationResult> {
        const local = await this.checkStructure(proof, requirements);
        if (!local.valid) {
            return local;
        }
        try {
            await this.assertFresh(proof);
        } catch (error) {
            return this.reject(error, local.payer);
        }
        return local;
    }

    /**
     * Checks that need no network access: shape, asset, amount, recipient,
     * fee payer and client signature, in that order.
     */
    async checkStructure(proof: PaymentProof, requirements: PaymentRequirements): Promise<VerificationResult> {
        let payer: string | undefined;
        try {
            this.assertSchemeAndNetwork(proof, requirements);
            const transfer = this.assertShape(proof.message);
            payer = transfer.authority;
            this.assertAsset(transfer, requirements);
            this.assertAmount(transfer, requirements);
            await this.assertRecipient(transfer, requirements);
            this.assertFeePayer(proof, transfer, requirements);
            await this.assertClientSignatures(proof, transfer);

            return Object.freeze({
                valid: true,
                payer: transfer.authority,
                payee: requirements.payTo,
                normalizedAmount: transfer.amount.toString(),
            });
        } catch (error) {
            return this.reject(error, payer);
        }
    }

    async assertFresh(proof: PaymentProof): Promise<void> {
        if (!this.ledger) {
            return;
        }
        const cached = this.blockhashCache.get(proof.recentBlockhash);
        let valid: boolean;
        if (cached && this.now() - cached.checkedAt < this.options.blockhashCacheMs) {
            valid = cached.valid;
        } else {
            try {
                valid = await this.ledger.isBlockhashValid(proof.recentBlockhash);
            } catch (error) {
                throw toPaymentError(error);
            }
            this.remember(proof.recentBlockhash, valid);
        }
        if (!valid) {
            throw new PaymentError('StaleTransaction', `Blockhash ${proof.recentBlockhash} is no longer valid`);
        }
    }

    private remember(recentBlockhash: string, valid: boolean) {
        const now = this.now();
        if (this.blockhashCache.size >= 1024) {
            for (const [key, entry] of this.blockhashCache) {
                if (now - entry.checkedAt >= this.options.blockhashCacheMs) {
                    this.blockhashCache.delete(key);
                }
            }
        }
        this.blockhashCache.set(recentBlockhash, { valid, checkedAt: now });
    }

    private reject(error: unknown, payer?: string): VerificationResult {
        const failure =
            error instanceof PaymentError ? error : new PaymentError('InvalidStructure', errorMessage(error));
        logger.info({ reason: failure.kind, error: failure.message, payer }, 'Payment rejected');
        return Object.freeze({ valid: false, reason: failure.kind, message: failure.message, payer });
    }

    private assertSchemeAndNetwork(proof: PaymentProof, requirements: PaymentRequirements) {
        if (requirements.scheme !== SCHEME) {
            throw new PaymentError('InvalidStructure', `Unsupported scheme ${requirements.scheme}`);
        }
        if (requirements.network !== this.options.network) {
            throw new PaymentError('InvalidStructure', `Unsupported network ${requirements.network}`);
        }
        const { envelope } = proof;
        if (envelope && (envelope.scheme !== requirements.scheme || envelope.network !== requirements.network)) {
            throw new PaymentError('InvalidStructure', 'Payment payload scheme or network does not match requirements');
        }
    }

    private assertShape(message: CompiledTransactionMessage): TransferDetails {
        if ('addressTableLookups' in message && message.addressTableLookups && message.addressTableLookups.length > 0) {
            throw new PaymentError('InvalidStructure', 'Address lookup tables are not accepted');
        }
        const { instructions } = message;
        if (instructions.length !== 3) {
            throw new PaymentError('InvalidStructure', `Expected 3 instructions, got ${instructions.length}`);
        }

        // The two compute-budget directives come first, one of each kind.
        const budgetKinds = new Set<number>();
        for (const instruction of instructions.slice(0, 2)) {
            const kind = this.assertComputeBudgetInstruction(instruction, message.staticAccounts);
            if (budgetKinds.has(kind)) {
                throw new PaymentError('InvalidStructure', 'Duplicate compute budget instruction');
            }
            budgetKinds.add(kind);
        }

        return this.parseTransferChecked(instructions[2], message.staticAccounts);
    }

    private assertComputeBudgetInstruction(instruction: CompiledInstruction, accounts: readonly Address[]): number {
        const program = accounts[instruction.programAddressIndex];
        const data = instruction.data;
        if (program !== COMPUTE_BUDGET_PROGRAM_ADDRESS || !data || data.length === 0) {
            throw new PaymentError('InvalidStructure', 'First two instructions must be compute budget instructions');
        }

        const discriminator = data[0];
        if (discriminator === SET_COMPUTE_UNIT_LIMIT_DISCRIMINATOR) {
            if (data.length !== COMPUTE_UNIT_LIMIT_DATA_LENGTH) {
                throw new PaymentError('InvalidStructure', 'Invalid SetComputeUnitLimit instruction');
            }
            return discriminator;
        }
        if (discriminator === SET_COMPUTE_UNIT_PRICE_DISCRIMINATOR) {
            if (data.length !== COMPUTE_UNIT_PRICE_DATA_LENGTH) {
                throw new PaymentError('InvalidStructure', 'Invalid SetComputeUnitPrice instruction');
            }
            const { microLamports } = getSetComputeUnitPriceInstructionDataDecoder().decode(data);
            if (microLamports > this.options.maxComputeUnitPrice) {
                throw new PaymentError(
                    'InvalidStructure',
                    `Compute unit price ${microLamports} exceeds max ${this.options.maxComputeUnitPrice}`,
                );
            }
            return discriminator;
        }
        throw new PaymentError('InvalidStructure', `Unexpected compute budget instruction ${discriminator}`);
    }

    private parseTransferChecked(instruction: CompiledInstruction, accounts: readonly Address[]): TransferDetails {
        const program = accounts[instruction.programAddressIndex];
        if (program !== TOKEN_PROGRAM_ADDRESS && program !== TOKEN_2022_PROGRAM_ADDRESS) {
            throw new PaymentError('InvalidStructure', 'Third instruction must be an SPL token transfer');
        }
        const data = instruction.data;
        if (!data || data[0] !== TRANSFER_CHECKED_DISCRIMINATOR || data.length !== TRANSFER_CHECKED_DATA_LENGTH) {
            throw new PaymentError('InvalidStructure', 'Expected a TransferChecked instruction');
        }
        const indices = instruction.accountIndices ?? [];
        if (indices.length !== TRANSFER_CHECKED_ACCOUNTS) {
            throw new PaymentError('InvalidStructure', `TransferChecked requires ${TRANSFER_CHECKED_ACCOUNTS} accounts`);
        }
        const [source, mint, destination, authority] = indices.map((index) => accounts[index]);
        if (!source || !mint || !destination || !authority) {
            throw new PaymentError('InvalidStructure', 'TransferChecked references an unknown account');
        }

        const { amount, decimals } = getTransferCheckedInstructionDataDecoder().decode(data);
        return { tokenProgram: program, source, mint, destination, authority, amount, decimals };
    }

    private assertAsset(transfer: TransferDetails, requirements: PaymentRequirements) {
        if (transfer.mint !== requirements.asset) {
            throw new PaymentError('WrongAsset', `Mint ${transfer.mint} does not match required ${requirements.asset}`);
        }
        const expectedDecimals = requirements.extra.decimals ?? this.options.decimals;
        if (transfer.decimals !== expectedDecimals) {
            throw new PaymentError(
                'WrongAsset',
                `Decimals ${transfer.decimals} do not match expected ${expectedDecimals}`,
            );
        }
    }

    private assertAmount(transfer: TransferDetails, requirements: PaymentRequirements) {
        const required = BigInt(requirements.maxAmountRequired);
        if (transfer.amount < required) {
            throw new PaymentError('InsufficientAmount', `Amount ${transfer.amount} is below required ${required}`);
        }
        if (transfer.amount > required) {
            throw new PaymentError('OverpaymentRejected', `Amount ${transfer.amount} exceeds required ${required}`);
        }
    }

    private async assertRecipient(transfer: TransferDetails, requirements: PaymentRequirements) {
        let expected: Address;
        try {
            [expected] = await findAssociatedTokenPda({
                owner: address(requirements.payTo),
                mint: transfer.mint,
                tokenProgram: transfer.tokenProgram,
            });
        } catch (error) {
            throw new PaymentError('WrongRecipient', `Cannot derive token account for ${requirements.payTo}: ${errorMessage(error)}`);
        }
        if (transfer.destination !== expected) {
            throw new PaymentError(
                'WrongRecipient',
                `Destination ${transfer.destination} is not the token account ${expected} of ${requirements.payTo}`,
            );
        }
    }

    private assertFeePayer(proof: PaymentProof, transfer: TransferDetails, requirements: PaymentRequirements) {
        const { feePayer, message, transaction } = proof;
        if (feePayer !== requirements.extra.feePayer) {
            throw new PaymentError(
                'UnexpectedFeePayer',
                `Fee payer ${feePayer} does not match required ${requirements.extra.feePayer}`,
            );
        }
        if (transaction.signatures[feePayer]) {
            throw new PaymentError('UnexpectedFeePayer', 'Fee payer signature must be left empty');
        }
        if (transfer.authority === feePayer) {
            throw new PaymentError('UnexpectedFeePayer', 'Fee payer cannot authorize the transfer');
        }
        // The facilitator's account may only appear as the fee payer, never as an instruction account.
        for (const instruction of message.instructions) {
            for (const index of instruction.accountIndices ?? []) {
                if (message.staticAccounts[index] === feePayer) {
                    throw new PaymentError('UnexpectedFeePayer', 'Fee payer must not be in instruction accounts');
                }
            }
        }
    }

    private async assertClientSignatures(proof: PaymentProof, transfer: TransferDetails) {
        const { message, transaction, feePayer } = proof;
        const signers = message.staticAccounts.slice(0, message.header.numSignerAccounts);
        if (!signers.includes(transfer.authority)) {
            throw new PaymentError('InvalidSignature', `Transfer authority ${transfer.authority} is not a signer`);
        }

        const messageBytes = new Uint8Array(transaction.messageBytes);
        for (const signer of signers) {
            if (signer === feePayer) {
                continue;
            }
            const signature = transaction.signatures[signer];
            if (!signature) {
                throw new PaymentError('InvalidSignature', `Missing signature for ${signer}`);
            }
            const publicKey = new Uint8Array(getAddressEncoder().encode(signer));
            let valid = false;
            try {
                valid = await ed25519.verifyAsync(new Uint8Array(signature), messageBytes, publicKey);
            } catch (error) {
                logger.debug({ signer, error: errorMessage(error) }, 'Signature could not be checked');
            }
            if (!valid) {
                throw new PaymentError('InvalidSignature', `Invalid signature for ${signer}`);
            }
        }
    }
}
