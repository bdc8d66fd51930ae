import {
    type Address,
    createKeyPairSignerFromBytes,
    getBase58Encoder,
    type KeyPairSigner,
    signTransaction,
    type Transaction,
} from '@solana/kit';
import { pino } from 'pino';
import { config } from '../config.js';
import { PaymentError, errorMessage } from '../domain/errors.js';

const logger = pino({ name: 'fee-payer', level: config.logLevel });

/**
 * The facilitator's fee-payer key. The private half is a non-extractable WebCrypto
 * key held in a private field; the only operation offered is co-signing a transaction.
 */
export class FeePayerSigner {
    readonly #signer: KeyPairSigner;

    private constructor(signer: KeyPairSigner) {
        this.#signer = signer;
    }

    static async fromBytes(secretKey: Uint8Array): Promise<FeePayerSigner> {
        const signer = await createKeyPairSignerFromBytes(secretKey);
        logger.info({ address: signer.address }, 'Loaded fee payer');
        return new FeePayerSigner(signer);
    }

    /** Accepts the 64-byte secret key in base58, as exported by the Solana CLI and wallets. */
    static async fromBase58(secretKey: string): Promise<FeePayerSigner> {
        let bytes: Uint8Array;
        try {
            bytes = new Uint8Array(getBase58Encoder().encode(secretKey.trim()));
        } catch (error) {
            throw new PaymentError('InternalFault', `Fee payer key is not valid base58: ${errorMessage(error)}`);
        }
        if (bytes.length !== 64) {
            throw new PaymentError('InternalFault', `Fee payer key must be 64 bytes, got ${bytes.length}`);
        }
        try {
            return await FeePayerSigner.fromBytes(bytes);
        } catch (error) {
            throw new PaymentError('InternalFault', `Fee payer key rejected: ${errorMessage(error)}`);
        }
    }

    get address(): Address {
        return this.#signer.address;
    }

    /** Adds the fee-payer signature; fails unless every required signature is then present. */
    async sign<T extends Transaction>(transaction: T): Promise<T> {
        try {
            return await signTransaction([this.#signer.keyPair], transaction);
        } catch (error) {
            throw new PaymentError('InternalFault', `Fee payer signing failed: ${errorMessage(error)}`);
        }
    }

    toJSON(): { address: string } {
        return { address: this.address };
    }
}
