export const ERROR_KINDS = [
    'MalformedProof',
    'InvalidStructure',
    'WrongAsset',
    'InsufficientAmount',
    'OverpaymentRejected',
    'WrongRecipient',
    'UnexpectedFeePayer',
    'InvalidSignature',
    'StaleTransaction',
    'NetworkTransient',
    'LedgerRejected',
    'SettlementExpired',
    'InternalFault',
    'InvalidAmount',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

// Verification-phase kinds are reported as `isValid: false`, never raised to a fault.
export const VERIFICATION_ERROR_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
    'MalformedProof',
    'InvalidStructure',
    'WrongAsset',
    'InsufficientAmount',
    'OverpaymentRejected',
    'WrongRecipient',
    'UnexpectedFeePayer',
    'InvalidSignature',
    'StaleTransaction',
]);

export class PaymentError extends Error {
    constructor(
        public readonly kind: ErrorKind,
        message?: string,
    ) {
        super(message ?? kind);
        this.name = 'PaymentError';
    }
}

export function isErrorKind(value: unknown): value is ErrorKind {
    return ERROR_KINDS.some((kind) => kind === value);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
