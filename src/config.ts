import dotenv from 'dotenv';
import path from 'path';
import { SUPPORTED_NETWORKS, type SolanaNetwork } from './domain/types.js';

dotenv.config();

const USDC_MAINNET_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
const USDC_DEVNET_MINT = '4zMMC9srt5Ri5X14GAgXhaHii3GnPAEERYPJgZJDncDU';

function parseNetwork(value: string | undefined): SolanaNetwork {
    // Cluster names such as "mainnet-beta" map onto the x402 network identifier.
    const normalized = (value || 'solana').replace('mainnet-beta', 'solana').replace(/^devnet$/, 'solana-devnet');
    const network = SUPPORTED_NETWORKS.find((candidate) => candidate === normalized);
    if (!network) {
        throw new Error(`Unsupported SOLANA_NETWORK: ${value}`);
    }
    return network;
}

function parseOrigins(value: string | undefined): string | string[] {
    if (!value || value.trim() === '*') {
        return '*';
    }
    return value.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0);
}

const network = parseNetwork(process.env.SOLANA_NETWORK);

export const config = {
    port: parseInt(process.env.PORT || '8402', 10),
    network,
    rpcUrl:
        process.env.SOLANA_RPC_URL ||
        (network === 'solana' ? 'https://api.mainnet-beta.solana.com' : 'https://api.devnet.solana.com'),
    commitment: process.env.SOLANA_COMMITMENT === 'finalized' ? ('finalized' as const) : ('confirmed' as const),
    usdcMint: process.env.USDC_MINT || (network === 'solana' ? USDC_MAINNET_MINT : USDC_DEVNET_MINT),
    usdcDecimals: parseInt(process.env.USDC_DECIMALS || '6', 10),
    facilitatorPrivateKey: process.env.FACILITATOR_PRIVATE_KEY || '',
    defaultTimeoutSeconds: parseInt(process.env.DEFAULT_TIMEOUT_SECONDS || '60', 10),
    maxComputeUnitPrice: BigInt(process.env.MAX_COMPUTE_UNIT_PRICE || '5'),
    blockhashCacheMs: parseInt(process.env.BLOCKHASH_CACHE_MS || '2000', 10),
    pollIntervalMs: parseInt(process.env.POLL_INTERVAL_MS || '500', 10),
    maxPollIntervalMs: parseInt(process.env.MAX_POLL_INTERVAL_MS || '4000', 10),
    maxSubmitAttempts: parseInt(process.env.MAX_SUBMIT_ATTEMPTS || '3', 10),
    cleanupIntervalMs: parseInt(process.env.CLEANUP_INTERVAL_MS || '300000', 10),
    evictionGraceMs: parseInt(process.env.EVICTION_GRACE_SECONDS || '3600', 10) * 1000,
    storageType: process.env.STORAGE_TYPE || 'memory',
    sqliteDbPath: path.resolve(process.env.SQLITE_DB_PATH || './facilitator.db'),
    corsOrigins: parseOrigins(process.env.CORS_ORIGINS),
    logLevel: process.env.LOG_LEVEL || 'info',
};

export type FacilitatorConfig = typeof config;
