import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { fileURLToPath } from 'url';
import { pino } from 'pino';
import type { ZodError } from 'zod';
import { config, type FacilitatorConfig } from './config.js';
import { PaymentError, errorMessage } from './domain/errors.js';
import type { ILedgerClient } from './domain/network.js';
import { RequirementsRequestSchema, SettleRequestSchema, VerifyRequestSchema } from './domain/schemas.js';
import type { ISettlementStorage } from './domain/storage.js';
import { SCHEME, type SupportedResponse, type VerifyResponse, X402_VERSION } from './domain/types.js';
import { requirePayment } from './middleware/x402.js';
import { CleanupService } from './services/cleanup.js';
import { FeePayerSigner } from './services/fee_payer.js';
import { SolanaRpcLedger } from './services/ledger.js';
import { RequirementsBuilder } from './services/requirements.js';
import { Settler } from './services/settler.js';
import { Verifier } from './services/verifier.js';
import { MemorySettlementStorage } from './storage/memory.js';
import { SqliteSettlementStorage } from './storage/sqlite.js';

const logger = pino({
    level: config.logLevel,
});

const VERSION = '1.0.0';
export const API_PREFIX = '/v1/x402';

export interface ServerDependencies {
    ledger: ILedgerClient;
    storage: ISettlementStorage;
    feePayer?: FeePayerSigner;
    settings?: Partial<FacilitatorConfig>;
}

function invalidRequest(res: Response, error: ZodError) {
    res.status(400).json({ error: 'InvalidRequest', details: error.flatten() });
}

export function createServer(dependencies: ServerDependencies) {
    const { ledger, storage, feePayer } = dependencies;
    const settings: FacilitatorConfig = { ...config, ...dependencies.settings };
    const app = express();
    app.use(cors({ origin: settings.corsOrigins }));
    app.use(express.json());
    const router = express.Router();

    const verifier = new Verifier(ledger, {
        network: settings.network,
        decimals: settings.usdcDecimals,
        maxComputeUnitPrice: settings.maxComputeUnitPrice,
        blockhashCacheMs: settings.blockhashCacheMs,
    });
    const settler = new Settler(storage, ledger, verifier, feePayer, {
        pollIntervalMs: settings.pollIntervalMs,
        maxPollIntervalMs: settings.maxPollIntervalMs,
        maxSubmitAttempts: settings.maxSubmitAttempts,
    });
    const builder = new RequirementsBuilder({
        network: settings.network,
        asset: settings.usdcMint,
        decimals: settings.usdcDecimals,
        defaultTimeoutSeconds: settings.defaultTimeoutSeconds,
        feePayer: feePayer?.address,
    });
    const cleanupService = new CleanupService(storage, settings.cleanupIntervalMs, settings.evictionGraceMs);
    cleanupService.start();

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'healthy', network: settings.network, version: VERSION });
    });

    app.get('/', (_req: Request, res: Response) => {
        res.json({
            name: 'Solana x402 Facilitator',
            description: 'Accept USDC payments over HTTP 402 on Solana',
            version: VERSION,
            network: settings.network,
            usdcMint: settings.usdcMint,
            endpoints: {
                supported: `GET ${API_PREFIX}/supported`,
                feePayer: `GET ${API_PREFIX}/fee-payer`,
                requirements: `POST ${API_PREFIX}/requirements`,
                verify: `POST ${API_PREFIX}/verify`,
                settle: `POST ${API_PREFIX}/settle`,
                demo: `GET ${API_PREFIX}/demo/protected`,
            },
        });
    });

    router.get('/supported', (_req: Request, res: Response) => {
        const supported: SupportedResponse = {
            schemes: [SCHEME],
            networks: [settings.network],
            kinds: [{ x402Version: X402_VERSION, scheme: SCHEME, network: settings.network }],
        };
        res.json(supported);
    });

    router.get('/fee-payer', (_req: Request, res: Response) => {
        if (!feePayer) {
            res.status(500).json({ error: 'InternalFault' });
            return;
        }
        res.json({ address: feePayer.address, network: settings.network });
    });

    router.post('/requirements', (req: Request, res: Response) => {
        const parsed = RequirementsRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            invalidRequest(res, parsed.error);
            return;
        }
        const body = parsed.data;
        try {
            const requirements = builder.build({
                resource: body.resource,
                price: body.amount ?? body.price ?? '',
                payTo: body.payTo,
                description: body.description,
                mimeType: body.mimeType,
                maxTimeoutSeconds: body.maxTimeoutSeconds,
            });
            res.json(builder.challenge(requirements));
        } catch (error) {
            const kind = error instanceof PaymentError ? error.kind : 'InternalFault';
            logger.warn({ error: errorMessage(error), reason: kind }, 'Requirements request failed');
            res.status(kind === 'InternalFault' ? 500 : 400).json({ error: kind, message: errorMessage(error) });
        }
    });

    router.post('/verify', async (req: Request, res: Response) => {
        const parsed = VerifyRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            invalidRequest(res, parsed.error);
            return;
        }
        const result = await verifier.verify(parsed.data.payment, parsed.data.requirements);
        const response: VerifyResponse = result.valid
            ? { isValid: true, payer: result.payer }
            : { isValid: false, reason: result.reason, invalidReason: result.message, payer: result.payer };
        res.json(response);
    });

    router.post('/settle', async (req: Request, res: Response) => {
        const parsed = SettleRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            invalidRequest(res, parsed.error);
            return;
        }
        const { payment, requirements } = parsed.data;
        try {
            const result = await settler.settle(payment, requirements);
            res.json(result);
        } catch (error) {
            logger.error({ error: errorMessage(error) }, 'Settle request failed');
            res.status(500).json({ success: false, error: 'InternalFault', network: requirements.network });
        }
    });

    // Pays the facilitator's own token account; without a fee payer key it answers InternalFault.
    router.get(
        '/demo/protected',
        requirePayment({
            builder,
            settler,
            price: '0.01',
            description: 'Access to the demo protected resource',
        }),
        (_req: Request, res: Response) => {
            res.json({ message: 'Payment accepted, here is the protected content' });
        },
    );

    app.use(API_PREFIX, router);

    // Body parser failures (malformed JSON) and anything thrown past a route.
    app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: 'InvalidRequest', details: error.message });
            return;
        }
        logger.error({ error: errorMessage(error) }, 'Unhandled request error');
        res.status(500).json({ error: 'InternalFault' });
    });

    return { app, verifier, settler, builder, cleanupService };
}

async function start() {
    const ledger = SolanaRpcLedger.fromUrl(config.rpcUrl, config.commitment);

    let storage: ISettlementStorage;
    if (config.storageType === 'sqlite') {
        logger.info({ path: config.sqliteDbPath }, 'Using SQLite storage');
        const sqliteStorage = new SqliteSettlementStorage(config.sqliteDbPath);
        await sqliteStorage.init();
        storage = sqliteStorage;
    } else {
        logger.info('Using in-memory storage');
        storage = new MemorySettlementStorage();
    }

    let feePayer: FeePayerSigner | undefined;
    if (config.facilitatorPrivateKey) {
        feePayer = await FeePayerSigner.fromBase58(config.facilitatorPrivateKey);
    } else {
        logger.warn('FACILITATOR_PRIVATE_KEY not set, settlement and requirements are disabled');
    }

    const { app } = createServer({ ledger, storage, feePayer });
    app.listen(config.port, () => {
        logger.info({ port: config.port, network: config.network, feePayer: feePayer?.address }, 'x402 Facilitator started');
    });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    start().catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Failed to start server');
        process.exit(1);
    });
}
