import { pino } from 'pino';
import { config } from '../config.js';
import { errorMessage } from '../domain/errors.js';
import type { ISettlementStorage } from '../domain/storage.js';

const logger = pino({ name: 'cleanup', level: config.logLevel });

export class CleanupService {
    private timer?: NodeJS.Timeout;

    constructor(
        private storage: ISettlementStorage,
        private intervalMs: number = 5 * 60 * 1000,
        private graceMs: number = 60 * 60 * 1000,
    ) { }

    start() {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.runOnce();
        }, this.intervalMs);
        this.timer.unref(); // Don't keep the process alive just for this
    }

    /** Evicts records past their deadline plus the grace period. Never rejects. */
    async runOnce(now: number = Date.now()): Promise<number> {
        try {
            const deleted = await this.storage.deleteExpired(now, this.graceMs);
            if (deleted > 0) {
                logger.info({ deleted }, 'Purged expired settlement records');
            }
            return deleted;
        } catch (error) {
            logger.error({ error: errorMessage(error) }, 'Error during cleanup');
            return 0;
        }
    }

    stop() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }
}
