#!/usr/bin/env tsx
/**
 * Refresh token garbage collection
 *
 * Deletes refresh token rows whose expiry lies more than the grace period in
 * the past. Revoked-but-unexpired rows are kept so revocation stays auditable
 * until the token would have died anyway.
 *
 * Usage:
 *   npx tsx scripts/prune-refresh-tokens.ts [--grace-days 7]
 */

import { PgRefreshTokenRepository } from '../backend/src/repositories/refresh-token.repository';
import { closePool } from '../backend/src/db';
import { logger } from '../backend/src/utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

async function main() {
    const args = process.argv.slice(2);
    const graceDays = parseInt(getArg(args, '--grace-days') ?? '0', 10);
    if (isNaN(graceDays) || graceDays < 0) {
        console.error('Usage: npx tsx scripts/prune-refresh-tokens.ts [--grace-days <n>]');
        process.exit(1);
    }

    const cutoff = new Date(Date.now() - graceDays * DAY_MS);
    const deleted = await new PgRefreshTokenRepository().deleteExpired(cutoff);
    logger.info({ deleted, cutoff: cutoff.toISOString() }, 'Pruned expired refresh tokens');
    await closePool();
}

function getArg(args: string[], flag: string): string | undefined {
    const idx = args.indexOf(flag);
    return idx >= 0 ? args[idx + 1] : undefined;
}

main().catch((err) => {
    logger.error({ err }, 'Refresh token pruning failed');
    process.exit(1);
});
