import type { ExplorerTx, TransactionExplorer } from "./explorer.js";
import { satsToBtc } from "./units.js";
import { withRetry, type RetryPolicy } from "../../core/retry.js";
import { logger, errorMessage } from "../../core/logger.js";

export type PaymentCheck = {
  address: string;
  expectedSats: bigint;
  createdAt: Date;
};

export type PaymentMatcher = {
  /** Hash of an unclaimed transaction paying `expectedSats` (± tolerance) to `address`, or null. */
  check(args: PaymentCheck): Promise<string | null>;
};

export type ClaimLookup = {
  claimedAmong(txHashes: readonly string[]): Promise<Set<string>>;
};

const SUSPICIOUS_AMOUNT_SATS = 10n * 100_000_000n;

export class BlockchainMatcher implements PaymentMatcher {
  private readonly explorer: TransactionExplorer;
  private readonly claims: ClaimLookup;
  private readonly toleranceSats: bigint;
  private readonly clockSkewMs: number;
  private readonly pageSize: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(args: {
    explorer: TransactionExplorer;
    claims: ClaimLookup;
    toleranceSats: number;
    clockSkewMs: number;
    pageSize: number;
    retryPolicy: RetryPolicy;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this.explorer = args.explorer;
    this.claims = args.claims;
    this.toleranceSats = BigInt(args.toleranceSats);
    this.clockSkewMs = args.clockSkewMs;
    this.pageSize = args.pageSize;
    this.retryPolicy = args.retryPolicy;
    this.sleep = args.sleep;
  }

  async check(args: PaymentCheck): Promise<string | null> {
    const { address, expectedSats, createdAt } = args;

    if (expectedSats <= this.toleranceSats) {
      logger.error(`matcher: expected amount too small: ${satsToBtc(expectedSats)} BTC`);
      return null;
    }
    if (expectedSats > SUSPICIOUS_AMOUNT_SATS) {
      logger.warn(`matcher: unusually large expected amount: ${satsToBtc(expectedSats)} BTC`);
    }

    const minSats = expectedSats - this.toleranceSats;
    const maxSats = expectedSats + this.toleranceSats;

    let txs: ExplorerTx[];
    try {
      txs = await withRetry(() => this.explorer.fetchAddressTransactions(address, this.pageSize), this.retryPolicy, {
        label: "explorer",
        sleep: this.sleep
      });
    } catch (e) {
      // No match yet; the caller polls again.
      logger.warn(`matcher: explorer unavailable for ${address}, treating as no match yet`, errorMessage(e));
      return null;
    }

    const notBefore = createdAt.getTime() - this.clockSkewMs;
    const recent = txs.filter((tx) => tx.time.getTime() >= notBefore);
    const claimed = recent.length ? await this.claims.claimedAmong(recent.map((tx) => tx.hash)) : new Set<string>();
    let considered = 0;

    for (const tx of recent) {
      if (claimed.has(tx.hash)) {
        logger.debug(`matcher: tx ${tx.hash.slice(0, 16)}... already used`);
        continue;
      }
      considered++;

      for (const out of tx.outputs) {
        if (out.address !== address) continue;
        if (out.valueSats >= minSats && out.valueSats <= maxSats) {
          logger.info(
            `matcher: payment found tx=${tx.hash} amount=${satsToBtc(out.valueSats)} expected=${satsToBtc(expectedSats)}`
          );
          return tx.hash;
        }
        logger.debug(
          `matcher: tx ${tx.hash.slice(0, 16)}... pays ${satsToBtc(out.valueSats)}, outside ${satsToBtc(minSats)}-${satsToBtc(maxSats)}`
        );
      }
    }

    logger.debug(`matcher: no match for ${satsToBtc(expectedSats)} BTC among ${considered} new transaction(s)`);
    return null;
  }
}

/**
 * Dry-run matcher for environments without real payments: every check "finds" a payment.
 * The synthetic hash is derived from the order's amount and creation time, so each order gets its own.
 */
export class DryRunMatcher implements PaymentMatcher {
  async check(args: PaymentCheck): Promise<string | null> {
    const hash = `dryrun-${args.expectedSats.toString()}-${args.createdAt.getTime()}`;
    logger.warn(`matcher: TEST MODE, reporting synthetic payment ${hash}`);
    return hash;
  }
}
