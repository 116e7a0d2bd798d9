// Price lookup for payment assets
// Resolves an asset's feed, queries the oracle on every call and rescales the
// answer to the precision the caller asks for.

import type { Address } from 'viem';

import { OracleError } from '../runtime/Revert';
import { SafeMath } from '../runtime/SafeMath';
import { isZero } from '../runtime/address';

export const PRICE_DECIMALS: number = 18;

/**
 * Raw answer of a feed. `price` is signed; only `price` and `decimals` are
 * consumed, freshness beyond a positive price is the oracle's concern.
 */
export interface OracleReport {
    readonly price: bigint;
    readonly decimals: number;
    readonly timestamp: bigint;
}

export interface PriceOracle {
    latestReport(feed: Address): Promise<OracleReport>;
}

export interface PriceReport {
    readonly value: bigint;
    readonly decimals: number;
}

export interface FeedDirectory {
    feedOf(asset: Address): Address | undefined;
}

export class PriceOracleClient {
    public constructor(
        private readonly oracle: PriceOracle,
        private readonly feeds: FeedDirectory,
    ) {}

    public async getPrice(asset: Address, decimals: number = PRICE_DECIMALS): Promise<PriceReport> {
        const feed: Address | undefined = this.feeds.feedOf(asset);
        if (feed === undefined || isZero(feed)) {
            throw new OracleError('MissingFeed', `No price feed for ${asset}`);
        }

        const report: OracleReport = await this.oracle.latestReport(feed);
        if (report.price <= 0n) {
            throw new OracleError('StaleOrInvalid', `Invalid price from feed ${feed}: ${report.price}`);
        }
        if (!Number.isInteger(report.decimals) || report.decimals < 0) {
            throw new OracleError('StaleOrInvalid', `Invalid decimals from feed ${feed}: ${report.decimals}`);
        }

        return { value: normalize(report.price, report.decimals, decimals), decimals };
    }
}

/**
 * Rescales `value` from `from` to `to` decimals, truncating when precision
 * is dropped.
 */
export function normalize(value: bigint, from: number, to: number): bigint {
    if (to >= from) return SafeMath.mul(value, SafeMath.pow10(to - from));
    return SafeMath.div(value, SafeMath.pow10(from - to));
}
