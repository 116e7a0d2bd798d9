// In-process price feeds for local deployments and tests.

import { getAddress, type Address } from 'viem';

import type { OracleReport, PriceOracle } from '../oracle/PriceOracleClient';
import { OracleError } from '../runtime/Revert';

export class MockPriceOracle implements PriceOracle {
    private readonly reports: Map<Address, OracleReport> = new Map();
    private queries: number = 0;

    public constructor(private readonly clock: () => bigint = () => BigInt(Math.floor(Date.now() / 1000))) {}

    /** Number of `latestReport` calls served. */
    public get queryCount(): number {
        return this.queries;
    }

    public setPrice(feed: Address, price: bigint, decimals: number = 8): void {
        this.reports.set(getAddress(feed), { price, decimals, timestamp: this.clock() });
    }

    public async latestReport(feed: Address): Promise<OracleReport> {
        this.queries++;
        const report: OracleReport | undefined = this.reports.get(getAddress(feed));
        if (report === undefined) {
            throw new OracleError('MissingFeed', `Feed ${feed} has no answer`);
        }
        return report;
    }
}
