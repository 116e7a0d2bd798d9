// PriceOracle backed by on-chain AggregatorV3 feeds, read through viem.

import type { Address, PublicClient } from 'viem';

import type { OracleReport, PriceOracle } from './PriceOracleClient';

export const aggregatorV3Abi = [
    {
        type: 'function',
        name: 'decimals',
        stateMutability: 'view',
        inputs: [],
        outputs: [{ name: '', type: 'uint8' }],
    },
    {
        type: 'function',
        name: 'latestRoundData',
        stateMutability: 'view',
        inputs: [],
        outputs: [
            { name: 'roundId', type: 'uint80' },
            { name: 'answer', type: 'int256' },
            { name: 'startedAt', type: 'uint256' },
            { name: 'updatedAt', type: 'uint256' },
            { name: 'answeredInRound', type: 'uint80' },
        ],
    },
] as const;

export class ChainlinkPriceOracle implements PriceOracle {
    public constructor(private readonly client: PublicClient) {}

    public async latestReport(feed: Address): Promise<OracleReport> {
        const [round, decimals] = await Promise.all([
            this.client.readContract({
                address: feed,
                abi: aggregatorV3Abi,
                functionName: 'latestRoundData',
            }),
            this.client.readContract({
                address: feed,
                abi: aggregatorV3Abi,
                functionName: 'decimals',
            }),
        ]);

        const [, answer, , updatedAt] = round;
        return { price: answer, decimals, timestamp: updatedAt };
    }
}
