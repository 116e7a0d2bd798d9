// Accepted payment assets and the feeds that price them.
// Owner gating happens in the sale contract; this class only keeps the table.

import type { Address } from 'viem';

import type { FeedDirectory } from '../oracle/PriceOracleClient';
import type { Checkpointable, Rollback } from '../runtime/Chain';
import { StateError } from '../runtime/Revert';
import { isZero, requireAddress } from '../runtime/address';

export interface PaymentAsset {
    readonly active: boolean;
    readonly priceFeed: Address;
}

export class PaymentTokenRegistry implements FeedDirectory, Checkpointable {
    private entries: Map<Address, PaymentAsset> = new Map();

    /**
     * Upsert: registering replaces any prior entry and marks the asset active.
     */
    public registerAsset(asset: Address, priceFeed: Address): PaymentAsset {
        const key: Address = requireAddress(asset, 'payment asset');
        const feed: Address = requireAddress(priceFeed, 'price feed');

        const entry: PaymentAsset = { active: true, priceFeed: feed };
        this.entries.set(key, entry);
        return entry;
    }

    public enableAsset(asset: Address): void {
        const key: Address = requireAddress(asset, 'payment asset');
        const entry: PaymentAsset | undefined = this.entries.get(key);
        if (entry === undefined) throw new StateError('AlreadyEnabled', 'Payment asset not registered');
        if (entry.active) throw new StateError('AlreadyEnabled', 'Payment asset already enabled');

        this.entries.set(key, { ...entry, active: true });
    }

    public disableAsset(asset: Address): void {
        const key: Address = requireAddress(asset, 'payment asset');
        const entry: PaymentAsset | undefined = this.entries.get(key);
        if (entry === undefined) throw new StateError('AlreadyDisabled', 'Payment asset not registered');
        if (!entry.active) throw new StateError('AlreadyDisabled', 'Payment asset already disabled');

        this.entries.set(key, { ...entry, active: false });
    }

    public isAcceptable(asset: Address): boolean {
        const entry: PaymentAsset | undefined = this.get(asset);
        return entry !== undefined && entry.active && !isZero(entry.priceFeed);
    }

    public get(asset: Address): PaymentAsset | undefined {
        return this.entries.get(requireAddress(asset, 'payment asset', true));
    }

    public feedOf(asset: Address): Address | undefined {
        return this.get(asset)?.priceFeed;
    }

    public assets(): ReadonlyArray<[Address, PaymentAsset]> {
        return [...this.entries];
    }

    public checkpoint(): Rollback {
        const saved: Map<Address, PaymentAsset> = new Map(this.entries);
        return () => {
            this.entries = saved;
        };
    }
}
