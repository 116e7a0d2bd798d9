// Staged Crowd Sale Contract
// Oracle-priced purchases in native coin or approved tokens, released at the
// active stage's rate: price → USD value → allocation → limits → settle to
// treasury → release → advance stage.
//
// Every write method runs in one exclusive scope: callers queue, callbacks
// into the sale during an operation are rejected, and a failure restores all
// sale state (and the chain's, when it can checkpoint) before rethrowing.
// Events go to subscribers only after the commit, outside the exclusive scope.

import { zeroAddress, type Address } from 'viem';

import { SaleLifecycle, type SaleStatus } from '../lifecycle/SaleLifecycle';
import {
    PRICE_DECIMALS,
    PriceOracleClient,
    type PriceOracle,
    type PriceReport,
} from '../oracle/PriceOracleClient';
import { PaymentTokenRegistry, type PaymentAsset } from '../payment/PaymentTokenRegistry';
import { isCheckpointable, type CallContext, type Chain, type Rollback, type TokenLedger } from '../runtime/Chain';
import { EventLog, NetEvent } from '../runtime/NetEvent';
import { ReentrancyGuard } from '../runtime/ReentrancyGuard';
import {
    ExternalCallError,
    InsufficientSupplyError,
    LimitExceededError,
    StateError,
    UnauthorizedError,
    ValidationError,
    describeRevert,
} from '../runtime/Revert';
import { SafeMath } from '../runtime/SafeMath';
import { isZero, requireAddress, sameAddress } from '../runtime/address';
import { createLogger, type Logger } from '../runtime/logger';
import { StageLedger, type AdvanceOutcome, type SaleStage } from '../stages/StageLedger';

export const NATIVE_DECIMALS: number = 18;

/** Stands for the native coin wherever an asset address is reported. */
export const NATIVE_ASSET: Address = zeroAddress;

// ── Events ──

export class PurchaseCompletedEvent extends NetEvent<{
    buyer: Address;
    paymentAsset: Address;
    amountPaid: bigint;
    usdAmount: bigint;
    tokenAmount: bigint;
    stageIndex: number;
}> {
    public constructor(quote: PurchaseQuote, buyer: Address) {
        super('PurchaseCompleted', {
            buyer,
            paymentAsset: quote.paymentAsset,
            amountPaid: quote.amountPaid,
            usdAmount: quote.usdAmount,
            tokenAmount: quote.tokenAmount,
            stageIndex: quote.stageIndex,
        });
    }
}

export class StageAddedEvent extends NetEvent<{ index: number; rate: bigint; cap: bigint }> {
    public constructor(index: number, rate: bigint, cap: bigint) {
        super('StageAdded', { index, rate, cap });
    }
}

export class StageUpdatedEvent extends NetEvent<{ previousIndex: number; newIndex: number; manual: boolean }> {
    public constructor(previousIndex: number, newIndex: number, manual: boolean) {
        super('StageUpdated', { previousIndex, newIndex, manual });
    }
}

export class SaleFinalizedEvent extends NetEvent<{ totalRaised: bigint; totalTokensSold: bigint }> {
    public constructor(totalRaised: bigint, totalTokensSold: bigint) {
        super('SaleFinalized', { totalRaised, totalTokensSold });
    }
}

export class FundsWithdrawnEvent extends NetEvent<{ asset: Address; to: Address; amount: bigint }> {
    public constructor(asset: Address, to: Address, amount: bigint) {
        super('FundsWithdrawn', { asset, to, amount });
    }
}

export class EndTimeUpdatedEvent extends NetEvent<{ previousEndTime: bigint; newEndTime: bigint }> {
    public constructor(previousEndTime: bigint, newEndTime: bigint) {
        super('EndTimeUpdated', { previousEndTime, newEndTime });
    }
}

export class MaxPurchaseLimitUpdatedEvent extends NetEvent<{ previousLimit: bigint; newLimit: bigint }> {
    public constructor(previousLimit: bigint, newLimit: bigint) {
        super('MaxPurchaseLimitUpdated', { previousLimit, newLimit });
    }
}

export class SalePausedEvent extends NetEvent<{ by: Address }> {
    public constructor(by: Address) {
        super('SalePaused', { by });
    }
}

export class SaleUnpausedEvent extends NetEvent<{ by: Address }> {
    public constructor(by: Address) {
        super('SaleUnpaused', { by });
    }
}

export class PaymentAssetRegisteredEvent extends NetEvent<{ asset: Address; priceFeed: Address }> {
    public constructor(asset: Address, priceFeed: Address) {
        super('PaymentAssetRegistered', { asset, priceFeed });
    }
}

export class PaymentAssetStatusChangedEvent extends NetEvent<{ asset: Address; active: boolean }> {
    public constructor(asset: Address, active: boolean) {
        super('PaymentAssetStatusChanged', { asset, active });
    }
}

export class OwnershipTransferredEvent extends NetEvent<{ previousOwner: Address; newOwner: Address }> {
    public constructor(previousOwner: Address, newOwner: Address) {
        super('OwnershipTransferred', { previousOwner, newOwner });
    }
}

// ── Types ──

export interface CrowdSaleParams {
    /** The sale's own account: holds the tokens for release. */
    readonly address: Address;
    readonly owner: Address;
    readonly token: Address;
    readonly treasury: Address;
    /** Asset whose price feed prices native-coin purchases. */
    readonly nativePriceAsset: Address;
    readonly startTime: bigint;
    readonly endTime: bigint;
    /** Whole tokens. */
    readonly maxPurchasePerAddress: bigint;
}

export interface CrowdSaleDependencies {
    readonly chain: Chain;
    readonly oracle: PriceOracle;
    readonly logger?: Logger;
}

export interface PurchaseQuote {
    readonly paymentAsset: Address;
    readonly amountPaid: bigint;
    readonly price: PriceReport;
    /** Whole reference-currency units, truncated. */
    readonly usdAmount: bigint;
    /** Whole tokens. */
    readonly tokenAmount: bigint;
    readonly stageIndex: number;
}

export interface PurchaseReceipt extends PurchaseQuote {
    /** Base units released to the buyer. */
    readonly tokenUnits: bigint;
}

export interface SaleInfo {
    readonly address: Address;
    readonly owner: Address;
    readonly token: Address;
    readonly treasury: Address;
    readonly nativePriceAsset: Address;
    readonly startTime: bigint;
    readonly endTime: bigint;
    readonly status: SaleStatus;
    readonly paused: boolean;
    readonly finalized: boolean;
    readonly currentStageIndex: number;
    readonly stageCount: number;
    readonly totalRaised: bigint;
    readonly totalTokensSold: bigint;
    readonly maxPurchasePerAddress: bigint;
}

interface Totals {
    owner: Address;
    totalRaised: bigint;
    totalTokensSold: bigint;
    purchases: Map<Address, bigint>;
}

// ── Main Contract ──

export class CrowdSaleContract extends ReentrancyGuard {
    public readonly address: Address;
    public readonly token: Address;
    public readonly treasury: Address;
    public readonly nativePriceAsset: Address;
    public readonly events: EventLog = new EventLog((error: unknown, event: NetEvent) => {
        this.log.error('Event listener failed', { event: event.name, error: describeRevert(error) });
    });

    private readonly chain: Chain;
    private readonly saleToken: TokenLedger;
    private readonly log: Logger;

    private readonly lifecycle: SaleLifecycle;
    private readonly stages: StageLedger = new StageLedger();
    private readonly registry: PaymentTokenRegistry = new PaymentTokenRegistry();
    private readonly prices: PriceOracleClient;

    private totals: Totals;
    private pending: NetEvent[] = [];

    public constructor(params: CrowdSaleParams, deps: CrowdSaleDependencies) {
        super();

        this.address = requireAddress(params.address, 'sale');
        this.token = requireAddress(params.token, 'token');
        this.treasury = requireAddress(params.treasury, 'treasury');
        this.nativePriceAsset = requireAddress(params.nativePriceAsset, 'native price asset');

        this.lifecycle = new SaleLifecycle({
            startTime: params.startTime,
            endTime: params.endTime,
            maxPurchasePerAddress: params.maxPurchasePerAddress,
        });

        this.chain = deps.chain;
        this.saleToken = deps.chain.token(this.token);
        this.prices = new PriceOracleClient(deps.oracle, this.registry);
        this.log = deps.logger ?? createLogger('CrowdSale');

        this.totals = {
            owner: requireAddress(params.owner, 'owner'),
            totalRaised: 0n,
            totalTokensSold: 0n,
            purchases: new Map(),
        };
    }

    public get owner(): Address {
        return this.totals.owner;
    }

    // ══════════════════════════════════════════════════════════════
    // ██ PURCHASES
    // ══════════════════════════════════════════════════════════════

    /**
     * Buy with the native coin attached as `ctx.value`. Priced through the
     * native price asset's feed; the payment goes straight to the treasury.
     */
    public async buyWithNative(ctx: CallContext): Promise<PurchaseReceipt> {
        return this._execute('buyWithNative', ctx, async (buyer: Address) => {
            const quote: PurchaseQuote = await this._quote(
                NATIVE_ASSET,
                this.nativePriceAsset,
                ctx.value ?? 0n,
                async () => NATIVE_DECIMALS,
            );

            return this._purchase(buyer, quote, async () => {
                const paid: boolean = await this.chain.transferNative(buyer, this.treasury, quote.amountPaid);
                if (!paid) throw new ExternalCallError('transferNative', 'Native payment transfer failed');
            });
        });
    }

    /**
     * Buy with an accepted token. The buyer must have approved the sale for
     * `amount` beforehand.
     */
    public async buyWithToken(ctx: CallContext, asset: Address, amount: bigint): Promise<PurchaseReceipt> {
        return this._execute('buyWithToken', ctx, async (buyer: Address) => {
            const paymentAsset: Address = requireAddress(asset, 'payment asset');
            const quote: PurchaseQuote = await this._quote(paymentAsset, paymentAsset, amount, () =>
                this.chain.token(paymentAsset).decimals(),
            );

            return this._purchase(buyer, quote, async () => {
                const ledger: TokenLedger = this.chain.token(paymentAsset);
                const paid: boolean = await ledger.transferFrom(this.address, buyer, this.treasury, amount);
                if (!paid) throw new ExternalCallError('transferFrom', 'Payment token transfer failed');
            });
        });
    }

    /**
     * Quote for `amount` of `asset` at the current stage without buying.
     * NATIVE_ASSET quotes a native-coin payment.
     */
    public async previewPurchase(asset: Address, amount: bigint): Promise<PurchaseQuote> {
        return isZero(requireAddress(asset, 'payment asset', true))
            ? this.previewNativePurchase(amount)
            : this.previewTokenPurchase(asset, amount);
    }

    public async previewNativePurchase(amount: bigint): Promise<PurchaseQuote> {
        return this._quote(NATIVE_ASSET, this.nativePriceAsset, amount, async () => NATIVE_DECIMALS);
    }

    public async previewTokenPurchase(asset: Address, amount: bigint): Promise<PurchaseQuote> {
        const paymentAsset: Address = requireAddress(asset, 'payment asset');
        return this._quote(paymentAsset, paymentAsset, amount, () => this.chain.token(paymentAsset).decimals());
    }

    // ══════════════════════════════════════════════════════════════
    // ██ ADMIN METHODS
    // ══════════════════════════════════════════════════════════════

    // ── Payment assets ──

    public async registerPaymentAsset(ctx: CallContext, asset: Address, priceFeed: Address): Promise<void> {
        return this._execute('registerPaymentAsset', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            const entry: PaymentAsset = this.registry.registerAsset(asset, priceFeed);
            this.emitEvent(new PaymentAssetRegisteredEvent(requireAddress(asset, 'payment asset'), entry.priceFeed));
        });
    }

    public async enablePaymentAsset(ctx: CallContext, asset: Address): Promise<void> {
        return this._execute('enablePaymentAsset', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            this.registry.enableAsset(asset);
            this.emitEvent(new PaymentAssetStatusChangedEvent(requireAddress(asset, 'payment asset'), true));
        });
    }

    public async disablePaymentAsset(ctx: CallContext, asset: Address): Promise<void> {
        return this._execute('disablePaymentAsset', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            this.registry.disableAsset(asset);
            this.emitEvent(new PaymentAssetStatusChangedEvent(requireAddress(asset, 'payment asset'), false));
        });
    }

    // ── Stages ──

    public async addStage(ctx: CallContext, rate: bigint, cap: bigint): Promise<number> {
        return this._execute('addStage', ctx, async (caller: Address) => {
            this._onlyOwner(caller);
            this.lifecycle.requireNotFinalized();

            const index: number = this.stages.addStage(rate, cap);
            this.emitEvent(new StageAddedEvent(index, rate, cap));
            return index;
        });
    }

    public async advanceStage(ctx: CallContext): Promise<number> {
        return this._execute('advanceStage', ctx, async (caller: Address) => {
            this._onlyOwner(caller);
            this.lifecycle.requireNotFinalized();

            const previous: number = this.stages.currentStageIndex;
            const next: number = this.stages.advanceManually();
            this.emitEvent(new StageUpdatedEvent(previous, next, true));
            this.log.info('Stage advanced manually', { previous, next });
            return next;
        });
    }

    // ── Lifecycle ──

    public async updateEndTime(ctx: CallContext, newEndTime: bigint): Promise<void> {
        return this._execute('updateEndTime', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            const previous: bigint = this.lifecycle.endTime;
            this.lifecycle.updateEndTime(newEndTime, this.chain.now());
            this.emitEvent(new EndTimeUpdatedEvent(previous, newEndTime));
        });
    }

    public async updateMaxPurchaseLimit(ctx: CallContext, limit: bigint): Promise<void> {
        return this._execute('updateMaxPurchaseLimit', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            const previous: bigint = this.lifecycle.maxPurchasePerAddress;
            this.lifecycle.updateMaxPurchaseLimit(limit);
            this.emitEvent(new MaxPurchaseLimitUpdatedEvent(previous, limit));
        });
    }

    public async pause(ctx: CallContext): Promise<void> {
        return this._execute('pause', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            this.lifecycle.pause();
            this.emitEvent(new SalePausedEvent(caller));
            this.log.info('Sale paused');
        });
    }

    public async unpause(ctx: CallContext): Promise<void> {
        return this._execute('unpause', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            this.lifecycle.unpause();
            this.emitEvent(new SaleUnpausedEvent(caller));
            this.log.info('Sale unpaused');
        });
    }

    public async finalize(ctx: CallContext): Promise<void> {
        return this._execute('finalize', ctx, async (caller: Address) => {
            this._onlyOwner(caller);
            this._finalize();
        });
    }

    // ── Funds ──

    /**
     * Sends the sale account's whole native balance (coin sent to it
     * directly, never a purchase payment) to the owner.
     */
    public async withdrawNative(ctx: CallContext): Promise<bigint> {
        return this._execute('withdrawNative', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            const balance: bigint = await this.chain.nativeBalanceOf(this.address);
            if (balance === 0n) throw new StateError('NothingToWithdraw', 'No native balance to withdraw');

            const sent: boolean = await this.chain.transferNative(this.address, this.owner, balance);
            if (!sent) throw new ExternalCallError('transferNative', 'Native withdrawal failed');

            this.emitEvent(new FundsWithdrawnEvent(NATIVE_ASSET, this.owner, balance));
            return balance;
        });
    }

    public async withdrawTokens(ctx: CallContext, token: Address, amount: bigint): Promise<void> {
        return this._execute('withdrawTokens', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            const tokenAddress: Address = requireAddress(token, 'token');
            if (amount <= 0n) throw new ValidationError('NonPositiveAmount', 'Amount must be > 0');

            const ledger: TokenLedger = this.chain.token(tokenAddress);
            const balance: bigint = await ledger.balanceOf(this.address);
            if (balance < amount) throw new InsufficientSupplyError(amount, balance);

            const sent: boolean = await ledger.transfer(this.address, this.owner, amount);
            if (!sent) throw new ExternalCallError('transfer', 'Token withdrawal failed');

            this.emitEvent(new FundsWithdrawnEvent(tokenAddress, this.owner, amount));
        });
    }

    public async transferOwnership(ctx: CallContext, newOwner: Address): Promise<void> {
        return this._execute('transferOwnership', ctx, async (caller: Address) => {
            this._onlyOwner(caller);

            const next: Address = requireAddress(newOwner, 'new owner');
            const previous: Address = this.totals.owner;
            this.totals.owner = next;
            this.emitEvent(new OwnershipTransferredEvent(previous, next));
        });
    }

    // ══════════════════════════════════════════════════════════════
    // ██ VIEW METHODS
    // ══════════════════════════════════════════════════════════════

    public getSaleInfo(): SaleInfo {
        return {
            address: this.address,
            owner: this.owner,
            token: this.token,
            treasury: this.treasury,
            nativePriceAsset: this.nativePriceAsset,
            startTime: this.lifecycle.startTime,
            endTime: this.lifecycle.endTime,
            status: this.lifecycle.status(this.chain.now()),
            paused: this.lifecycle.paused,
            finalized: this.lifecycle.finalized,
            currentStageIndex: this.stages.currentStageIndex,
            stageCount: this.stages.length,
            totalRaised: this.totals.totalRaised,
            totalTokensSold: this.totals.totalTokensSold,
            maxPurchasePerAddress: this.lifecycle.maxPurchasePerAddress,
        };
    }

    public status(): SaleStatus {
        return this.lifecycle.status(this.chain.now());
    }

    public getStage(index: number): SaleStage {
        return this.stages.stage(index);
    }

    public getStages(): ReadonlyArray<SaleStage> {
        return this.stages.list();
    }

    public currentRate(): bigint {
        return this.stages.currentRate();
    }

    public purchasedBy(account: Address): bigint {
        return this.totals.purchases.get(requireAddress(account, 'account', true)) ?? 0n;
    }

    public isPaymentAccepted(asset: Address): boolean {
        return this.registry.isAcceptable(asset);
    }

    public getPaymentAsset(asset: Address): PaymentAsset | undefined {
        return this.registry.get(asset);
    }

    public async getPrice(asset: Address): Promise<PriceReport> {
        return this.prices.getPrice(asset, PRICE_DECIMALS);
    }

    // ══════════════════════════════════════════════════════════════
    // ██ INTERNAL HELPERS
    // ══════════════════════════════════════════════════════════════

    private _onlyOwner(caller: Address): void {
        if (!sameAddress(caller, this.totals.owner)) throw new UnauthorizedError(caller);
    }

    private emitEvent(event: NetEvent): void {
        this.pending.push(event);
    }

    /**
     * Pricing half of a purchase: open-sale preconditions, price, USD value
     * and allocation at the current rate. Reads only. The payment asset's
     * ledger is consulted only once the asset is known to be accepted.
     */
    private async _quote(
        paymentAsset: Address,
        priceAsset: Address,
        amount: bigint,
        decimalsOf: () => Promise<number>,
    ): Promise<PurchaseQuote> {
        this.lifecycle.requireOpen(this.chain.now());
        if (amount <= 0n) throw new ValidationError('NonPositiveAmount', 'Payment amount must be > 0');

        const rate: bigint = this.stages.currentRate();
        if (!this.registry.isAcceptable(priceAsset)) {
            throw new StateError('PaymentNotAccepted', `Payment asset ${priceAsset} not accepted`);
        }

        const paymentDecimals: number = await decimalsOf();
        const price: PriceReport = await this.prices.getPrice(priceAsset, PRICE_DECIMALS);
        const scale: bigint = SafeMath.pow10(price.decimals + paymentDecimals);
        const usdAmount: bigint = SafeMath.div(SafeMath.mul(price.value, amount), scale);
        const tokenAmount: bigint = SafeMath.mul(usdAmount, rate);
        if (tokenAmount === 0n) {
            throw new ValidationError('AllocationTooSmall', 'Payment too small for a whole token');
        }

        return {
            paymentAsset,
            amountPaid: amount,
            price,
            usdAmount,
            tokenAmount,
            stageIndex: this.stages.currentStageIndex,
        };
    }

    /**
     * Settlement half: stage capacity, supply and per-address limit, then
     * payment, bookkeeping, release and stage advancement.
     */
    private async _purchase(
        buyer: Address,
        quote: PurchaseQuote,
        settle: () => Promise<void>,
    ): Promise<PurchaseReceipt> {
        if (quote.tokenAmount > this.stages.remaining()) {
            const stage: SaleStage = this.stages.currentStage();
            throw new LimitExceededError('stage', stage.cap, SafeMath.add(stage.sold, quote.tokenAmount));
        }

        const tokenUnits: bigint = SafeMath.mul(quote.tokenAmount, SafeMath.pow10(await this.saleToken.decimals()));
        const available: bigint = await this.saleToken.balanceOf(this.address);
        if (available < tokenUnits) throw new InsufficientSupplyError(tokenUnits, available);

        const purchased: bigint = SafeMath.add(this.purchasedBy(buyer), quote.tokenAmount);
        const limit: bigint = this.lifecycle.maxPurchasePerAddress;
        if (purchased > limit) throw new LimitExceededError('address', limit, purchased);

        await settle();

        // Effects before the release call
        this.totals.totalRaised = SafeMath.add(this.totals.totalRaised, quote.usdAmount);
        this.totals.totalTokensSold = SafeMath.add(this.totals.totalTokensSold, quote.tokenAmount);
        this.totals.purchases.set(buyer, purchased);
        this.stages.recordSale(quote.tokenAmount);

        const released: boolean = await this.saleToken.transfer(this.address, buyer, tokenUnits);
        if (!released) throw new ExternalCallError('transfer', 'Token release failed');

        this._advanceAfterSale();

        this.emitEvent(new PurchaseCompletedEvent(quote, buyer));
        this.log.debug('Purchase completed', {
            buyer,
            paymentAsset: quote.paymentAsset,
            usdAmount: quote.usdAmount,
            tokenAmount: quote.tokenAmount,
            stageIndex: quote.stageIndex,
        });

        return { ...quote, tokenUnits };
    }

    private _advanceAfterSale(): void {
        const previous: number = this.stages.currentStageIndex;
        const outcome: AdvanceOutcome = this.stages.tryAdvance();

        if (outcome === 'advanced') {
            const next: number = this.stages.currentStageIndex;
            this.emitEvent(new StageUpdatedEvent(previous, next, false));
            this.log.info('Stage sold out, advanced', { previous, next });
        } else if (outcome === 'exhausted' && !this.lifecycle.finalized) {
            this._finalize();
        }
    }

    private _finalize(): void {
        this.lifecycle.finalize();
        this.emitEvent(new SaleFinalizedEvent(this.totals.totalRaised, this.totals.totalTokensSold));
        this.log.info('Sale finalized', {
            totalRaised: this.totals.totalRaised,
            totalTokensSold: this.totals.totalTokensSold,
        });
    }

    private checkpoint(): Rollback {
        const saved: Totals = { ...this.totals, purchases: new Map(this.totals.purchases) };
        return () => {
            this.totals = saved;
        };
    }

    /**
     * Runs `body` as one atomic operation for the validated caller. Events are
     * published only once it has committed.
     */
    private async _execute<T>(
        operation: string,
        ctx: CallContext,
        body: (caller: Address) => Promise<T>,
    ): Promise<T> {
        try {
            const caller: Address = requireAddress(ctx.sender, 'caller');
            return await this.nonReentrant(() => this._atomically(() => body(caller)));
        } catch (error: unknown) {
            this.log.warn(`${operation} reverted`, { caller: ctx.sender, error: describeRevert(error) });
            throw error;
        }
    }

    private async _atomically<T>(body: () => Promise<T>): Promise<T> {
        const rollbacks: Rollback[] = [
            this.checkpoint(),
            this.stages.checkpoint(),
            this.lifecycle.checkpoint(),
            this.registry.checkpoint(),
        ];
        if (isCheckpointable(this.chain)) rollbacks.push(this.chain.checkpoint());

        let result: T;
        try {
            result = await body();
        } catch (error: unknown) {
            for (const rollback of rollbacks.reverse()) rollback();
            this.pending = [];
            throw error;
        }

        const committed: NetEvent[] = this.pending;
        this.pending = [];
        this.detached(() => this.events.publish(committed));
        return result;
    }
}
