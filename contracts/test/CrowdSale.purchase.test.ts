/**
 * CrowdSale Purchase Tests
 *
 * Pricing, allocation and settlement for native and token payments, stage
 * advancement, per-address limits, and rollback of failed purchases.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { zeroAddress, type Address } from 'viem';

import { NATIVE_ASSET, type CrowdSaleContract } from '../src/crowdsale/CrowdSaleContract';
import type { Rollback, TokenLedger } from '../src/runtime/Chain';
import { ExternalCallError, InsufficientSupplyError, LimitExceededError, type ExternalCall } from '../src/runtime/Revert';
import { CappedToken } from '../src/token/CappedToken';
import { ETHER, END, START, USDC, deploySale, hasReason, nativeFor } from './helpers/setup';

/** Payment token that calls back into the sale while pulling a payment. */
class CallbackToken implements TokenLedger {
    public readonly address: Address;
    public callbackError: unknown;

    public constructor(
        private readonly inner: CappedToken,
        private readonly callback: () => Promise<void>,
    ) {
        this.address = inner.address;
    }

    public async decimals(): Promise<number> {
        return this.inner.decimals();
    }

    public async balanceOf(account: Address): Promise<bigint> {
        return this.inner.balanceOf(account);
    }

    public async allowance(owner: Address, spender: Address): Promise<bigint> {
        return this.inner.allowance(owner, spender);
    }

    public async transfer(caller: Address, to: Address, amount: bigint): Promise<boolean> {
        return this.inner.transfer(caller, to, amount);
    }

    public async transferFrom(caller: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
        try {
            await this.callback();
        } catch (error: unknown) {
            this.callbackError = error;
        }
        return this.inner.transferFrom(caller, from, to, amount);
    }

    public checkpoint(): Rollback {
        return this.inner.checkpoint();
    }
}

function failedCall(call: ExternalCall, message: string): (error: unknown) => boolean {
    return (error: unknown) => error instanceof ExternalCallError && error.call === call && error.message === message;
}

function purchaseEvents(sale: CrowdSaleContract): number {
    return sale.events.named('PurchaseCompleted').length;
}

describe('CrowdSale purchases', () => {
    describe('Native coin', () => {
        it('prices the payment and releases rate × USD tokens', async () => {
            const { sale, chain, buyer, treasury, saleToken } = await deploySale();

            const receipt = await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            assert.deepEqual(receipt, {
                paymentAsset: NATIVE_ASSET,
                amountPaid: 50_000_000_000_000_000n,
                price: { value: 2_000n * ETHER, decimals: 18 },
                usdAmount: 100n,
                tokenAmount: 200n,
                stageIndex: 0,
                tokenUnits: 200n * ETHER,
            });
            assert.equal(await saleToken.balanceOf(buyer), 200n * ETHER);
            assert.equal(await saleToken.balanceOf(sale.address), 999_800n * ETHER);
            assert.equal(await chain.nativeBalanceOf(treasury), 50_000_000_000_000_000n);
            assert.equal(await chain.nativeBalanceOf(buyer), 100n * ETHER - 50_000_000_000_000_000n);
            assert.equal(await chain.nativeBalanceOf(sale.address), 0n);
        });

        it('updates totals, the stage and the purchaser record', async () => {
            const { sale, buyer } = await deploySale();

            await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            const info = sale.getSaleInfo();
            assert.equal(info.totalRaised, 100n);
            assert.equal(info.totalTokensSold, 200n);
            assert.deepEqual(sale.getStage(0), { rate: 2n, cap: 1_000n, sold: 200n });
            assert.equal(sale.purchasedBy(buyer), 200n);
        });

        it('emits PurchaseCompleted after the purchase commits', async () => {
            const { sale, buyer } = await deploySale();

            await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            const [event] = sale.events.named('PurchaseCompleted');
            assert.deepEqual(event?.data, {
                buyer,
                paymentAsset: zeroAddress,
                amountPaid: 50_000_000_000_000_000n,
                usdAmount: 100n,
                tokenAmount: 200n,
                stageIndex: 0,
            });
        });

        it('drops fractional USD value', async () => {
            const { sale, chain, buyer, treasury } = await deploySale();
            const value: bigint = nativeFor(100n) + 250_000_000_000_000n;

            const receipt = await sale.buyWithNative({ sender: buyer, value });

            assert.equal(receipt.usdAmount, 100n);
            assert.equal(receipt.tokenAmount, 200n);
            assert.equal(await chain.nativeBalanceOf(treasury), value);
        });

        it('rejects a payment worth less than one whole token', async () => {
            const { sale, buyer } = await deploySale();

            await assert.rejects(sale.buyWithNative({ sender: buyer, value: 1n }), hasReason('AllocationTooSmall'));
            await assert.rejects(sale.buyWithNative({ sender: buyer }), hasReason('NonPositiveAmount'));
        });

        it('requires the native price asset to be accepted', async () => {
            const { sale, owner, buyer, nativeAsset } = await deploySale();
            await sale.disablePaymentAsset({ sender: owner }, nativeAsset);

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                hasReason('PaymentNotAccepted'),
            );
        });

        it('fails when the buyer cannot cover the payment', async () => {
            const { sale, chain, buyer } = await deploySale();
            chain.setBalance(buyer, nativeFor(10n));

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                failedCall('transferNative', 'Native payment transfer failed'),
            );
            assert.equal(sale.getStage(0).sold, 0n);
        });
    });

    describe('Payment tokens', () => {
        it('pulls the approved payment to the treasury', async () => {
            const { sale, usdc, saleToken, buyer, treasury } = await deploySale();
            usdc.approve(buyer, sale.address, 100n * USDC);

            const receipt = await sale.buyWithToken({ sender: buyer }, usdc.address, 100n * USDC);

            assert.equal(receipt.paymentAsset, usdc.address);
            assert.equal(receipt.usdAmount, 100n);
            assert.equal(receipt.tokenAmount, 200n);
            assert.equal(await usdc.balanceOf(treasury), 100n * USDC);
            assert.equal(await usdc.balanceOf(buyer), 9_900n * USDC);
            assert.equal(await usdc.allowance(buyer, sale.address), 0n);
            assert.equal(await saleToken.balanceOf(buyer), 200n * ETHER);
        });

        it('rolls everything back when the pull fails', async () => {
            const { sale, usdc, saleToken, buyer, treasury } = await deploySale();

            await assert.rejects(
                sale.buyWithToken({ sender: buyer }, usdc.address, 100n * USDC),
                failedCall('transferFrom', 'Payment token transfer failed'),
            );

            assert.equal(await usdc.balanceOf(buyer), 10_000n * USDC);
            assert.equal(await usdc.balanceOf(treasury), 0n);
            assert.equal(await saleToken.balanceOf(buyer), 0n);
            assert.equal(sale.getSaleInfo().totalTokensSold, 0n);
            assert.equal(purchaseEvents(sale), 0);
        });

        it('rejects disabled and unregistered assets', async () => {
            const { sale, owner, usdc, saleToken, buyer } = await deploySale();
            usdc.approve(buyer, sale.address, 100n * USDC);
            await sale.disablePaymentAsset({ sender: owner }, usdc.address);

            await assert.rejects(
                sale.buyWithToken({ sender: buyer }, usdc.address, 100n * USDC),
                hasReason('PaymentNotAccepted'),
            );
            await assert.rejects(
                sale.buyWithToken({ sender: buyer }, saleToken.address, 1n),
                hasReason('PaymentNotAccepted'),
            );
        });

        it('checks the sale and the asset before reading an unknown ledger', async () => {
            const { sale, chain, owner, buyer } = await deploySale();
            const unknownAsset: Address = chain.createAccount();

            await assert.rejects(
                sale.buyWithToken({ sender: buyer }, unknownAsset, 1n),
                hasReason('PaymentNotAccepted'),
            );
            await assert.rejects(sale.previewTokenPurchase(unknownAsset, 1n), hasReason('PaymentNotAccepted'));

            await sale.pause({ sender: owner });
            await assert.rejects(sale.buyWithToken({ sender: buyer }, unknownAsset, 1n), hasReason('Paused'));
        });
    });

    describe('Stages', () => {
        it('advances when a purchase fills the current stage exactly', async () => {
            const { sale, buyer, other } = await deploySale({
                stages: [
                    [1n, 1_000n],
                    [1n, 500n],
                ],
                maxPurchasePerAddress: 2_000n,
            });

            await sale.buyWithNative({ sender: buyer, value: nativeFor(900n) });
            assert.equal(sale.getSaleInfo().currentStageIndex, 0);

            const receipt = await sale.buyWithNative({ sender: other, value: nativeFor(100n) });

            assert.equal(receipt.stageIndex, 0);
            assert.deepEqual(sale.getStage(0), { rate: 1n, cap: 1_000n, sold: 1_000n });
            assert.equal(sale.getSaleInfo().currentStageIndex, 1);
            assert.deepEqual(sale.events.named('StageUpdated')[0]?.data, { previousIndex: 0, newIndex: 1, manual: false });
        });

        it('prices later purchases at the new stage rate', async () => {
            const { sale, buyer } = await deploySale({
                stages: [
                    [2n, 200n],
                    [1n, 500n],
                ],
            });

            await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });
            const receipt = await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            assert.equal(receipt.stageIndex, 1);
            assert.equal(receipt.tokenAmount, 100n);
            assert.equal(sale.purchasedBy(buyer), 300n);
        });

        it('finalizes when the last stage sells out', async () => {
            const { sale, buyer, other } = await deploySale({ stages: [[1n, 100n]] });

            await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            assert.equal(sale.status(), 'Finalized');
            assert.deepEqual(sale.events.named('SaleFinalized')[0]?.data, { totalRaised: 100n, totalTokensSold: 100n });
            await assert.rejects(
                sale.buyWithNative({ sender: other, value: nativeFor(1n) }),
                hasReason('AlreadyFinalized'),
            );
        });

        it('rejects a purchase larger than the stage has left', async () => {
            const { sale, chain, buyer, treasury } = await deploySale({ stages: [[1n, 100n]] });

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(101n) }),
                (error: unknown) =>
                    error instanceof LimitExceededError &&
                    error.scope === 'stage' &&
                    error.limit === 100n &&
                    error.attempted === 101n,
            );
            assert.equal(sale.getStage(0).sold, 0n);
            assert.equal(await chain.nativeBalanceOf(treasury), 0n);
        });

        it('measures stage capacity against what the stage has left', async () => {
            const { sale, buyer } = await deploySale({ stages: [[1n, 100n]] });
            await sale.buyWithNative({ sender: buyer, value: nativeFor(60n) });

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(41n) }),
                (error: unknown) =>
                    error instanceof LimitExceededError &&
                    error.scope === 'stage' &&
                    error.limit === 100n &&
                    error.attempted === 101n,
            );
            assert.equal(sale.getStage(0).sold, 60n);
            assert.equal(sale.purchasedBy(buyer), 60n);
        });

        it('rejects purchases before any stage exists', async () => {
            const { sale, buyer } = await deploySale({ stages: [] });

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                hasReason('NoActiveStage'),
            );
        });
    });

    describe('Limits and supply', () => {
        it('rejects a purchase that would pass the per-address limit', async () => {
            const { sale, chain, buyer, treasury, saleToken } = await deploySale({
                stages: [[1n, 5_000n]],
                maxPurchasePerAddress: 1_000n,
            });
            await sale.buyWithNative({ sender: buyer, value: nativeFor(950n) });

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(60n) }),
                (error: unknown) =>
                    error instanceof LimitExceededError &&
                    error.scope === 'address' &&
                    error.message === 'Exceeds purchase limit per address: 1010 > 1000',
            );

            assert.equal(sale.purchasedBy(buyer), 950n);
            assert.equal(sale.getStage(0).sold, 950n);
            assert.equal(await chain.nativeBalanceOf(treasury), nativeFor(950n));
            assert.equal(await saleToken.balanceOf(buyer), 950n * ETHER);
        });

        it('counts the limit per buyer', async () => {
            const { sale, buyer, other } = await deploySale({
                stages: [[1n, 5_000n]],
                maxPurchasePerAddress: 1_000n,
            });

            await sale.buyWithNative({ sender: buyer, value: nativeFor(1_000n) });
            await sale.buyWithNative({ sender: other, value: nativeFor(1_000n) });

            assert.equal(sale.getSaleInfo().totalTokensSold, 2_000n);
        });

        it('rejects a purchase the sale account cannot cover', async () => {
            const { sale, buyer } = await deploySale({ saleSupply: 100n });

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                (error: unknown) =>
                    error instanceof InsufficientSupplyError &&
                    error.required === 200n * ETHER &&
                    error.available === 100n * ETHER,
            );
        });
    });

    describe('Lifecycle gating', () => {
        it('rejects purchases before start and after end', async () => {
            const early = await deploySale({ now: START - 10n });
            await assert.rejects(
                early.sale.buyWithNative({ sender: early.buyer, value: nativeFor(100n) }),
                hasReason('NotStarted'),
            );

            const late = await deploySale({ now: END + 1n });
            await assert.rejects(
                late.sale.buyWithNative({ sender: late.buyer, value: nativeFor(100n) }),
                hasReason('Ended'),
            );
        });

        it('rejects purchases while paused and logs the rejection', async () => {
            const { sale, owner, buyer, logLines } = await deploySale();
            await sale.pause({ sender: owner });

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                hasReason('Paused'),
            );
            assert.ok(
                logLines.some(
                    (line: string) =>
                        line.includes('buyWithNative reverted') &&
                        line.includes('"error":"StateError(Paused): Sale paused"'),
                ),
            );
        });
    });

    describe('Oracle failures', () => {
        it('leaves every balance untouched when the price is invalid', async () => {
            const { sale, chain, oracle, nativeFeed, buyer, treasury, saleToken } = await deploySale();
            oracle.setPrice(nativeFeed, -1n, 8);

            await assert.rejects(
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                hasReason('StaleOrInvalid'),
            );

            assert.equal(await chain.nativeBalanceOf(buyer), 100n * ETHER);
            assert.equal(await chain.nativeBalanceOf(treasury), 0n);
            assert.equal(await saleToken.balanceOf(buyer), 0n);
            assert.equal(sale.getStage(0).sold, 0n);
            assert.equal(purchaseEvents(sale), 0);
        });

        it('queries the feed on every purchase', async () => {
            const { sale, oracle, nativeFeed, buyer } = await deploySale();

            await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });
            oracle.setPrice(nativeFeed, 4_000n * 10n ** 8n, 8);
            const receipt = await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            assert.equal(receipt.usdAmount, 200n);
            assert.equal(receipt.tokenAmount, 400n);
            assert.equal(oracle.queryCount, 2);
        });
    });

    describe('Execution scope', () => {
        it('serializes concurrent purchases', async () => {
            const { sale, buyer, other } = await deploySale();

            await Promise.all([
                sale.buyWithNative({ sender: buyer, value: nativeFor(100n) }),
                sale.buyWithNative({ sender: other, value: nativeFor(100n) }),
                sale.buyWithNative({ sender: buyer, value: nativeFor(50n) }),
            ]);

            assert.equal(sale.getStage(0).sold, 500n);
            assert.equal(sale.getSaleInfo().totalRaised, 250n);
            assert.equal(sale.purchasedBy(buyer), 300n);
            assert.equal(purchaseEvents(sale), 3);
        });

        it('keeps a committed purchase when a subscriber throws', async () => {
            const { sale, chain, buyer, treasury, logLines } = await deploySale();
            const seen: string[] = [];
            sale.events.subscribe(() => {
                throw new Error('listener failed');
            });
            sale.events.subscribe((event) => {
                seen.push(event.name);
            });

            const receipt = await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });

            assert.equal(receipt.tokenAmount, 200n);
            assert.equal(sale.getStage(0).sold, 200n);
            assert.equal(await chain.nativeBalanceOf(treasury), nativeFor(100n));
            assert.equal(purchaseEvents(sale), 1);
            assert.deepEqual(seen, ['PurchaseCompleted']);
            assert.ok(
                logLines.some((line: string) =>
                    line.endsWith('Event listener failed {"event":"PurchaseCompleted","error":"listener failed"}'),
                ),
            );
        });

        it('lets a subscriber call into the sale once the purchase has committed', async () => {
            const { sale, owner, buyer } = await deploySale();
            let paused: Promise<void> = Promise.resolve();
            sale.events.subscribe((event) => {
                if (event.name === 'PurchaseCompleted') paused = sale.pause({ sender: owner });
            });

            await sale.buyWithNative({ sender: buyer, value: nativeFor(100n) });
            await paused;

            assert.equal(sale.status(), 'Paused');
            assert.equal(purchaseEvents(sale), 1);
            assert.deepEqual(sale.events.named('SalePaused')[0]?.data, { by: owner });
        });

        it('rejects calls back into the sale from a payment token', async () => {
            const { sale, chain, owner, buyer, usdcFeed } = await deploySale();
            const inner: CappedToken = new CappedToken({
                address: chain.createAccount(),
                owner,
                name: 'Callback Dollar',
                symbol: 'CBD',
                decimals: 6,
                cap: 1_000_000n,
            });
            const token: CallbackToken = new CallbackToken(inner, () => sale.finalize({ sender: owner }));
            chain.registerToken(token);
            inner.mint(owner, buyer, 1_000n * USDC);
            inner.approve(buyer, sale.address, 100n * USDC);
            await sale.registerPaymentAsset({ sender: owner }, token.address, usdcFeed);

            const receipt = await sale.buyWithToken({ sender: buyer }, token.address, 100n * USDC);

            assert.equal(receipt.tokenAmount, 200n);
            assert.ok(hasReason('ReentrantCall')(token.callbackError));
            assert.equal(sale.getSaleInfo().finalized, false);
        });
    });

    describe('Preview', () => {
        it('quotes without changing state', async () => {
            const { sale, usdc, oracle } = await deploySale();

            const native = await sale.previewNativePurchase(nativeFor(100n));
            const token = await sale.previewTokenPurchase(usdc.address, 50n * USDC);

            assert.equal(native.tokenAmount, 200n);
            assert.equal(token.usdAmount, 50n);
            assert.equal(token.tokenAmount, 100n);
            assert.equal(sale.getStage(0).sold, 0n);
            assert.equal(purchaseEvents(sale), 0);
            assert.equal(oracle.queryCount, 2);
        });

        it('routes the native marker to a native quote', async () => {
            const { sale, usdc } = await deploySale();

            assert.equal((await sale.previewPurchase(NATIVE_ASSET, nativeFor(100n))).tokenAmount, 200n);
            assert.equal((await sale.previewPurchase(usdc.address, 10n * USDC)).paymentAsset, usdc.address);
        });

        it('applies the same gates as a purchase', async () => {
            const { sale } = await deploySale({ now: END + 1n });

            await assert.rejects(sale.previewNativePurchase(nativeFor(100n)), hasReason('Ended'));
        });
    });
});
