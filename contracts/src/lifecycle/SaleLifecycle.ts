// Sale window, pause flag, finalization and the per-address purchase limit.

import type { Checkpointable, Rollback } from '../runtime/Chain';
import { StateError, ValidationError } from '../runtime/Revert';

export type SaleStatus = 'Pending' | 'Open' | 'Paused' | 'Ended' | 'Finalized';

export interface LifecycleParams {
    readonly startTime: bigint;
    readonly endTime: bigint;
    readonly maxPurchasePerAddress: bigint;
}

interface LifecycleState {
    endTime: bigint;
    paused: boolean;
    finalized: boolean;
    maxPurchasePerAddress: bigint;
}

export class SaleLifecycle implements Checkpointable {
    public readonly startTime: bigint;
    private state: LifecycleState;

    public constructor(params: LifecycleParams) {
        if (params.startTime >= params.endTime) {
            throw new ValidationError('InvalidTimeRange', 'Start must be before end');
        }
        if (params.maxPurchasePerAddress <= 0n) {
            throw new ValidationError('NonPositiveAmount', 'Max purchase must be > 0');
        }

        this.startTime = params.startTime;
        this.state = {
            endTime: params.endTime,
            paused: false,
            finalized: false,
            maxPurchasePerAddress: params.maxPurchasePerAddress,
        };
    }

    public get endTime(): bigint {
        return this.state.endTime;
    }

    public get paused(): boolean {
        return this.state.paused;
    }

    public get finalized(): boolean {
        return this.state.finalized;
    }

    public get maxPurchasePerAddress(): bigint {
        return this.state.maxPurchasePerAddress;
    }

    public status(now: bigint): SaleStatus {
        if (this.state.finalized) return 'Finalized';
        if (now < this.startTime) return 'Pending';
        if (now > this.state.endTime) return 'Ended';
        return this.state.paused ? 'Paused' : 'Open';
    }

    // ── Guards ──

    public requireNotFinalized(): void {
        if (this.state.finalized) throw new StateError('AlreadyFinalized', 'Sale finalized');
    }

    public requireOpen(now: bigint): void {
        this.requireNotFinalized();
        if (this.state.paused) throw new StateError('Paused', 'Sale paused');
        if (now < this.startTime) throw new StateError('NotStarted', 'Sale not started');
        if (now > this.state.endTime) throw new StateError('Ended', 'Sale ended');
    }

    // ── Transitions ──

    public pause(): void {
        this.requireNotFinalized();
        if (this.state.paused) throw new StateError('AlreadyPaused', 'Already paused');
        this.state.paused = true;
    }

    public unpause(): void {
        this.requireNotFinalized();
        if (!this.state.paused) throw new StateError('NotPaused', 'Not paused');
        this.state.paused = false;
    }

    /**
     * Terminal. A second call fails rather than acting as a no-op.
     */
    public finalize(): void {
        this.requireNotFinalized();
        this.state.finalized = true;
    }

    public updateEndTime(newEndTime: bigint, now: bigint): void {
        this.requireNotFinalized();
        if (newEndTime <= now) throw new ValidationError('PastTimestamp', 'End time must be in the future');
        if (newEndTime <= this.startTime) throw new ValidationError('BeforeStart', 'End time must be after start');
        this.state.endTime = newEndTime;
    }

    public updateMaxPurchaseLimit(limit: bigint): void {
        this.requireNotFinalized();
        if (limit <= 0n) throw new ValidationError('NonPositiveAmount', 'Max purchase must be > 0');
        this.state.maxPurchasePerAddress = limit;
    }

    public checkpoint(): Rollback {
        const saved: LifecycleState = { ...this.state };
        return () => {
            this.state = saved;
        };
    }
}
