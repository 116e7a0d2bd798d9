// Ordered sale stages and the advancement state machine.
//
// The current index starts at 0, moves forward one stage at a time and never
// moves back. A full last stage is terminal: tryAdvance reports 'exhausted'
// and the sale contract finalizes.

import type { Checkpointable, Rollback } from '../runtime/Chain';
import { StateError, ValidationError } from '../runtime/Revert';
import { SafeMath } from '../runtime/SafeMath';

export interface SaleStage {
    /** Tokens allocated per whole reference-currency unit. */
    readonly rate: bigint;
    /** Max tokens sellable in this stage. */
    readonly cap: bigint;
    /** Tokens sold so far in this stage. */
    readonly sold: bigint;
}

export type AdvanceOutcome = 'unchanged' | 'advanced' | 'exhausted';

export class StageLedger implements Checkpointable {
    private stages: SaleStage[] = [];
    private index: number = 0;

    public get currentStageIndex(): number {
        return this.index;
    }

    public get length(): number {
        return this.stages.length;
    }

    public list(): ReadonlyArray<SaleStage> {
        return this.stages;
    }

    public stage(index: number): SaleStage {
        const stage: SaleStage | undefined = this.stages[index];
        if (stage === undefined) throw new StateError('NoActiveStage', `No stage at index ${index}`);
        return stage;
    }

    public currentStage(): SaleStage {
        return this.stage(this.index);
    }

    /**
     * Appends a stage and returns its index.
     */
    public addStage(rate: bigint, cap: bigint): number {
        if (rate <= 0n) throw new ValidationError('NonPositiveRate', 'Rate must be > 0');
        if (cap <= 0n) throw new ValidationError('NonPositiveCap', 'Cap must be > 0');

        this.stages.push({ rate, cap, sold: 0n });
        return this.stages.length - 1;
    }

    public currentRate(): bigint {
        if (this.stages.length === 0) throw new StateError('NoActiveStage', 'No sale stages');
        const rate: bigint = this.currentStage().rate;
        if (rate === 0n) throw new StateError('NoActiveStage', 'Current stage has no rate');
        return rate;
    }

    /** Capacity left in the current stage. */
    public remaining(): bigint {
        const stage: SaleStage = this.currentStage();
        return stage.sold >= stage.cap ? 0n : SafeMath.sub(stage.cap, stage.sold);
    }

    /**
     * Adds `amount` to the current stage. The caller has already checked the
     * stage's capacity inside the same exclusive scope.
     */
    public recordSale(amount: bigint): void {
        const stage: SaleStage = this.currentStage();
        this.stages[this.index] = { ...stage, sold: SafeMath.add(stage.sold, amount) };
    }

    public tryAdvance(): AdvanceOutcome {
        if (this.stages.length === 0) return 'unchanged';

        const stage: SaleStage = this.currentStage();
        if (stage.sold < stage.cap) return 'unchanged';

        if (this.index + 1 < this.stages.length) {
            this.index++;
            return 'advanced';
        }
        return 'exhausted';
    }

    /**
     * Forces the next stage regardless of what the current one sold.
     */
    public advanceManually(): number {
        if (this.stages.length === 0) throw new StateError('NoActiveStage', 'No sale stages');
        if (this.index + 1 >= this.stages.length) {
            throw new StateError('FinalStageReached', 'Already at final stage');
        }
        this.index++;
        return this.index;
    }

    public checkpoint(): Rollback {
        const stages: SaleStage[] = [...this.stages];
        const index: number = this.index;
        return () => {
            this.stages = stages;
            this.index = index;
        };
    }
}
