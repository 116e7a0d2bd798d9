// Sale runtime: failure taxonomy
// Every failed operation throws a Revert. The executing scope rolls back all
// state touched by the operation before the error reaches the caller.

import type { Address } from 'viem';

export class Revert extends Error {
    public constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// ── Malformed input ──

export type ValidationReason =
    | 'ZeroAddress'
    | 'InvalidAddress'
    | 'NonPositiveAmount'
    | 'NonPositiveRate'
    | 'NonPositiveCap'
    | 'PastTimestamp'
    | 'BeforeStart'
    | 'InvalidTimeRange'
    | 'AllocationTooSmall';

export class ValidationError extends Revert {
    public constructor(
        public readonly reason: ValidationReason,
        message: string,
    ) {
        super(message);
    }
}

// ── Operation invalid for the current lifecycle or stage state ──

export type StateReason =
    | 'AlreadyFinalized'
    | 'NoActiveStage'
    | 'FinalStageReached'
    | 'AlreadyEnabled'
    | 'AlreadyDisabled'
    | 'NotStarted'
    | 'Ended'
    | 'Paused'
    | 'AlreadyPaused'
    | 'NotPaused'
    | 'ReentrantCall'
    | 'NothingToWithdraw'
    | 'PaymentNotAccepted';

export class StateError extends Revert {
    public constructor(
        public readonly reason: StateReason,
        message: string,
    ) {
        super(message);
    }
}

// ── Price feed ──

export type OracleReason = 'StaleOrInvalid' | 'MissingFeed';

export class OracleError extends Revert {
    public constructor(
        public readonly reason: OracleReason,
        message: string,
    ) {
        super(message);
    }
}

// ── Business rules ──

export class InsufficientSupplyError extends Revert {
    public constructor(
        public readonly required: bigint,
        public readonly available: bigint,
    ) {
        super(`Insufficient token supply: required ${required}, available ${available}`);
    }
}

export type LimitScope = 'address' | 'stage';

export class LimitExceededError extends Revert {
    public constructor(
        public readonly scope: LimitScope,
        public readonly limit: bigint,
        public readonly attempted: bigint,
    ) {
        super(
            scope === 'address'
                ? `Exceeds purchase limit per address: ${attempted} > ${limit}`
                : `Exceeds stage capacity: ${attempted} > ${limit}`,
        );
    }
}

export class UnauthorizedError extends Revert {
    public constructor(public readonly caller: Address) {
        super('Only owner');
    }
}

export type ExternalCall = 'transfer' | 'transferFrom' | 'transferNative';

export class ExternalCallError extends Revert {
    public constructor(
        public readonly call: ExternalCall,
        message: string,
    ) {
        super(message);
    }
}

export class ArithmeticError extends Revert {}

export type RevertReason = ValidationReason | StateReason | OracleReason;

/** The `reason` discriminant of a ValidationError, StateError or OracleError. */
export function reasonOf(error: unknown): RevertReason | undefined {
    if (error instanceof ValidationError || error instanceof StateError || error instanceof OracleError) {
        return error.reason;
    }
    return undefined;
}

/** One-line form for logs: `Name(reason): message`. */
export function describeRevert(error: unknown): string {
    if (error instanceof Revert) {
        const reason: RevertReason | undefined = reasonOf(error);
        return reason === undefined ? `${error.name}: ${error.message}` : `${error.name}(${reason}): ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
}
