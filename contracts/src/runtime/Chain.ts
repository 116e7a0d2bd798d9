// Sale runtime: host interfaces
// The sale never touches balances directly. It reads time and moves value
// through the host chain and the token ledgers the chain resolves.

import type { Address } from 'viem';

/**
 * Identity and attached native value of the account invoking an operation.
 */
export interface CallContext {
    readonly sender: Address;
    readonly value?: bigint;
}

export type Rollback = () => void;

/**
 * State that can be captured before an operation and restored if it fails.
 */
export interface Checkpointable {
    checkpoint(): Rollback;
}

export function isCheckpointable(value: object): value is Checkpointable {
    return typeof Reflect.get(value, 'checkpoint') === 'function';
}

/**
 * ERC-20-like ledger. `caller` is the account the ledger treats as the
 * message sender; the boolean result reports whether the transfer happened.
 */
export interface TokenLedger {
    readonly address: Address;
    decimals(): Promise<number>;
    balanceOf(account: Address): Promise<bigint>;
    allowance(owner: Address, spender: Address): Promise<bigint>;
    transfer(caller: Address, to: Address, amount: bigint): Promise<boolean>;
    transferFrom(caller: Address, from: Address, to: Address, amount: bigint): Promise<boolean>;
}

export interface Chain {
    /** Current block time in unix seconds. */
    now(): bigint;
    nativeBalanceOf(account: Address): Promise<bigint>;
    transferNative(from: Address, to: Address, amount: bigint): Promise<boolean>;
    token(address: Address): TokenLedger;
}
