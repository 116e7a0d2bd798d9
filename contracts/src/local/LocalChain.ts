// In-process chain
// Holds the clock, native-coin balances and the token ledgers deployed on it.
// A checkpoint covers native balances and every checkpointable ledger, which
// is what lets a failed sale operation roll back value it already moved.

import { getAddress, numberToHex, type Address } from 'viem';

import { CappedToken } from '../token/CappedToken';
import { isCheckpointable, type Chain, type Checkpointable, type Rollback, type TokenLedger } from '../runtime/Chain';
import { Revert, ValidationError } from '../runtime/Revert';
import { SafeMath } from '../runtime/SafeMath';
import { isZero, requireAddress } from '../runtime/address';

export interface LocalTokenParams {
    readonly owner: Address;
    readonly name: string;
    readonly symbol: string;
    readonly decimals?: number;
    readonly cap: bigint;
}

export class LocalChain implements Chain, Checkpointable {
    private timestamp: bigint;
    private accountNonce: bigint = 0n;
    private nativeBalances: Map<Address, bigint> = new Map();
    private readonly ledgers: Map<Address, TokenLedger> = new Map();

    public constructor(timestamp: bigint = BigInt(Math.floor(Date.now() / 1000))) {
        this.timestamp = timestamp;
    }

    public now(): bigint {
        return this.timestamp;
    }

    public setTime(timestamp: bigint): void {
        if (timestamp < this.timestamp) throw new Revert('Time cannot move backwards');
        this.timestamp = timestamp;
    }

    public increaseTime(seconds: bigint): void {
        this.setTime(SafeMath.add(this.timestamp, seconds));
    }

    /**
     * Fresh, deterministic account address.
     */
    public createAccount(): Address {
        this.accountNonce++;
        return getAddress(numberToHex(0x1000n + this.accountNonce, { size: 20 }));
    }

    // ── Native coin ──

    public setBalance(account: Address, amount: bigint): void {
        this.nativeBalances.set(requireAddress(account, 'account'), amount);
    }

    public async nativeBalanceOf(account: Address): Promise<bigint> {
        return this.nativeBalances.get(requireAddress(account, 'account', true)) ?? 0n;
    }

    public async transferNative(from: Address, to: Address, amount: bigint): Promise<boolean> {
        const sender: Address = requireAddress(from, 'sender');
        const recipient: Address = requireAddress(to, 'recipient');
        if (amount < 0n) return false;

        const balance: bigint = this.nativeBalances.get(sender) ?? 0n;
        if (balance < amount) return false;

        this.nativeBalances.set(sender, SafeMath.sub(balance, amount));
        this.nativeBalances.set(recipient, SafeMath.add(this.nativeBalances.get(recipient) ?? 0n, amount));
        return true;
    }

    // ── Tokens ──

    public deployToken(params: LocalTokenParams): CappedToken {
        const token: CappedToken = new CappedToken({ ...params, address: this.createAccount() });
        this.registerToken(token);
        return token;
    }

    public registerToken(ledger: TokenLedger): void {
        const address: Address = requireAddress(ledger.address, 'token');
        if (this.ledgers.has(address)) throw new Revert(`Token already deployed at ${address}`);
        this.ledgers.set(address, ledger);
    }

    public token(address: Address): TokenLedger {
        const key: Address = requireAddress(address, 'token', true);
        if (isZero(key)) throw new ValidationError('ZeroAddress', 'Invalid token: zero address');

        const ledger: TokenLedger | undefined = this.ledgers.get(key);
        if (ledger === undefined) throw new Revert(`No token deployed at ${key}`);
        return ledger;
    }

    public checkpoint(): Rollback {
        const balances: Map<Address, bigint> = new Map(this.nativeBalances);
        const ledgerRollbacks: Rollback[] = [];
        for (const ledger of this.ledgers.values()) {
            if (isCheckpointable(ledger)) ledgerRollbacks.push(ledger.checkpoint());
        }

        return () => {
            this.nativeBalances = balances;
            for (const rollback of ledgerRollbacks) rollback();
        };
    }
}
