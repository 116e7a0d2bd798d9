// Capped fungible token
// ERC-20-like ledger with a hard supply cap. Only the token owner mints;
// holders burn their own balance. Used as the sale token and as payment
// assets on a local chain.

import { zeroAddress, type Address } from 'viem';

import type { Checkpointable, Rollback, TokenLedger } from '../runtime/Chain';
import { EventLog, NetEvent } from '../runtime/NetEvent';
import { Revert, UnauthorizedError, ValidationError } from '../runtime/Revert';
import { SafeMath } from '../runtime/SafeMath';
import { isZero, requireAddress, sameAddress } from '../runtime/address';

// ── Events ──

export class TransferEvent extends NetEvent<{ from: Address; to: Address; amount: bigint }> {
    public constructor(from: Address, to: Address, amount: bigint) {
        super('Transfer', { from, to, amount });
    }
}

export class ApprovalEvent extends NetEvent<{ owner: Address; spender: Address; amount: bigint }> {
    public constructor(owner: Address, spender: Address, amount: bigint) {
        super('Approval', { owner, spender, amount });
    }
}

// ── Token ──

export interface CappedTokenParams {
    readonly address: Address;
    readonly owner: Address;
    readonly name: string;
    readonly symbol: string;
    readonly decimals?: number;
    /** Supply cap in whole tokens. */
    readonly cap: bigint;
}

interface Balances {
    balances: Map<Address, bigint>;
    allowances: Map<string, bigint>;
    totalSupply: bigint;
}

export class CappedToken implements TokenLedger, Checkpointable {
    public readonly address: Address;
    public readonly owner: Address;
    public readonly name: string;
    public readonly symbol: string;
    public readonly tokenDecimals: number;
    /** Supply cap in base units. */
    public readonly maxSupply: bigint;
    public readonly events: EventLog = new EventLog();

    private ledger: Balances = { balances: new Map(), allowances: new Map(), totalSupply: 0n };

    public constructor(params: CappedTokenParams) {
        this.address = requireAddress(params.address, 'token');
        this.owner = requireAddress(params.owner, 'token owner');

        if (params.name.length === 0) throw new Revert('Name required');
        if (params.symbol.length === 0) throw new Revert('Symbol required');
        if (params.cap <= 0n) throw new ValidationError('NonPositiveCap', 'Max supply must be > 0');

        this.name = params.name;
        this.symbol = params.symbol;
        this.tokenDecimals = params.decimals ?? 18;
        this.maxSupply = SafeMath.mul(params.cap, SafeMath.pow10(this.tokenDecimals));
    }

    public get totalSupply(): bigint {
        return this.ledger.totalSupply;
    }

    public async decimals(): Promise<number> {
        return this.tokenDecimals;
    }

    public async balanceOf(account: Address): Promise<bigint> {
        return this._balance(requireAddress(account, 'account', true));
    }

    public async allowance(owner: Address, spender: Address): Promise<bigint> {
        return this.ledger.allowances.get(allowanceKey(owner, spender)) ?? 0n;
    }

    // ══════════════════════════════════════════════════════════════
    // ██ WRITE METHODS
    // ══════════════════════════════════════════════════════════════

    public mint(caller: Address, to: Address, amount: bigint): void {
        if (!sameAddress(caller, this.owner)) throw new UnauthorizedError(caller);

        const recipient: Address = requireAddress(to, 'recipient');
        if (amount <= 0n) throw new ValidationError('NonPositiveAmount', 'Amount must be > 0');

        const newSupply: bigint = SafeMath.add(this.ledger.totalSupply, amount);
        if (newSupply > this.maxSupply) throw new Revert('Max supply exceeded');

        this.ledger.totalSupply = newSupply;
        this.ledger.balances.set(recipient, SafeMath.add(this._balance(recipient), amount));
        this.events.publish([new TransferEvent(zeroAddress, recipient, amount)]);
    }

    public burn(caller: Address, amount: bigint): void {
        const holder: Address = requireAddress(caller, 'holder');
        if (amount <= 0n) throw new ValidationError('NonPositiveAmount', 'Amount must be > 0');

        const balance: bigint = this._balance(holder);
        if (balance < amount) throw new Revert('Insufficient balance');

        this.ledger.balances.set(holder, SafeMath.sub(balance, amount));
        this.ledger.totalSupply = SafeMath.sub(this.ledger.totalSupply, amount);
        this.events.publish([new TransferEvent(holder, zeroAddress, amount)]);
    }

    public approve(caller: Address, spender: Address, amount: bigint): void {
        const owner: Address = requireAddress(caller, 'owner');
        const approved: Address = requireAddress(spender, 'spender');

        this.ledger.allowances.set(allowanceKey(owner, approved), amount);
        this.events.publish([new ApprovalEvent(owner, approved, amount)]);
    }

    public async transfer(caller: Address, to: Address, amount: bigint): Promise<boolean> {
        return this._move(caller, to, amount);
    }

    public async transferFrom(caller: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
        const key: string = allowanceKey(from, caller);
        const allowed: bigint = this.ledger.allowances.get(key) ?? 0n;
        if (allowed < amount) return false;

        if (!this._move(from, to, amount)) return false;
        this.ledger.allowances.set(key, SafeMath.sub(allowed, amount));
        return true;
    }

    public checkpoint(): Rollback {
        const saved: Balances = {
            balances: new Map(this.ledger.balances),
            allowances: new Map(this.ledger.allowances),
            totalSupply: this.ledger.totalSupply,
        };
        return () => {
            this.ledger = saved;
        };
    }

    // ══════════════════════════════════════════════════════════════
    // ██ INTERNAL HELPERS
    // ══════════════════════════════════════════════════════════════

    private _balance(account: Address): bigint {
        return this.ledger.balances.get(account) ?? 0n;
    }

    private _move(from: Address, to: Address, amount: bigint): boolean {
        const sender: Address = requireAddress(from, 'sender', true);
        const recipient: Address = requireAddress(to, 'recipient', true);
        if (isZero(sender) || isZero(recipient) || amount < 0n) return false;

        const balance: bigint = this._balance(sender);
        if (balance < amount) return false;

        this.ledger.balances.set(sender, SafeMath.sub(balance, amount));
        this.ledger.balances.set(recipient, SafeMath.add(this._balance(recipient), amount));
        this.events.publish([new TransferEvent(sender, recipient, amount)]);
        return true;
    }
}

function allowanceKey(owner: Address, spender: Address): string {
    return `${owner.toLowerCase()}:${spender.toLowerCase()}`;
}
