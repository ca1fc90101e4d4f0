import type { Address } from 'viem';
import { getAddress, zeroAddress } from 'viem';

import type { Revertible } from './revertible.js';

export class CollaboratorFailure extends Error {
  readonly token: Address;

  constructor(token: Address, message: string) {
    super(message);
    this.token = token;
  }
}

export class InsufficientTokenBalance extends CollaboratorFailure {
  constructor(token: Address, holder: Address, needed: bigint, available: bigint) {
    super(token, `Token ${token}: balance of ${holder} is ${available}, needs ${needed}`);
  }
}

export class InsufficientAllowance extends CollaboratorFailure {
  constructor(token: Address, owner: Address, spender: Address, needed: bigint, available: bigint) {
    super(token, `Token ${token}: allowance ${owner} -> ${spender} is ${available}, needs ${needed}`);
  }
}

export class NotTokenOwner extends CollaboratorFailure {
  constructor(token: Address, sender: Address) {
    super(token, `Token ${token}: ${sender} is not the owner`);
  }
}

export type TokenMovement = {
  token: Address;
  from: Address;
  to: Address;
  amount: bigint;
};

// Runs after balances move. Throwing fails the call; calling back into the
// engine models a token that re-enters its caller.
export type TransferHook = (movement: TokenMovement) => void;

export type TokenRecord = {
  address: Address;
  name: string;
  symbol: string;
  decimals: number;
  owner: Address;
  totalSupply: bigint;
  balances: Array<{ holder: Address; amount: bigint }>;
  allowances: Array<{ owner: Address; spender: Address; amount: bigint }>;
};

/** A token bound to the account that is calling it. */
export interface TokenHandle {
  readonly address: Address;
  balanceOf(holder: Address): bigint;
  mint(to: Address, amount: bigint): void;
  transfer(to: Address, amount: bigint): void;
  transferFrom(from: Address, to: Address, amount: bigint): void;
  approve(spender: Address, amount: bigint): void;
  transferOwnership(newOwner: Address): void;
}

function nonNegative(amount: bigint): bigint {
  if (amount < 0n) throw new RangeError('amount must be >= 0');
  return amount;
}

export class TokenLedger implements Revertible {
  public readonly address: Address;
  public readonly name: string;
  public readonly symbol: string;
  public readonly decimals: number;

  private _owner: Address;
  private _totalSupply = 0n;
  private balances = new Map<Address, bigint>();
  private allowances = new Map<Address, Map<Address, bigint>>();
  private hook?: TransferHook;

  constructor(args: { address: Address; name: string; symbol: string; decimals: number; owner: Address }) {
    if (!Number.isInteger(args.decimals) || args.decimals < 0) throw new Error('TokenLedger: invalid decimals');
    this.address = getAddress(args.address);
    this.name = args.name;
    this.symbol = args.symbol;
    this.decimals = args.decimals;
    this._owner = getAddress(args.owner);
  }

  static fromRecord(r: TokenRecord): TokenLedger {
    const t = new TokenLedger(r);
    t._totalSupply = r.totalSupply;
    for (const b of r.balances) t.balances.set(getAddress(b.holder), b.amount);
    for (const a of r.allowances) t.allowanceRow(getAddress(a.owner)).set(getAddress(a.spender), a.amount);
    return t;
  }

  get owner(): Address {
    return this._owner;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  connect(sender: Address): TokenHandle {
    const from = getAddress(sender);
    return {
      address: this.address,
      balanceOf: (holder) => this.balanceOf(holder),
      mint: (to, amount) => this.mint(from, to, amount),
      transfer: (to, amount) => this.transfer(from, to, amount),
      transferFrom: (owner, to, amount) => this.transferFrom(from, owner, to, amount),
      approve: (spender, amount) => this.approve(from, spender, amount),
      transferOwnership: (newOwner) => this.transferOwnership(from, newOwner),
    };
  }

  setTransferHook(hook: TransferHook | undefined): void {
    this.hook = hook;
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(getAddress(holder)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(getAddress(owner))?.get(getAddress(spender)) ?? 0n;
  }

  mint(sender: Address, to: Address, amount: bigint): void {
    nonNegative(amount);
    if (getAddress(sender) !== this._owner) throw new NotTokenOwner(this.address, sender);

    const recipient = getAddress(to);
    this._totalSupply += amount;
    this.balances.set(recipient, this.balanceOf(recipient) + amount);
    this.hook?.({ token: this.address, from: zeroAddress, to: recipient, amount });
  }

  transfer(sender: Address, to: Address, amount: bigint): void {
    this.move(getAddress(sender), getAddress(to), nonNegative(amount));
  }

  transferFrom(sender: Address, owner: Address, to: Address, amount: bigint): void {
    nonNegative(amount);
    const spender = getAddress(sender);
    const from = getAddress(owner);

    const allowed = this.allowance(from, spender);
    if (allowed < amount) throw new InsufficientAllowance(this.address, from, spender, amount, allowed);
    this.allowanceRow(from).set(spender, allowed - amount);

    this.move(from, getAddress(to), amount);
  }

  approve(sender: Address, spender: Address, amount: bigint): void {
    this.allowanceRow(getAddress(sender)).set(getAddress(spender), nonNegative(amount));
  }

  transferOwnership(sender: Address, newOwner: Address): void {
    if (getAddress(sender) !== this._owner) throw new NotTokenOwner(this.address, sender);
    this._owner = getAddress(newOwner);
  }

  checkpoint(): () => void {
    const owner = this._owner;
    const totalSupply = this._totalSupply;
    const balances = new Map(this.balances);
    const allowances = new Map([...this.allowances].map(([k, row]) => [k, new Map(row)] as const));

    return () => {
      this._owner = owner;
      this._totalSupply = totalSupply;
      this.balances = balances;
      this.allowances = allowances;
    };
  }

  toRecord(): TokenRecord {
    return {
      address: this.address,
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      owner: this._owner,
      totalSupply: this._totalSupply,
      balances: [...this.balances].map(([holder, amount]) => ({ holder, amount })),
      allowances: [...this.allowances].flatMap(([owner, row]) =>
        [...row].map(([spender, amount]) => ({ owner, spender, amount })),
      ),
    };
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) throw new InsufficientTokenBalance(this.address, from, amount, available);

    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.hook?.({ token: this.address, from, to, amount });
  }

  private allowanceRow(owner: Address): Map<Address, bigint> {
    let row = this.allowances.get(owner);
    if (!row) {
      row = new Map<Address, bigint>();
      this.allowances.set(owner, row);
    }
    return row;
  }
}
