import type { Address } from 'viem';
import { getAddress } from 'viem';

import type { Revertible } from './revertible.js';
import type { TokenHandle, TokenRecord } from './token-ledger.js';
import { CollaboratorFailure, TokenLedger } from './token-ledger.js';

export class UnknownContract extends CollaboratorFailure {
  constructor(address: Address) {
    super(address, `No contract deployed at ${address}`);
  }
}

export type ChainRecord = {
  blockNumber: bigint;
  contracts: Address[];
  tokens: TokenRecord[];
};

/**
 * In-process host for the engine: block height, contract accounts, token
 * ledgers and all-or-nothing execution of entry points.
 */
export class LocalChain {
  private block: bigint;
  private contracts = new Set<Address>();
  private tokens = new Map<Address, TokenLedger>();
  private readonly participants: Revertible[] = [];
  private depth = 0;

  constructor(args?: { initialBlock?: bigint }) {
    const initial = args?.initialBlock ?? 0n;
    if (initial < 0n) throw new Error('LocalChain: initialBlock must be >= 0');
    this.block = initial;
  }

  static fromRecord(r: ChainRecord): LocalChain {
    const chain = new LocalChain({ initialBlock: r.blockNumber });
    for (const c of r.contracts) chain.contracts.add(getAddress(c));
    for (const t of r.tokens) {
      const ledger = TokenLedger.fromRecord(t);
      chain.tokens.set(ledger.address, ledger);
      chain.contracts.add(ledger.address);
    }
    return chain;
  }

  blockNumber(): bigint {
    return this.block;
  }

  mine(blocks: bigint = 1n): bigint {
    if (blocks < 0n) throw new RangeError('mine: blocks must be >= 0');
    if (this.depth > 0) throw new Error('LocalChain: cannot mine inside an invocation');
    this.block += blocks;
    return this.block;
  }

  get invoking(): boolean {
    return this.depth > 0;
  }

  registerContract(address: Address): void {
    this.contracts.add(getAddress(address));
  }

  isContract(address: Address): boolean {
    return this.contracts.has(getAddress(address));
  }

  isToken(address: Address): boolean {
    return this.tokens.has(getAddress(address));
  }

  deployToken(args: { address: Address; name: string; symbol: string; decimals: number; owner: Address }): TokenLedger {
    const address = getAddress(args.address);
    if (this.contracts.has(address)) throw new Error(`LocalChain: address ${address} already holds a contract`);

    const ledger = new TokenLedger({ ...args, address });
    this.tokens.set(address, ledger);
    this.contracts.add(address);
    return ledger;
  }

  ledger(address: Address): TokenLedger {
    const ledger = this.tokens.get(getAddress(address));
    if (!ledger) throw new UnknownContract(address);
    return ledger;
  }

  listTokens(): TokenLedger[] {
    return [...this.tokens.values()];
  }

  token(address: Address, sender: Address): TokenHandle {
    return this.ledger(address).connect(sender);
  }

  /** Add state that must roll back together with the token ledgers. */
  register(participant: Revertible): void {
    this.participants.push(participant);
  }

  /**
   * Run `fn` to completion or not at all. On a throw every ledger and
   * registered participant is restored and the error is re-thrown. Nested
   * calls (an external call re-entering the engine) checkpoint on their own.
   */
  invoke<T>(fn: () => T): T {
    const contracts = new Set(this.contracts);
    const tokens = new Map(this.tokens);
    const restores = [...this.tokens.values(), ...this.participants].map((p) => p.checkpoint());

    this.depth++;
    try {
      return fn();
    } catch (err) {
      for (const restore of restores.reverse()) restore();
      this.contracts = contracts;
      this.tokens = tokens;
      throw err;
    } finally {
      this.depth--;
    }
  }

  toRecord(): ChainRecord {
    const tokenAddresses = new Set(this.tokens.keys());
    return {
      blockNumber: this.block,
      contracts: [...this.contracts].filter((c) => !tokenAddresses.has(c)),
      tokens: [...this.tokens.values()].map((t) => t.toRecord()),
    };
  }
}
