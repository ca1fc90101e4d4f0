import type { Address } from 'viem';

import type { Revertible } from '../chain/revertible.js';

export interface RewardToken {
  readonly address: Address;
  mint(to: Address, amount: bigint): void;
  transfer(to: Address, amount: bigint): void;
  balanceOf(holder: Address): bigint;
  transferOwnership(newOwner: Address): void;
}

export interface StakedAsset {
  readonly address: Address;
  transferFrom(from: Address, to: Address, amount: bigint): void;
  transfer(to: Address, amount: bigint): void;
  balanceOf(holder: Address): bigint;
}

/** What the engine needs from whatever hosts it. `LocalChain` is the in-process one. */
export interface FarmHost {
  blockNumber(): bigint;
  isContract(address: Address): boolean;
  // A contract that speaks the token interface, as opposed to any other code.
  isToken(address: Address): boolean;
  token(address: Address, sender: Address): RewardToken & StakedAsset;
  register(participant: Revertible): void;
  invoke<T>(fn: () => T): T;
}
