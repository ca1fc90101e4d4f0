import type { Address } from 'viem';

import type { Revertible } from '../chain/revertible.js';

type Stamped<T extends string, P> = { type: T; block: bigint } & P;

export type FarmEvent =
  | Stamped<'PoolAdded', { poolId: number; lpToken: Address; weight: bigint; lastRewardBlock: bigint }>
  | Stamped<'PoolWeightSet', { poolId: number; previous: bigint; weight: bigint; totalWeight: bigint }>
  | Stamped<
      'PoolSettled',
      {
        poolId: number;
        lastRewardBlock: bigint;
        totalReward: bigint;
        treasuryMint: bigint;
        communityMint: bigint;
        poolMint: bigint;
        redirected: bigint;
      }
    >
  | Stamped<'Deposit', { poolId: number; user: Address; amount: bigint }>
  | Stamped<'Withdraw', { poolId: number; user: Address; amount: bigint }>
  | Stamped<'EmergencyWithdraw', { poolId: number; user: Address; amount: bigint }>
  | Stamped<'RewardPaid', { poolId: number; user: Address; pending: bigint; paid: bigint }>
  | Stamped<'WalletUpdated', { wallet: 'treasury' | 'community'; previous: Address; next: Address }>
  | Stamped<'RewardTokenUpdated', { previous: Address; next: Address }>
  | Stamped<'RewardTokenOwnershipTransferred', { token: Address; newOwner: Address }>
  | Stamped<'AdminTransferred', { previous: Address; next: Address }>;

export type FarmEventType = FarmEvent['type'];

export class EventJournal implements Revertible {
  private events: FarmEvent[] = [];

  constructor(initial: readonly FarmEvent[] = []) {
    this.events = [...initial];
  }

  emit(event: FarmEvent): void {
    this.events.push(event);
  }

  get length(): number {
    return this.events.length;
  }

  list(): readonly FarmEvent[] {
    return this.events;
  }

  since(index: number): FarmEvent[] {
    return this.events.slice(index);
  }

  ofType<T extends FarmEventType>(type: T): Array<Extract<FarmEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<FarmEvent, { type: T }> => e.type === type);
  }

  checkpoint(): () => void {
    const length = this.events.length;
    return () => {
      this.events.length = length;
    };
  }
}

// bigints travel as "<digits>n" strings; addresses and names never match.
export function encodeEvent(event: FarmEvent): string {
  return JSON.stringify(event, (_key, value: unknown) => (typeof value === 'bigint' ? `${value}n` : value));
}

const EVENT_TYPES: ReadonlySet<string> = new Set<FarmEventType>([
  'PoolAdded',
  'PoolWeightSet',
  'PoolSettled',
  'Deposit',
  'Withdraw',
  'EmergencyWithdraw',
  'RewardPaid',
  'WalletUpdated',
  'RewardTokenUpdated',
  'RewardTokenOwnershipTransferred',
  'AdminTransferred',
]);

function isFarmEvent(v: unknown): v is FarmEvent {
  if (typeof v !== 'object' || v === null) return false;
  if (!('type' in v) || !('block' in v)) return false;
  return typeof v.type === 'string' && EVENT_TYPES.has(v.type) && typeof v.block === 'bigint';
}

export function decodeEvent(json: string): FarmEvent {
  const parsed: unknown = JSON.parse(json, (_key, value: unknown) =>
    typeof value === 'string' && /^-?\d+n$/.test(value) ? BigInt(value.slice(0, -1)) : value,
  );
  if (!isFarmEvent(parsed)) throw new Error('decodeEvent: not a farm event');
  return parsed;
}
