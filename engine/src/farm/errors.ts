export type ConfigurationReason =
  | 'zero_address'
  | 'wallet_is_contract'
  | 'reward_token_not_contract'
  | 'lp_not_contract'
  | 'lp_not_token'
  | 'lp_is_reward_token'
  | 'lp_duplicate'
  | 'reward_token_is_lp'
  | 'emission_ended';

export class ConfigurationError extends Error {
  readonly reason: ConfigurationReason;

  constructor(reason: ConfigurationReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

export class InsufficientStake extends Error {
  readonly poolId: number;
  readonly requested: bigint;
  readonly staked: bigint;

  constructor(poolId: number, requested: bigint, staked: bigint) {
    super(`Withdraw ${requested} from pool ${poolId} exceeds stake ${staked}`);
    this.poolId = poolId;
    this.requested = requested;
    this.staked = staked;
  }
}

export class Unauthorized extends Error {
  constructor(caller: string, action: string) {
    super(`${caller} may not ${action}`);
  }
}

export class UnknownPool extends Error {
  constructor(poolId: number) {
    super(`Unknown pool ${poolId}`);
  }
}

// Pending reward came out negative: the debt was not resynced after a settlement.
export class LedgerInvariantViolation extends Error {}
