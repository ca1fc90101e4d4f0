export type FarmCounter =
  | 'settlements'
  | 'deposits'
  | 'withdrawals'
  | 'emergency_withdrawals'
  | 'reward_payouts'
  | 'capped_payouts'
  | 'failed_invocations'
  | 'blocks_mined'
  | 'keeper_runs';

export type FarmGauge = 'block' | 'pools' | 'period';

export type MetricsSnapshot = {
  counters: Partial<Record<FarmCounter, number>>;
  gauges: Partial<Record<FarmGauge, number>>;
};

export class Metrics {
  private readonly counters: Partial<Record<FarmCounter, number>> = {};
  private readonly gauges: Partial<Record<FarmGauge, number>> = {};

  inc(name: FarmCounter, by: number = 1): void {
    if (!Number.isFinite(by)) throw new Error('Metrics: increment must be finite');
    this.counters[name] = (this.counters[name] ?? 0) + by;
  }

  setGauge(name: FarmGauge, value: number | bigint): void {
    const v = typeof value === 'bigint' ? Number(value) : value;
    if (!Number.isFinite(v)) throw new Error('Metrics: gauge value must be finite');
    this.gauges[name] = v;
  }

  counter(name: FarmCounter): number {
    return this.counters[name] ?? 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: { ...this.counters },
      gauges: { ...this.gauges },
    };
  }
}
