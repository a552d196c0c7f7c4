import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  FILTER: 'filterMs',
  PRUNE: 'pruneMs',
  RESOLVE: 'resolveMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  filterMs: number;
  pruneMs: number;
  resolveMs: number;
  operationsRemoved: number;
  pruneIterations: number;
  componentsRemoved: number;
  extensionsStripped: number;
  typesRegistered: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  filterMs: 0,
  pruneMs: 0,
  resolveMs: 0,
  operationsRemoved: 0,
  pruneIterations: 0,
  componentsRemoved: 0,
  extensionsStripped: 0,
  typesRegistered: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      filterMs: { total: 0 },
      pruneMs: { total: 0 },
      resolveMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    const duration = this.now() - current.startedAt;
    this.accumulateDuration(key, duration);
    this.timers[key] = { total: this.snapshot[key] };
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    this.accumulateDuration(METRIC_PHASES[phase], durationMs);
  }

  public addOperationsRemoved(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.operationsRemoved += count;
  }

  public recordPrune(stats: {
    iterations: number;
    componentsRemoved: number;
    extensionsStripped: number;
  }): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.pruneIterations += stats.iterations;
    this.snapshot.componentsRemoved += stats.componentsRemoved;
    this.snapshot.extensionsStripped += stats.extensionsStripped;
  }

  public setTypesRegistered(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.typesRegistered = count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
