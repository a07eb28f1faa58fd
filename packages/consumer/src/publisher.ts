import type { BinaryState, MetricPublisher, MetricSnapshot } from '@occupancy-meter/types';

interface Measurement<T> {
  value: T;
  unit: string;
}

/** Exposed form of one source's metrics. */
export interface SourceMetrics {
  sourceId: string;
  state: BinaryState;
  occupancyTotal: Measurement<number>;
  occupancyCount: Measurement<number>;
  currentOccupancy: Measurement<number | null>;
  lastTriggered: string | null;
  onSince: string | null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function isoOrNull(time: number | null): string | null {
  return time === null ? null : new Date(time).toISOString();
}

/**
 * MetricPublisher that keeps the latest snapshot per source and renders
 * it for the /metrics endpoint. Open intervals are re-folded at render
 * time so totals keep rising between events.
 */
export class SnapshotBoard implements MetricPublisher {
  private latest = new Map<string, MetricSnapshot>();

  publish(snapshot: MetricSnapshot): void {
    this.latest.set(snapshot.sourceId, snapshot);
  }

  retract(sourceId: string): void {
    this.latest.delete(sourceId);
  }

  get size(): number {
    return this.latest.size;
  }

  render(now = Date.now()): SourceMetrics[] {
    return Array.from(this.latest.values())
      .sort((a, b) => a.sourceId.localeCompare(b.sourceId))
      .map((snapshot) => this.renderOne(snapshot, now));
  }

  private renderOne(snapshot: MetricSnapshot, now: number): SourceMetrics {
    const closed = snapshot.totalDuration - (snapshot.currentDuration ?? 0);
    let current: number | null = null;
    if (snapshot.state === 'on' && snapshot.intervalStart !== null) {
      current = Math.max(0, (now - snapshot.intervalStart) / 1000);
    }

    return {
      sourceId: snapshot.sourceId,
      state: snapshot.state,
      occupancyTotal: { value: round2(closed + (current ?? 0)), unit: 's' },
      occupancyCount: { value: snapshot.activationCount, unit: 'events' },
      currentOccupancy: { value: current === null ? null : round2(current), unit: 's' },
      lastTriggered: isoOrNull(snapshot.lastTrigger),
      onSince: isoOrNull(snapshot.intervalStart),
    };
  }
}
