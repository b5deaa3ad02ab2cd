import type { ThreatStore } from '../store/ThreatStore.js';
import type {
  PageRequest,
  ThreatFilter,
  ThreatPage,
  ThreatRecord,
  ThreatStatistics,
} from '../../types/threat.types.js';

/**
 * Read-side composition over a ThreatStore. Callers hand in ranges that are
 * already validated (offset >= 0, limit within [1, 1000]).
 */
export class ThreatQueries {
  constructor(private readonly store: ThreatStore) {}

  list(filter: ThreatFilter, page: PageRequest): Promise<ThreatRecord[]> {
    return this.store.list(filter, page);
  }

  count(filter: ThreatFilter = {}): Promise<number> {
    return this.store.count(filter);
  }

  /** One page together with the number of records matching the filter. */
  async page(filter: ThreatFilter, page: PageRequest): Promise<ThreatPage> {
    const [items, total] = await Promise.all([this.store.list(filter, page), this.store.count(filter)]);
    return { items, total };
  }

  async statistics(): Promise<ThreatStatistics> {
    const [total, byType, bySeverity] = await Promise.all([
      this.store.count({}),
      this.store.countGroupedBy('type'),
      this.store.countGroupedBy('severity'),
    ]);
    return { total, by_type: byType, by_severity: bySeverity };
  }
}
