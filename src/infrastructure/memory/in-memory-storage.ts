import type {
  ActivityEvent,
  EventStore,
  EventTotals,
  FreezeCompletion,
  NewActivityEvent,
  OpenedReport,
  PaginationParams,
  Report,
  ReportStore,
  ReportingStorage,
} from '../../domain/index.js';
import { guardPersistence } from '../../domain/index.js';

type Undo = () => void;

interface MemoryState {
  readonly events: Map<number, ActivityEvent>;
  readonly reports: Map<number, Report>;
  nextEventId: number;
  nextReportId: number;
  readonly failures: Map<string, Error>;
  readonly now: () => Date;
}

/**
 * Undo log of one transaction. A nested transaction hands its entries to
 * the parent on success so the outer rollback still covers them.
 */
class Journal {
  private readonly entries: Undo[] = [];

  record(undo: Undo): void {
    this.entries.push(undo);
  }

  rollback(): void {
    for (const undo of this.entries.reverse()) undo();
    this.entries.length = 0;
  }

  mergeInto(parent: Journal): void {
    for (const undo of this.entries) parent.record(undo);
  }
}

function byNewest(a: ActivityEvent, b: ActivityEvent): number {
  return b.event_timestamp.getTime() - a.event_timestamp.getTime() || b.id - a.id;
}

function paginate<T>(rows: T[], page?: PaginationParams): T[] {
  if (page === undefined) return rows;
  return rows.slice(page.offset, page.offset + page.limit);
}

/** Runs one store operation: injected fault first, then the work. */
async function run<T>(state: MemoryState, operation: string, work: () => T): Promise<T> {
  return guardPersistence(operation, async () => {
    const failure = state.failures.get(operation);
    if (failure !== undefined) throw failure;
    return work();
  });
}

class MemoryEventStore implements EventStore {
  private readonly state: MemoryState;
  private readonly journal: Journal | null;

  constructor(state: MemoryState, journal: Journal | null) {
    this.state = state;
    this.journal = journal;
  }

  async append(event: NewActivityEvent): Promise<number> {
    return run(this.state, 'append_event', () => {
      const id = this.state.nextEventId++;
      this.state.events.set(id, {
        id,
        event_type: event.event_type,
        event_subtype: event.event_subtype ?? null,
        object_id: event.object_id ?? null,
        user_id: event.user_id ?? null,
        event_data: event.event_data ?? {},
        event_timestamp: event.event_timestamp ?? this.state.now(),
        report_id: null,
        source_plugin: event.source_plugin ?? 'core',
      });
      this.journal?.record(() => this.state.events.delete(id));
      return id;
    });
  }

  async claimForPeriod(reportId: number, periodStart: Date, periodEnd: Date): Promise<number> {
    return run(this.state, 'claim_events', () => {
      let claimed = 0;
      for (const event of this.state.events.values()) {
        const at = event.event_timestamp.getTime();
        if (event.report_id !== null) continue;
        if (at < periodStart.getTime() || at > periodEnd.getTime()) continue;

        this.state.events.set(event.id, { ...event, report_id: reportId });
        this.journal?.record(() => {
          const current = this.state.events.get(event.id);
          if (current !== undefined) this.state.events.set(event.id, { ...current, report_id: null });
        });
        claimed++;
      }
      return claimed;
    });
  }

  async listByReport(reportId: number | null, page?: PaginationParams): Promise<ActivityEvent[]> {
    return run(this.state, 'list_events', () => {
      const rows = [...this.state.events.values()]
        .filter((event) => event.report_id === reportId)
        .sort(byNewest);
      return paginate(rows, page);
    });
  }

  async listRecent(limit: number): Promise<ActivityEvent[]> {
    return this.listByReport(null, { limit, offset: 0 });
  }

  async countByType(reportId: number | null): Promise<EventTotals> {
    return run(this.state, 'count_events', () => {
      const counts = new Map<string, number>();
      for (const event of this.state.events.values()) {
        if (event.report_id !== reportId) continue;
        counts.set(event.event_type, (counts.get(event.event_type) ?? 0) + 1);
      }
      return Object.fromEntries(counts);
    });
  }

  async lastEventFor(eventType: string, objectId: string): Promise<ActivityEvent | null> {
    return run(this.state, 'last_event', () => {
      const [latest] = [...this.state.events.values()]
        .filter((event) => event.event_type === eventType && event.object_id === objectId)
        .sort(byNewest);
      return latest ?? null;
    });
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    return run(this.state, 'delete_events', () => {
      let deleted = 0;
      for (const event of [...this.state.events.values()]) {
        if (event.event_timestamp.getTime() >= cutoff.getTime()) continue;
        this.state.events.delete(event.id);
        this.journal?.record(() => this.state.events.set(event.id, event));
        deleted++;
      }
      return deleted;
    });
  }
}

class MemoryReportStore implements ReportStore {
  private readonly state: MemoryState;
  private readonly journal: Journal | null;

  constructor(state: MemoryState, journal: Journal | null) {
    this.state = state;
    this.journal = journal;
  }

  async createIfNoneActive(input: { period_start: Date }): Promise<OpenedReport> {
    return run(this.state, 'create_report', () => {
      const active = this.newestActive();
      if (active !== null) return { id: active.id, created: false };

      const id = this.state.nextReportId++;
      this.state.reports.set(id, {
        id,
        status: 'active',
        period_start: input.period_start,
        period_end: null,
        frozen_at: null,
        event_count: 0,
        summary_data: null,
        emailed: false,
        emailed_at: null,
        created_at: this.state.now(),
      });
      this.journal?.record(() => this.state.reports.delete(id));
      return { id, created: true };
    });
  }

  async findActive(): Promise<Report | null> {
    return run(this.state, 'find_active_report', () => this.newestActive());
  }

  async beginFreeze(reportId: number, periodEnd: Date): Promise<boolean> {
    return run(this.state, 'begin_freeze', () => {
      const report = this.state.reports.get(reportId);
      if (report === undefined || report.status !== 'active' || report.period_end !== null) {
        return false;
      }
      this.replace(report, { ...report, period_end: periodEnd });
      return true;
    });
  }

  async completeFreeze(reportId: number, completion: FreezeCompletion): Promise<boolean> {
    return run(this.state, 'complete_freeze', () => {
      const report = this.state.reports.get(reportId);
      if (report === undefined || report.status !== 'active') return false;
      this.replace(report, {
        ...report,
        status: 'frozen',
        frozen_at: completion.frozen_at,
        event_count: completion.event_count,
        summary_data: completion.summary_data,
      });
      return true;
    });
  }

  async findById(reportId: number): Promise<Report | null> {
    return run(this.state, 'find_report', () => this.state.reports.get(reportId) ?? null);
  }

  async findLastFrozen(): Promise<Report | null> {
    const [latest] = await this.listFrozen({ limit: 1, offset: 0 });
    return latest ?? null;
  }

  async listFrozen(page: PaginationParams): Promise<Report[]> {
    return run(this.state, 'list_frozen_reports', () => {
      const rows = [...this.state.reports.values()]
        .filter((report) => report.status === 'frozen')
        .sort((a, b) => (b.frozen_at?.getTime() ?? 0) - (a.frozen_at?.getTime() ?? 0) || b.id - a.id);
      return paginate(rows, page);
    });
  }

  async markEmailed(reportId: number): Promise<boolean> {
    return run(this.state, 'mark_emailed', () => {
      const report = this.state.reports.get(reportId);
      if (report === undefined) return false;
      this.replace(report, { ...report, emailed: true, emailed_at: this.state.now() });
      return true;
    });
  }

  private newestActive(): Report | null {
    const [newest] = [...this.state.reports.values()]
      .filter((report) => report.status === 'active')
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id);
    return newest ?? null;
  }

  private replace(previous: Report, next: Report): void {
    this.state.reports.set(next.id, next);
    this.journal?.record(() => this.state.reports.set(previous.id, previous));
  }
}

function scopedStorage(state: MemoryState, journal: Journal | null): ReportingStorage {
  return {
    events: new MemoryEventStore(state, journal),
    reports: new MemoryReportStore(state, journal),
    transaction: async <T>(work: (tx: ReportingStorage) => Promise<T>): Promise<T> => {
      const child = new Journal();
      try {
        const result = await work(scopedStorage(state, child));
        if (journal !== null) child.mergeInto(journal);
        return result;
      } catch (err: unknown) {
        child.rollback();
        throw err;
      }
    },
    ping: async () => {
      await run(state, 'ping', () => undefined);
    },
  };
}

export interface InMemoryStorageOptions {
  /** Clock for defaulted timestamps. */
  now?: () => Date;
}

/**
 * Process-local storage with the same contract as the Postgres one.
 *
 * Writes apply immediately, like row-level writes; each transaction keeps an
 * undo journal, so a failing transaction reverts only what it wrote even when
 * other transactions interleave with it.
 */
export class InMemoryReportingStorage implements ReportingStorage {
  readonly events: EventStore;
  readonly reports: ReportStore;

  private readonly state: MemoryState;
  private readonly root: ReportingStorage;

  constructor(options: InMemoryStorageOptions = {}) {
    this.state = {
      events: new Map(),
      reports: new Map(),
      nextEventId: 1,
      nextReportId: 1,
      failures: new Map(),
      now: options.now ?? (() => new Date()),
    };
    this.root = scopedStorage(this.state, null);
    this.events = this.root.events;
    this.reports = this.root.reports;
  }

  transaction<T>(work: (tx: ReportingStorage) => Promise<T>): Promise<T> {
    return this.root.transaction(work);
  }

  ping(): Promise<void> {
    return this.root.ping();
  }

  /**
   * Makes every call of `operation` (e.g. `complete_freeze`) fail until
   * cleared. The error reaches callers wrapped in PersistenceError.
   */
  failOn(operation: string, error: Error = new Error(`Injected failure: ${operation}`)): void {
    this.state.failures.set(operation, error);
  }

  clearFailures(operation?: string): void {
    if (operation === undefined) this.state.failures.clear();
    else this.state.failures.delete(operation);
  }
}
