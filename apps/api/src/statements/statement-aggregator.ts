import { StatementGroupSummary, StatementMetrics } from '@statement-insights/shared';

export interface AggregationEntry {
  requestTime: unknown;
  statement: string;
  metrics: StatementMetrics;
}

interface GroupState {
  key: string;
  requestTime: string | null;
  exampleStatement?: string;
  elapsedSeconds: number[];
  cpuMicroseconds: number[];
  serviceSeconds: number[];
  resultCounts: number[];
  resultSizes: number[];
  count: number;
}

export interface AccumulatorOptions {
  /** Remember the first statement of each group (used for template groups). */
  keepExample?: boolean;
}

function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

function average(values: number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

/**
 * Groups entries under a caller-supplied key. Built per run; groups keep
 * the order in which their key was first seen.
 */
export class StatementAccumulator {
  private readonly groups = new Map<string, GroupState>();

  constructor(private readonly options: AccumulatorOptions = {}) {}

  get size(): number {
    return this.groups.size;
  }

  add(key: string, entry: AggregationEntry): void {
    let group = this.groups.get(key);
    if (!group) {
      group = {
        key,
        requestTime: typeof entry.requestTime === 'string' ? entry.requestTime : null,
        elapsedSeconds: [],
        cpuMicroseconds: [],
        serviceSeconds: [],
        resultCounts: [],
        resultSizes: [],
        count: 0,
      };
      if (this.options.keepExample) {
        group.exampleStatement = entry.statement;
      }
      this.groups.set(key, group);
    }

    group.elapsedSeconds.push(entry.metrics.elapsedSeconds);
    group.cpuMicroseconds.push(entry.metrics.cpuMicroseconds);
    group.serviceSeconds.push(entry.metrics.serviceSeconds);
    group.resultCounts.push(entry.metrics.resultCount);
    group.resultSizes.push(entry.metrics.resultSizeBytes);
    group.count += 1;
  }

  /** Group summaries, highest total elapsed time first. Ties keep first-seen order. */
  summarize(): StatementGroupSummary[] {
    return Array.from(this.groups.values())
      .map((group): StatementGroupSummary => {
        const summary: StatementGroupSummary = {
          representativeTime: group.requestTime,
          key: group.key,
          avgElapsedSeconds: average(group.elapsedSeconds),
          totalElapsedSeconds: sum(group.elapsedSeconds),
          avgCpuMicroseconds: average(group.cpuMicroseconds),
          avgServiceSeconds: average(group.serviceSeconds),
          avgResultCount: average(group.resultCounts),
          avgResultSizeBytes: average(group.resultSizes),
          count: group.count,
        };
        if (group.exampleStatement !== undefined) {
          summary.exampleStatement = group.exampleStatement;
        }
        return summary;
      })
      .sort((a, b) => b.totalElapsedSeconds - a.totalElapsedSeconds);
  }
}

export function groupByStatement(entries: Iterable<AggregationEntry>): StatementGroupSummary[] {
  const accumulator = new StatementAccumulator();
  for (const entry of entries) {
    accumulator.add(entry.statement, entry);
  }
  return accumulator.summarize();
}

export function groupByTemplate(
  entries: Iterable<AggregationEntry>,
  template: (statement: string) => string,
): StatementGroupSummary[] {
  const accumulator = new StatementAccumulator({ keepExample: true });
  for (const entry of entries) {
    accumulator.add(template(entry.statement), entry);
  }
  return accumulator.summarize();
}
