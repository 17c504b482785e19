/**
 * Rolling performance statistics keyed by (subject, task type), where the
 * subject is a model name or a strategy type.
 *
 * Every average is a streaming mean, `(old * (n - 1) + x) / n`; history is
 * never kept or recomputed.
 */

import type { PerformanceRecord, TaskType } from './types.js';

export interface PerformanceSample {
  success: boolean;
  latencyMs: number;
  score?: number;
}

export interface PerformanceEntry<S extends string> {
  subject: S;
  taskType: TaskType;
  record: Readonly<PerformanceRecord>;
}

export function streamingMean(previous: number, count: number, value: number): number {
  return (previous * (count - 1) + value) / count;
}

export function emptyRecord(): PerformanceRecord {
  return {
    avgScore: 0,
    avgLatencyMs: 0,
    successRate: 0,
    sampleCount: 0,
    scoreSampleCount: 0,
    lastUsed: 0,
  };
}

export class PerformanceStore<S extends string = string> {
  private readonly records = new Map<S, Map<TaskType, PerformanceRecord>>();

  record(subject: S, taskType: TaskType, sample: PerformanceSample, now: number = Date.now()): Readonly<PerformanceRecord> {
    let byTask = this.records.get(subject);
    if (!byTask) {
      byTask = new Map();
      this.records.set(subject, byTask);
    }

    let record = byTask.get(taskType);
    if (!record) {
      record = emptyRecord();
      byTask.set(taskType, record);
    }

    record.sampleCount++;
    const n = record.sampleCount;
    record.successRate = streamingMean(record.successRate, n, sample.success ? 1 : 0);
    record.avgLatencyMs = streamingMean(record.avgLatencyMs, n, sample.latencyMs);

    // Scores have their own divisor so unscored samples do not dilute the mean
    if (sample.score !== undefined) {
      record.scoreSampleCount++;
      record.avgScore = streamingMean(record.avgScore, record.scoreSampleCount, sample.score);
    }

    record.lastUsed = now;
    return record;
  }

  get(subject: S, taskType: TaskType): Readonly<PerformanceRecord> | undefined {
    return this.records.get(subject)?.get(taskType);
  }

  forTaskType(taskType: TaskType): PerformanceEntry<S>[] {
    const entries: PerformanceEntry<S>[] = [];
    for (const [subject, byTask] of this.records) {
      const record = byTask.get(taskType);
      if (record) {
        entries.push({ subject, taskType, record });
      }
    }
    return entries;
  }

  entries(): PerformanceEntry<S>[] {
    const entries: PerformanceEntry<S>[] = [];
    for (const [subject, byTask] of this.records) {
      for (const [taskType, record] of byTask) {
        entries.push({ subject, taskType, record });
      }
    }
    return entries;
  }

  subjectCount(): number {
    return this.records.size;
  }

  taskTypes(): Set<TaskType> {
    const types = new Set<TaskType>();
    for (const byTask of this.records.values()) {
      for (const taskType of byTask.keys()) {
        types.add(taskType);
      }
    }
    return types;
  }

  totalSamples(): number {
    let total = 0;
    for (const { record } of this.entries()) {
      total += record.sampleCount;
    }
    return total;
  }

  get size(): number {
    let size = 0;
    for (const byTask of this.records.values()) {
      size += byTask.size;
    }
    return size;
  }

  clear(): void {
    this.records.clear();
  }
}
