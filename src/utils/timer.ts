/**
 * Pipeline Timer
 * Records how long each SOP pipeline stage and repeated operation takes
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'timer' });

/** Operations slower than this are logged individually */
const DEFAULT_SLOW_THRESHOLD_MS = 1000;

/** Model calls are always logged */
const ALWAYS_LOGGED_OPERATIONS = new Set(['gemini_generate']);

interface TimingEntry {
  name: string;
  startTime: number;
  durationMs?: number;
}

export interface StageTiming {
  stage: string;
  durationMs: number;
  durationFormatted: string;
}

export interface OperationSummary {
  name: string;
  count: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export interface PipelineSummary {
  runId: string;
  totalDurationMs: number;
  totalDurationFormatted: string;
  stages: StageTiming[];
  operationTotals: OperationSummary[];
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

export class PipelineTimer {
  private readonly pipelineStart = Date.now();
  private currentStage: TimingEntry | null = null;
  private readonly stages: TimingEntry[] = [];
  private readonly operations = new Map<string, number[]>();

  constructor(
    private readonly runId: string,
    private readonly slowThresholdMs = DEFAULT_SLOW_THRESHOLD_MS
  ) {
    logger.debug({ runId }, 'Pipeline timer started');
  }

  /**
   * Start a stage, ending the previous one
   */
  startStage(name: string): void {
    this.endStage();
    this.currentStage = { name, startTime: Date.now() };
    this.stages.push(this.currentStage);
    logger.info({ runId: this.runId, stage: name }, `Stage started: ${name}`);
  }

  endStage(): void {
    const stage = this.currentStage;
    if (!stage) return;

    stage.durationMs = Date.now() - stage.startTime;
    this.currentStage = null;
    logger.info(
      { runId: this.runId, stage: stage.name, durationMs: stage.durationMs },
      `Stage completed: ${stage.name} (${formatDuration(stage.durationMs)})`
    );
  }

  /**
   * Time an async operation. The duration is recorded even if it throws.
   */
  async timeOperation<T>(name: string, operation: () => Promise<T>, metadata?: Record<string, unknown>): Promise<T> {
    const startTime = Date.now();
    try {
      return await operation();
    } finally {
      const durationMs = Date.now() - startTime;
      const durations = this.operations.get(name);
      if (durations) {
        durations.push(durationMs);
      } else {
        this.operations.set(name, [durationMs]);
      }

      if (durationMs > this.slowThresholdMs || ALWAYS_LOGGED_OPERATIONS.has(name)) {
        logger.debug(
          { runId: this.runId, operation: name, durationMs, ...metadata },
          `${name}: ${formatDuration(durationMs)}`
        );
      }
    }
  }

  getSummary(): PipelineSummary {
    this.endStage();
    const totalDurationMs = Date.now() - this.pipelineStart;

    const stages = this.stages
      .filter((s): s is TimingEntry & { durationMs: number } => s.durationMs !== undefined)
      .map((s) => ({
        stage: s.name,
        durationMs: s.durationMs,
        durationFormatted: formatDuration(s.durationMs),
      }));

    const operationTotals = [...this.operations].map(([name, durations]): OperationSummary => {
      const totalMs = durations.reduce((a, b) => a + b, 0);
      return {
        name,
        count: durations.length,
        totalMs,
        avgMs: Math.round(totalMs / durations.length),
        minMs: Math.min(...durations),
        maxMs: Math.max(...durations),
      };
    });
    operationTotals.sort((a, b) => b.totalMs - a.totalMs);

    return {
      runId: this.runId,
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      stages,
      operationTotals,
    };
  }

  logSummary(): PipelineSummary {
    const summary = this.getSummary();
    const breakdown = summary.stages.map((s) => `${s.stage}: ${s.durationFormatted}`).join(' | ');

    logger.info(
      { runId: this.runId, totalDurationMs: summary.totalDurationMs, operations: summary.operationTotals },
      `Pipeline completed in ${summary.totalDurationFormatted} (${breakdown})`
    );
    return summary;
  }
}
