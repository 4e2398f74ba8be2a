// =====================================================
// Leaderboard Maintenance
// =====================================================
// Periodic snapshot, optional scheduled rebuild and store health probes.
// One interval drives every task; a tick is skipped while the previous
// one is still running.

import { logger } from '../../utils/logger';
import { LeaderboardService } from './leaderboard.service';

// ===========================================
// Types
// ===========================================

export interface MaintenanceOptions {
  tickMs: number;
  snapshotIntervalMs: number;
  /** 0 disables scheduled rebuilds */
  rebuildIntervalMs: number;
  now?: () => number;
}

export interface TickReport {
  snapshot: 'taken' | 'failed' | 'skipped';
  rebuild: 'done' | 'failed' | 'skipped';
  durableHealthy: boolean;
  rankingHealthy: boolean;
}

// ===========================================
// Maintenance Loop
// ===========================================

export class LeaderboardMaintenance {
  private readonly service: LeaderboardService;
  private readonly options: MaintenanceOptions;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickReport> | null = null;
  private lastSnapshotAt: number | null = null;
  private lastRebuildAt: number;

  constructor(service: LeaderboardService, options: MaintenanceOptions) {
    this.service = service;
    this.options = options;
    this.now = options.now ?? (() => Date.now());
    this.lastRebuildAt = this.now();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      if (this.inFlight) {
        logger.debug('[Maintenance] Previous tick still running, skipping');
        return;
      }
      this.runTick().catch((error: unknown) => {
        logger.error('[Maintenance] Tick failed:', error);
      });
    }, this.options.tickMs);
    this.timer.unref();

    logger.info(`[Maintenance] Started (tick every ${this.options.tickMs}ms)`);
  }

  /**
   * Stops scheduling and waits for a tick that is already running.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('[Maintenance] Stopped');
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Runs one tick now. Concurrent callers share the in-flight tick.
   */
  runTick(): Promise<TickReport> {
    if (!this.inFlight) {
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async tick(): Promise<TickReport> {
    const report: TickReport = {
      snapshot: 'skipped',
      rebuild: 'skipped',
      durableHealthy: false,
      rankingHealthy: false,
    };

    if (this.lastSnapshotAt === null || this.now() - this.lastSnapshotAt >= this.options.snapshotIntervalMs) {
      try {
        await this.service.takeSnapshot();
        this.lastSnapshotAt = this.now();
        report.snapshot = 'taken';
      } catch (error) {
        logger.error('[Maintenance] Snapshot failed:', error);
        report.snapshot = 'failed';
      }
    }

    const { rebuildIntervalMs } = this.options;
    if (rebuildIntervalMs > 0 && this.now() - this.lastRebuildAt >= rebuildIntervalMs) {
      // Measured from the last attempt, successful or not
      this.lastRebuildAt = this.now();
      try {
        await this.service.rebuildLeaderboard();
        report.rebuild = 'done';
      } catch (error) {
        logger.error('[Maintenance] Scheduled rebuild failed:', error);
        report.rebuild = 'failed';
      }
    }

    report.durableHealthy = await this.service.checkDurableHealth();
    report.rankingHealthy = await this.service.checkRankingHealth();

    return report;
  }
}
