import type { EpsonPrinterClient } from './epson-client';
import type { AppLogger } from './logger';
import type { ReadingRepository } from './readings';

export interface PollResult {
  available: boolean;
  readingId?: number;
}

export class StatusPoller {
  private polling = false;
  private pendingRefresh = false;
  private timer: NodeJS.Timeout | undefined;
  private current: Promise<PollResult> | undefined;

  constructor(
    private client: EpsonPrinterClient,
    private readings: ReadingRepository,
    private logger: AppLogger,
    private intervalMs: number
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.trigger();
    }, this.intervalMs);
    this.trigger();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Runs an update now. A call made while an update is in flight resolves with
   * that update's result and schedules exactly one follow-up poll.
   */
  refresh(): Promise<PollResult> {
    if (this.polling && this.current) {
      this.pendingRefresh = true;
      return this.current;
    }
    this.current = this.pollLoop();
    return this.current;
  }

  private trigger(): void {
    this.refresh().catch((error: unknown) => {
      this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'poll failed');
    });
  }

  private async pollLoop(): Promise<PollResult> {
    this.polling = true;
    try {
      return await this.poll();
    } finally {
      this.polling = false;
      if (this.pendingRefresh) {
        this.pendingRefresh = false;
        this.trigger();
      }
    }
  }

  private async poll(): Promise<PollResult> {
    const available = await this.client.update();
    const page = this.client.snapshot();
    if (!available || !page) {
      this.logger.info({ resource: this.client.resource }, 'poll skipped, printer unavailable');
      return { available: false };
    }

    const readingId = this.readings.insert(page);
    this.logger.info(
      { readingId, status: page.printerStatus, inks: page.inks, maintenanceBox: page.maintenanceBox },
      'printer status updated'
    );
    return { available: true, readingId };
  }
}
