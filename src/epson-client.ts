import type { AppLogger } from './logger';
import { parseStatusPage, StatusPageData } from './status-page';
import { withTimeout } from './utils';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface EpsonClientOptions {
  host: string;
  path: string;
  logger: AppLogger;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export const DEFAULT_MODEL = 'WorkForce Printer';
export const UNKNOWN_STATUS = 'Unknown';

const DEFAULT_TIMEOUT_MS = 10_000;

// Sensor key -> colour label printed in the tank's div.clrname.
export const INK_LABELS = {
  black: 'BK',
  photoblack: 'PB',
  magenta: 'M',
  cyan: 'C',
  yellow: 'Y',
  lightcyan: 'LC',
  lightmagenta: 'LM',
  gray: 'GY'
} as const;

export type InkSensorKey = keyof typeof INK_LABELS;

function isInkSensorKey(key: string): key is InkSensorKey {
  return Object.prototype.hasOwnProperty.call(INK_LABELS, key);
}

/**
 * Keeps the most recent scrape of a printer's status page. `update()` never
 * throws; a failed fetch clears the page and marks the client unavailable.
 */
export class EpsonPrinterClient {
  readonly resource: string;
  available = true;
  private page: StatusPageData | null = null;
  private readonly timeoutMs: number;
  private readonly fetchPage: FetchLike;
  private readonly logger: AppLogger;

  constructor(options: EpsonClientOptions) {
    this.resource = `http://${options.host}${options.path}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchPage = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger;
  }

  get model(): string {
    return this.page?.model ?? DEFAULT_MODEL;
  }

  get macAddress(): string | null {
    return this.page?.macAddress ?? null;
  }

  get deviceName(): string | null {
    return this.page?.deviceName ?? null;
  }

  get ipAddress(): string | null {
    return this.page?.ipAddress ?? null;
  }

  snapshot(): StatusPageData | null {
    return this.page;
  }

  async update(): Promise<boolean> {
    const controller = new AbortController();
    try {
      const html = await withTimeout(
        this.download(controller.signal),
        this.timeoutMs,
        `status page request timed out after ${this.timeoutMs}ms`
      );
      this.page = parseStatusPage(html);
      this.available = true;
      return true;
    } catch (error) {
      controller.abort();
      this.page = null;
      this.available = false;
      this.logger.warn(
        { resource: this.resource, error: error instanceof Error ? error.message : String(error) },
        'status page unavailable'
      );
      return false;
    }
  }

  getSensorValue(key: string): number | string | null {
    const page = this.page;
    if (!page) {
      return null;
    }
    if (key === 'printer_status') {
      return page.printerStatus ?? UNKNOWN_STATUS;
    }
    if (key === 'clean') {
      return page.maintenanceBox;
    }
    if (isInkSensorKey(key)) {
      return page.inks[INK_LABELS[key]] ?? null;
    }
    return null;
  }

  private async download(signal: AbortSignal): Promise<string> {
    const response = await this.fetchPage(this.resource, { signal });
    if (!response.ok) {
      throw new Error(`status page responded with HTTP ${response.status}`);
    }
    return response.text();
  }
}
