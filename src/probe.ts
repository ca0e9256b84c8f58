import { EpsonPrinterClient, FetchLike } from './epson-client';
import type { AppLogger } from './logger';

export const DEFAULT_STATUS_PATH = '/PRESENTATION/HTML/TOP/PRTINFO.HTML';

export class CannotConnectError extends Error {
  readonly code = 'CANNOT_CONNECT';

  constructor(readonly resource: string) {
    super(`Unable to load the printer status page at ${resource}`);
    this.name = 'CannotConnectError';
  }
}

export interface ProbeInput {
  host: string;
  path?: string;
}

export interface ProbeResult {
  title: string;
  name: string;
  model: string;
  macAddress: string | null;
}

export interface ProbeDeps {
  logger: AppLogger;
  timeoutMs?: number;
  fetch?: FetchLike;
}

// Connection check used before a printer is configured.
export async function probePrinter(input: ProbeInput, deps: ProbeDeps): Promise<ProbeResult> {
  const client = new EpsonPrinterClient({
    host: input.host,
    path: input.path ?? DEFAULT_STATUS_PATH,
    logger: deps.logger,
    timeoutMs: deps.timeoutMs,
    fetch: deps.fetch
  });

  const ok = await client.update();
  if (!ok) {
    throw new CannotConnectError(client.resource);
  }

  return {
    title: `Epson WorkForce Printer (${input.host})`,
    name: client.deviceName ?? client.model,
    model: client.model,
    macAddress: client.macAddress
  };
}
