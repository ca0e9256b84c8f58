import path from 'node:path';
import crypto from 'node:crypto';
import Fastify from 'fastify';
import type { FastifyInstance, FastifyRequest, FastifyServerOptions } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import fastifyStatic from '@fastify/static';
import type { AppConfig } from './config';
import type { EpsonPrinterClient, FetchLike } from './epson-client';
import type { StatusPoller } from './poller';
import { CannotConnectError, probePrinter } from './probe';
import type { ReadingRepository } from './readings';
import { buildDeviceInfo, isSensorKey, readSensor, readSensors } from './sensors';
import { renderHistory, renderHome } from './ui';

export interface AppDeps {
  config: AppConfig;
  client: EpsonPrinterClient;
  poller: StatusPoller;
  readings: ReadingRepository;
  fetch?: FetchLike;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { config, client, poller, readings } = deps;
  const fastify = Fastify({ logger: deps.logger ?? false });

  await fastify.register(fastifyStatic, {
    root: path.join(process.cwd(), 'public'),
    prefix: '/static/'
  });

  await fastify.register(rateLimit, {
    global: false,
    max: config.rateLimitPerMinute,
    timeWindow: '1 minute'
  });

  const limited = { config: { rateLimit: { max: config.rateLimitPerMinute, timeWindow: '1 minute' } } };

  fastify.addHook('onRequest', async (request, reply) => {
    if (config.requireApiKey && request.url.startsWith('/api')) {
      const provided = getApiKey(request);
      if (!provided || !config.apiKey || !isApiKeyValid(provided, config.apiKey)) {
        reply.code(401);
        return reply.send({ error: 'Unauthorized' });
      }
    }
    return undefined;
  });

  const deviceInfo = () => buildDeviceInfo(config.printerHost, client, config.deviceName);
  const sensors = () => readSensors(client, config.printerHost, config.monitoredConditions);

  fastify.get('/healthz', async () => ({ ok: true }));

  fastify.get('/readyz', async (_request, reply) => {
    if (!client.available) {
      reply.code(503);
      return { ready: false, resource: client.resource };
    }
    return { ready: true, resource: client.resource };
  });

  fastify.get('/', async (_request, reply) => {
    reply.type('text/html');
    return renderHome({
      device: deviceInfo(),
      available: client.available,
      sensors: sensors(),
      lastUpdated: readings.latest()?.createdAt
    });
  });

  fastify.get('/history', async (request, reply) => {
    const { page, pageSize } = parsePagination(request);
    reply.type('text/html');
    return renderHistory(readings.list(page, pageSize));
  });

  fastify.get('/api/status', async () => {
    const latest = readings.latest();
    return {
      resource: client.resource,
      available: client.available,
      device: deviceInfo(),
      deviceName: client.deviceName,
      ipAddress: client.ipAddress,
      macAddress: client.macAddress,
      lastUpdated: latest?.createdAt ?? null
    };
  });

  fastify.get('/api/sensors', async () => ({
    available: client.available,
    sensors: sensors()
  }));

  fastify.get('/api/sensors/:key', async (request, reply) => {
    const { key } = request.params as { key: string };
    if (!isSensorKey(key) || !config.monitoredConditions.includes(key)) {
      reply.code(404);
      return { error: `Sensor ${key} is not monitored` };
    }
    return readSensor(client, config.printerHost, key);
  });

  fastify.post('/api/refresh', limited, async (_request, reply) => {
    try {
      const result = await poller.refresh();
      if (!result.available) {
        reply.code(502);
      }
      return { ...result, sensors: sensors() };
    } catch (error) {
      fastify.log.error({ error }, 'refresh failed');
      reply.code(502);
      return { available: false, error: error instanceof Error ? error.message : String(error) };
    }
  });

  fastify.get('/api/readings', async (request) => {
    const { page, pageSize } = parsePagination(request);
    return readings.list(page, pageSize);
  });

  fastify.post('/api/probe', limited, async (request, reply) => {
    const body = request.body as Record<string, unknown> | undefined;
    const host = typeof body?.host === 'string' ? body.host.trim() : '';
    const statusPath = typeof body?.path === 'string' && body.path.trim().length > 0 ? body.path.trim() : undefined;
    if (!host) {
      reply.code(400);
      return { error: 'host is required' };
    }

    try {
      return await probePrinter(
        { host, path: statusPath },
        { logger: fastify.log, timeoutMs: config.requestTimeoutMs, fetch: deps.fetch }
      );
    } catch (error) {
      if (error instanceof CannotConnectError) {
        reply.code(502);
        return { error: 'cannot_connect', message: error.message };
      }
      throw error;
    }
  });

  return fastify;
}

function parsePagination(request: FastifyRequest): { page: number; pageSize: number } {
  const query = request.query as { page?: string; pageSize?: string };
  const page = Number.parseInt(query.page ?? '1', 10);
  const pageSize = Number.parseInt(query.pageSize ?? '20', 10);
  return {
    page: Number.isFinite(page) && page > 0 ? page : 1,
    pageSize: Number.isFinite(pageSize) && pageSize > 0 ? Math.min(pageSize, 100) : 20
  };
}

function getApiKey(request: FastifyRequest): string | undefined {
  const header = request.headers['x-api-key'];
  if (!header) {
    return undefined;
  }
  if (Array.isArray(header)) {
    return header[0];
  }
  return header;
}

function isApiKeyValid(provided: string, expected: string): boolean {
  const providedBuffer = Buffer.from(provided);
  const expectedBuffer = Buffer.from(expected);
  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return crypto.timingSafeEqual(providedBuffer, expectedBuffer);
}
