import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { collapseWhitespace } from './utils';

// Statuses shorter than this lose a trailing period ("Available." -> "Available").
export const MAX_STATUS_LENGTH = 30;

export interface StatusPageData {
  source: string | null;
  model: string | null;
  printerStatus: string | null;
  scannerStatus: string | null;
  inks: Record<string, number>;
  maintenanceBox: number | null;
  network: Record<string, string>;
  wifiDirect: Record<string, string> | null;
  macAddress: string | null;
  deviceName: string | null;
  ipAddress: string | null;
}

interface TankLevels {
  inks: Record<string, number>;
  maintenanceBox: number | null;
}

const STATUS_LABEL = /^(?:printer|scanner)\s+status\s*[:-]?\s*/i;
const MAC_PATTERN = /\b(?:[0-9A-F]{2}:){5}[0-9A-F]{2}\b/i;
const LABELLED_MAC_PATTERN = /MAC Address\s*:?\s*((?:[0-9A-F]{2}:){5}[0-9A-F]{2})/i;
const STYLE_HEIGHT = /height\s*:\s*(\d+)/i;

export function parseStatusPage(html: string, source?: string): StatusPageData {
  const $ = cheerio.load(html);
  const model = parseModel($);
  const { inks, maintenanceBox } = parseTanks($);
  const network = parseKeyValueTable($, 'info-network');
  const wifiDirect = parseKeyValueTable($, 'info-wfd');

  return {
    source: source || model,
    model,
    printerStatus: parsePrinterStatus($),
    scannerStatus: parseFieldsetStatus($, 'SCN_STATUS'),
    inks,
    maintenanceBox,
    network,
    wifiDirect: Object.keys(wifiDirect).length > 0 ? wifiDirect : null,
    macAddress: network['MAC Address'] || extractMacAddress($),
    deviceName: network['Device Name'] || null,
    ipAddress: network['IP Address'] || null
  };
}

export function cleanStatus(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  let status = value.trim().replace(STATUS_LABEL, '');
  if (status.length < MAX_STATUS_LENGTH && status.endsWith('.')) {
    status = status.slice(0, -1);
  }
  return status.length > 0 ? status : null;
}

function parseModel($: CheerioAPI): string | null {
  const title = $('title').first().text().trim();
  if (title) {
    return `Epson ${title}`;
  }
  const header = $('span.header').first().text().trim();
  if (header) {
    return `Epson ${header}`;
  }
  return null;
}

/**
 * Newer firmware renders `<fieldset id="PRT_STATUS"><ul>...</ul></fieldset>`;
 * older pages only have `<div class="information"><p class="clearfix"><span>`.
 */
function parsePrinterStatus($: CheerioAPI): string | null {
  return parseFieldsetStatus($, 'PRT_STATUS') ?? parseInformationStatus($);
}

function parseFieldsetStatus($: CheerioAPI, id: string): string | null {
  const fieldset = $(`fieldset#${id}`).first();
  if (fieldset.length === 0) {
    return null;
  }
  const list = fieldset.find('ul').first();
  const text = list.length > 0 ? list.text() : fieldset.text();
  return cleanStatus(collapseWhitespace(text));
}

function parseInformationStatus($: CheerioAPI): string | null {
  const info = $('div.information').first();
  if (info.length === 0) {
    return null;
  }
  let span = info.find('p.clearfix').first().find('span').first();
  if (span.length === 0) {
    span = info.find('span').first();
  }
  if (span.length === 0) {
    return null;
  }
  return cleanStatus(collapseWhitespace(span.text()));
}

function parseTanks($: CheerioAPI): TankLevels {
  const inks: Record<string, number> = {};
  let maintenanceBox: number | null = null;

  $('li.tank').each((_, element) => {
    const tank = $(element);
    const height = barHeight($, tank);
    if (height === null) {
      return;
    }
    const level = Math.max(0, Math.min(100, height * 2));

    if (tank.find('div.mbicn').length > 0) {
      maintenanceBox = level;
      return;
    }

    const label = tank
      .find('div.clrname')
      .toArray()
      .map((div) => $(div).text().trim())
      .find((text) => text.length > 0);
    if (label) {
      inks[label.toUpperCase()] = level;
    }
  });

  return { inks, maintenanceBox };
}

function barHeight($: CheerioAPI, tank: Cheerio<Element>): number | null {
  const bar = tank.find('div.tank').first();
  if (bar.length === 0) {
    return null;
  }

  const colored = bar.find('img.color').first();
  const image = colored.length > 0 ? colored : bar.find('img').first();
  if (image.length > 0) {
    const fromImage = heightAttribute(image) ?? styleHeight(image);
    if (fromImage !== null) {
      return fromImage;
    }
  }

  const descendants = bar.find('*').toArray().map((node) => $(node));
  for (const node of descendants) {
    const fromAttribute = heightAttribute(node);
    if (fromAttribute !== null) {
      return fromAttribute;
    }
  }
  for (const node of descendants) {
    const fromStyle = styleHeight(node);
    if (fromStyle !== null) {
      return fromStyle;
    }
  }
  return null;
}

function heightAttribute(node: Cheerio<Element>): number | null {
  const value = node.attr('height')?.trim();
  return value && /^\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

function styleHeight(node: Cheerio<Element>): number | null {
  const match = node.attr('style')?.match(STYLE_HEIGHT);
  return match ? Number.parseInt(match[1], 10) : null;
}

function parseKeyValueTable($: CheerioAPI, containerId: string): Record<string, string> {
  const data: Record<string, string> = {};
  $(`[id="${containerId}"] tr`).each((_, row) => {
    const keyCell = $(row).find('td.item-key').first();
    const valueCell = $(row).find('td.item-value').first();
    if (keyCell.length === 0 || valueCell.length === 0) {
      return;
    }
    const key = cleanKey(keyCell.text());
    if (key) {
      data[key] = collapseWhitespace(valueCell.text());
    }
  });
  return data;
}

function cleanKey(text: string): string {
  return collapseWhitespace(text).replace(/\s*:$/, '').trim();
}

function extractMacAddress($: CheerioAPI): string | null {
  const text = $.root().text();
  return text.match(LABELLED_MAC_PATTERN)?.[1] ?? text.match(MAC_PATTERN)?.[0] ?? null;
}
