import type { EpsonPrinterClient } from './epson-client';

export const DOMAIN = 'epson_workforce';

export interface SensorDescription {
  key: string;
  name: string;
  icon: string;
  unit?: string;
}

export const SENSOR_TYPES = [
  { key: 'black', name: 'Ink level Black', icon: 'mdi:water', unit: '%' },
  { key: 'photoblack', name: 'Ink level Photoblack', icon: 'mdi:water', unit: '%' },
  { key: 'magenta', name: 'Ink level Magenta', icon: 'mdi:water', unit: '%' },
  { key: 'cyan', name: 'Ink level Cyan', icon: 'mdi:water', unit: '%' },
  { key: 'yellow', name: 'Ink level Yellow', icon: 'mdi:water', unit: '%' },
  { key: 'lightcyan', name: 'Ink level Light Cyan', icon: 'mdi:water', unit: '%' },
  { key: 'lightmagenta', name: 'Ink level Light Magenta', icon: 'mdi:water', unit: '%' },
  { key: 'gray', name: 'Ink level Gray', icon: 'mdi:water', unit: '%' },
  { key: 'clean', name: 'Cleaning level', icon: 'mdi:water', unit: '%' },
  { key: 'printer_status', name: 'Printer Status', icon: 'mdi:printer' }
] as const satisfies readonly SensorDescription[];

export type SensorKey = (typeof SENSOR_TYPES)[number]['key'];

export const MONITORED_CONDITIONS: SensorKey[] = SENSOR_TYPES.map((description) => description.key);

export function isSensorKey(value: string): value is SensorKey {
  return MONITORED_CONDITIONS.some((key) => key === value);
}

export function getSensorDescription(key: SensorKey): SensorDescription {
  const description = SENSOR_TYPES.find((entry) => entry.key === key);
  if (!description) {
    throw new Error(`Unknown sensor ${key}`);
  }
  return description;
}

export function sensorUniqueId(host: string, key: SensorKey): string {
  const hostClean = host.replace(/[.:]/g, '_');
  return `${DOMAIN}_${hostClean}_${key}`;
}

export interface DeviceInfo {
  identifiers: Array<[string, string]>;
  name: string;
  manufacturer: string;
  model: string;
  connections?: Array<['mac', string]>;
}

export function buildDeviceInfo(host: string, client: EpsonPrinterClient, name?: string): DeviceInfo {
  const info: DeviceInfo = {
    identifiers: [[DOMAIN, host]],
    name: name ?? `Epson WorkForce Printer (${host})`,
    manufacturer: 'Epson',
    model: client.model
  };
  if (client.macAddress) {
    info.connections = [['mac', client.macAddress]];
  }
  return info;
}

export interface SensorState {
  uniqueId: string;
  key: SensorKey;
  name: string;
  icon: string;
  unit: string | null;
  value: number | string | null;
  available: boolean;
}

export function readSensor(client: EpsonPrinterClient, host: string, key: SensorKey): SensorState {
  const description = getSensorDescription(key);
  return {
    uniqueId: sensorUniqueId(host, key),
    key,
    name: description.name,
    icon: description.icon,
    unit: description.unit ?? null,
    value: client.getSensorValue(key),
    available: client.available
  };
}

export function readSensors(client: EpsonPrinterClient, host: string, keys: readonly SensorKey[]): SensorState[] {
  return SENSOR_TYPES.filter((description) => keys.includes(description.key)).map((description) =>
    readSensor(client, host, description.key)
  );
}
