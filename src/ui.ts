import type { ReadingListResult } from './readings';
import type { DeviceInfo, SensorState } from './sensors';
import { escapeHtml, formatDisplayTime, formatPercent } from './utils';

function renderLayout(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Epson Monitor</title>
  <link rel="stylesheet" href="/static/styles.css" />
</head>
<body>
  <div class="page">
    <header class="top-bar">
      <div class="brand">
        <div>
          <p class="eyebrow">Printer Status Monitor</p>
          <h1>${escapeHtml(title)}</h1>
        </div>
      </div>
      <nav class="nav">
        <a href="/" class="nav-link">Sensors</a>
        <a href="/history" class="nav-link">History</a>
      </nav>
    </header>
    <main class="content">
      ${body}
    </main>
  </div>
</body>
</html>`;
}

function renderValue(sensor: SensorState): string {
  if (!sensor.available || sensor.value === null) {
    return '<span class="chip unavailable">unavailable</span>';
  }
  if (typeof sensor.value === 'number') {
    const level = Math.max(0, Math.min(100, sensor.value));
    return `<div class="level"><div class="level-bar" style="width: ${level}%"></div></div>
          <span class="level-value">${escapeHtml(formatPercent(sensor.value))}</span>`;
  }
  return escapeHtml(sensor.value);
}

export function renderHome(options: {
  device: DeviceInfo;
  available: boolean;
  sensors: SensorState[];
  lastUpdated?: string;
}): string {
  const rows = options.sensors
    .map(
      (sensor) => `<tr>
        <td>${escapeHtml(sensor.name)}</td>
        <td>${renderValue(sensor)}</td>
        <td><code>${escapeHtml(sensor.uniqueId)}</code></td>
      </tr>`
    )
    .join('');

  const mac = options.device.connections?.[0]?.[1];
  const availability = options.available ? 'available' : 'unavailable';

  const body = `
    <section class="card">
      <div class="status-row">
        <div class="status">
          <span class="status-label">Printer</span>
          <span class="badge ${availability}">${availability}</span>
        </div>
        <div class="status">
          <span class="status-label">Model</span>
          <span class="badge">${escapeHtml(options.device.model)}</span>
        </div>
        ${mac ? `<div class="status"><span class="status-label">MAC</span><span class="badge">${escapeHtml(mac)}</span></div>` : ''}
      </div>
      <p class="hint">${options.lastUpdated ? `Last reading ${escapeHtml(formatDisplayTime(options.lastUpdated))}` : 'No readings yet.'}</p>
    </section>

    <section class="card">
      <div class="table-wrap">
        <table id="sensor-table">
          <thead>
            <tr>
              <th>Sensor</th>
              <th>Value</th>
              <th>Entity</th>
            </tr>
          </thead>
          <tbody>
            ${rows || '<tr><td colspan="3">No sensors monitored.</td></tr>'}
          </tbody>
        </table>
      </div>
    </section>
  `;

  return renderLayout(options.device.name, body);
}

export function renderHistory(data: ReadingListResult): string {
  const rows = data.items
    .map((reading) => {
      const inks = Object.entries(reading.inks)
        .map(([label, level]) => `${escapeHtml(label)} ${level}%`)
        .join(', ');
      return `<tr>
        <td>${escapeHtml(formatDisplayTime(reading.createdAt))}</td>
        <td>${escapeHtml(reading.printerStatus ?? 'Unknown')}</td>
        <td>${inks || '-'}</td>
        <td>${escapeHtml(formatPercent(reading.maintenanceBox))}</td>
      </tr>`;
    })
    .join('');

  const totalPages = Math.max(1, Math.ceil(data.total / data.pageSize));
  const prevPage = Math.max(1, data.page - 1);
  const nextPage = Math.min(totalPages, data.page + 1);

  const body = `
    <section class="card">
      <div class="table-wrap">
        <table id="history-table">
          <thead>
            <tr>
              <th>Time</th>
              <th>Status</th>
              <th>Ink levels</th>
              <th>Maintenance box</th>
            </tr>
          </thead>
          <tbody>
            ${rows || '<tr><td colspan="4">No readings yet.</td></tr>'}
          </tbody>
        </table>
      </div>
      <div class="pager">
        <a class="text-link" href="/history?page=${prevPage}&pageSize=${data.pageSize}">Prev</a>
        <span>Page ${data.page} of ${totalPages}</span>
        <a class="text-link" href="/history?page=${nextPage}&pageSize=${data.pageSize}">Next</a>
      </div>
    </section>
  `;

  return renderLayout('History', body);
}
