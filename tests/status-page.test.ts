import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { cleanStatus, parseStatusPage } from '../src/status-page';

function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');
}

function page(body: string, head = ''): string {
  return `<html><head>${head}</head><body>${body}</body></html>`;
}

describe('parseStatusPage', () => {
  it('parses the fieldset layout with network tables', () => {
    const data = parseStatusPage(readFixture('fieldset-layout.html'), 'fieldset-layout.html');

    expect(data.source).toBe('fieldset-layout.html');
    expect(data.model).toBe('Epson WF-3999 Series');
    expect(data.printerStatus).toBe('Available');
    expect(data.scannerStatus).toBe('Available');
    expect(data.inks).toEqual({ BK: 26, C: 100, M: 52, Y: 48 });
    expect(data.maintenanceBox).toBe(70);
    expect(data.network).toEqual({
      'Device Name': 'EPSONA1B2C3',
      'Connection Status': 'Wi-Fi',
      'Signal Strength': 'Excellent',
      SSID: 'test-network',
      'IP Address': '192.168.1.50',
      'MAC Address': '00:11:22:33:44:55'
    });
    expect(data.wifiDirect).toEqual({ 'Connection Method': 'Not Set' });
    expect(data.macAddress).toBe('00:11:22:33:44:55');
    expect(data.deviceName).toBe('EPSONA1B2C3');
    expect(data.ipAddress).toBe('192.168.1.50');
  });

  it('parses the information layout with inline style bars', () => {
    const data = parseStatusPage(readFixture('information-layout.html'));

    expect(data.source).toBe('Epson ET-9999 Series');
    expect(data.model).toBe('Epson ET-9999 Series');
    expect(data.printerStatus).toBe('Verfügbar');
    expect(data.scannerStatus).toBeNull();
    expect(data.inks).toEqual({ BK: 44, C: 56, M: 54, Y: 38 });
    expect(data.maintenanceBox).toBe(30);
    expect(data.network).toEqual({});
    expect(data.wifiDirect).toBeNull();
    expect(data.macAddress).toBe('66:77:88:99:AA:BB');
    expect(data.deviceName).toBeNull();
    expect(data.ipAddress).toBeNull();
  });

  it('returns empty values for an unrelated page', () => {
    const data = parseStatusPage(page('<div>Some other content</div>'));

    expect(data.source).toBeNull();
    expect(data.model).toBeNull();
    expect(data.printerStatus).toBeNull();
    expect(data.inks).toEqual({});
    expect(data.maintenanceBox).toBeNull();
    expect(data.macAddress).toBeNull();
  });
});

describe('printer status', () => {
  it.each([
    ['Available.', 'Available'],
    ['Ready', 'Ready'],
    ['Paper jam.', 'Paper jam'],
    ['Printer cover is open. Close.', 'Printer cover is open. Close'],
    ['Paper out. Load paper in tray.', 'Paper out. Load paper in tray.'],
    [
      'This is a very long status message that exceeds thirty characters.',
      'This is a very long status message that exceeds thirty characters.'
    ]
  ])('reads %j from the fieldset list', (raw, expected) => {
    const html = page(`<fieldset id="PRT_STATUS"><ul>${raw}</ul></fieldset>`);
    expect(parseStatusPage(html).printerStatus).toBe(expected);
  });

  it('reads the fieldset text when the list is missing', () => {
    const html = page('<fieldset id="PRT_STATUS"><legend>Printer Status</legend>Printing.</fieldset>');
    expect(parseStatusPage(html).printerStatus).toBe('Printing');
  });

  it('falls back to the information span inside p.clearfix', () => {
    const html = page('<div class="information"><p class="clearfix"><span>Available.</span></p></div>');
    expect(parseStatusPage(html).printerStatus).toBe('Available');
  });

  it('falls back to any span inside the information div', () => {
    const html = page('<div class="information"><span>Ready</span></div>');
    expect(parseStatusPage(html).printerStatus).toBe('Ready');
  });

  it('only reads spans from the first p.clearfix', () => {
    const html = page(
      '<div class="information"><p class="clearfix">Idle</p><span>Ready.</span>' +
        '<p class="clearfix"><span>Printing.</span></p></div>'
    );
    expect(parseStatusPage(html).printerStatus).toBe('Ready');
  });

  it('takes the first span when several are present', () => {
    const html = page(
      '<div class="information"><p class="clearfix"><span>Printing.</span><span>Page 1 of 5</span></p></div>'
    );
    expect(parseStatusPage(html).printerStatus).toBe('Printing');
  });

  it('prefers the fieldset over the information div', () => {
    const html = page(
      '<fieldset id="PRT_STATUS"><ul>Primary Status</ul></fieldset>' +
        '<div class="information"><p class="clearfix"><span>Fallback Status</span></p></div>'
    );
    expect(parseStatusPage(html).printerStatus).toBe('Primary Status');
  });

  it('falls through an empty fieldset', () => {
    const html = page(
      '<fieldset id="PRT_STATUS"></fieldset><div class="information"><span>Fallback Works</span></div>'
    );
    expect(parseStatusPage(html).printerStatus).toBe('Fallback Works');
  });

  it.each([
    ['<fieldset id="PRT_STATUS"><ul></ul></fieldset>'],
    ['<fieldset id="PRT_STATUS"><ul>   </ul></fieldset>'],
    ['<div class="information"><p class="clearfix"><span></span></p></div>'],
    ['<div class="information"><span>   </span></div>'],
    ['<div class="information"><p>No span here</p></div>']
  ])('is null for %s', (body) => {
    expect(parseStatusPage(page(body)).printerStatus).toBeNull();
  });
});

describe('cleanStatus', () => {
  it('strips a leading status label', () => {
    expect(cleanStatus('Printer Status: Available.')).toBe('Available');
    expect(cleanStatus('scanner status - Busy')).toBe('Busy');
  });

  it('returns null for empty input', () => {
    expect(cleanStatus(undefined)).toBeNull();
    expect(cleanStatus('')).toBeNull();
    expect(cleanStatus('  ')).toBeNull();
  });
});

describe('tank levels', () => {
  const tank = (label: string, bar: string) =>
    `<li class="tank"><div class="clrname">${label}</div><div class="tank">${bar}</div></li>`;

  it('doubles the height attribute of the bar child', () => {
    const html = page(
      `<ul>${tank('BK', '<div height="45"></div>')}${tank('C', '<div height="30"></div>')}` +
        `${tank('M', '<div height="25"></div>')}${tank('Y', '<div height="40"></div>')}</ul>`
    );
    expect(parseStatusPage(html).inks).toEqual({ BK: 90, C: 60, M: 50, Y: 80 });
  });

  it('reads photo inks and upper-cases labels', () => {
    const html = page(
      `<ul>${tank('PB', '<div height="35"></div>')}${tank('lc', '<div height="20"></div>')}` +
        `${tank('LM', '<div height="15"></div>')}${tank('GY', '<div height="22"></div>')}</ul>`
    );
    expect(parseStatusPage(html).inks).toEqual({ PB: 70, LC: 40, LM: 30, GY: 44 });
  });

  it('prefers img.color over other images', () => {
    const html = page(`<ul>${tank('BK', '<img src="frame.png" height="50"><img class="color" height="12">')}</ul>`);
    expect(parseStatusPage(html).inks).toEqual({ BK: 24 });
  });

  it('clamps levels to 100', () => {
    const html = page(`<ul>${tank('Y', '<div height="60"></div>')}</ul>`);
    expect(parseStatusPage(html).inks).toEqual({ Y: 100 });
  });

  it('reads the waste tank from the mbicn row', () => {
    const html = page(
      '<ul><li class="tank"><div class="mbicn">Waste</div><div class="tank"><div height="10"></div></div></li></ul>'
    );
    const data = parseStatusPage(html);
    expect(data.maintenanceBox).toBe(20);
    expect(data.inks).toEqual({});
  });

  it('skips tanks without a bar height', () => {
    const html = page(`<ul>${tank('BK', '<div></div>')}<li class="tank"><div class="clrname">C</div></li></ul>`);
    expect(parseStatusPage(html).inks).toEqual({});
  });
});

describe('device details', () => {
  it('reads the model from the title and a labelled MAC address', () => {
    const data = parseStatusPage(
      page('<div><p>MAC Address: 12:34:56:78:90:AB</p></div>', '<title>ET-1234 Series</title>')
    );
    expect(data.model).toBe('Epson ET-1234 Series');
    expect(data.macAddress).toBe('12:34:56:78:90:AB');
  });

  it('reads a MAC address with a spaced colon', () => {
    const data = parseStatusPage(
      page(
        `<div>
          Some text
          MAC Address : AA:BB:CC:DD:EE:FF
          More text
        </div>`,
        '<title>WF-1234 Series</title>'
      )
    );
    expect(data.model).toBe('Epson WF-1234 Series');
    expect(data.macAddress).toBe('AA:BB:CC:DD:EE:FF');
  });

  it('reads a labelled MAC address from a single-line page', () => {
    const data = parseStatusPage(
      '<html><head><title>ET-1234 Series</title></head><body><p>MAC Address: 12:34:56:78:90:AB</p>' +
        '<p>IP Address: 192.168.1.9</p></body></html>'
    );
    expect(data.macAddress).toBe('12:34:56:78:90:AB');
  });
});
