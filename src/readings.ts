import type { Database } from 'better-sqlite3';
import type { StatusPageData } from './status-page';
import { formatIso } from './utils';

export interface ReadingRow {
  id: number;
  created_at: string;
  printer_status: string | null;
  maintenance_box: number | null;
  inks: string;
  snapshot: string;
}

export interface Reading {
  id: number;
  createdAt: string;
  printerStatus: string | null;
  maintenanceBox: number | null;
  inks: Record<string, number>;
}

export interface ReadingListResult {
  items: Reading[];
  page: number;
  pageSize: number;
  total: number;
}

export interface ReadingRepository {
  insert: (page: StatusPageData, createdAt?: string) => number;
  list: (page: number, pageSize: number) => ReadingListResult;
  latest: () => Reading | undefined;
}

function parseInks(value: string): Record<string, number> {
  const parsed: unknown = JSON.parse(value);
  const inks: Record<string, number> = {};
  if (parsed && typeof parsed === 'object') {
    for (const [label, level] of Object.entries(parsed)) {
      if (typeof level === 'number') {
        inks[label] = level;
      }
    }
  }
  return inks;
}

export function toReading(row: ReadingRow): Reading {
  return {
    id: row.id,
    createdAt: row.created_at,
    printerStatus: row.printer_status,
    maintenanceBox: row.maintenance_box,
    inks: parseInks(row.inks)
  };
}

export function createReadingRepository(db: Database): ReadingRepository {
  const insertStmt = db.prepare(
    'INSERT INTO readings (created_at, printer_status, maintenance_box, inks, snapshot) VALUES (?, ?, ?, ?, ?)'
  );
  const listStmt = db.prepare('SELECT * FROM readings ORDER BY id DESC LIMIT ? OFFSET ?');
  const countStmt = db.prepare('SELECT COUNT(1) as total FROM readings');
  const latestStmt = db.prepare('SELECT * FROM readings ORDER BY id DESC LIMIT 1');

  return {
    insert: (page, createdAt = formatIso()) => {
      const result = insertStmt.run(
        createdAt,
        page.printerStatus,
        page.maintenanceBox,
        JSON.stringify(page.inks),
        JSON.stringify(page)
      );
      return Number(result.lastInsertRowid);
    },
    list: (page, pageSize) => {
      const safePage = Math.max(1, page);
      const safeSize = Math.max(1, pageSize);
      const offset = (safePage - 1) * safeSize;
      const items = (listStmt.all(safeSize, offset) as ReadingRow[]).map(toReading);
      const total = (countStmt.get() as { total: number }).total;
      return { items, page: safePage, pageSize: safeSize, total };
    },
    latest: () => {
      const row = latestStmt.get() as ReadingRow | undefined;
      return row ? toReading(row) : undefined;
    }
  };
}
