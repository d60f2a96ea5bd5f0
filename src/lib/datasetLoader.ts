/**
 * Dataset loader
 *
 * Reads the dashboard's CSV extracts into in-memory tables:
 * - the primary monthly aggregate table is mandatory
 * - every other dataset is optional and comes back as `null` when absent
 * - raw reads are memoized for the process, keyed by file identity
 */

import fs from 'fs';
import path from 'path';
import * as Papa from 'papaparse';
import { APP_CONFIG, DATASET_FILES, DatasetKey } from './config';
import { getDatasetCache } from './datasetCache';
import { FatalConfigurationError } from './errors';
import { CATEGORICAL_COLUMNS, COUPON_COLUMN } from './filterEngine';
import { getLogger } from './logger';
import { cellOf, makeTable } from './table';
import { CellValue, Row, Table } from '../types/dashboard';

const log = getLogger('datasetLoader');

export interface BaseTables {
  primary: Table;
  rfmCustomers: Table | null;
  rfmTargets: Table | null;
  skuSummary: Table | null;
  skuRules: Table | null;
  missingProfile: Table | null;
  outlierProfile: Table | null;
  auditTopOrders: Table | null;
}

// ─── Cell coercion ────────────────────────────────────────────────────────────

const MISSING_TOKENS = new Set(['', 'nan', 'NaN', 'NA', 'N/A', '<NA>', 'null', 'NULL', 'None']);
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const BOOLEAN_PATTERN = /^(true|false)$/i;

export function coerceCell(raw: string | undefined): CellValue {
  if (raw === undefined) return null;
  const text = raw.trim();
  if (MISSING_TOKENS.has(text)) return null;
  if (BOOLEAN_PATTERN.test(text)) return text.toLowerCase() === 'true';
  if (NUMBER_PATTERN.test(text)) return Number(text);
  return raw;
}

export function parseCsv(text: string, source = 'inline'): Table {
  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  for (const err of result.errors) {
    log.warn('CSV parse issue', { source, row: err.row, code: err.code, message: err.message });
  }

  const columns = (result.meta.fields ?? []).filter((f) => f.length > 0);
  const rows = result.data.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const col of columns) row[col] = coerceCell(record[col]);
    return row;
  });

  return makeTable(columns, rows);
}

// ─── File access ──────────────────────────────────────────────────────────────

export function readTable(filePath: string): Table {
  const abs = path.resolve(filePath);
  const stat = fs.statSync(abs);
  const identity = `${abs}:${stat.size}:${stat.mtimeMs}`;
  const cache = getDatasetCache();

  if (!cache.has(identity)) {
    const evicted = cache.deleteByPrefix(`${abs}:`);
    if (evicted > 0) log.info('Dataset changed on disk', { file: path.basename(abs), evicted });
  }

  return cache.getOrSet(identity, () => {
    const table = parseCsv(fs.readFileSync(abs, 'utf8'), path.basename(abs));
    log.info('Dataset loaded', { file: path.basename(abs), rows: table.rows.length, columns: table.columns.length });
    return table;
  });
}

export function loadOptional(dataDir: string, key: DatasetKey): Table | null {
  const file = path.join(dataDir, DATASET_FILES[key]);
  if (!fs.existsSync(file)) {
    log.info('Optional dataset not found', { dataset: key, file: DATASET_FILES[key] });
    return null;
  }
  return readTable(file);
}

// ─── Primary table preparation ────────────────────────────────────────────────

const DIMENSION_COLUMNS: readonly string[] = Object.values(CATEGORICAL_COLUMNS).filter(
  (c) => c !== CATEGORICAL_COLUMNS.campaignType,
);

function normalizeDimension(value: CellValue): CellValue {
  return value === null ? null : String(value);
}

function normalizeCampaignType(value: CellValue): CellValue {
  if (value === null) return null;
  const text = String(value).trim();
  return /^no coupon$/i.test(text) ? 'No campaign' : text;
}

/** `true`/`false`, `1`/`0` and their text forms; anything else is missing. */
export function normalizeCouponFlag(value: CellValue): CellValue {
  if (typeof value === 'boolean') return value;
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (text === 'true' || text === '1') return true;
    if (text === 'false' || text === '0') return false;
  }
  return null;
}

/**
 * Returns a copy ready for filtering: the time key and the dimension columns
 * hold strings, campaign labels are trimmed with "No coupon" renamed to
 * "No campaign", and the coupon flag is a boolean.
 */
export function preparePrimaryTable(table: Table): Table {
  const present = (c: string): boolean => table.columns.includes(c);
  const stringColumns = [APP_CONFIG.timeColumn, ...DIMENSION_COLUMNS].filter(present);
  const hasCampaign = present(CATEGORICAL_COLUMNS.campaignType);
  const hasCoupon = present(COUPON_COLUMN);

  const rows = table.rows.map((row): Row => {
    const out: Record<string, CellValue> = { ...row };
    for (const c of stringColumns) out[c] = normalizeDimension(cellOf(row, c));
    if (hasCampaign) {
      out[CATEGORICAL_COLUMNS.campaignType] = normalizeCampaignType(cellOf(row, CATEGORICAL_COLUMNS.campaignType));
    }
    if (hasCoupon) out[COUPON_COLUMN] = normalizeCouponFlag(cellOf(row, COUPON_COLUMN));
    return out;
  });
  return makeTable(table.columns, rows);
}

export function loadBaseTables(dataDir: string = APP_CONFIG.dataDir): BaseTables {
  const primaryFile = path.join(dataDir, DATASET_FILES.primary);
  if (!fs.existsSync(primaryFile)) {
    log.error('Primary dataset not found', { file: DATASET_FILES.primary, dataDir });
    throw new FatalConfigurationError(
      `${DATASET_FILES.primary} was not found in ${dataDir}.`,
      DATASET_FILES.primary,
    );
  }

  const tables: BaseTables = {
    primary: preparePrimaryTable(readTable(primaryFile)),
    rfmCustomers: loadOptional(dataDir, 'rfmCustomers'),
    rfmTargets: loadOptional(dataDir, 'rfmTargets'),
    skuSummary: loadOptional(dataDir, 'skuSummary'),
    skuRules: loadOptional(dataDir, 'skuRules'),
    missingProfile: loadOptional(dataDir, 'missingProfile'),
    outlierProfile: loadOptional(dataDir, 'outlierProfile'),
    auditTopOrders: loadOptional(dataDir, 'auditTopOrders'),
  };

  log.info('Base tables ready', {
    dataDir,
    optionalAvailable: Object.entries(tables)
      .filter(([name, t]) => name !== 'primary' && t !== null)
      .map(([name]) => name),
    cache: getDatasetCache().stats(),
  });
  return tables;
}
