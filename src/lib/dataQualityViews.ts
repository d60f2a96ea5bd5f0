import { APP_CONFIG, DATASET_FILES } from './config';
import { topN } from './aggregationLayer';
import { available, missingColumn, missingDataset, unavailable } from './errors';
import { hasColumn, head } from './table';
import { Availability, Cell, Table } from '../types/dashboard';

export interface DataQualityViews {
  missingness: Availability<Table<Cell>>;
  outliers: Availability<Table<Cell>>;
  auditTopOrders: Availability<Table>;
}

function ranked(
  table: Table | null,
  file: string,
  labelColumn: string,
  valueColumn: string,
  limit: number,
): Availability<Table<Cell>> {
  if (!table) return unavailable(missingDataset(file));
  const absent = [labelColumn, valueColumn].filter((c) => !hasColumn(table, c));
  if (absent.length > 0) return unavailable(missingColumn(file, ...absent));
  return available(topN(table, valueColumn, limit, [labelColumn]));
}

/** Columns with the highest share of missing values. */
export function missingnessView(
  profile: Table | null,
  limit: number = APP_CONFIG.topMissingColumns,
): Availability<Table<Cell>> {
  return ranked(profile, DATASET_FILES.missingProfile, 'column_name', 'missing_pct', limit);
}

/** Share of IQR outliers per key metric, highest first. */
export function outlierView(profile: Table | null): Availability<Table<Cell>> {
  return ranked(profile, DATASET_FILES.outlierProfile, 'column', 'pct_outliers_iqr', Infinity);
}

export function auditView(audit: Table | null, limit: number = APP_CONFIG.tablePreviewRows): Availability<Table> {
  if (!audit) return unavailable(missingDataset(DATASET_FILES.auditTopOrders));
  return available(head(audit, limit));
}

export function dataQualityViews(tables: {
  missingProfile: Table | null;
  outlierProfile: Table | null;
  auditTopOrders: Table | null;
}): DataQualityViews {
  return {
    missingness: missingnessView(tables.missingProfile),
    outliers: outlierView(tables.outlierProfile),
    auditTopOrders: auditView(tables.auditTopOrders),
  };
}
