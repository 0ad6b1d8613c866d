import { z } from 'zod';
import { Culture } from '../../../shared/i18n/cultures';

export const REPORT_KINDS = ['collections', 'sales'] as const;
export type ReportKind = (typeof REPORT_KINDS)[number];

export const REPORT_FORMATS = ['xlsx', 'pdf'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export type ReportColumnType = 'date' | 'text' | 'number';

export interface ReportColumn {
  key: string;
  header: string;
  type: ReportColumnType;
  width?: number;
}

export type ReportCell = string | number | null;

/**
 * A plain grid: one header row, data rows in column order, one totals row.
 */
export interface TabularReport {
  kind: ReportKind;
  title: string;
  culture: Culture;
  from: string;
  to: string;
  columns: ReportColumn[];
  rows: ReportCell[][];
  totals: ReportCell[];
}

export interface ReportRange {
  from: string;
  to: string;
}

export const reportKindSchema = z.enum(REPORT_KINDS);

export function reportFileName(kind: ReportKind, range: ReportRange, extension: string): string {
  return `${kind}_${range.from}_${range.to}.${extension}`;
}
