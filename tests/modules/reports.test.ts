import { beforeEach, describe, expect, it } from 'vitest';
import { Container, createContainer } from '../../src/container';
import { TabularReport } from '../../src/modules/reports/domain/tabular-report';
import { ExcelReportRenderer } from '../../src/modules/reports/infra/excel-report.renderer';
import { formatPdfCell, PdfReportRenderer } from '../../src/modules/reports/infra/pdf-report.renderer';
import { ValidationError } from '../../src/shared/errors/validation.error';
import { testConfig } from '../helpers/test-app';
import { setupTestDatabase } from '../helpers/test-database';

const sampleReport: TabularReport = {
  kind: 'sales',
  title: 'Sales',
  culture: 'hi-IN',
  from: '2026-03-01',
  to: '2026-03-31',
  columns: [
    { key: 'date', header: 'Date', type: 'date' },
    { key: 'customer', header: 'Customer', type: 'text' },
    { key: 'due', header: 'Due', type: 'number' },
  ],
  rows: [
    ['2026-03-01', 'Customer X', 123456.5],
    ['2026-03-02', null, 10],
  ],
  totals: ['Total', null, 123466.5],
};

describe('ReportService', () => {
  let container: Container;

  beforeEach(async () => {
    await setupTestDatabase();
    container = createContainer(testConfig);
  });

  it('builds a collection grid joined with farmer and shift names', async () => {
    const base = { farmerId: 1, shiftId: 1, notes: null, createdBy: null };
    await container.collections.create(
      { ...base, date: '2026-03-01', quantityLitres: 10, fatPercent: 4.5, pricePerLitre: 40 },
      'admin'
    );
    await container.collections.create(
      { ...base, date: '2026-03-04', quantityLitres: 2.5, fatPercent: 3.8, pricePerLitre: 38 },
      'admin'
    );
    await container.collections.create(
      { ...base, date: '2026-04-01', quantityLitres: 50, fatPercent: 4, pricePerLitre: 40 },
      'admin'
    );

    const report = await container.reports.build('collections', { from: '2026-03-01', to: '2026-03-31' }, 'en-US');

    expect(report.columns.map((c) => c.header)).toEqual([
      'Date',
      'Farmer code',
      'Farmer',
      'Shift',
      'Litres',
      'Fat %',
      'Rate',
      'Amount',
    ]);
    expect(report.rows).toEqual([
      ['2026-03-01', 'F001', 'Farmer A', 'Morning', 10, 4.5, 40, 400],
      ['2026-03-04', 'F001', 'Farmer A', 'Morning', 2.5, 3.8, 38, 95],
    ]);
    expect(report.totals).toEqual(['Total', null, null, null, 12.5, null, null, 495]);
  });

  it('builds a sales grid with payment totals', async () => {
    await container.sales.create(
      {
        customerId: 1,
        shiftId: null,
        date: '2026-03-10',
        quantityLitres: 4,
        unitPrice: 55,
        discount: 5,
        paidAmount: 100,
        createdBy: null,
      },
      'admin'
    );

    const report = await container.reports.build('sales', { from: '2026-03-01', to: '2026-03-31' }, 'en-US');

    expect(report.rows).toEqual([['2026-03-10', 'Customer X', null, 4, 55, 5, 100, 115]]);
    expect(report.totals).toEqual(['Total', null, null, 4, null, 5, 100, 115]);
  });

  it('rejects an inverted range', async () => {
    await expect(
      container.reports.build('sales', { from: '2026-03-31', to: '2026-03-01' }, 'en-US')
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('ExcelReportRenderer', () => {
  it('lays out header, rows and a bold totals row', () => {
    const workbook = new ExcelReportRenderer().buildWorkbook(sampleReport);
    const sheet = workbook.getWorksheet('sales');

    expect(sheet).toBeDefined();
    expect(sheet?.rowCount).toBe(4);
    expect(sheet?.getRow(1).getCell(1).value).toBe('Date');
    expect(sheet?.getRow(2).getCell(2).value).toBe('Customer X');
    expect(sheet?.getRow(2).getCell(3).value).toBe(123456.5);
    expect(sheet?.getRow(4).getCell(3).value).toBe(123466.5);
    expect(sheet?.getRow(4).font?.bold).toBe(true);
  });

  it('renders an xlsx (zip) buffer', async () => {
    const buffer = await new ExcelReportRenderer().render(sampleReport);
    expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});

describe('PdfReportRenderer', () => {
  it('formats numeric cells for the report culture', () => {
    const [, , due] = sampleReport.columns;
    expect(formatPdfCell(123456.5, due, sampleReport)).toBe('1,23,456.50');
    expect(formatPdfCell(null, due, sampleReport)).toBe('');
  });

  it('renders a PDF document', async () => {
    const buffer = await new PdfReportRenderer().render(sampleReport);
    expect(buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});
