import { jsPDF } from 'jspdf';
import autoTable from 'jspdf-autotable';
import { formatNumber } from '../../../shared/i18n/cultures';
import { ReportCell, ReportColumn, TabularReport } from '../domain/tabular-report';
import { ReportRenderer } from '../ports/report-renderer.port';

/**
 * Cell text for the PDF grid. Numbers follow the report culture; dates stay
 * ISO because the built-in PDF fonts only cover Latin glyphs.
 */
export function formatPdfCell(value: ReportCell, column: ReportColumn, report: TabularReport): string {
  if (value === null) return '';
  if (typeof value === 'number') {
    return column.type === 'number' ? formatNumber(value, report.culture) : String(value);
  }
  return value;
}

export class PdfReportRenderer implements ReportRenderer {
  readonly format = 'pdf';
  readonly contentType = 'application/pdf';
  readonly extension = 'pdf';

  async render(report: TabularReport): Promise<Buffer> {
    const doc = new jsPDF({ orientation: 'landscape', unit: 'mm', format: 'a4' });
    const cells = (row: ReportCell[]) =>
      report.columns.map((column, index) => formatPdfCell(row[index] ?? null, column, report));

    doc.setFontSize(16);
    doc.text(report.title, 14, 16);
    doc.setFontSize(10);
    doc.setTextColor(100, 100, 100);
    doc.text(`${report.from} to ${report.to}`, 14, 23);

    autoTable(doc, {
      startY: 28,
      head: [report.columns.map((column) => column.header)],
      body: report.rows.map(cells),
      foot: [cells(report.totals)],
      theme: 'grid',
      headStyles: { fillColor: [5, 150, 105], fontSize: 9 },
      footStyles: { fillColor: [240, 240, 240], textColor: [20, 20, 20], fontStyle: 'bold' },
      bodyStyles: { fontSize: 9 },
    });

    return Buffer.from(doc.output('arraybuffer'));
  }
}
