import ExcelJS from 'exceljs';
import { SERVICE_NAME } from '../../../shared/constants';
import { TabularReport } from '../domain/tabular-report';
import { ReportRenderer } from '../ports/report-renderer.port';

const MONEY_FORMAT = '#,##0.00';

export class ExcelReportRenderer implements ReportRenderer {
  readonly format = 'xlsx';
  readonly contentType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
  readonly extension = 'xlsx';

  /**
   * One worksheet named after the report kind: header row, data rows,
   * bold totals row. Numbers stay numeric cells.
   */
  buildWorkbook(report: TabularReport): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.creator = SERVICE_NAME;
    workbook.title = `${report.title} ${report.from} to ${report.to}`;

    const sheet = workbook.addWorksheet(report.kind);
    sheet.columns = report.columns.map((column) => ({
      header: column.header,
      key: column.key,
      width: column.width ?? 14,
      style: column.type === 'number' ? { numFmt: MONEY_FORMAT } : {},
    }));
    sheet.getRow(1).font = { bold: true };

    for (const row of report.rows) {
      sheet.addRow(row);
    }
    sheet.addRow(report.totals).font = { bold: true };

    return workbook;
  }

  async render(report: TabularReport): Promise<Buffer> {
    const data = await this.buildWorkbook(report).xlsx.writeBuffer();
    return Buffer.from(data);
  }
}
