import { ReportFormat, TabularReport } from '../domain/tabular-report';

export interface ReportRenderer {
  readonly format: ReportFormat;
  readonly contentType: string;
  readonly extension: string;
  render(report: TabularReport): Promise<Buffer>;
}
