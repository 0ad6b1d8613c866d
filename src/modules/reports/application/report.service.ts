import { ValidationError } from '../../../shared/errors/validation.error';
import { Culture } from '../../../shared/i18n/cultures';
import { roundMoney } from '../../../shared/utils/values';
import { MilkCollectionRepositoryPort } from '../../collections/ports/milk-collection.repository.port';
import { SaleRepositoryPort } from '../../sales/ports/sale.repository.port';
import { ReportColumn, ReportKind, ReportRange, TabularReport } from '../domain/tabular-report';

const COLLECTION_COLUMNS: ReportColumn[] = [
  { key: 'date', header: 'Date', type: 'date', width: 12 },
  { key: 'farmerCode', header: 'Farmer code', type: 'text', width: 12 },
  { key: 'farmer', header: 'Farmer', type: 'text', width: 24 },
  { key: 'shift', header: 'Shift', type: 'text', width: 12 },
  { key: 'litres', header: 'Litres', type: 'number', width: 10 },
  { key: 'fat', header: 'Fat %', type: 'number', width: 8 },
  { key: 'rate', header: 'Rate', type: 'number', width: 10 },
  { key: 'amount', header: 'Amount', type: 'number', width: 12 },
];

const SALE_COLUMNS: ReportColumn[] = [
  { key: 'date', header: 'Date', type: 'date', width: 12 },
  { key: 'customer', header: 'Customer', type: 'text', width: 24 },
  { key: 'shift', header: 'Shift', type: 'text', width: 12 },
  { key: 'litres', header: 'Litres', type: 'number', width: 10 },
  { key: 'unitPrice', header: 'Unit price', type: 'number', width: 10 },
  { key: 'discount', header: 'Discount', type: 'number', width: 10 },
  { key: 'paid', header: 'Paid', type: 'number', width: 12 },
  { key: 'due', header: 'Due', type: 'number', width: 12 },
];

function sum(values: number[]): number {
  return roundMoney(values.reduce((total, value) => total + value, 0));
}

/**
 * Assembles collection and sale grids for the renderers.
 */
export class ReportService {
  constructor(
    private readonly collections: MilkCollectionRepositoryPort,
    private readonly sales: SaleRepositoryPort
  ) {}

  async build(kind: ReportKind, range: ReportRange, culture: Culture): Promise<TabularReport> {
    if (range.from > range.to) {
      throw new ValidationError('Report range is inverted', { from: `Must not be after ${range.to}` });
    }

    return kind === 'collections' ? this.buildCollections(range, culture) : this.buildSales(range, culture);
  }

  private async buildCollections(range: ReportRange, culture: Culture): Promise<TabularReport> {
    const records = await this.collections.findDetailed(range.from, range.to);

    return {
      kind: 'collections',
      title: 'Milk collections',
      culture,
      ...range,
      columns: COLLECTION_COLUMNS,
      rows: records.map((r) => [
        r.date,
        r.farmerCode,
        r.farmerName,
        r.shiftName,
        r.quantityLitres,
        r.fatPercent,
        r.pricePerLitre,
        r.dueAmount,
      ]),
      totals: [
        'Total',
        null,
        null,
        null,
        sum(records.map((r) => r.quantityLitres)),
        null,
        null,
        sum(records.map((r) => r.dueAmount)),
      ],
    };
  }

  private async buildSales(range: ReportRange, culture: Culture): Promise<TabularReport> {
    const records = await this.sales.findDetailed(range.from, range.to);

    return {
      kind: 'sales',
      title: 'Sales',
      culture,
      ...range,
      columns: SALE_COLUMNS,
      rows: records.map((r) => [
        r.date,
        r.customerName,
        r.shiftName,
        r.quantityLitres,
        r.unitPrice,
        r.discount,
        r.paidAmount,
        r.dueAmount,
      ]),
      totals: [
        'Total',
        null,
        null,
        sum(records.map((r) => r.quantityLitres)),
        null,
        sum(records.map((r) => r.discount)),
        sum(records.map((r) => r.paidAmount)),
        sum(records.map((r) => r.dueAmount)),
      ],
    };
  }
}
