import { MilkCollectionRepositoryPort } from '../../collections/ports/milk-collection.repository.port';
import { SaleRepositoryPort } from '../../sales/ports/sale.repository.port';
import { DashboardSummary } from '../domain/dashboard-summary';

export class DashboardService {
  constructor(
    private readonly collections: MilkCollectionRepositoryPort,
    private readonly sales: SaleRepositoryPort
  ) {}

  async getSummary(date: string): Promise<DashboardSummary> {
    const [collections, sales] = await Promise.all([
      this.collections.summarize(date, date),
      this.sales.summarize(date, date),
    ]);
    return { date, collections, sales };
  }
}
