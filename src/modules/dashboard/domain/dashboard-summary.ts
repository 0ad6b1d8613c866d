import { DailySummary } from '../../collections/domain/milk-collection.entity';

export interface DashboardSummary {
  date: string;
  collections: DailySummary;
  sales: DailySummary;
}
