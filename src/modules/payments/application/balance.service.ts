import { RecordLookup } from '../../../shared/application/audited-crud.service';
import { RecordNotFoundError } from '../../../shared/errors/database.error';
import { roundMoney } from '../../../shared/utils/values';
import { MilkCollectionRepositoryPort } from '../../collections/ports/milk-collection.repository.port';
import { SaleRepositoryPort } from '../../sales/ports/sale.repository.port';
import { PartyBalance } from '../domain/payment.entity';
import { PaymentRepositoryPort } from '../ports/payment.repository.port';

export interface BalanceServiceDeps {
  farmers: RecordLookup;
  customers: RecordLookup;
  collections: MilkCollectionRepositoryPort;
  sales: SaleRepositoryPort;
  farmerPayments: PaymentRepositoryPort;
  customerPayments: PaymentRepositoryPort;
}

/**
 * Running balances: what the cooperative owes each farmer and what each
 * customer owes the cooperative.
 */
export class BalanceService {
  constructor(private readonly deps: BalanceServiceDeps) {}

  async farmerBalance(farmerId: number): Promise<PartyBalance> {
    if (!(await this.deps.farmers.findById(farmerId))) {
      throw new RecordNotFoundError('Farmer', String(farmerId));
    }

    const [totalDue, totalPaid] = await Promise.all([
      this.deps.collections.totalDueForFarmer(farmerId),
      this.deps.farmerPayments.totalPaid(farmerId),
    ]);
    return { partyType: 'farmer', partyId: farmerId, totalDue, totalPaid, balance: roundMoney(totalDue - totalPaid) };
  }

  async customerBalance(customerId: number): Promise<PartyBalance> {
    if (!(await this.deps.customers.findById(customerId))) {
      throw new RecordNotFoundError('Customer', String(customerId));
    }

    const [totalDue, totalPaid] = await Promise.all([
      this.deps.sales.totalDueForCustomer(customerId),
      this.deps.customerPayments.totalPaid(customerId),
    ]);
    return {
      partyType: 'customer',
      partyId: customerId,
      totalDue,
      totalPaid,
      balance: roundMoney(totalDue - totalPaid),
    };
  }
}
