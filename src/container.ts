import { AppConfig } from './infra/config/config';
import { AuditLogService } from './modules/audit/application/audit-log.service';
import { AuditLogRepository } from './modules/audit/infra/postgres-audit-log.repository';
import { AuthService } from './modules/auth/application/auth.service';
import { BranchService } from './modules/branches/application/branch.service';
import { BranchRepository } from './modules/branches/infra/postgres-branch.repository';
import { MilkCollectionService } from './modules/collections/application/milk-collection.service';
import { CollectionRepository } from './modules/collections/infra/postgres-milk-collection.repository';
import { CustomerService } from './modules/customers/application/customer.service';
import { CustomerRepository } from './modules/customers/infra/postgres-customer.repository';
import { DashboardService } from './modules/dashboard/application/dashboard.service';
import { EmployeeService } from './modules/employees/application/employee.service';
import { EmployeeRepository } from './modules/employees/infra/postgres-employee.repository';
import { FarmerService } from './modules/farmers/application/farmer.service';
import { FarmerRepository } from './modules/farmers/infra/postgres-farmer.repository';
import { BalanceService } from './modules/payments/application/balance.service';
import { PaymentService } from './modules/payments/application/payment.service';
import {
  PaymentCustomerRepository,
  PaymentFarmerRepository,
} from './modules/payments/infra/postgres-payment.repository';
import { ReportService } from './modules/reports/application/report.service';
import { ExcelReportRenderer } from './modules/reports/infra/excel-report.renderer';
import { PdfReportRenderer } from './modules/reports/infra/pdf-report.renderer';
import { ReportRenderer } from './modules/reports/ports/report-renderer.port';
import { SaleService } from './modules/sales/application/sale.service';
import { SaleRepository } from './modules/sales/infra/postgres-sale.repository';
import { ShiftService } from './modules/shifts/application/shift.service';
import { ShiftRepository } from './modules/shifts/infra/postgres-shift.repository';

export interface Container {
  auth: AuthService;
  branches: BranchService;
  employees: EmployeeService;
  farmers: FarmerService;
  customers: CustomerService;
  shifts: ShiftService;
  collections: MilkCollectionService;
  sales: SaleService;
  farmerPayments: PaymentService;
  customerPayments: PaymentService;
  balances: BalanceService;
  auditLogs: AuditLogService;
  dashboard: DashboardService;
  reports: ReportService;
  renderers: ReportRenderer[];
}

/**
 * Wires repositories into services. Repositories share the `database`
 * singleton, so the container itself holds no connection.
 */
export function createContainer(config: AppConfig): Container {
  // 1. Repositories
  const auditRepo = new AuditLogRepository();
  const branchRepo = new BranchRepository();
  const employeeRepo = new EmployeeRepository();
  const farmerRepo = new FarmerRepository();
  const customerRepo = new CustomerRepository();
  const shiftRepo = new ShiftRepository();
  const collectionRepo = new CollectionRepository();
  const saleRepo = new SaleRepository();
  const farmerPaymentRepo = new PaymentFarmerRepository();
  const customerPaymentRepo = new PaymentCustomerRepository();

  // 2. Services
  return {
    auth: new AuthService({
      jwtKey: config.auth.jwtKey,
      jwtIssuer: config.auth.jwtIssuer,
      jwtAudience: config.auth.jwtAudience,
      tokenTtlSeconds: config.auth.tokenTtlSeconds,
    }),
    branches: new BranchService(branchRepo, auditRepo),
    employees: new EmployeeService(employeeRepo, branchRepo, auditRepo),
    farmers: new FarmerService(farmerRepo, branchRepo, auditRepo),
    customers: new CustomerService(customerRepo, branchRepo, auditRepo),
    shifts: new ShiftService(shiftRepo, auditRepo),
    collections: new MilkCollectionService(
      collectionRepo,
      { farmers: farmerRepo, shifts: shiftRepo, employees: employeeRepo },
      auditRepo
    ),
    sales: new SaleService(
      saleRepo,
      { customers: customerRepo, shifts: shiftRepo, employees: employeeRepo },
      auditRepo
    ),
    farmerPayments: new PaymentService(
      farmerPaymentRepo,
      { parties: farmerRepo, employees: employeeRepo },
      auditRepo,
      'farmer'
    ),
    customerPayments: new PaymentService(
      customerPaymentRepo,
      { parties: customerRepo, employees: employeeRepo },
      auditRepo,
      'customer'
    ),
    balances: new BalanceService({
      farmers: farmerRepo,
      customers: customerRepo,
      collections: collectionRepo,
      sales: saleRepo,
      farmerPayments: farmerPaymentRepo,
      customerPayments: customerPaymentRepo,
    }),
    auditLogs: new AuditLogService(auditRepo),
    dashboard: new DashboardService(collectionRepo, saleRepo),
    reports: new ReportService(collectionRepo, saleRepo),
    renderers: [new ExcelReportRenderer(), new PdfReportRenderer()],
  };
}
