import cookieParser from 'cookie-parser';
import express, { Express } from 'express';
import session from 'express-session';
import { Container } from '../../container';
import { AUTH_DEFAULTS } from '../../shared/constants';
import { AppConfig } from '../config/config';
import { createAuditLogRouter } from '../../modules/audit/interface/http/audit-log.routes';
import { createSessionAuthRouter, createTokenRouter } from '../../modules/auth/interface/http/auth.routes';
import { createBranchRouter } from '../../modules/branches/interface/http/branch.routes';
import { createMilkCollectionRouter } from '../../modules/collections/interface/http/milk-collection.routes';
import { createCustomerRouter } from '../../modules/customers/interface/http/customer.routes';
import {
  createDashboardApiRouter,
  createDashboardPageRouter,
} from '../../modules/dashboard/interface/http/dashboard.routes';
import { createEmployeeRouter } from '../../modules/employees/interface/http/employee.routes';
import { createFarmerRouter } from '../../modules/farmers/interface/http/farmer.routes';
import { createBalanceRouter, createPaymentRouter } from '../../modules/payments/interface/http/payment.routes';
import { createReportRouter } from '../../modules/reports/interface/http/report.routes';
import { createSaleRouter } from '../../modules/sales/interface/http/sale.routes';
import { createShiftRouter } from '../../modules/shifts/interface/http/shift.routes';
import { createDatabaseCheckRouter, createHealthRouter } from '../../modules/system/interface/http/system.routes';
import { createApiAuthentication } from './middleware/authenticate.middleware';
import { cultureNegotiation } from './middleware/culture.middleware';
import { errorHandler, notFoundHandler } from './middleware/error-handler.middleware';
import { requestLogger } from './middleware/request-logger.middleware';

/**
 * Builds the full HTTP pipeline: logging, body parsing, session, culture,
 * public endpoints, session pages, then the authenticated `/api` surface.
 */
export function createApp(container: Container, config: AppConfig): Express {
  const app = express();
  const isProduction = config.app.nodeEnv === 'production';

  app.disable('x-powered-by');
  if (isProduction) {
    app.set('trust proxy', 1);
  }

  app.use(requestLogger);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(
    session({
      name: AUTH_DEFAULTS.SESSION_COOKIE,
      secret: config.auth.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        sameSite: 'lax',
        secure: isProduction,
        maxAge: AUTH_DEFAULTS.SESSION_MAX_AGE_MS,
      },
    })
  );
  app.use(cookieParser());
  app.use(cultureNegotiation);

  // Public
  app.use(createHealthRouter({ environment: config.app.nodeEnv }));
  app.use(createDatabaseCheckRouter());

  // Session pages
  app.get('/', (_req, res) => res.redirect('/dashboard'));
  app.use(createSessionAuthRouter(container.auth));
  app.use(createDashboardPageRouter(container.dashboard));

  // API
  app.use('/api/auth', createTokenRouter(container.auth));
  app.use('/api', createApiAuthentication(container.auth));
  app.use('/api', createBalanceRouter(container.balances));
  app.use('/api/branches', createBranchRouter(container.branches));
  app.use('/api/employees', createEmployeeRouter(container.employees));
  app.use('/api/farmers', createFarmerRouter(container.farmers));
  app.use('/api/customers', createCustomerRouter(container.customers));
  app.use('/api/shifts', createShiftRouter(container.shifts));
  app.use('/api/milk-collections', createMilkCollectionRouter(container.collections));
  app.use('/api/sales', createSaleRouter(container.sales));
  app.use('/api/payments', createPaymentRouter(container.farmerPayments, container.customerPayments));
  app.use('/api/audit-logs', createAuditLogRouter(container.auditLogs));
  app.use('/api/dashboard', createDashboardApiRouter(container.dashboard));
  app.use('/api/reports', createReportRouter(container.reports, container.renderers));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Served when configuration fails to load: only `/health` and `/version`.
 */
export function createFallbackApp(environment: string): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(createHealthRouter({ environment }));
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
