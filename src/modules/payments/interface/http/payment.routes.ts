import { Router } from 'express';
import { createCrudRouter, idParam } from '../../../../infra/http/crud.router';
import { asyncHandler } from '../../../../infra/http/async-handler';
import { BalanceService } from '../../application/balance.service';
import { PaymentService } from '../../application/payment.service';
import { paymentFilterSchema, paymentInputSchema } from '../../domain/payment.entity';

export function createPaymentRouter(farmerPayments: PaymentService, customerPayments: PaymentService): Router {
  const router = Router();
  const options = { inputSchema: paymentInputSchema, filterSchema: paymentFilterSchema };

  router.use('/farmers', createCrudRouter(farmerPayments, options));
  router.use('/customers', createCrudRouter(customerPayments, options));

  return router;
}

/**
 * `GET /farmers/:id/balance` and `GET /customers/:id/balance`, mounted
 * under `/api` ahead of the master-data routers.
 */
export function createBalanceRouter(balances: BalanceService): Router {
  const router = Router();

  router.get(
    '/farmers/:id/balance',
    asyncHandler(async (req, res) => {
      res.json(await balances.farmerBalance(idParam(req)));
    })
  );

  router.get(
    '/customers/:id/balance',
    asyncHandler(async (req, res) => {
      res.json(await balances.customerBalance(idParam(req)));
    })
  );

  return router;
}
