import { Request, Router } from 'express';
import { z } from 'zod';
import { idSchema, parseInput } from '../../shared/utils/validation';
import { actorOf, asyncHandler } from './async-handler';

export interface CrudServicePort<TRecord, TInput, TFilter> {
  list(filter: TFilter): Promise<TRecord[]>;
  get(id: number): Promise<TRecord>;
  create(input: TInput, actor: string): Promise<TRecord>;
  update(id: number, input: TInput, actor: string): Promise<TRecord>;
  remove(id: number, actor: string): Promise<void>;
}

export interface CrudRouterOptions<TInput, TFilter> {
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  filterSchema: z.ZodType<TFilter, z.ZodTypeDef, unknown>;
}

export function idParam(req: Request): number {
  return parseInput(idSchema, req.params.id);
}

/**
 * Mounts `GET /`, `POST /`, `GET /:id`, `PUT /:id` and `DELETE /:id`
 * for a service.
 */
export function createCrudRouter<TRecord, TInput, TFilter>(
  service: CrudServicePort<TRecord, TInput, TFilter>,
  options: CrudRouterOptions<TInput, TFilter>
): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const filter = parseInput(options.filterSchema, req.query);
      res.json(await service.list(filter));
    })
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const input = parseInput(options.inputSchema, req.body);
      res.status(201).json(await service.create(input, actorOf(req)));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      res.json(await service.get(idParam(req)));
    })
  );

  router.put(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = idParam(req);
      const input = parseInput(options.inputSchema, req.body);
      res.json(await service.update(id, input, actorOf(req)));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      await service.remove(idParam(req), actorOf(req));
      res.status(204).end();
    })
  );

  return router;
}
