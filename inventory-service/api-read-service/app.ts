import cors from 'cors';
import express from 'express';
import { getProduct, listProducts } from '../shared/catalog';
import { errorHandler, notFoundHandler, requestContext, route, serviceRoutes } from '../shared/http';
import { createServiceLogger } from '../shared/logger';
import { getOrder, listOrders } from '../shared/orders';
import { getStatistics, listLowStockProducts } from '../shared/reports';
import {
  IdParamSchema,
  PageQuerySchema,
  ProductQuerySchema,
  ThresholdParamSchema,
  parseOrThrow,
} from '../shared/schemas';
import type { Store } from '../shared/store';

const log = createServiceLogger('api-read');

export function createReadApp(store: Store): express.Express {
  const app = express();
  app.use(cors());
  app.use(requestContext(log));

  app.use(
    serviceRoutes(
      store,
      {
        name: 'Inventory API (read)',
        version: '1.0.0',
        endpoints: [
          'GET /products',
          'GET /products/low-stock/:threshold',
          'GET /products/:id',
          'GET /orders',
          'GET /orders/:id',
          'GET /statistics',
        ],
      },
      log,
    ),
  );

  app.get('/products', route(async (req, res) => {
    const { skip, limit, ...filter } = parseOrThrow(ProductQuerySchema, req.query, 'query');
    res.status(200).json(await listProducts(store, filter, { skip, limit }));
  }));

  app.get('/products/low-stock/:threshold', route(async (req, res) => {
    const threshold = parseOrThrow(ThresholdParamSchema, req.params.threshold, 'threshold');
    res.status(200).json(await listLowStockProducts(store, threshold));
  }));

  app.get('/products/:id', route(async (req, res) => {
    const id = parseOrThrow(IdParamSchema, req.params.id, 'product id');
    res.status(200).json(await getProduct(store, id));
  }));

  app.get('/orders', route(async (req, res) => {
    const page = parseOrThrow(PageQuerySchema, req.query, 'query');
    res.status(200).json(await listOrders(store, page));
  }));

  app.get('/orders/:id', route(async (req, res) => {
    const id = parseOrThrow(IdParamSchema, req.params.id, 'order id');
    res.status(200).json(await getOrder(store, id));
  }));

  app.get('/statistics', route(async (_req, res) => {
    res.status(200).json(await getStatistics(store));
  }));

  app.use(notFoundHandler);
  app.use(errorHandler(log));

  return app;
}
