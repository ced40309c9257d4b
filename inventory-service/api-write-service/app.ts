import cors from 'cors';
import express from 'express';
import { createProduct, deleteProduct, updateProduct } from '../shared/catalog';
import { errorHandler, notFoundHandler, requestContext, route, serviceRoutes } from '../shared/http';
import { createServiceLogger } from '../shared/logger';
import { createOrder, deleteOrder, updateOrder } from '../shared/orders';
import { IdParamSchema, OrderBodySchema, ProductBodySchema, parseOrThrow } from '../shared/schemas';
import type { Store } from '../shared/store';

const log = createServiceLogger('api-write');

export function createWriteApp(store: Store): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(requestContext(log));

  app.use(
    serviceRoutes(
      store,
      {
        name: 'Inventory API (write)',
        version: '1.0.0',
        endpoints: [
          'POST /products',
          'PUT /products/:id',
          'DELETE /products/:id',
          'POST /orders',
          'PUT /orders/:id',
          'DELETE /orders/:id',
        ],
      },
      log,
    ),
  );

  app.post('/products', route(async (req, res) => {
    const body = parseOrThrow(ProductBodySchema, req.body, 'product');
    const product = await createProduct(store, body);
    res.status(201).json(product);
  }));

  app.put('/products/:id', route(async (req, res) => {
    const id = parseOrThrow(IdParamSchema, req.params.id, 'product id');
    const body = parseOrThrow(ProductBodySchema, req.body, 'product');
    const product = await updateProduct(store, id, body);
    res.status(200).json(product);
  }));

  app.delete('/products/:id', route(async (req, res) => {
    const id = parseOrThrow(IdParamSchema, req.params.id, 'product id');
    await deleteProduct(store, id);
    res.status(200).json({ message: 'Product deleted' });
  }));

  app.post('/orders', route(async (req, res) => {
    const body = parseOrThrow(OrderBodySchema, req.body, 'order');
    const order = await createOrder(store, body);
    res.status(201).json(order);
  }));

  app.put('/orders/:id', route(async (req, res) => {
    const id = parseOrThrow(IdParamSchema, req.params.id, 'order id');
    const body = parseOrThrow(OrderBodySchema, req.body, 'order');
    const order = await updateOrder(store, id, body);
    res.status(200).json(order);
  }));

  app.delete('/orders/:id', route(async (req, res) => {
    const id = parseOrThrow(IdParamSchema, req.params.id, 'order id');
    await deleteOrder(store, id);
    res.status(200).json({ message: 'Order deleted' });
  }));

  app.use(notFoundHandler);
  app.use(errorHandler(log));

  return app;
}
