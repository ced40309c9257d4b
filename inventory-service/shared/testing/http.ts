import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { Express } from 'express';
import type { Server } from 'node:http';

export interface RunningApp {
  client: AxiosInstance;
  close(): Promise<void>;
}

/** Listens on an ephemeral local port and returns a client that never throws on status. */
export async function startApp(app: Express): Promise<RunningApp> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }

  return {
    client: axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
    }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}
