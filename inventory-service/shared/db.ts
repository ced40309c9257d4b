import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { Pool } from 'pg';
import { z } from 'zod';
import { getConfig } from './config';
import type { DbConfig } from './config';
import { createServiceLogger } from './logger';

const log = createServiceLogger('db');

const DbSecretSchema = z.object({
  username: z.string(),
  password: z.string(),
  dbname: z.string().optional(),
  port: z.coerce.number().int().optional(),
});

interface DbCredentials {
  user: string;
  password: string;
  database: string;
  port: number;
}

let writerPool: Pool | null = null;
let readerPool: Pool | null = null;

async function getDbCredentials(config: DbConfig): Promise<DbCredentials> {
  if (!config.secretArn) {
    return { user: config.user, password: config.password, database: config.database, port: config.port };
  }

  const smClient = new SecretsManagerClient({});
  const data = await smClient.send(new GetSecretValueCommand({ SecretId: config.secretArn }));
  if (!data.SecretString) {
    throw new Error('Database secret not found');
  }
  const secret = DbSecretSchema.parse(JSON.parse(data.SecretString));
  return {
    user: secret.username,
    password: secret.password,
    database: secret.dbname ?? config.database,
    port: secret.port ?? config.port,
  };
}

async function createPool(host: string, role: 'writer' | 'reader'): Promise<Pool> {
  const config = getConfig().db;
  const creds = await getDbCredentials(config);
  const pool = new Pool({
    host,
    port: creds.port,
    user: creds.user,
    password: creds.password,
    database: creds.database,
    max: config.poolMax,
  });
  pool.on('error', (err) => log.error('Idle database client failed', { role, error: err }));
  return pool;
}

export async function getWriterPool(): Promise<Pool> {
  if (!writerPool) {
    writerPool = await createPool(getConfig().db.writerEndpoint, 'writer');
  }
  return writerPool;
}

export async function getReaderPool(): Promise<Pool> {
  if (!readerPool) {
    readerPool = await createPool(getConfig().db.readerEndpoint, 'reader');
  }
  return readerPool;
}

export async function closePools(): Promise<void> {
  const pools = [writerPool, readerPool].filter((pool): pool is Pool => pool !== null);
  writerPool = null;
  readerPool = null;
  await Promise.all(pools.map((pool) => pool.end()));
}
