import dotenv from 'dotenv';
dotenv.config();

import { buildApp } from './app';
import { config } from './config';
import { TabularStore } from './store/tabular-store';

async function start() {
  const store = new TabularStore({ filePath: config.KYC_STORE_PATH });
  const server = await buildApp({ store });

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    const records = await store.openOrCreate();
    server.log.info(`KYC database ${store.filePath} holds ${records.length} records`);

    await server.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    server.log.error(err);
    await server.close();
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  console.error('Failed to start server', err);
  process.exit(1);
});
