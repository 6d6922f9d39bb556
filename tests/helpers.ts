import { once } from 'node:events';
import { join } from 'node:path';
import { createApp } from '../src/server/app.js';
import { openDatabase, type DatabaseHandle } from '../src/server/database.js';

export const MIGRATIONS_DIR = join(process.cwd(), 'migrations');
export const VIEWS_DIR = join(process.cwd(), 'views');

export function openTestDatabase(): DatabaseHandle {
  return openDatabase({ path: ':memory:', migrationsDir: MIGRATIONS_DIR });
}

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export async function startTestServer(db: DatabaseHandle): Promise<TestServer> {
  const app = createApp({
    db,
    chart: { width: 400, height: 200 },
    viewsDir: VIEWS_DIR,
    logRequests: false,
  });

  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
