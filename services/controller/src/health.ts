import { createServer, type Server } from 'node:http';
import { logger } from '@kustomize-sync/shared';

const log = logger.child({ module: 'health' });

/** Liveness on /healthz, readiness (watch synced) on /readyz. */
export function createHealthServer(isReady: () => boolean): Server {
  return createServer((req, res) => {
    if (req.url === '/healthz') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'healthy' }));
    } else if (req.url === '/readyz') {
      const ok = isReady();
      res.writeHead(ok ? 200 : 503, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: ok ? 'ready' : 'not ready' }));
    } else {
      res.writeHead(404).end();
    }
  });
}

export function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      log.info({ port }, 'health probe listening');
      resolve();
    });
  });
}
