import http from 'node:http';

import type { MetricsSnapshot } from './metrics.js';

export type HealthStatus = {
  ok: boolean;
  ready: boolean;
  block?: string;
  period?: string;
  pools?: number;
  warnings?: string[];
  modules?: Record<string, { started: boolean; lastBlock?: string }>;
};

type Route = () => Promise<{ status: number; body: unknown }> | { status: number; body: unknown };

/** Local-only status endpoints: `/health` always, `/metrics` when a source is given. */
export class HealthServer {
  private readonly port: number;
  private readonly routes = new Map<string, Route>();
  private server?: http.Server;

  constructor(args: {
    port: number;
    getStatus: () => Promise<HealthStatus> | HealthStatus;
    getMetrics?: () => MetricsSnapshot;
  }) {
    this.port = args.port;

    this.routes.set('/health', async () => {
      const status = await args.getStatus();
      return { status: status.ok ? 200 : 503, body: status };
    });

    const getMetrics = args.getMetrics;
    if (getMetrics) this.routes.set('/metrics', () => ({ status: 200, body: getMetrics() }));
  }

  /** Bound port; differs from the configured one when that was 0. */
  get boundPort(): number | undefined {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') return undefined;
    return addr.port;
  }

  async start(): Promise<void> {
    if (this.server) return;

    const server = http.createServer(async (req, res) => {
      const route = req.url && req.method === 'GET' ? this.routes.get(new URL(req.url, 'http://127.0.0.1').pathname) : undefined;
      if (!route) {
        res.statusCode = 404;
        res.end();
        return;
      }

      res.setHeader('content-type', 'application/json');
      try {
        const { status, body } = await route();
        res.statusCode = status;
        res.end(JSON.stringify(body));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        res.statusCode = 500;
        res.end(JSON.stringify({ ok: false, ready: false, warnings: [msg] } satisfies HealthStatus));
      }
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, '127.0.0.1', resolve);
    });
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    const s = this.server;
    this.server = undefined;

    await new Promise<void>((resolve) => s.close(() => resolve()));
  }
}
