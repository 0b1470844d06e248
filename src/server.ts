import { Hono } from 'hono';
import type { ScalerMetrics } from './metrics.js';
import type { ScalerLoop } from './loop.js';

/**
 * /metrics for the scraper, /healthz for the kubelet, /status for humans.
 */
export function createMetricsApp(metrics: ScalerMetrics, loop: Pick<ScalerLoop, 'state' | 'lastTickAt' | 'status'>): Hono {
  const app = new Hono();

  app.get('/metrics', async (c) => {
    const body = await metrics.render();
    return c.body(body, 200, { 'Content-Type': metrics.contentType() });
  });

  app.get('/healthz', (c) => {
    const lastTickAt = loop.lastTickAt();
    return c.json({
      status: 'ok',
      state: loop.state,
      lastTickAt: lastTickAt ? lastTickAt.toISOString() : null,
    });
  });

  app.get('/status', (c) => c.json({ pools: loop.status() }));

  app.notFound((c) => c.json({ error: { message: 'Route not found', statusCode: 404 } }, 404));

  return app;
}
