// ============================================================================
// LaunchTrack — REST API
// ============================================================================
import express from 'express';
import cors from 'cors';
import { z } from 'zod';
import { BAUD_RATES, METRIC_KEYS, METRIC_UNITS, isMetricKey } from '@launchtrack/shared';
import type { AppConfig } from './config.js';
import { describeError } from './errors.js';
import { renderSvg } from './render/svg.js';
import { listSerialPorts, serialSupport } from './sources/serial.js';
import { sourceConfigSchema } from './sources/schema.js';
import type { TelemetryMonitor } from './telemetry/service.js';

export const VERSION = '0.1.0';

const metricBody = z.object({
  metric: z.enum(METRIC_KEYS),
});

function issues(err: z.ZodError): string {
  return err.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

export function createApp(monitor: TelemetryMonitor, config: Pick<AppConfig, 'chart' | 'defaults'>) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({
      name: 'LaunchTrack',
      version: VERSION,
      uptime: process.uptime(),
      status: 'operational',
    });
  });

  app.get('/api/status', (_req, res) => {
    res.json(monitor.snapshot());
  });

  // --- Sources ---
  app.get('/api/sources', async (_req, res) => {
    try {
      res.json({
        sources: await monitor.sources(),
        baudRates: BAUD_RATES,
        defaults: config.defaults,
      });
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  app.get('/api/serial/ports', async (_req, res) => {
    const support = await serialSupport();
    if (!support.available) {
      return res.status(503).json({ error: `Serial support unavailable: ${support.reason}` });
    }
    try {
      res.json(await listSerialPorts());
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  app.post('/api/connect', async (req, res) => {
    const parsed = sourceConfigSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: issues(parsed.error) });
    }
    try {
      const result = await monitor.connect(parsed.data);
      res.status(result.ok ? 200 : 502).json(result);
    } catch (err) {
      res.status(500).json({ ok: false, message: describeError(err) });
    }
  });

  app.post('/api/disconnect', async (_req, res) => {
    try {
      await monitor.disconnect();
      res.json({ ok: true, snapshot: monitor.snapshot() });
    } catch (err) {
      res.status(500).json({ error: describeError(err) });
    }
  });

  // --- Charts ---
  app.get('/api/charts', (_req, res) => {
    res.json(monitor.charts());
  });

  app.put('/api/charts/:id', (req, res) => {
    if (!monitor.hasChart(req.params.id)) {
      return res.status(404).json({ error: `Unknown chart: ${req.params.id}` });
    }
    const parsed = metricBody.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: issues(parsed.error) });
    }
    monitor.setChartMetric(req.params.id, parsed.data.metric);
    res.json({ id: req.params.id, metric: parsed.data.metric });
  });

  app.get('/api/charts/:id/svg', (req, res) => {
    const chart = monitor.charts().find(c => c.id === req.params.id);
    if (!chart) return res.status(404).json({ error: `Unknown chart: ${req.params.id}` });
    res.type('image/svg+xml').send(renderSvg(chart.primitives, config.chart.width, config.chart.height));
  });

  app.get('/api/history/:metric', (req, res) => {
    const metric = req.params.metric;
    if (!isMetricKey(metric)) return res.status(400).json({ error: `Unknown metric: ${metric}` });
    res.json({ metric, unit: METRIC_UNITS[metric], ...monitor.series(metric) });
  });

  return app;
}
