// ============================================================================
// LaunchTrack — WebSocket Broadcast
// ============================================================================
import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import { METRIC_KEYS, type MonitorFrame, type MonitorMessage, type MonitorSnapshot } from '@launchtrack/shared';
import { describeError } from './errors.js';
import { sourceConfigSchema } from './sources/schema.js';
import type { TelemetryMonitor } from './telemetry/service.js';

const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connect'), source: z.unknown() }),
  z.object({ type: z.literal('disconnect') }),
  z.object({ type: z.literal('set_metric'), chart: z.string(), metric: z.enum(METRIC_KEYS) }),
]);

function send(ws: WebSocket, msg: MonitorMessage) {
  if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
}

async function handleCommand(ws: WebSocket, monitor: TelemetryMonitor, raw: string) {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return send(ws, { type: 'error', message: 'Commands must be JSON' });
  }
  const cmd = commandSchema.safeParse(data);
  if (!cmd.success) {
    return send(ws, { type: 'error', message: `Unknown command: ${cmd.error.issues[0]?.message ?? raw}` });
  }

  switch (cmd.data.type) {
    case 'connect': {
      const config = sourceConfigSchema.safeParse(cmd.data.source);
      if (!config.success) return send(ws, { type: 'error', message: config.error.issues.map(i => i.message).join('; ') });
      const result = await monitor.connect(config.data);
      if (!result.ok) send(ws, { type: 'error', message: result.message });
      break;
    }
    case 'disconnect':
      await monitor.disconnect();
      break;
    case 'set_metric':
      if (!monitor.setChartMetric(cmd.data.chart, cmd.data.metric)) {
        send(ws, { type: 'error', message: `Unknown chart: ${cmd.data.chart}` });
      }
      break;
  }
}

/** Attach the `/ws` endpoint: pushes every frame and status change to all clients. */
export function attachWebSocket(server: Server, monitor: TelemetryMonitor): WebSocketServer {
  const wss = new WebSocketServer({ server, path: '/ws' });

  const broadcast = (msg: MonitorMessage) => {
    const payload = JSON.stringify(msg);
    wss.clients.forEach(client => {
      if (client.readyState === WebSocket.OPEN) client.send(payload);
    });
  };

  monitor.on('frame', (frame: MonitorFrame) => broadcast({ type: 'frame', frame }));
  monitor.on('status', (snapshot: MonitorSnapshot) => broadcast({ type: 'snapshot', snapshot }));

  wss.on('connection', (ws: WebSocket) => {
    console.log('⚡ Client connected');
    send(ws, { type: 'frame', frame: { snapshot: monitor.snapshot(), charts: monitor.charts() } });

    ws.on('message', data => {
      handleCommand(ws, monitor, data.toString()).catch(err => {
        send(ws, { type: 'error', message: describeError(err) });
      });
    });

    ws.on('close', () => console.log('⚡ Client disconnected'));
  });

  return wss;
}
