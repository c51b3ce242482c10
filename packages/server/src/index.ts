import { createServer } from 'http';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { TelemetryMonitor } from './telemetry/service.js';
import { attachWebSocket } from './ws.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

const monitor = new TelemetryMonitor({
  historyCapacity: config.historyCapacity,
  acquisitionIntervalMs: config.acquisitionIntervalMs,
  renderIntervalMs: config.renderIntervalMs,
  viewport: config.chart,
  sources: {
    serialSettleMs: config.serialSettleMs,
    tcpConnectTimeoutMs: config.tcpConnectTimeoutMs,
  },
});

const app = createApp(monitor, config);
const server = createServer(app);
const wss = attachWebSocket(server, monitor);

monitor.start();

async function shutdown(signal: string) {
  console.log(`🚀 ${signal} received, shutting down`);
  await monitor.stop();
  wss.close();
  server.close(() => process.exit(0));
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch(err => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  });
}

server.listen(config.port, config.host, () => {
  console.log(`
  🚀 ╔═══════════════════════════════════════╗
  🚀 ║         L A U N C H T R A C K         ║
  🚀 ║      Rocket Telemetry Monitor v0.1    ║
  🚀 ╠═══════════════════════════════════════╣
  🚀 ║  HTTP:  http://${config.host}:${config.port}
  🚀 ║  WS:    ws://${config.host}:${config.port}/ws
  🚀 ╚═══════════════════════════════════════╝
  `);
});
