import { loadConfig } from './config.js';
import { createSkyWindowServer, VERSION } from './app.js';

const config = loadConfig();
const { server, wss } = createSkyWindowServer(config);

server.listen(config.port, '0.0.0.0', () => {
  const { stepSeconds, minElevationDeg, concurrency } = config.visibility;
  console.log(`
  🔭 ╔═══════════════════════════════════════╗
  🔭 ║           S K Y W I N D O W           ║
  🔭 ║   Radio Source Uptime Planner v${VERSION}  ║
  🔭 ╠═══════════════════════════════════════╣
  🔭 ║  HTTP:  http://0.0.0.0:${config.port}            ║
  🔭 ║  WS:    ws://0.0.0.0:${config.port}/ws           ║
  🔭 ╚═══════════════════════════════════════╝
  `);
  console.log(`🔭 Defaults: step ${stepSeconds}s, min elevation ${minElevationDeg}°, ${concurrency} workers`);
});

const shutdown = () => {
  console.log('🌐 Shutting down');
  for (const client of wss.clients) client.terminate();
  server.close(() => process.exit(0));
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
