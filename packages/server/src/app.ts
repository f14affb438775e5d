import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import { createServer, type Server } from 'http';
import type { ServerConfig } from './config.js';
import { VisibilityService } from './visibility/service.js';
import { createVisibilityRouter } from './visibility/api.js';
import { attachVisibilitySocket } from './visibility/socket.js';

export const VERSION = '0.1.0';

export interface SkyWindowServer {
  server: Server;
  wss: WebSocketServer;
  visibility: VisibilityService;
}

export function createSkyWindowServer(config: ServerConfig): SkyWindowServer {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  const server = createServer(app);
  const wss = new WebSocketServer({ server, path: '/ws' });

  // Services
  const visibility = new VisibilityService(config.visibility);

  app.get('/api/health', (_req, res) => {
    res.json({
      name: 'SkyWindow',
      version: VERSION,
      uptime: process.uptime(),
      status: 'operational',
      activeJobs: visibility.activeJobs,
    });
  });

  app.use('/api', createVisibilityRouter(visibility));
  attachVisibilitySocket(wss, visibility);

  server.on('close', () => visibility.cancelAll());

  return { server, wss, visibility };
}
