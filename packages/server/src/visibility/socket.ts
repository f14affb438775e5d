import { WebSocket, type WebSocketServer } from 'ws';
import type { PairOutcome, VisibilityServerMessage } from '@skywindow/shared';
import { isVisibilityError } from '../errors.js';
import { ClientMessageSchema, toObservationWindow } from './schema.js';
import type { VisibilityService } from './service.js';

/**
 * Streams visibility jobs over WebSocket. Each connection runs at most one
 * job; a new `compute`, a `cancel`, or the socket closing abandons the
 * running one, and its partial results are never reported as done.
 */
export function attachVisibilitySocket(wss: WebSocketServer, service: VisibilityService) {
  let nextConnection = 1;

  wss.on('connection', (ws: WebSocket) => {
    const jobId = `ws-${nextConnection++}`;
    let requestId: string | null = null;

    const send = (msg: VisibilityServerMessage) => {
      if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
    };

    const onPair = (id: string, outcome: PairOutcome) => {
      if (id === jobId && requestId) send({ type: 'visibility_pair', requestId, outcome });
    };
    service.on('pair', onPair);

    const cancelCurrent = () => {
      if (requestId && service.cancel(jobId)) send({ type: 'visibility_cancelled', requestId });
      requestId = null;
    };

    ws.on('message', (data) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data.toString());
      } catch {
        send({ type: 'visibility_error', error: 'Malformed JSON' });
        return;
      }

      const msg = ClientMessageSchema.safeParse(parsed);
      if (!msg.success) {
        send({ type: 'visibility_error', error: msg.error.issues.map((i) => i.message).join('; ') });
        return;
      }

      if (msg.data.type === 'cancel') {
        cancelCurrent();
        return;
      }

      cancelCurrent();
      const request = msg.data;
      const current = request.requestId;
      requestId = current;

      service
        .run(jobId, {
          stations: request.stations,
          sources: request.sources,
          window: toObservationWindow(request.window),
          minElevationDeg: request.minElevationDeg,
        })
        .then((result) => {
          if (result && requestId === current) {
            send({ type: 'visibility_done', requestId: current, pairCount: result.size });
            requestId = null;
          }
        })
        .catch((err: unknown) => {
          if (requestId === current) requestId = null;
          if (isVisibilityError(err)) {
            send({ type: 'visibility_error', requestId: current, error: err.message, kind: err.kind });
          } else {
            console.error('🔭 WebSocket visibility job failed:', err);
            send({ type: 'visibility_error', requestId: current, error: 'Internal error' });
          }
        });
    });

    ws.on('close', () => {
      service.cancel(jobId);
      service.off('pair', onPair);
    });
  });
}
