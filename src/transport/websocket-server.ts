import * as fs from 'fs';
import * as https from 'https';
import WebSocket from 'ws';
import createDebug from 'debug';
import { MAX_REQUEST_BYTES, STEGO_SERVER_PORT } from '../utils/constants';
import { handleStegoRequest } from './request-handler';

const debug = createDebug('pcm-stego:server');

/**
 * Interface for stego WebSocket server configuration options
 */
export interface StegoServerOptions {
  port?: number;
  maxPayload?: number; // Largest accepted request in bytes
  tls?: {
    cert: string;   // Path to certificate file
    key: string;    // Path to private key file
    ca?: string;    // Optional path to CA certificate
  };
}

function readPem(path: string, marker: string, label: string): string {
  const pem = fs.readFileSync(path, 'utf8');
  if (!pem.includes(marker)) {
    throw new Error(`${label} must be in PEM format. Refusing to start insecure server.`);
  }
  return pem;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Create a WebSocket server that answers each JSON request message with a
 * JSON response. Every request is handled on its own; nothing is shared
 * between messages or connections.
 */
export function createStegoWebSocketServer(options: StegoServerOptions = {}): WebSocket.Server {
  const port = options.port ?? STEGO_SERVER_PORT;
  const maxPayload = options.maxPayload ?? MAX_REQUEST_BYTES;
  let server: WebSocket.Server;

  if (options.tls) {
    // Certificate problems throw; there is no fallback to plain ws://
    const httpsOptions: https.ServerOptions = {
      cert: readPem(options.tls.cert, '-----BEGIN CERTIFICATE-----', 'TLS certificate'),
      key: readPem(options.tls.key, '-----BEGIN', 'TLS private key'),
    };
    if (options.tls.ca) {
      httpsOptions.ca = readPem(options.tls.ca, '-----BEGIN', 'TLS CA certificate');
    }

    const httpsServer = https.createServer(httpsOptions);
    const wss = new WebSocket.Server({ server: httpsServer, maxPayload });

    // ws leaves an external server running, so it is closed along with wss
    httpsServer.on('error', (err) => wss.emit('error', err));
    wss.once('close', () => {
      httpsServer.close((err) => {
        if (err) {
          debug('HTTPS server close failed: %O', err);
        }
      });
    });

    httpsServer.listen(port, () => {
      debug(`Stego WebSocket Secure (WSS) server is running on wss://localhost:${port}`);
    });
    server = wss;
  } else {
    server = new WebSocket.Server({ port, maxPayload });
    debug(`Stego WebSocket server is running on ws://localhost:${port}`);
  }

  // Listen failures such as EADDRINUSE surface here
  server.on('error', (err) => {
    debug('WebSocket server error: %O', err);
  });

  server.on('connection', (ws) => {
    ws.on('message', (data: WebSocket.RawData) => {
      const response = handleStegoRequest(rawDataToString(data));
      ws.send(JSON.stringify(response));
    });

    ws.on('error', (err) => {
      debug('WebSocket client error: %O', err);
    });
  });

  return server;
}
