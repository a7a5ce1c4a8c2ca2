import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadApiConfig, type ApiConfig } from './config.js';
import { errorBody, handleCapo, handleProgression, handleRank, handleVoicings, listInstruments } from './index.js';

export interface ApiServer {
  server: Server;
  port: number;
  config: ApiConfig;
}

export interface ApiServerOptions {
  log?: (line: string) => void;
}

type RouteHandler = (body: unknown, config: ApiConfig) => unknown;

const writeLog = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

const readRequestBody = async (request: IncomingMessage): Promise<string> =>
  await new Promise<string>((resolveBody, rejectBody) => {
    let body = '';
    request.setEncoding('utf8');
    request.on('data', (chunk: string) => {
      body += chunk;
    });
    request.on('end', () => resolveBody(body));
    request.on('error', (error: Error) => rejectBody(error));
  });

const sendJson = (response: ServerResponse<IncomingMessage>, statusCode: number, payload: unknown): void => {
  response.writeHead(statusCode, { 'content-type': 'application/json; charset=utf-8' });
  response.end(JSON.stringify(payload));
};

const postRoutes: Record<string, RouteHandler> = {
  '/api/voicings': handleVoicings,
  '/api/capo': handleCapo,
  '/api/rank': handleRank,
  '/api/progression': handleProgression,
};

const routePath = (url: string | undefined): string => (url ?? '/').split('?')[0] ?? '/';

export const createApiServer = (config: ApiConfig = loadApiConfig(), options: ApiServerOptions = {}): ApiServer => {
  const log = options.log ?? writeLog;

  const handleRequest = async (request: IncomingMessage, response: ServerResponse<IncomingMessage>): Promise<void> => {
    const path = routePath(request.url);

    if (request.method === 'GET' && path === '/api/health') {
      sendJson(response, 200, { ok: true });
      return;
    }

    if (request.method === 'GET' && path === '/api/instruments') {
      sendJson(response, 200, { instruments: listInstruments() });
      return;
    }

    const handler = request.method === 'POST' ? postRoutes[path] : undefined;
    if (!handler) {
      sendJson(response, 404, { error: `No route for ${request.method ?? 'GET'} ${path}.` });
      return;
    }

    try {
      const body = await readRequestBody(request);
      const payload: unknown = body.trim() === '' ? {} : JSON.parse(body);
      sendJson(response, 200, handler(payload, config));
    } catch (error) {
      sendJson(response, 400, errorBody(error));
    }
  };

  const server = createServer((request, response) => {
    const startedAt = performance.now();
    response.on('finish', () => {
      const elapsed = (performance.now() - startedAt).toFixed(1);
      log(`${request.method ?? 'GET'} ${routePath(request.url)} ${response.statusCode} ${elapsed}ms`);
    });

    handleRequest(request, response).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : 'Unexpected server error.';
      process.stderr.write(`Request failed: ${message}\n`);
      if (!response.headersSent) {
        sendJson(response, 500, { error: message });
      }
    });
  });

  return { server, port: config.port, config };
};

export const startApiServer = async (config?: ApiConfig, options?: ApiServerOptions): Promise<ApiServer> => {
  const apiServer = createApiServer(config, options);
  await new Promise<void>((resolveStart, rejectStart) => {
    const onError = (error: Error): void => {
      apiServer.server.off('listening', onListening);
      rejectStart(error);
    };

    const onListening = (): void => {
      apiServer.server.off('error', onError);
      resolveStart();
    };

    apiServer.server.once('error', onError);
    apiServer.server.once('listening', onListening);
    apiServer.server.listen(apiServer.port);
  });
  return apiServer;
};

export const isServerEntrypointInvocation = (moduleUrl: string, argvPath: string | undefined): boolean =>
  argvPath !== undefined && fileURLToPath(moduleUrl) === resolve(argvPath);

if (isServerEntrypointInvocation(import.meta.url, process.argv[1])) {
  const apiServer = await startApiServer();
  const address = apiServer.server.address();
  const port = address !== null && typeof address !== 'string' ? address.port : apiServer.port;
  process.stdout.write(
    `Fingerboard API listening on http://localhost:${port} (default instrument ${apiServer.config.defaultInstrument}, up to ${apiServer.config.maxResults} results)\n`,
  );
}
