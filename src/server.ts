import fastify, { FastifyError, FastifyInstance } from 'fastify';

import { HttpServerError, errorMessage } from './errors';
import { ServerConfig } from './types';
import { Logger } from './services/Logger';
import { DefaultRoutingStrategy } from './strategy/RoutingStrategy';
import {
  validateJsonRpcRequest,
  validateRouteParams,
  createJsonRpcError,
  JSON_RPC_ERRORS,
} from './validation';

export interface RunningServer {
  address: string;
  server: FastifyInstance;
  shutdown: () => Promise<void>;
}

interface RpcRoute {
  Params: { projectId: string; chainId: string };
  Body: unknown;
}

const JSON_BODY_ERROR_CODES: ReadonlySet<string> = new Set([
  'FST_ERR_CTP_INVALID_JSON_BODY',
  'FST_ERR_CTP_EMPTY_JSON_BODY',
]);

// fastify 4's JSON parser rethrows the SyntaxError itself, tagged with a 400
function isJsonBodyError(error: FastifyError): boolean {
  return JSON_BODY_ERROR_CODES.has(error.code) || error instanceof SyntaxError;
}

export function createGatewayServer(strategy: DefaultRoutingStrategy, logger: Logger): FastifyInstance {
  const server = fastify({
    logger: { level: logger.frameworkLevel },
    ignoreTrailingSlash: true,
    return503OnClosing: true,
  });

  // Body parser failures and other framework errors still answer in JSON-RPC shape
  server.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode === 415) {
      return reply
        .code(415)
        .send(createJsonRpcError(JSON_RPC_ERRORS.INVALID_REQUEST, 'Content-Type must be application/json', null));
    }
    if (isJsonBodyError(error)) {
      return reply
        .code(400)
        .send(createJsonRpcError(JSON_RPC_ERRORS.PARSE_ERROR, 'Parse error', null, error.message));
    }
    if (statusCode >= 400 && statusCode < 500) {
      return reply
        .code(statusCode)
        .send(createJsonRpcError(JSON_RPC_ERRORS.INVALID_REQUEST, 'Invalid Request', null, error.message));
    }

    logger.error(`💥 Request handling error for ${request.url}: ${error.message}`);
    return reply
      .code(500)
      .send(createJsonRpcError(JSON_RPC_ERRORS.INTERNAL_ERROR, 'Internal error', null));
  });

  server.get('/health', async () => {
    return {
      projects: strategy.getRegistry().getHealthStatus(),
      timestamp: new Date().toISOString(),
    };
  });

  server.post<RpcRoute>('/:projectId/:chainId', async (request, reply) => {
    const route = validateRouteParams(request.params, request.body);
    if (!route.success) {
      return reply.code(400).send(route.error);
    }

    const validationResult = validateJsonRpcRequest(request.body);
    if (!validationResult.success) {
      logger.debug(`❌ Validation failed for ${request.url}`, validationResult.error.error);
      return reply.code(400).send(validationResult.error);
    }

    const { projectId, chainId } = route.data;
    const rpcRequest = validationResult.data;
    const rpcId = rpcRequest.id ?? null;

    // Client went away before we answered: stop waiting on the upstream
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    };
    reply.raw.once('close', onClose);

    try {
      const outcome = await strategy.route(
        {
          projectId,
          chainId,
          rpcMethod: rpcRequest.method,
          rpcParams: rpcRequest.params,
          rpcId,
        },
        { signal: controller.signal }
      );

      if (outcome.success) {
        return reply
          .code(200)
          .type('application/json')
          .send(JSON.stringify(outcome.result));
      }

      const { code, message, data } = outcome.error.toJsonRpcError();
      return reply.code(outcome.error.statusCode).send(createJsonRpcError(code, message, rpcId, data));
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  return server;
}

async function closeWithGrace(server: FastifyInstance, graceMs: number, logger: Logger): Promise<void> {
  logger.info('🔄 Shutting down gracefully...');
  const forceClose = setTimeout(() => {
    logger.warn(`Grace period of ${graceMs}ms elapsed, closing remaining connections`);
    server.server.closeAllConnections();
  }, graceMs);

  try {
    await server.close();
    logger.info('✅ Server closed successfully');
  } finally {
    clearTimeout(forceClose);
  }
}

/**
 * Binds the gateway to the configured address. Rejects with HttpServerError
 * when the address cannot be bound; the returned shutdown may be called any
 * number of times.
 */
export async function startServer(
  serverConfig: ServerConfig,
  strategy: DefaultRoutingStrategy,
  logger: Logger
): Promise<RunningServer> {
  const server = createGatewayServer(strategy, logger);
  const { httpHost, httpPort, shutdownGraceMs } = serverConfig;

  let address: string;
  try {
    address = await server.listen({ host: httpHost, port: httpPort });
  } catch (error) {
    const bindError = new HttpServerError(httpHost, httpPort, error);
    await server.close().catch((closeError: unknown) => {
      logger.debug(`Ignoring close failure after bind error: ${errorMessage(closeError)}`);
    });
    throw bindError;
  }

  logger.info(`🚀 Gateway listening on ${address}`);

  let closing: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    if (!closing) {
      closing = closeWithGrace(server, shutdownGraceMs, logger);
    }
    return closing;
  };

  return { address, server, shutdown };
}
