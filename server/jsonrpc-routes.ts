/**
 * Legacy JSON-RPC endpoint
 *
 * A small slice of the LMS JSON-RPC interface so that third-party control
 * surfaces built for it can drive players. The reply is always plain text:
 * `success` or `command not supported`. A recognized phrase whose dispatch
 * fails (unknown player, rejected argument) also answers
 * `command not supported`; the failure is logged.
 */

import { Router, type Request, type Response } from 'express';
import { LEGACY_REPLY } from '@shared/gateway-protocol';
import { LegacyRpcRequestSchema } from '@shared/schemas';
import type { CommandDispatcher } from './command-dispatcher';
import { parseLegacyPhrase } from './command-normalizer';
import { createLogger } from './logger';

const rpcLogger = createLogger('JsonRpc');

export function createLegacyRpcRouter(dispatcher: CommandDispatcher): Router {
  const router = Router();

  const handle = async (req: Request, res: Response) => {
    rpcLogger.debug(`jsonrpc: ${JSON.stringify(req.body)}`);

    const request = LegacyRpcRequestSchema.safeParse(req.body);
    if (!request.success) {
      rpcLogger.warn('Malformed jsonrpc request body');
      return res.status(400).type('text/plain').send(LEGACY_REPLY.NOT_SUPPORTED);
    }

    const [playerId, words] = request.data.params;
    const parsed = parseLegacyPhrase(playerId, words);
    if (!parsed.ok) {
      rpcLogger.debug(`${parsed.error}: ${parsed.reason}`);
      return res.type('text/plain').send(LEGACY_REPLY.NOT_SUPPORTED);
    }

    const result = await dispatcher.dispatchCommand(parsed.value);
    if (!result.ok) {
      rpcLogger.warn(`${parsed.value.name} on ${playerId} failed: ${result.error} (${result.message})`);
      return res.type('text/plain').send(LEGACY_REPLY.NOT_SUPPORTED);
    }
    res.type('text/plain').send(LEGACY_REPLY.SUCCESS);
  };

  router.get('/jsonrpc.js', handle);
  router.post('/jsonrpc.js', handle);

  return router;
}
