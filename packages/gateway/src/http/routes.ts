/**
 * HTTP API Routes
 *
 * Thin controllers over the devnet: validate input, run one chain
 * transaction, return state. No transfer logic here.
 *
 * Bigints travel as decimal strings in both directions.
 */

import { Router, Request, Response, NextFunction } from 'express';
import {
  address,
  EMPTY_BYTES,
  GatewayError,
  hexData,
  transferNonce,
  ValidationError,
} from '../boundaries/index.js';
import type { Address, GatewayErrorCategory, HexData } from '../boundaries/index.js';
import { Revert } from '../local/index.js';
import type { Devnet, Side } from '../local/index.js';
import type { Logger } from '../utils/index.js';

export interface RouteOptions {
  /** Messenger gas limit used when a deposit names none. */
  defaultGasLimit: bigint;
}

// =============================================================================
// VALIDATION
// =============================================================================

type Body = Record<string, unknown>;

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('INVALID_BODY', 'Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

function validateSide(value: unknown, fieldName: string): Side {
  if (value !== 'l1' && value !== 'l2') {
    throw new ValidationError('INVALID_SIDE', `${fieldName} must be "l1" or "l2"`);
  }
  return value;
}

function validateAddress(value: unknown, fieldName: string): Address {
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_ADDRESS', `${fieldName} must be an address string`);
  }
  return address(value);
}

function validateHex(value: unknown, fieldName: string): HexData {
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_HEX', `${fieldName} must be a hex string`);
  }
  return hexData(value);
}

function validateUint(value: unknown, fieldName: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError('INVALID_AMOUNT', `${fieldName} must be a decimal integer string`);
  }
  return BigInt(value);
}

function validateNonce(value: unknown, fieldName: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError('INVALID_NONCE', `${fieldName} must be a decimal integer string`);
  }
  return transferNonce(value);
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export function createRoutes(devnet: Devnet, logger: Logger, options: RouteOptions): Router {
  const router = Router();

  // ===========================================================================
  // GET /transfers/:side/:nonce
  // Ledger status of one transfer on the destination gateway
  // ===========================================================================
  router.get(
    '/transfers/:side/:nonce',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const side = validateSide(req.params.side, 'side');
        const nonce = validateNonce(req.params.nonce, 'nonce');

        res.json({
          side,
          nonce: nonce.toString(),
          status: devnet.side(side).gateway.statusOf(nonce),
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // GET /balances/:side/:address
  // ===========================================================================
  router.get(
    '/balances/:side/:address',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const side = validateSide(req.params.side, 'side');
        const account = validateAddress(req.params.address, 'address');

        const balance = await devnet.side(side).token.balanceOf(account);
        res.json({ side, address: account, balance: balance.toString() });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /faucet
  // Mint test USDC
  // ===========================================================================
  router.post(
    '/faucet',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = readBody(req);
        const side = validateSide(body.side, 'side');
        const to = validateAddress(body.to, 'to');
        const amount = validateUint(body.amount, 'amount');

        await devnet.faucet(side, to, amount);
        logger.info({ chain: side, to, amount }, 'Faucet mint');

        const balance = await devnet.side(side).token.balanceOf(to);
        res.json({ side, to, balance: balance.toString() });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /deposits
  // Approve and deposit as `sender`, in one transaction
  // ===========================================================================
  router.post(
    '/deposits',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = readBody(req);
        const side = validateSide(body.side, 'side');
        const sender = validateAddress(body.sender, 'sender');
        const to = validateAddress(body.to, 'to');
        const amount = validateUint(body.amount, 'amount');
        const data = body.data === undefined ? EMPTY_BYTES : validateHex(body.data, 'data');
        const gasLimit = body.gasLimit === undefined ? options.defaultGasLimit : validateUint(body.gasLimit, 'gasLimit');
        const fee = body.fee === undefined ? 0n : validateUint(body.fee, 'fee');

        const { chain, token, gateway } = devnet.side(side);
        const nonce = await chain.transact(sender, fee, async (ctx) => {
          await token.approve(ctx, gateway.address, amount);
          return gateway.deposit(ctx, { token: token.address, to, amount, data, gasLimit });
        });

        logger.info({ chain: side, nonce, sender, to, amount }, 'Deposit submitted');
        res.status(201).json({ side, nonce: nonce.toString() });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /claims
  // ===========================================================================
  router.post(
    '/claims',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = readBody(req);
        const side = validateSide(body.side, 'side');
        const nonce = validateNonce(body.nonce, 'nonce');
        const message = validateHex(body.message, 'message');
        const attestation = validateHex(body.attestation, 'attestation');
        const claimer = validateAddress(body.claimer, 'claimer');

        const { chain, gateway } = devnet.side(side);
        await chain.transact(claimer, 0n, (ctx) => gateway.claim(ctx, nonce, message, attestation));

        logger.info({ chain: side, nonce, claimer }, 'Transfer claimed');
        res.json({ side, nonce: nonce.toString(), status: gateway.statusOf(nonce) });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // POST /relay-and-claim
  // ===========================================================================
  router.post(
    '/relay-and-claim',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = readBody(req);
        const side = validateSide(body.side, 'side');
        const nonce = validateNonce(body.nonce, 'nonce');
        const message = validateHex(body.message, 'message');
        const attestation = validateHex(body.attestation, 'attestation');
        const relayCall = validateHex(body.relayCall, 'relayCall');
        const claimer = validateAddress(body.claimer, 'claimer');

        const { chain, gateway } = devnet.side(side);
        await chain.transact(claimer, 0n, (ctx) =>
          gateway.relayAndClaim(ctx, nonce, message, attestation, relayCall)
        );

        logger.info({ chain: side, nonce, claimer }, 'Transfer relayed and claimed');
        res.json({ side, nonce: nonce.toString(), status: gateway.statusOf(nonce) });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

const STATUS_BY_CATEGORY: Record<GatewayErrorCategory, number> = {
  VALIDATION: 400,
  AUTHORIZATION: 403,
  STATE_PRECONDITION: 409,
  COLLABORATOR: 502,
};

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof GatewayError) {
      res.status(STATUS_BY_CATEGORY[err.category]).json({
        error: err.message,
        code: err.code,
        category: err.category,
      });
      return;
    }

    if (err instanceof Revert) {
      res.status(422).json({ error: err.message, code: 'REVERT' });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
