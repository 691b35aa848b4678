import fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { Bytes32Schema, EvmAddressSchema } from '../infra/address';
import { log } from '../infra/logger';
import { MarginError, MarginErrorCode, type ErrorCategory } from '../margin/errors';
import type { HealthEngine } from '../margin/health_engine';
import type { MarginManager } from '../margin/manager';
import type { MarketRegistry } from '../margin/market_registry';
import type { SubAccountStore } from '../margin/sub_accounts';
import {
  serializeError,
  serializeHealth,
  serializeLiquidation,
  serializeMarginError,
  serializeMarket,
  serializeReceipt,
  serializeSubAccount,
} from '../util/serialize';

export type ServerDeps = {
  engine: HealthEngine;
  manager: MarginManager;
  registry: MarketRegistry;
  subAccounts: SubAccountStore;
};

const AccountParamsSchema = z.object({ account: EvmAddressSchema });
const LiquidateBodySchema = z.object({ caller: EvmAddressSchema });

// token amounts travel as decimal strings in native units
const AmountSchema = z
  .string()
  .regex(/^[0-9]+$/)
  .transform((value) => BigInt(value));

const CallerRequestSchema = z.object({
  params: AccountParamsSchema,
  body: z.object({ caller: EvmAddressSchema }),
});

const TokenRequestSchema = z.object({
  params: AccountParamsSchema,
  body: z.object({ caller: EvmAddressSchema, token: EvmAddressSchema, amount: AmountSchema }),
});

const MarketRequestSchema = z.object({
  params: AccountParamsSchema,
  body: z.object({ caller: EvmAddressSchema, marketId: Bytes32Schema, amount: AmountSchema }),
});

const OrderRequestSchema = z.object({
  params: AccountParamsSchema,
  body: z.object({
    caller: EvmAddressSchema,
    market: z.number().int().nonnegative(),
    side: z.enum(['buy', 'sell']),
    size: AmountSchema,
    limitPrice: AmountSchema,
    reduceOnly: z.boolean().default(false),
  }),
});

const CancelRequestSchema = z.object({
  params: AccountParamsSchema.extend({ orderId: z.string().regex(/^[0-9]+$/) }),
  body: z.object({ caller: EvmAddressSchema }),
});

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  configuration: 400,
  authorization: 403,
  precondition: 409,
  external: 502,
};

export function statusFor(err: MarginError): number {
  if (err.code === MarginErrorCode.NoSubAccount) return 404;
  return STATUS_BY_CATEGORY[err.category];
}

function invalidRequest(message: string) {
  return { error: { code: 'invalid_request', category: 'request', message } };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const app = fastify({ logger: false });
  const serverLog = log.child({ module: 'risk-engine.server' });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof MarginError) {
      reply.code(statusFor(err)).send(serializeMarginError(err));
      return;
    }
    serverLog.error({ err: serializeError(err), url: req.url }, 'request-failed');
    reply.code(500).send({ error: { code: 'internal_error', category: 'internal', message: 'internal error' } });
  });

  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    markets: deps.registry.size,
    subAccounts: deps.subAccounts.size,
  }));

  app.get('/markets', async () => {
    const rows = deps.registry.list().map(serializeMarket);
    return { count: rows.length, rows };
  });

  app.get('/accounts/:account/health', async (req, reply) => {
    const params = AccountParamsSchema.safeParse(req.params);
    if (!params.success) {
      reply.code(400);
      return invalidRequest('account must be a 20-byte hex address');
    }
    const status = await deps.engine.evaluateHealth(params.data.account);
    return serializeHealth(status);
  });

  app.post('/accounts/:account/liquidate', async (req, reply) => {
    const params = AccountParamsSchema.safeParse(req.params);
    if (!params.success) {
      reply.code(400);
      return invalidRequest('account must be a 20-byte hex address');
    }
    const body = LiquidateBodySchema.safeParse(req.body);
    if (!body.success) {
      reply.code(400);
      return invalidRequest('body must include caller as a 20-byte hex address');
    }
    const result = await deps.engine.liquidate(params.data.account, body.data.caller);
    return serializeLiquidation(result);
  });

  // owner operations: `account` is the owner, `caller` must match it

  app.post('/accounts/:account/sub-account', async (req, reply) => {
    const parsed = CallerRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const sub = await deps.manager.openSubAccount(parsed.data.params.account, parsed.data.body.caller);
    reply.code(201);
    return serializeSubAccount(sub);
  });

  app.post('/accounts/:account/fund', async (req, reply) => {
    const parsed = TokenRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    await deps.manager.fund(params.account, body.caller, body.token, body.amount);
    return { status: 'ok' };
  });

  app.post('/accounts/:account/sweep', async (req, reply) => {
    const parsed = TokenRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    await deps.manager.sweep(params.account, body.caller, body.token, body.amount);
    return { status: 'ok' };
  });

  app.post('/accounts/:account/collateral/deposit', async (req, reply) => {
    const parsed = MarketRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    await deps.manager.depositCollateral(params.account, body.caller, body.marketId, body.amount);
    return { status: 'ok' };
  });

  app.post('/accounts/:account/collateral/withdraw', async (req, reply) => {
    const parsed = MarketRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    const withdrawn = await deps.manager.withdrawCollateral(params.account, body.caller, body.marketId, body.amount);
    return { withdrawn: withdrawn.toString() };
  });

  app.post('/accounts/:account/borrow', async (req, reply) => {
    const parsed = MarketRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    return serializeReceipt(await deps.manager.borrow(params.account, body.caller, body.marketId, body.amount));
  });

  app.post('/accounts/:account/repay', async (req, reply) => {
    const parsed = MarketRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    return serializeReceipt(await deps.manager.repay(params.account, body.caller, body.marketId, body.amount));
  });

  app.post('/accounts/:account/exchange/deposit', async (req, reply) => {
    const parsed = TokenRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    await deps.manager.depositToExchange(params.account, body.caller, body.token, body.amount);
    return { status: 'ok' };
  });

  app.post('/accounts/:account/exchange/withdraw', async (req, reply) => {
    const parsed = TokenRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    const withdrawn = await deps.manager.withdrawFromExchange(params.account, body.caller, body.token, body.amount);
    return { withdrawn: withdrawn.toString() };
  });

  app.post('/accounts/:account/orders', async (req, reply) => {
    const parsed = OrderRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    const orderId = await deps.manager.placeOrder(params.account, body.caller, {
      market: body.market,
      side: body.side,
      size: body.size,
      limitPrice: body.limitPrice,
      reduceOnly: body.reduceOnly,
    });
    reply.code(201);
    return { orderId };
  });

  app.post('/accounts/:account/orders/:orderId/cancel', async (req, reply) => {
    const parsed = CancelRequestSchema.safeParse({ params: req.params, body: req.body });
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(describeIssues(parsed.error));
    }
    const { params, body } = parsed.data;
    await deps.manager.cancelOrder(params.account, body.caller, params.orderId);
    return { cancelled: params.orderId };
  });

  return app;
}
