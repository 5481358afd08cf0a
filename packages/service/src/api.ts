import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import type { Logger } from 'pino';
import { isLedgerError, type Address } from '@spoke-ledger/core';
import { stringifyBigInts, stringifyFields } from '@spoke-ledger/core/utils';
import { HTTP_STATUS, SERVICE_ERROR_CODES, SERVICE_NAME } from './constants';
import type { Market } from './bootstrap';
import type { AccountStorage } from './storage';
import type { HealthMonitor } from './health-monitor';
import {
  RequestError,
  createError,
  isRecord,
  parseAddress,
  parseAmount,
  parseBoolean,
  parseReserveId,
  parseUnsigned,
  statusForLedgerError,
} from './utils';

export interface LedgerAPIDeps {
  market: Market;
  storage: AccountStorage;
  monitor: HealthMonitor;
  logger: Logger;
  /** when set, every POST must carry it in the X-API-Key header */
  apiKey?: string;
}

type AmountAction = {
  path: string;
  run: (caller: Address, reserveId: number, amount: bigint, user: Address) => Record<string, bigint>;
};

async function readBody(c: Context): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await c.req.json<unknown>();
  } catch {
    throw new RequestError('Request body must be valid JSON');
  }
  if (!isRecord(body)) {
    throw new RequestError('Request body must be a JSON object');
  }
  return body;
}

function callerOf(body: Record<string, unknown>, user: Address): Address {
  return body.caller === undefined ? user : parseAddress(body.caller, 'caller');
}

/**
 * Creates the HTTP API over one spoke and its collaborators.
 *
 * The API key only admits an operator; the `caller` and `liquidator` fields
 * are taken from the request body as given, so the spoke's position manager
 * checks hold between the identities that operator names, not against the
 * client itself.
 */
export function createLedgerAPI({ market, storage, monitor, logger, apiKey }: LedgerAPIDeps) {
  const { spoke, hub, oracle, symbols } = market;
  const app = new Hono();

  // Enable CORS for all origins
  app.use('*', cors({
    origin: (origin) => origin || '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
    exposeHeaders: ['Content-Length'],
    maxAge: 86400,
  }));

  if (apiKey) {
    app.use('*', async (c, next) => {
      if (c.req.method !== 'POST') {
        return next();
      }
      if (c.req.header('X-API-Key') !== apiKey) {
        logger.warn({ path: c.req.path }, 'Unauthorized write attempt');
        return c.json(
          { success: false, error: createError(SERVICE_ERROR_CODES.INVALID_API_KEY, 'Missing or invalid X-API-Key header') },
          HTTP_STATUS.UNAUTHORIZED
        );
      }
      return next();
    });
  }

  app.onError((error, c) => {
    if (isLedgerError(error)) {
      logger.info({ code: error.code, path: c.req.path, details: stringifyBigInts(error.details) }, 'Request rejected by ledger');
      return c.json({ success: false, error: createError(error.code, error.message) }, statusForLedgerError(error));
    }
    if (error instanceof RequestError) {
      return c.json(
        { success: false, error: createError(SERVICE_ERROR_CODES.INVALID_REQUEST, error.message) },
        HTTP_STATUS.BAD_REQUEST
      );
    }
    logger.error({ error, path: c.req.path }, 'Unhandled request error');
    return c.json(
      { success: false, error: createError(SERVICE_ERROR_CODES.INTERNAL_ERROR, 'Internal server error') },
      HTTP_STATUS.INTERNAL_SERVER_ERROR
    );
  });

  function reserveView(reserveId: number) {
    const reserve = spoke.getReserve(reserveId);
    const asset = hub.getAsset(reserve.assetId);
    return stringifyFields({
      reserveId,
      symbol: symbols.get(reserveId) ?? null,
      assetId: reserve.assetId,
      decimals: reserve.decimals,
      ...spoke.getReserveConfig(reserveId),
      dynamicConfigKey: reserve.dynamicConfigKey,
      dynamicConfig: spoke.getDynamicReserveConfig(reserveId),
      price: oracle.getPrices().get(reserveId) ?? null,
      totalAddedAssets: asset.totalAddedAssets,
      liquidity: asset.liquidity,
      drawnDebt: asset.drawnDebt,
      premiumDebt: asset.premiumDebt,
      deficit: asset.deficit,
      drawnIndex: asset.drawnIndex,
    });
  }

  function positionView(reserveId: number, user: Address) {
    return stringifyFields({
      reserveId,
      symbol: symbols.get(reserveId) ?? null,
      ...spoke.getUserPosition(reserveId, user),
      suppliedAssets: spoke.getUserSuppliedAssets(reserveId, user),
      ...spoke.getUserDebt(reserveId, user),
      usingAsCollateral: spoke.isUsingAsCollateral(reserveId, user),
      borrowing: spoke.isBorrowing(reserveId, user),
    });
  }

  function accountView(user: Address) {
    return stringifyFields(spoke.getUserAccountData(user));
  }

  // ==================== Health Check ====================

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: Date.now(),
      reserves: spoke.getReserveCount(),
      monitor: monitor.getStatus(),
    });
  });

  // Every listed reserve priced and the monitor watching accounts
  app.get('/ready', (c) => {
    const prices = oracle.getPrices();
    const status = monitor.getStatus();
    const issues: string[] = [];

    const unpriced = spoke
      .getReserves()
      .filter((reserve) => !prices.has(reserve.reserveId))
      .map((reserve) => symbols.get(reserve.reserveId) ?? String(reserve.reserveId));
    if (unpriced.length > 0) {
      issues.push(`reserves without a price: ${unpriced.join(', ')}`);
    }
    if (!status.isRunning) {
      issues.push('health monitor is not running');
    }

    const ready = issues.length === 0;
    return c.json(
      {
        ready,
        issues,
        reserves: spoke.getReserveCount(),
        priced: prices.size,
        liquidatable: status.liquidatable,
      },
      ready ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE
    );
  });

  // ==================== Reserves ====================

  app.get('/reserves', (c) => {
    const reserves = spoke.getReserves().map((reserve) => reserveView(reserve.reserveId));
    return c.json({ reserves, total: reserves.length });
  });

  app.get('/reserves/:reserveId', (c) => {
    const reserveId = parseReserveId(c.req.param('reserveId'));
    return c.json({ reserve: reserveView(reserveId) });
  });

  // ==================== Users ====================

  app.get('/users/:address/account', (c) => {
    const user = parseAddress(c.req.param('address'), 'address');
    const positions = spoke.getReserves()
      .map((reserve) => reserve.reserveId)
      .filter((reserveId) =>
        spoke.isUsingAsCollateral(reserveId, user)
        || spoke.isBorrowing(reserveId, user)
        || spoke.getUserSuppliedShares(reserveId, user) > 0n
      )
      .map((reserveId) => positionView(reserveId, user));

    return c.json({
      user,
      account: accountView(user),
      hasPositiveRiskPremium: spoke.hasPositiveRiskPremium(user),
      positions,
    });
  });

  app.get('/users/:address/positions/:reserveId', (c) => {
    const user = parseAddress(c.req.param('address'), 'address');
    const reserveId = parseReserveId(c.req.param('reserveId'));
    return c.json({ user, position: positionView(reserveId, user) });
  });

  const amountActions: AmountAction[] = [
    { path: 'supply', run: (caller, reserveId, amount, user) => ({ shares: spoke.supply(caller, reserveId, amount, user) }) },
    { path: 'withdraw', run: (caller, reserveId, amount, user) => ({ amount: spoke.withdraw(caller, reserveId, amount, user) }) },
    { path: 'borrow', run: (caller, reserveId, amount, user) => ({ shares: spoke.borrow(caller, reserveId, amount, user) }) },
    { path: 'repay', run: (caller, reserveId, amount, user) => ({ amount: spoke.repay(caller, reserveId, amount, user) }) },
  ];

  for (const action of amountActions) {
    app.post(`/users/:address/${action.path}`, async (c) => {
      const user = parseAddress(c.req.param('address'), 'address');
      const body = await readBody(c);
      const reserveId = parseReserveId(body.reserveId);
      const amount = parseAmount(body.amount, 'amount');
      const caller = callerOf(body, user);

      const result = action.run(caller, reserveId, amount, user);
      return c.json({ success: true, ...stringifyFields(result), account: accountView(user) });
    });
  }

  app.post('/users/:address/collateral', async (c) => {
    const user = parseAddress(c.req.param('address'), 'address');
    const body = await readBody(c);
    const reserveId = parseReserveId(body.reserveId);
    const enabled = parseBoolean(body.enabled, 'enabled');

    spoke.setUsingAsCollateral(callerOf(body, user), reserveId, enabled, user);
    return c.json({ success: true, reserveId, enabled, account: accountView(user) });
  });

  app.post('/users/:address/risk-premium', async (c) => {
    const user = parseAddress(c.req.param('address'), 'address');
    const body = await readBody(c);

    const riskPremium = spoke.updateUserRiskPremium(callerOf(body, user), user);
    return c.json({ success: true, riskPremium: riskPremium.toString() });
  });

  app.post('/users/:address/dynamic-config', async (c) => {
    const user = parseAddress(c.req.param('address'), 'address');
    const body = await readBody(c);

    spoke.updateUserDynamicConfig(callerOf(body, user), user);
    return c.json({ success: true, account: accountView(user) });
  });

  // ==================== Liquidations ====================

  app.post('/liquidations', async (c) => {
    const body = await readBody(c);
    const collateralReserveId = parseReserveId(body.collateralReserveId, 'collateralReserveId');
    const debtReserveId = parseReserveId(body.debtReserveId, 'debtReserveId');
    const user = parseAddress(body.user, 'user');
    const liquidator = parseAddress(body.liquidator, 'liquidator');
    const debtToCover = parseAmount(body.debtToCover, 'debtToCover');

    const outcome = spoke.liquidationCall(liquidator, collateralReserveId, debtReserveId, user, debtToCover);
    return c.json({ success: true, outcome: stringifyFields(outcome), account: accountView(user) });
  });

  app.get('/liquidatable', (c) => {
    const accounts = storage.getLiquidatable().map((snapshot) => ({
      user: snapshot.user,
      updatedAt: snapshot.updatedAt,
      account: stringifyFields(snapshot.accountData),
    }));
    return c.json({ accounts, total: accounts.length });
  });

  // ==================== Prices ====================

  app.get('/prices', (c) => {
    const prices: Record<string, string> = {};
    for (const [reserveId, price] of oracle.getPrices()) {
      prices[String(reserveId)] = price.toString();
    }
    return c.json({ prices, timestamp: Date.now() });
  });

  app.post('/prices/:reserveId', async (c) => {
    const reserveId = parseReserveId(c.req.param('reserveId'));
    const body = await readBody(c);
    const price = parseUnsigned(body.price, 'price');

    spoke.getReserve(reserveId);
    oracle.setReservePrice(reserveId, price);
    logger.info({ reserveId, symbol: symbols.get(reserveId), price: price.toString() }, 'Price updated');

    const result = monitor.handlePriceUpdate(reserveId);
    return c.json({ success: true, reserveId, price: price.toString(), ...result });
  });

  return app;
}
