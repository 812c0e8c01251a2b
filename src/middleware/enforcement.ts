import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { UnconfiguredPolicy } from '../config/env.js';
import { EnforcementError } from '../contracts/errors.js';
import type { DecisionHistory } from '../decisions/history.js';
import type { EnforcementGateway } from '../gateway/gateway.js';
import type { Decision, EvaluationRequest } from '../gateway/types.js';
import { generateRequestId, logger } from '../observability/logger.js';

declare global {
  namespace Express {
    interface Request {
      tenantId?: string;
      requestId?: string;
    }
  }
}

export const TENANT_HEADER = 'x-tenant-id';
export const USER_HEADER = 'x-user-id';

export interface TenantContextOptions {
  defaultTenant: string;
}

/**
 * Resolves the tenant for a request: X-Tenant-ID, then X-User-ID, then the
 * configured default. Authentication happens before this runs.
 *
 * The rest of the chain runs inside a log context carrying the request and
 * tenant ids.
 */
export function tenantContext(options: TenantContextOptions): RequestHandler {
  return (req, _res, next) => {
    const tenantId = req.get(TENANT_HEADER) || req.get(USER_HEADER) || options.defaultTenant;
    const requestId = generateRequestId();
    req.tenantId = tenantId;
    req.requestId = requestId;
    logger.runWithContext({ requestId, tenantId, path: req.path }, () => next());
  };
}

export interface EnforceOptions {
  unconfigured: UnconfiguredPolicy;
  defaultTenant?: string;
  history?: DecisionHistory;
}

export type RequestMapper = (req: Request) => EvaluationRequest | null;

/**
 * Route guard that asks the gateway for a decision. `buildRequest` returns
 * null for requests the guard should not evaluate.
 *
 * deny → 403, unconfigured → 503 or pass-through depending on policy,
 * allow → next() with any warnings on `res.locals.contractWarnings`.
 */
export function enforce(
  gateway: EnforcementGateway,
  buildRequest: RequestMapper,
  options: EnforceOptions
): RequestHandler {
  const handle = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const request = buildRequest(req);
    if (request === null) {
      next();
      return;
    }

    const tenantId = req.tenantId ?? options.defaultTenant ?? 'default';
    const requestId = req.requestId ?? generateRequestId();

    let decision: Decision;
    try {
      decision = gateway.evaluate(tenantId, request);
    } catch (error) {
      next(error);
      return;
    }

    res.locals.decision = decision;

    if (options.history) {
      await options.history.append({
        recordedAt: new Date().toISOString(),
        requestId,
        tenantId,
        request,
        decision,
      });
    }

    if (decision.outcome === 'deny') {
      logger.warn('contract_denied', 'Request denied by contract', {
        contract: request.contract,
        violations: decision.violations.map(v => ({ ruleId: v.ruleId, code: v.code })),
      });
      res.status(403).json({
        error: 'contract_violation',
        contract: request.contract,
        violations: decision.violations,
      });
      return;
    }

    if (decision.outcome === 'unconfigured') {
      logger.warn('contract_unconfigured', 'No contract for tenant', {
        contract: request.contract,
        policy: options.unconfigured,
      });
      if (options.unconfigured === 'deny') {
        res.status(503).json({
          error: 'contract_unconfigured',
          contract: request.contract,
          reason: decision.reason,
        });
        return;
      }
      next();
      return;
    }

    if (decision.violations.length > 0) {
      logger.warn('contract_warnings', 'Request allowed with warnings', {
        contract: request.contract,
        warnings: decision.violations.map(v => v.ruleId),
      });
      res.locals.contractWarnings = decision.violations;
    }
    next();
  };

  return (req, res, next) => {
    handle(req, res, next).catch(next);
  };
}

export const enforcementErrorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (!(error instanceof EnforcementError)) {
    next(error);
    return;
  }

  logger.error('enforcement_error', 'Contract enforcement failed', {
    path: req.path,
    code: error.code,
    error: error.message,
  });
  res.status(500).json({ error: 'enforcement_error', code: error.code });
};
