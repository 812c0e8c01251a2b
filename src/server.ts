import express, { type Express } from 'express';
import type { UnconfiguredPolicy } from './config/env.js';
import type { ContractRegistry } from './contracts/registry.js';
import type { DecisionHistory } from './decisions/history.js';
import { sanitizeDecision } from './decisions/history.js';
import type { EnforcementGateway } from './gateway/gateway.js';
import { evaluationRequestSchema } from './gateway/schema.js';
import { enforcementErrorHandler, tenantContext } from './middleware/enforcement.js';
import { logger } from './observability/logger.js';

export interface AppDependencies {
  registry: ContractRegistry;
  gateway: EnforcementGateway;
  history: DecisionHistory;
  defaultTenant: string;
  unconfiguredPolicy: UnconfiguredPolicy;
}

/**
 * Reference HTTP embedding. Business routes would sit behind `enforce()`;
 * `/evaluate` exposes the decision API directly. Allow and deny are both
 * 200; an unconfigured tenant is 503 when the policy is `deny`.
 */
export function createApp({ registry, gateway, history, defaultTenant, unconfiguredPolicy }: AppDependencies): Express {
  const app = express();
  app.use(express.json());
  app.use(tenantContext({ defaultTenant }));

  app.post('/evaluate', async (req, res, next) => {
    const tenantId = req.tenantId ?? defaultTenant;
    const requestId = req.requestId ?? 'unknown';
    try {
      const parsed = evaluationRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          error: 'invalid_request',
          issues: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
        });
        return;
      }

      const decision = gateway.evaluate(tenantId, parsed.data);
      await history.append({
        recordedAt: new Date().toISOString(),
        requestId,
        tenantId,
        request: parsed.data,
        decision,
      });

      logger.info('evaluation', 'Decision returned', {
        contract: parsed.data.contract,
        kind: parsed.data.kind,
        outcome: decision.outcome,
        violations: decision.violations.length,
      });
      const status = decision.outcome === 'unconfigured' && unconfiguredPolicy === 'deny' ? 503 : 200;
      res.status(status).json(decision);
    } catch (error) {
      next(error);
    }
  });

  app.get('/contracts/:tenant/:name', (req, res) => {
    const { tenant, name } = req.params;
    const history = registry.history(tenant, name);
    const active = registry.tryResolve(tenant, name);

    if (!active) {
      res.status(404).json({ error: 'Contract not found', tenant, name });
      return;
    }

    res.status(200).json({
      id: active.id,
      tenantScope: active.tenantScope,
      version: active.version,
      hash: active.hash,
      rules: active.rules.map(r => ({ id: r.id, type: r.type, severity: r.severity, description: r.description })),
      versions: history.map(c => ({ id: c.id, version: c.version, hash: c.hash })),
    });
  });

  app.get('/decisions', async (req, res, next) => {
    try {
      const limit = Number.parseInt(String(req.query.limit ?? ''), 10) || 50;
      const actualLimit = Math.min(Math.max(1, limit), 100);

      const decisions = await history.getRecent(actualLimit);
      const stats = await history.getStats();

      res.status(200).json({
        decisions: decisions.map(sanitizeDecision),
        meta: {
          count: decisions.length,
          limit: actualLimit,
          total: stats.count,
          maxSize: stats.maxSize,
          storageType: stats.type,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', contracts: registry.list().length });
  });

  app.use(enforcementErrorHandler);
  return app;
}
