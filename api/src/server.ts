import { Router, type Request, type Response } from 'express';
import {
  buildIdQuery,
  config,
  effectiveLimit,
  errorMessage,
  extractDomain,
  isWellFormedId,
  logger,
  partitionIds,
  repairDomain,
  sameEntity,
  fieldText,
  validateIdQuery,
} from '@shellmatch/shared';
import { analyzeAccounts, analyzeRecords, isQueryable, type PipelineDeps } from '@shellmatch/worker';

function stringList(v: unknown): string[] | null {
  if (!Array.isArray(v)) return null;
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string' && typeof item !== 'number') return null;
    out.push(String(item).trim());
  }
  return out.filter(Boolean);
}

function positiveInt(v: unknown): number | undefined {
  const n = typeof v === 'number' ? v : typeof v === 'string' && v.trim() ? Number(v) : NaN;
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

function bodyField(req: Request, key: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) return undefined;
  return new Map<string, unknown>(Object.entries(body)).get(key);
}

function fail(res: Response, status: number, message: string) {
  return res.status(status).json({ status: 'error', message });
}

export function createServer(deps: PipelineDeps) {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      message: 'Account to shell account assessment API',
      version: '1.0.0',
      status: 'running',
      recordSource: deps.source.name,
      judge: deps.judge.name,
      badDomains: deps.badDomains.size,
    });
  });

  // GET /api/accounts/:id
  router.get('/accounts/:id', async (req, res) => {
    const id = String(req.params.id || '').trim();
    if (!isWellFormedId(id, config.accountIdPrefix)) {
      return fail(res, 400, `Invalid Account ID '${id}': expected 15 or 18 characters starting with '${config.accountIdPrefix}'`);
    }
    try {
      const started = Date.now();
      const record = await deps.source.fetchByIdentifier(id);
      if (!record) return fail(res, 404, `No Account found with ID: ${id}`);
      const [analysis] = await analyzeRecords([record], deps, 1);
      return res.json({
        status: 'success',
        message: 'Account retrieved successfully',
        data: {
          accounts: [analysis],
          summary: { total_requested: 1, accounts_retrieved: 1 },
          execution_time: `${((Date.now() - started) / 1000).toFixed(2)}s`,
        },
      });
    } catch (e) {
      logger.error('Account analysis failed', { id, err: errorMessage(e) });
      return fail(res, 500, `Error retrieving Account: ${errorMessage(e)}`);
    }
  });

  // POST /api/accounts/analyze { accountIds: string[] }
  router.post('/accounts/analyze', async (req, res) => {
    const ids = stringList(bodyField(req, 'accountIds'));
    if (!ids || ids.length === 0) return fail(res, 400, 'accountIds required');
    if (ids.length > config.maxAnalyze) return fail(res, 400, `At most ${config.maxAnalyze} accountIds per request`);
    try {
      const data = await analyzeAccounts(ids, deps);
      return res.json({ status: 'success', message: `Analyzed ${data.accounts.length} of ${ids.length} accounts`, data });
    } catch (e) {
      logger.error('Batch analysis failed', { count: ids.length, err: errorMessage(e) });
      return fail(res, 500, `Error retrieving Account data: ${errorMessage(e)}`);
    }
  });

  // POST /api/accounts/validate { accountIds: string[] }
  router.post('/accounts/validate', async (req, res) => {
    const ids = stringList(bodyField(req, 'accountIds'));
    if (!ids) return fail(res, 400, 'accountIds required');
    const { valid, invalid } = partitionIds(ids, config.accountIdPrefix);
    try {
      const found = valid.size > 0 ? await deps.source.fetchByIdentifiers(Array.from(valid.keys())) : [];
      const validIds: string[] = [];
      const missing: string[] = [];
      for (const [id18, original] of valid) {
        if (found.some((r) => sameEntity(fieldText(r.Identifier), id18))) validIds.push(original);
        else missing.push(original);
      }
      return res.json({
        status: 'success',
        message: `Validated ${validIds.length} valid and ${invalid.length + missing.length} invalid Account IDs`,
        data: {
          valid_account_ids: validIds,
          invalid_account_ids: [...invalid, ...missing],
          format_invalid_count: invalid.length,
          not_found_count: missing.length,
        },
      });
    } catch (e) {
      logger.error('Account id validation failed', { count: ids.length, err: errorMessage(e) });
      return fail(res, 500, `Error validating Account IDs: ${errorMessage(e)}`);
    }
  });

  async function idsFromQuery(req: Request, res: Response, maxKey: string) {
    const source = deps.source;
    if (!isQueryable(source)) {
      fail(res, 400, `Query analysis is not supported by the ${source.name} record source`);
      return null;
    }
    const query = bodyField(req, 'query');
    const check = validateIdQuery(typeof query === 'string' ? query : '');
    if (!check.ok) {
      fail(res, 400, check.error);
      return null;
    }
    const q = String(query);
    const max = positiveInt(bodyField(req, maxKey)) ?? config.maxAnalyze;
    const finalQuery = buildIdQuery(q, max);
    const { ids, totalSize } = await source.queryIdentifiers(finalQuery);
    return { ids, totalSize, query: q, finalQuery, limit: effectiveLimit(q, max) };
  }

  // POST /api/accounts/query-ids { query, maxIds? }
  router.post('/accounts/query-ids', async (req, res) => {
    try {
      const found = await idsFromQuery(req, res, 'maxIds');
      if (!found) return;
      return res.json({
        status: 'success',
        message: `Retrieved ${found.ids.length} Account IDs from query`,
        data: {
          account_ids: found.ids,
          summary: { total_found: found.totalSize, final_query: found.finalQuery, effective_limit: found.limit ?? null },
        },
      });
    } catch (e) {
      logger.error('Id query failed', { err: errorMessage(e) });
      return fail(res, 500, `Error executing SOQL query: ${errorMessage(e)}`);
    }
  });

  // POST /api/accounts/analyze-query { query, maxAnalyze? }
  router.post('/accounts/analyze-query', async (req, res) => {
    try {
      const found = await idsFromQuery(req, res, 'maxAnalyze');
      if (!found) return;
      const data = await analyzeAccounts(found.ids, deps);
      return res.json({
        status: 'success',
        message: `Analyzed ${data.accounts.length} accounts from query`,
        data: {
          ...data,
          query_info: {
            original_query: found.query,
            final_query: found.finalQuery,
            total_found: found.totalSize,
            analyzed_count: data.accounts.length,
            effective_limit: found.limit ?? null,
          },
        },
      });
    } catch (e) {
      logger.error('Query analysis failed', { err: errorMessage(e) });
      return fail(res, 500, `Error analyzing accounts from query: ${errorMessage(e)}`);
    }
  });

  // GET /api/bad-domains/check?value=<email or url>
  router.get('/bad-domains/check', (req, res) => {
    const value = typeof req.query.value === 'string' ? req.query.value : '';
    if (!value.trim()) return fail(res, 400, 'value required');
    const domain = extractDomain(value);
    const repaired = repairDomain(domain, deps.badDomains);
    return res.json({
      status: 'success',
      data: { value, domain, repaired, isBad: repaired !== '' && deps.badDomains.has(repaired) },
    });
  });

  return router;
}
