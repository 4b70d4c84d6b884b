/**
 * gatehouse - Basic Example Server
 *
 * A complete example showing:
 * - Identity adapter setup from the environment
 * - Express integration with the authentication and role guards
 * - A per-request database session
 *
 * Run with IDENTITY_SERVER_URL, IDENTITY_REALM, IDENTITY_CLIENT_ID and
 * IDENTITY_CLIENT_SECRET set; the database defaults to in-memory SQLite.
 */

import express, { NextFunction, Request, Response } from 'express';
import {
  AdapterError,
  ConfigurationError,
  createQueuedExecution,
  createSessionManager,
  getLogger,
  IdentityAdapter,
  InternalError,
  loadConfig,
  loadEnvironment,
  requireAuthentication,
  requirePermission,
  requireRoles,
} from '../src';

// ============================================================================
// CONFIGURATION
// ============================================================================

const PORT = 3000;

loadEnvironment();
const config = loadConfig();
const logger = getLogger({ level: config.logLevel });

if (!config.identity) {
  throw new ConfigurationError('IdentityConfig', 'undefined', 'IDENTITY_SERVER_URL is not set');
}

const identity = new IdentityAdapter({
  config: config.identity,
  execution: createQueuedExecution({ concurrency: 20 }),
  logger,
});

const database = createSessionManager(config.database ?? { kind: 'sqlite' }, logger);

// ============================================================================
// APPLICATION
// ============================================================================

const app = express();
app.use(express.json());

const authenticated = requireAuthentication({ identity });

app.get('/health', (_req, res) => {
  res.json({ status: 'ok', admin: identity.leaseState });
});

// Any caller with a valid token
app.get('/api/me', authenticated, async (req, res, next) => {
  try {
    const userinfo = await identity.getUserinfo(req.identity?.token ?? '');
    res.json(userinfo);
  } catch (error) {
    next(error);
  }
});

// Realm role check
app.get('/api/users/:id', authenticated, requireRoles({ identity, any: ['admin', 'user-manager'] }), async (req, res, next) => {
  try {
    const user = await identity.getUserById(req.params.id);
    if (!user) {
      res.status(404).json({ error: 'not_found' });
      return;
    }
    res.json(user);
  } catch (error) {
    next(error);
  }
});

// Fine-grained permission from the provider's authorization service
app.get('/api/reports', authenticated, requirePermission({ identity, resource: 'reports', scope: 'view' }), async (_req, res, next) => {
  try {
    const rows = await database.runInSession((session) => session.query('SELECT 1 AS ready'));
    res.json({ reports: [], database: rows[0] });
  } catch (error) {
    next(error);
  }
});

app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const adapterError = error instanceof AdapterError ? error : new InternalError(undefined, { cause: error });
  logger.error({ err: error }, 'request failed');
  res.status(adapterError.httpStatus).json(adapterError.toJSON());
});

// ============================================================================
// START
// ============================================================================

identity
  .initialize()
  .then(() => {
    app.listen(PORT, () => {
      logger.info({ port: PORT }, 'example server listening');
    });
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'failed to start');
    process.exitCode = 1;
  });
