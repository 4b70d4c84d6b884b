/**
 * gatehouse CLI - command definitions
 *
 * Commands:
 * - token inspect: Decode and display an access token
 * - user get / user find: Look up users through the admin API
 * - roles list / roles of: Show realm roles, or the realm roles of a user
 * - db ping: Open a session and run `SELECT 1`
 *
 * Identity and database settings come from the environment (see
 * `loadConfig`). Failures are printed and reflected in `process.exitCode`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config';
import { createSessionManager, SessionManagerPort } from '../database';
import { IdentityAdapter } from '../identity/adapter';
import type { IdentityPort } from '../identity/port';
import type { IdentityRole, IdentityUser } from '../identity/schemas';
import { getLogger } from '../logging/logger';
import { collectRoles, decodeJwt, getTimeUntilExpiration } from '../tokens/jwt';
import { ConfigurationError, TokenClaims } from '../types';

// ============================================================================
// CONTEXT
// ============================================================================

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  output: CliOutput;
  /** Builds the identity port; closed after each command. */
  identity(): IdentityPort & { close(): Promise<void> };
  database(): SessionManagerPort & { readonly engine: { readonly url: string } };
}

function createIdentityFromEnv(): IdentityAdapter {
  const config = loadConfig();
  if (!config.identity) {
    throw new ConfigurationError('IdentityConfig', 'undefined', 'IDENTITY_SERVER_URL is not set');
  }
  return new IdentityAdapter({ config: config.identity, logger: getLogger({ level: config.logLevel }) });
}

function createDatabaseFromEnv() {
  const config = loadConfig();
  if (!config.database) {
    throw new ConfigurationError('DatabaseConfig', 'undefined', 'DATABASE_KIND is not set');
  }
  return createSessionManager(config.database, getLogger({ level: config.logLevel }));
}

export const defaultContext: CliContext = {
  output: {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  },
  identity: createIdentityFromEnv,
  database: createDatabaseFromEnv,
};

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function createPrinter(output: CliOutput) {
  return {
    success: (msg: string) => output.log(`${chalk.green('✓')} ${msg}`),
    error: (msg: string) => output.error(`${chalk.red('✗')} ${msg}`),
    warn: (msg: string) => output.log(`${chalk.yellow('⚠')} ${msg}`),
    header: (msg: string) => output.log(chalk.bold(msg)),
    field: (label: string, value: string) => output.log(`  ${chalk.dim(label.padEnd(12))}${value}`),
    item: (value: string) => output.log(`  ${chalk.dim('•')} ${value}`),
    json: (value: unknown) => output.log(JSON.stringify(value, null, 2)),
  };
}

type Printer = ReturnType<typeof createPrinter>;

function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString();
}

export function formatRemaining(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
  return `${Math.floor(seconds / 86400)}d ${Math.floor((seconds % 86400) / 3600)}h`;
}

function printUser(print: Printer, user: IdentityUser): void {
  print.field('ID:', user.id);
  print.field('Username:', user.username ?? '-');
  print.field('Email:', user.email ?? '-');
  print.field('Name:', [user.firstName, user.lastName].filter(Boolean).join(' ') || '-');
  print.field('Enabled:', user.enabled === false ? chalk.red('no') : chalk.green('yes'));
}

function printRoles(print: Printer, roles: IdentityRole[]): void {
  if (roles.length === 0) {
    print.warn('No roles');
    return;
  }
  for (const role of roles) {
    print.item(role.description ? `${role.name} ${chalk.dim(`(${role.description})`)}` : role.name);
  }
}

function printClaims(print: Printer, token: string, claims: TokenClaims): void {
  print.header('Claims:');
  print.field('Subject:', claims.sub ?? '-');
  if (claims.iss) print.field('Issuer:', claims.iss);
  if (claims.azp) print.field('Client:', claims.azp);

  if (claims.exp !== undefined) {
    print.header('Timestamps:');
    if (claims.iat !== undefined) print.field('Issued At:', formatTimestamp(claims.iat));
    print.field('Expires At:', formatTimestamp(claims.exp));
    const remaining = getTimeUntilExpiration(token);
    print.field(
      'Status:',
      remaining > 0 ? `${chalk.green('VALID')} (${formatRemaining(remaining)})` : chalk.red('EXPIRED')
    );
  }

  const roles = [...collectRoles(claims)].sort();
  if (roles.length > 0) {
    print.header('Roles:');
    roles.forEach((role) => print.item(role));
  }
}

// ============================================================================
// PROGRAM
// ============================================================================

export function createProgram(context: CliContext = defaultContext): Command {
  const print = createPrinter(context.output);

  async function run(action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      print.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  }

  async function withIdentity(action: (identity: IdentityPort) => Promise<void>): Promise<void> {
    await run(async () => {
      const identity = context.identity();
      try {
        await action(identity);
      } finally {
        await identity.close();
      }
    });
  }

  const program = new Command();
  program.name('gatehouse').description('Identity provider and database adapter tools');

  // token
  const token = program.command('token').description('Access token utilities');

  token
    .command('inspect <token>')
    .description('Decode and display an access token without verifying it')
    .option('-j, --json', 'Output as JSON')
    .action((raw: string, options: { json?: boolean }) =>
      run(async () => {
        const decoded = decodeJwt(raw);
        if (options.json) {
          print.json({ header: decoded.header, claims: decoded.claims });
          return;
        }
        print.header('Header:');
        print.field('Algorithm:', decoded.header.alg);
        if (decoded.header.kid) print.field('Key ID:', decoded.header.kid);
        printClaims(print, raw, decoded.claims);
      })
    );

  // user
  const user = program.command('user').description('Look up users');

  user
    .command('get <id>')
    .description('Show one user')
    .action((id: string) =>
      withIdentity(async (identity) => {
        const found = await identity.getUserById(id);
        if (!found) {
          print.warn(`User ${id} not found`);
          process.exitCode = 1;
          return;
        }
        printUser(print, found);
      })
    );

  user
    .command('find <query>')
    .description('Search users by username, email or name')
    .option('-m, --max <count>', 'Maximum results', '100')
    .action((query: string, options: { max: string }) =>
      withIdentity(async (identity) => {
        const max = Number.parseInt(options.max, 10);
        const users = await identity.searchUsers(query, Number.isNaN(max) ? undefined : max);
        if (users.length === 0) {
          print.warn('No users matched');
          return;
        }
        for (const found of users) {
          print.item(`${found.id} ${found.username ?? '-'} ${chalk.dim(found.email ?? '')}`.trimEnd());
        }
      })
    );

  // roles
  const roles = program.command('roles').description('Inspect realm roles');

  roles
    .command('list')
    .description('List realm roles')
    .action(() => withIdentity(async (identity) => printRoles(print, await identity.getRealmRoles())));

  roles
    .command('of <userId>')
    .description('List the realm roles mapped to a user')
    .action((userId: string) =>
      withIdentity(async (identity) => printRoles(print, await identity.getUserRoles(userId)))
    );

  // db
  const db = program.command('db').description('Database utilities');

  db.command('ping')
    .description('Open a session and run SELECT 1')
    .action(() =>
      run(async () => {
        const manager = context.database();
        try {
          await manager.runInSession((session) => session.query('SELECT 1'));
          print.success(`Database reachable at ${manager.engine.url}`);
        } finally {
          await manager.dispose();
        }
      })
    );

  return program;
}
