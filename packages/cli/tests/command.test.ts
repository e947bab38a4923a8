import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SqliteConnection } from '@rowshift/connector-db';
import { UsageError, exitCodeFor, parseArgs, runCli } from '../src/index.js';

function captureIo(env: NodeJS.ProcessEnv = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    io: {
      stdout: (text: string) => {
        stdout.push(text);
      },
      stderr: (text: string) => {
        stderr.push(text);
      },
      env,
    },
  };
}

async function seed(path: string, sql: string): Promise<void> {
  const connection = new SqliteConnection({ path });
  await connection.connect();
  connection.exec(sql);
  await connection.disconnect();
}

async function select(path: string, sql: string): Promise<unknown[][]> {
  const connection = new SqliteConnection({ path });
  await connection.connect();
  try {
    return (await connection.query(sql)).rows;
  } finally {
    await connection.disconnect();
  }
}

describe('parseArgs', () => {
  it('reads flags', () => {
    expect(
      parseArgs(['--config', 'm.yaml', '--transforms', 't.mjs', '--dry-run', '--format', 'json', '--log-level', 'warn'])
    ).toEqual({
      config: 'm.yaml',
      transforms: 't.mjs',
      dryRun: true,
      format: 'json',
      logLevel: 'warn',
      help: false,
    });
  });

  it('requires --config unless asking for help', () => {
    expect(() => parseArgs([])).toThrow(new UsageError('--config is required'));
    expect(parseArgs(['-h']).help).toBe(true);
  });

  it('rejects bad values and unknown flags', () => {
    expect(() => parseArgs(['--config'])).toThrow('--config needs a value');
    expect(() => parseArgs(['--config', 'm.yaml', '--format', 'xml'])).toThrow('--format must be text or json (got xml)');
    expect(() => parseArgs(['--config', 'm.yaml', '--verbose'])).toThrow('Unknown argument: --verbose');
  });
});

describe('exitCodeFor', () => {
  it('maps run status to exit codes', () => {
    expect(exitCodeFor('completed')).toBe(0);
    expect(exitCodeFor('completed_with_errors')).toBe(2);
    expect(exitCodeFor('cancelled')).toBe(2);
    expect(exitCodeFor('failed')).toBe(1);
  });
});

describe('runCli', () => {
  let tmpDir: string;
  let sourcePath: string;
  let targetPath: string;

  beforeEach(async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'rowshift-cli-'));
    sourcePath = join(tmpDir, 'source.db');
    targetPath = join(tmpDir, 'target.db');
    await seed(
      sourcePath,
      `CREATE TABLE users (id INTEGER PRIMARY KEY, username TEXT);
       INSERT INTO users VALUES (1, 'ada'), (2, 'grace');`
    );
  });

  afterEach(() => {
    if (tmpDir) {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  function writeConfig(migration: string, extra = ''): string {
    const path = join(tmpDir, 'migrations.yaml');
    writeFileSync(
      path,
      `databases:
  source: { type: sqlite, path: source.db }
  target: { type: sqlite, path: target.db }
options:
  retry_delay_ms: 0
${extra}migrations:
${migration}
`
    );
    return path;
  }

  const USERS = `  - name: users
    root_table: users
    columns:
      users.id: id
      users.username: username
`;

  it('prints usage on bad arguments', async () => {
    const { io, stderr } = captureIo();
    expect(await runCli(['--nope'], io)).toBe(1);
    expect(stderr.join('')).toMatch(/^Unknown argument: --nope\n\nUsage: rowshift --config/);
  });

  it('prints the compiled plan on a dry run', async () => {
    const config = writeConfig(USERS);
    const { io, stdout } = captureIo();

    expect(await runCli(['--config', config, '--dry-run'], io)).toBe(0);
    expect(stdout.join('')).toBe(
      [
        'users -> users (insert, page 1000, batch 500)',
        '  columns: id, username',
        '  query: SELECT "users"."id" AS "users.id", "users"."username" AS "users.username" FROM "users" ORDER BY "users"."id", "users"."username" LIMIT 1000',
        '',
      ].join('\n')
    );
  });

  it('prints the plan as JSON', async () => {
    const config = writeConfig(USERS);
    const { io, stdout } = captureIo();

    await runCli(['--config', config, '--dry-run', '--format', 'json'], io);
    const plans: unknown = JSON.parse(stdout.join(''));
    expect(plans).toMatchObject([{ name: 'users', targetColumns: ['id', 'username'], transform: null }]);
  });

  it('reports configuration errors with their suggestion', async () => {
    const config = writeConfig(`${USERS}    transform_function: nope\n`);
    const { io, stderr } = captureIo();

    expect(await runCli(['--config', config, '--dry-run', '--log-level', 'silent'], io)).toBe(1);
    expect(stderr.join('')).toBe(
      'Error [UNKNOWN_TRANSFORM]: Transform function "nope" is not registered.\nMigration: users\nSuggested action: No transforms are registered; pass a registry or remove transformFunction.\n'
    );
  });

  it('reports unreadable config files', async () => {
    const { io, stderr } = captureIo();
    expect(await runCli(['--config', join(tmpDir, 'missing.yaml')], io)).toBe(1);
    expect(stderr.join('')).toContain(`Cannot read ${join(tmpDir, 'missing.yaml')}`);
  });

  it('migrates between SQLite files with a transform module', async () => {
    await seed(targetPath, 'CREATE TABLE users (id INTEGER PRIMARY KEY, username TEXT);');
    writeFileSync(
      join(tmpDir, 'transforms.mjs'),
      `export const registry = {
  shout: ({ projected }) => ({ username: String(projected.get('username').value).toUpperCase() }),
};
`
    );
    const config = writeConfig(`${USERS}    transform_function: shout\n`, 'transforms: transforms.mjs\n');
    const { io, stdout } = captureIo();

    expect(await runCli(['--config', config, '--log-level', 'silent'], io)).toBe(0);

    const lines = stdout.join('').split('\n');
    expect(lines[0]).toMatch(/^Run [0-9a-f-]{36}: completed \(\d+ms\)$/);
    expect(lines[1]).toMatch(/^users -> users: succeeded \(\d+ms\)$/);
    expect(lines[2]).toBe('  read 2, transformed 2, skipped 0, failed transform 0');
    expect(lines[3]).toBe('  written 2, failed write 0, batches 1 committed / 0 failed');

    expect(await select(targetPath, 'SELECT id, username FROM users ORDER BY id')).toEqual([
      [1, 'ADA'],
      [2, 'GRACE'],
    ]);
  });

  it('exits with 2 when batches fail', async () => {
    const config = writeConfig(USERS, '');
    const { io, stdout } = captureIo();

    expect(await runCli(['--config', config, '--log-level', 'silent'], io)).toBe(2);
    expect(stdout.join('')).toContain('SQLite write failed: no such table: users');
  });
});
