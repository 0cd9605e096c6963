import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ConfigService, helpers, type LogEntry } from '../src/index.js';

process.env.PORTCALL_TEST_FLAG = ' TRUE ';
assert.equal(ConfigService.flag('PORTCALL_TEST_FLAG', false), true);
process.env.PORTCALL_TEST_FLAG = '0';
assert.equal(ConfigService.flag('PORTCALL_TEST_FLAG', true), false);
process.env.PORTCALL_TEST_FLAG = 'maybe';
assert.equal(ConfigService.flag('PORTCALL_TEST_FLAG', true), true);
delete process.env.PORTCALL_TEST_FLAG;
assert.equal(ConfigService.flag('PORTCALL_TEST_FLAG', false), false);

delete process.env.PORTCALL_LOG_CALL_ERRORS;
delete process.env.PORTCALL_LOG_INTEROP_ERRORS;
assert.deepEqual(ConfigService.resolveConfig({ loadEnv: false }), { logCallErrors: false, logInteropErrors: true });

process.env.PORTCALL_LOG_CALL_ERRORS = '1';
process.env.PORTCALL_LOG_INTEROP_ERRORS = 'false';
assert.deepEqual(ConfigService.resolveConfig({ loadEnv: false }), { logCallErrors: true, logInteropErrors: false });
assert.deepEqual(
  ConfigService.resolveConfig({ loadEnv: false, logCallErrors: false, logInteropErrors: true }),
  { logCallErrors: false, logInteropErrors: true },
);
delete process.env.PORTCALL_LOG_CALL_ERRORS;
delete process.env.PORTCALL_LOG_INTEROP_ERRORS;

assert.throws(() => ConfigService.resolveConfig(JSON.parse('{"logCallErrors":"yes"}')));

const envDir = mkdtempSync(path.join(os.tmpdir(), 'portcall-env-'));

try {
  writeFileSync(path.join(envDir, '.env'), 'PORTCALL_FROM_FILE=loaded\nPORTCALL_PRESET=file\n');
  writeFileSync(path.join(envDir, 'custom.env'), 'PORTCALL_LOG_CALL_ERRORS=true\n');
  process.env.PORTCALL_PRESET = 'process';

  assert.deepEqual(ConfigService.resolveConfig({ rootDir: envDir }), { logCallErrors: false, logInteropErrors: true });
  assert.equal(ConfigService.resolveFromRootDir('custom.env'), path.join(path.resolve(envDir), 'custom.env'));
  assert.equal(process.env.PORTCALL_FROM_FILE, 'loaded');
  assert.equal(process.env.PORTCALL_PRESET, 'process', 'variables already set are kept');

  assert.deepEqual(
    ConfigService.resolveConfig({ rootDir: envDir, envFiles: ['custom.env', 'absent.env'] }),
    { logCallErrors: true, logInteropErrors: true },
  );
}
finally {
  delete process.env.PORTCALL_FROM_FILE;
  delete process.env.PORTCALL_PRESET;
  delete process.env.PORTCALL_LOG_CALL_ERRORS;
  ConfigService.setRootDir(process.cwd());
  rmSync(envDir, { recursive: true, force: true });
}

const silence = <T>(fn: () => T): T => {
  const { log, warn, error } = console;
  console.log = () => undefined;
  console.warn = () => undefined;
  console.error = () => undefined;

  try {
    return fn();
  }
  finally {
    Object.assign(console, { log, warn, error });
  }
};

const received: Omit<LogEntry, 'time'>[] = [];
const logger = helpers.createConsoleLogger('warn');
logger.addListener(({ level, msg, meta, time }) => {
  assert.equal(typeof time, 'number');
  received.push({ level, msg, meta });
});

silence(() => {
  logger.info('hidden');
  logger.warn('shown', { a: 1 });
  const child = logger.child({ component: 'child' });
  child.error('from child', { b: 2 });
  child.child({ failure: 'function-not-found' }).warn('nested', { component: 'override' });
  logger.debug('filtered');
});

assert.deepEqual(received, [
  { level: 'warn', msg: 'shown', meta: { a: 1 } },
  { level: 'error', msg: 'from child', meta: { component: 'child', b: 2 } },
  { level: 'warn', msg: 'nested', meta: { component: 'override', failure: 'function-not-found' } },
]);

const levelOf = (level: string | undefined) => {
  if (level === undefined) {
    delete process.env.LOG_LEVEL;
  }
  else {
    process.env.LOG_LEVEL = level;
  }

  const seen: string[] = [];
  const envLogger = helpers.createConsoleLogger();
  envLogger.addListener((payload) => seen.push(payload.level));
  silence(() => {
    envLogger.debug('d');
    envLogger.info('i');
    envLogger.error('e');
  });
  return seen;
};

const previousLevel = process.env.LOG_LEVEL;
assert.deepEqual(levelOf('error'), ['error']);
assert.deepEqual(levelOf('DEBUG'), ['debug', 'info', 'error']);
assert.deepEqual(levelOf('bogus'), ['info', 'error']);
assert.deepEqual(levelOf(undefined), ['info', 'error']);
levelOf(previousLevel);

console.info('portcall.config tests passed');
