import assert from 'node:assert/strict';
import path from 'node:path';
import * as z from 'zod';

import {
  ConfigService,
  FunctionRegistry,
  LoaderService,
  RegistrationError,
  createBridge,
  qualify,
} from '../src/index.js';
import { MemoryRequest } from './fixtures/memory-request.js';
import { createRecordingLogger } from './fixtures/recording-logger.js';

const fixtures = path.join(ConfigService.getDirname(import.meta.url), 'fixtures');
const functionDir = path.join(fixtures, 'functions');
const { logger, entries } = createRecordingLogger();

const bridge = createBridge({ config: { loadEnv: false, logInteropErrors: false }, logger });
assert.equal(await bridge.load({ functionDir }), 3);
assert.deepEqual(bridge.registry.defaultNamespace.names(), ['greet']);
assert.equal(bridge.registry.namespace('acme/tools')?.version, '2.0.0');
assert.deepEqual(bridge.registry.namespace('acme/tools')?.names(), ['add', 'negate']);
assert.deepEqual(
  entries.filter((entry) => entry.msg === 'portcall function loaded').map((entry) => entry.meta.function),
  ['greet', 'add', 'negate'],
);

const caller = bridge.createCaller(bridge.install(() => new MemoryRequest()));
const tools = { id: 'acme/tools', version: '2.0.0' };

assert.deepEqual(await caller.call(qualify('greet'), 'world', z.string()), { kind: 'success', value: 'hello world' });
assert.deepEqual(await caller.call(qualify('add', tools), { a: 2, b: 3 }, z.number()), { kind: 'success', value: 5 });
assert.deepEqual(await caller.call(qualify('negate', tools), 4, z.number()), { kind: 'success', value: -4 });

await assert.rejects(
  bridge.load({ functionDir }),
  (error) => error instanceof RegistrationError && error.code === 'DuplicateName',
);

const narrow = createBridge({ config: { loadEnv: false }, logger });
assert.equal(await narrow.load({ functionDir, pattern: 'greeting.*' }), 1);
assert.equal(await narrow.load({ functionDir, pattern: '**/*.nothing' }), 0);

const invalidDir = path.join(fixtures, 'invalid');
await assert.rejects(
  createBridge({ config: { loadEnv: false }, logger }).load({ functionDir: invalidDir }),
  (error) => error instanceof Error
    && error.message.startsWith(`(FUNCTION) Invalid configuration export in ${path.join(invalidDir, 'broken.function.ts')}: `),
);

const missingDir = path.join(fixtures, 'missing');
await assert.rejects(
  createBridge({ config: { loadEnv: false }, logger }).load({ functionDir: missingDir }),
  { message: `(FUNCTION) Missing configuration export: ${path.join(missingDir, 'empty.function.ts')}` },
);

ConfigService.setRootDir(fixtures);
try {
  const relative = createBridge({ config: { loadEnv: false }, logger });
  assert.equal(await relative.load({ functionDir: 'functions' }), 3, 'relative directories start at the root directory');
  assert.deepEqual(relative.registry.defaultNamespace.names(), ['greet']);
}
finally {
  ConfigService.setRootDir(process.cwd());
}

const registry = new FunctionRegistry(logger);
LoaderService.add(registry, { name: 'first', namespace: { id: 'acme/kit', version: '1' }, handler: () => 1 });
LoaderService.add(registry, { name: 'second', namespace: { id: 'acme/kit', version: '1' }, handler: () => 2 });
assert.deepEqual(registry.namespace('acme/kit')?.names(), ['first', 'second']);

LoaderService.add(registry, { name: 'third', namespace: { id: 'acme/kit', version: '2' }, handler: () => 3 });
assert.equal(registry.namespace('acme/kit')?.version, '2');
assert.deepEqual(registry.namespace('acme/kit')?.names(), ['third']);

console.info('portcall.loader tests passed');
