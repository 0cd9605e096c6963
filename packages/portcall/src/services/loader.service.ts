import { pathToFileURL } from 'node:url';
import { globSync } from 'glob';
import * as z from 'zod';

import type { BridgeFunction, FunctionConfig, LoadConfig, Logger } from '../types/index.js';
import { ConfigService } from './config.service.js';
import { FunctionRegistry } from './registry.service.js';

const DEFAULT_PATTERN = '**/*.function.{js,ts}';

const FunctionConfigSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  namespace: z.object({ id: z.string(), version: z.string() }).optional(),
  handler: z.custom<BridgeFunction>((value) => typeof value === 'function', { message: 'handler must be a function' }),
});

const FunctionModuleSchema = z.union([FunctionConfigSchema, z.array(FunctionConfigSchema)]);

export namespace LoaderService {
  /** Registers one function config, reusing a namespace already created with the same id and version. */
  export function add(registry: FunctionRegistry, config: FunctionConfig): void {
    const { name, namespace, handler } = config;

    if (!namespace) {
      registry.register(name, handler);
      return;
    }

    const existing = registry.namespace(namespace.id);
    const target = existing && existing.version === namespace.version
      ? existing
      : registry.createNamespace(namespace.id, namespace.version);

    target.register(name, handler);
  }

  async function loadFile(registry: FunctionRegistry, file: string, logger: Logger): Promise<number> {
    const module: Record<string, unknown> = await import(pathToFileURL(file).href);
    const exported = module.config ?? module.default;

    if (!exported) {
      throw new Error(`(FUNCTION) Missing configuration export: ${file}`);
    }

    const parsed = FunctionModuleSchema.safeParse(exported);

    if (!parsed.success) {
      throw new Error(`(FUNCTION) Invalid configuration export in ${file}: ${parsed.error.message}`);
    }

    const entries = Array.isArray(parsed.data) ? parsed.data : [parsed.data];

    for (const entry of entries) {
      add(registry, entry);
      logger.debug('portcall function loaded', { file, function: entry.name, namespace: entry.namespace?.id });
    }

    return entries.length;
  }

  /**
   * Imports every module under `functionDir` (relative paths start at the root
   * directory) matching the pattern and registers the functions it exports.
   * Files load one after another, in path order.
   */
  export async function loadFunctions(registry: FunctionRegistry, param: LoadConfig, logger: Logger): Promise<number> {
    const { functionDir, pattern = DEFAULT_PATTERN } = param;
    const cwd = ConfigService.resolveFromRootDir(functionDir);
    const files = globSync(pattern, { cwd, absolute: true, ignore: ['**/*.d.ts'] }).sort();
    let count = 0;

    for (const file of files) {
      count += await loadFile(registry, file, logger);
    }

    return count;
  }
}
