import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as z from 'zod';

import type { BridgeConfig, ResolvedBridgeConfig } from '../types/index.js';

let rootDir = process.cwd();
const defaultEnvFiles = ['.env'];

const EnvFlagSchema = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const BridgeConfigSchema = z.object({
  logCallErrors: z.boolean().optional(),
  logInteropErrors: z.boolean().optional(),
  loadEnv: z.boolean().optional(),
  envFiles: z.array(z.string()).optional(),
  rootDir: z.string().optional(),
});

export namespace ConfigService {
  export const getDirname = (importMetaUrl: string) => {
    return dirname(fileURLToPath(importMetaUrl));
  };

  export function setRootDir(dir: string): void {
    rootDir = resolve(dir);
  }

  export function resolveFromRootDir(...segments: string[]): string {
    return resolve(rootDir, ...segments);
  }

  export function env(field: string, defaultValue: string): string {
    return process.env[field] ?? defaultValue;
  }

  /** Reads a boolean flag; unset or unrecognised values fall back to `defaultValue`. */
  export function flag(field: string, defaultValue: boolean): boolean {
    const parsed = EnvFlagSchema.safeParse(process.env[field]?.trim().toLowerCase());
    return parsed.success ? parsed.data : defaultValue;
  }

  export function loadEnv(envFiles: string[] = defaultEnvFiles): void {
    const files = envFiles.map((file) => resolveFromRootDir(file));

    for (const file of files) {
      if (existsSync(file)) {
        config({ path: file, encoding: 'utf8', override: false });
      }
    }
  }

  /**
   * Validates a bridge configuration and fills the logging toggles from
   * `PORTCALL_LOG_CALL_ERRORS` / `PORTCALL_LOG_INTEROP_ERRORS` where unset.
   */
  export function resolveConfig(param: BridgeConfig = {}): ResolvedBridgeConfig {
    const parsed = BridgeConfigSchema.parse(param);

    if (parsed.rootDir) {
      setRootDir(parsed.rootDir);
    }

    if (parsed.loadEnv !== false) {
      loadEnv(parsed.envFiles);
    }

    return {
      logCallErrors: parsed.logCallErrors ?? flag('PORTCALL_LOG_CALL_ERRORS', false),
      logInteropErrors: parsed.logInteropErrors ?? flag('PORTCALL_LOG_INTEROP_ERRORS', true),
    };
  }
}
