export type BridgeConfig = {
  /** Log failures reported by the called functions. Defaults to `PORTCALL_LOG_CALL_ERRORS` or false. */
  logCallErrors?: boolean;
  /** Log failures of the bridge itself. Defaults to `PORTCALL_LOG_INTEROP_ERRORS` or true. */
  logInteropErrors?: boolean;
  loadEnv?: boolean;
  envFiles?: string[];
  /** Base for `.env` files and relative function directories. Defaults to the working directory. */
  rootDir?: string;
};

export type ResolvedBridgeConfig = {
  logCallErrors: boolean;
  logInteropErrors: boolean;
};

export type LoadConfig = {
  functionDir: string;
  pattern?: string;
};
