export type ObjectError = {
  kind: 'object';
  name: string;
  message: string;
  stackLines: string[];
  cause: StructuredError | null;
};

export type ValueError = {
  kind: 'value';
  rawValue: unknown;
};

export type StructuredError = ObjectError | ValueError;

/** JSON form of an {@link ObjectError}; value errors travel as the raw value itself. */
export type WireErrorRecord = {
  name: string;
  message: string;
  stackLines: string[];
  cause: unknown;
};
