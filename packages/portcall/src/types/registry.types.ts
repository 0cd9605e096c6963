type MaybePromise<T> = T | PromiseLike<T>;

/**
 * A function callable across the bridge. It receives the decoded call argument
 * and may answer with a value or with anything thenable.
 *
 * Declared through a method signature so the parameter stays bivariant and
 * functions with a typed argument can be registered as they are.
 */
export type BridgeFunction<TArg = unknown, TResult = unknown> = {
  call(argument: TArg): MaybePromise<TResult>;
}['call'];

export type NamespaceRef = {
  /** `author/package` identifier. */
  id: string;
  version: string;
};

export type QualifiedName = {
  name: string;
  namespace?: NamespaceRef;
};

export type RegistrationErrorCode = 'InvalidName' | 'DuplicateName' | 'InvalidNamespace' | 'InvalidVersion';

/** Shape exported by function modules picked up by the loader. */
export type FunctionConfig = {
  name: string;
  description?: string;
  namespace?: NamespaceRef;
  handler: BridgeFunction;
};
