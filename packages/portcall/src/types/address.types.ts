export type ParsedAddress = {
  protocolVersion: string;
  functionName: string;
  namespaceId?: string;
  namespaceVersion?: string;
};
