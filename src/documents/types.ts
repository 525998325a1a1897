export class DocumentReadError extends Error {
  constructor(
    public readonly documentPath: string,
    public readonly reason: string
  ) {
    super(`Cannot read document ${documentPath}: ${reason}`);
    this.name = 'DocumentReadError';
  }
}

export interface DiscoveryOptions {
  roots: string[];
  extensions: string[];
  exclude: string[];
}
