export interface PublicIpResolverPort {
  /** Resolves the service's own public IPv4 address, or null when every lookup fails. */
  resolve(): Promise<string | null>;
}
