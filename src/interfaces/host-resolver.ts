/** Picks the address to dial for a configured (possibly unset) host. */
export interface HostResolver {
  resolve(host: string | undefined): Promise<string>;
}
