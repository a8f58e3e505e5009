/** State shared by the bootstrap steps during one run. */
export type BootstrapRun = {
  /** Address recorded by the public-ip step. */
  publicIp?: string;
}

/** Resolves the host's public address as raw text from an IP echo service. */
export type PublicIpResolver = (url: string, timeoutMs: number) => Promise<string>
