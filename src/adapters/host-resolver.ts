import { execFileSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { errorMessage } from "../errors.js";
import type { HostResolver } from "../interfaces/host-resolver.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

export const DEFAULT_HOST = "127.0.0.1";

const LOOPBACK_NAMES = new Set(["127.0.0.1", "localhost", "::1"]);
const PRIVATE_PREFIXES = ["172.", "192.168.", "10."];

/**
 * Substitutes the Windows host's address for an unset or loopback host when
 * running under WSL, where the console listens on the Windows side.
 *
 * The gateway comes from a private-range `nameserver` in /etc/resolv.conf,
 * else from the `via` address of the default route. Detection runs once per
 * resolver.
 */
export class WslHostResolver implements HostResolver {
  private gateway: string | null | undefined;

  constructor(
    private readonly logger: Logger = noopLogger,
    private readonly timeoutMs = 5000,
  ) {}

  async resolve(host: string | undefined): Promise<string> {
    if (host !== undefined && !LOOPBACK_NAMES.has(host.toLowerCase())) return host;
    const gateway = this.detectGateway();
    if (gateway) {
      this.logger.debug?.(`WSL detected; dialing Windows host ${gateway}`);
      return gateway;
    }
    return host ?? DEFAULT_HOST;
  }

  /** Windows host address, or null outside WSL. */
  detectGateway(): string | null {
    if (this.gateway === undefined) this.gateway = this.runDetection();
    return this.gateway;
  }

  private runDetection(): string | null {
    const version = this.read("/proc/version");
    if (!version || !/microsoft|wsl/i.test(version)) return null;
    return this.nameserverGateway() ?? this.defaultRouteGateway();
  }

  private nameserverGateway(): string | null {
    const resolvConf = this.read("/etc/resolv.conf");
    if (!resolvConf) return null;
    for (const line of resolvConf.split("\n")) {
      const [keyword, address] = line.trim().split(/\s+/);
      if (keyword !== "nameserver" || !address) continue;
      if (PRIVATE_PREFIXES.some((prefix) => address.startsWith(prefix))) return address;
    }
    return null;
  }

  private defaultRouteGateway(): string | null {
    try {
      const routes = execFileSync("ip", ["route", "show", "default"], {
        encoding: "utf-8",
        timeout: this.timeoutMs,
      });
      return /via\s+(\d+\.\d+\.\d+\.\d+)/.exec(routes)?.[1] ?? null;
    } catch (err) {
      this.logger.debug?.(`Default route lookup failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private read(path: string): string | null {
    try {
      return readFileSync(path, "utf-8");
    } catch (err) {
      this.logger.debug?.(`Cannot read ${path}: ${errorMessage(err)}`);
      return null;
    }
  }
}
