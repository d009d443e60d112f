import {
  ConfigLoadError,
  UnknownNetworkError,
  describeCause,
  getLogger,
  type NetworkLookup,
  type NetworkProfile,
} from '@scratchpay/core';
import * as fs from 'node:fs';
import { z } from 'zod';

const logger = getLogger();

const NetworkProfileSchema = z.object({
  rpc: z.string().url(),
  explorer: z.string().url(),
  description: z.string().default(''),
});

const NetworkConfigSchema = z.object({
  rpc_profiles: z.record(NetworkProfileSchema).default({}),
});

export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;

export function parseNetworkConfig(config: unknown): NetworkConfig {
  return NetworkConfigSchema.parse(config);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read-only set of named network profiles.
 *
 * Profiles are metadata attached to payloads. Nothing here opens a connection.
 */
export class NetworkCatalog implements NetworkLookup {
  private readonly profiles: ReadonlyMap<string, Readonly<NetworkProfile>>;

  constructor(profiles: Iterable<NetworkProfile>) {
    const entries = new Map<string, Readonly<NetworkProfile>>();
    for (const profile of profiles) {
      entries.set(profile.name, Object.freeze({ ...profile }));
    }
    this.profiles = entries;
  }

  static fromConfig(config: NetworkConfig): NetworkCatalog {
    return new NetworkCatalog(
      Object.entries(config.rpc_profiles).map(([name, definition]) => ({
        name,
        rpc: definition.rpc,
        explorer: definition.explorer,
        description: definition.description,
      }))
    );
  }

  /**
   * Load profiles from a JSON file.
   * A missing file, invalid JSON or a schema mismatch all raise ConfigLoadError.
   */
  static load(filePath: string): NetworkCatalog {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigLoadError(filePath, describeCause(error), { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ConfigLoadError(filePath, `invalid JSON (${describeCause(error)})`, { cause: error });
    }

    const parsed = NetworkConfigSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigLoadError(filePath, formatIssues(parsed.error), { cause: parsed.error });
    }

    const catalog = NetworkCatalog.fromConfig(parsed.data);
    logger.debug(`Loaded ${catalog.size} network profile(s) from ${filePath}`);
    return catalog;
  }

  get size(): number {
    return this.profiles.size;
  }

  listNames(): string[] {
    return [...this.profiles.keys()].sort();
  }

  list(): NetworkProfile[] {
    return this.listNames().map((name) => this.lookup(name));
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  lookup(name: string): NetworkProfile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new UnknownNetworkError(name, this.listNames());
    }
    return { ...profile };
  }
}
