import type { MetadataSource } from "@gpubench/shared";
import {
  DEFAULT_METADATA_ENDPOINT,
  METADATA_ATTRIBUTES_PATH,
  METADATA_FLAVOR_HEADER,
  METADATA_HOST_ENV_VAR,
} from "@/lib/constants.ts";

export interface GceMetadataOptions {
  endpoint?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads instance attributes from the node-local metadata server.
 * Every failure (404, other status, network error, timeout) reads as absent.
 */
export class GceMetadataSource implements MetadataSource {
  private endpoint: string;
  private timeoutMs: number;

  constructor(options: GceMetadataOptions = {}) {
    this.endpoint = resolveEndpoint(
      options.endpoint ?? DEFAULT_METADATA_ENDPOINT,
      options.env ?? process.env,
    );
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  static fromConfig(config: {
    metadata: { endpoint: string; timeout_ms: number };
  }): GceMetadataSource {
    return new GceMetadataSource({
      endpoint: config.metadata.endpoint,
      timeoutMs: config.metadata.timeout_ms,
    });
  }

  get baseUrl(): string {
    return this.endpoint;
  }

  async getAttribute(name: string): Promise<string | null> {
    const url = `${this.endpoint}/${METADATA_ATTRIBUTES_PATH}/${encodeURIComponent(name)}`;
    try {
      const response = await fetch(url, {
        headers: METADATA_FLAVOR_HEADER,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) return null;
      // trailing newlines are dropped, as shell command substitution does
      return (await response.text()).replace(/\n+$/, "");
    } catch {
      return null;
    }
  }
}

/**
 * Swap the host of the endpoint for $GCE_METADATA_HOST when it is set,
 * keeping the path.
 */
export function resolveEndpoint(
  endpoint: string,
  env: NodeJS.ProcessEnv,
): string {
  const trimmed = endpoint.replace(/\/+$/, "");
  const host = env[METADATA_HOST_ENV_VAR]?.trim();
  if (!host) return trimmed;

  const url = new URL(trimmed);
  return `${url.protocol}//${host}${url.pathname.replace(/\/+$/, "")}`;
}

/** Fetched value on success, `defaultValue` otherwise. */
export async function getMetadataAttribute(
  source: MetadataSource,
  name: string,
  defaultValue: string,
): Promise<string> {
  const value = await source.getAttribute(name);
  return value ?? defaultValue;
}
