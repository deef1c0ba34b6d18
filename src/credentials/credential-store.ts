import { logger } from "../config/logger.js";
import type { GroupCredential, RegistryAuth } from "./types.js";
import { groupCredentialSchema } from "./types.js";

export const ENV_SECRET_PREFIX = "WH_SECRET_";
export const ENV_AUTH_PREFIX = "WH_AUTH_";
export const ENV_REMOVE_PREFIX = "WH_REMOVE_";

/**
 * Read-only lookup from group name to its credential.
 * Built once at startup and handed to the orchestrator.
 */
export class CredentialStore {
  private readonly credentials: ReadonlyMap<string, GroupCredential>;

  constructor(credentials: Iterable<GroupCredential>) {
    const map = new Map<string, GroupCredential>();
    for (const credential of credentials) {
      map.set(credential.name, Object.freeze({ ...credential }));
    }
    this.credentials = map;
  }

  /** Exact (case-sensitive) lookup after trimming. */
  lookup(name: string): GroupCredential | undefined {
    return this.credentials.get(name.trim());
  }

  get size(): number {
    return this.credentials.size;
  }

  names(): string[] {
    return [...this.credentials.keys()];
  }
}

/**
 * Decode a base64 `user:password` registry credential.
 * Returns null when the value does not decode to that shape.
 */
export function decodeRegistryAuth(raw: string): RegistryAuth | null {
  const value = raw.trim();
  if (!value) return null;
  const decoded = Buffer.from(value, "base64").toString("utf-8");
  const sep = decoded.indexOf(":");
  if (sep <= 0) return null;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

function mask(value: string): string {
  return "*".repeat(value.length);
}

/**
 * Build the credential store from `WH_SECRET_<name>`, `WH_AUTH_<name>` and
 * `WH_REMOVE_<name>` variables. Invalid groups are dropped with a warning.
 */
export function loadCredentials(env: NodeJS.ProcessEnv): CredentialStore {
  const credentials: GroupCredential[] = [];

  for (const key of Object.keys(env)) {
    if (!key.startsWith(ENV_SECRET_PREFIX)) continue;
    const name = key.slice(ENV_SECRET_PREFIX.length);

    const rawAuth = env[`${ENV_AUTH_PREFIX}${name}`]?.trim() ?? "";
    let registryAuth: RegistryAuth | undefined;
    if (rawAuth) {
      const decoded = decodeRegistryAuth(rawAuth);
      if (decoded) {
        registryAuth = decoded;
      } else {
        logger.warn(`Ignoring ${ENV_AUTH_PREFIX}${name}: expected base64 encoded user:password`, { webhook: name });
      }
    }

    const parsed = groupCredentialSchema.safeParse({
      name,
      secret: env[key] ?? "",
      registryAuth,
      purgeOldImage: env[`${ENV_REMOVE_PREFIX}${name}`]?.trim().toLowerCase() === "true",
    });
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => i.message).join(", ");
      logger.warn(`Skipping webhook ${name || "(unnamed)"}: ${reason}`, { webhook: name, variable: key });
      continue;
    }

    const credential = parsed.data;
    logger.info(`Found secret for ${credential.name} = ${mask(credential.secret)}`);
    if (credential.registryAuth) {
      logger.info(`Registry auth for ${credential.name} = ${mask(rawAuth)}`);
    }
    if (credential.purgeOldImage) {
      logger.warn(`Purge mode enabled for ${credential.name}: old images will be deleted after pulling new ones`);
    }
    credentials.push(credential);
  }

  return new CredentialStore(credentials);
}
