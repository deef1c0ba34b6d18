import { timingSafeEqual } from "node:crypto";
import type { CredentialStore } from "./credential-store.js";
import type { GroupCredential } from "./types.js";

export type AuthenticationFailure = "not-found" | "missing" | "mismatch";

/** Thrown before any runtime call when a webhook request cannot be authenticated. */
export class AuthenticationError extends Error {
  readonly name = "AuthenticationError" as const;
  readonly kind: AuthenticationFailure;
  readonly group: string;

  constructor(kind: AuthenticationFailure, group: string) {
    super(
      kind === "not-found" ? `Webhook not found: ${group}` : kind === "missing" ? "Secret not found" : "Secret mismatch",
    );
    this.kind = kind;
    this.group = group;
  }
}

function secretsEqual(supplied: string, expected: string): boolean {
  const a = Buffer.from(supplied);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Resolve the credential for a group and check the supplied secret against it.
 * Both values are trimmed; the name lookup is exact.
 */
export function authenticate(store: CredentialStore, name: string, secret: string | undefined): GroupCredential {
  const group = name.trim();
  const credential = store.lookup(group);
  if (!credential) throw new AuthenticationError("not-found", group);

  const supplied = secret?.trim() ?? "";
  if (!supplied) throw new AuthenticationError("missing", group);
  if (!secretsEqual(supplied, credential.secret)) throw new AuthenticationError("mismatch", group);

  return credential;
}
