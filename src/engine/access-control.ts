import { LedgerError } from "./errors.js";

export interface RoleHolders {
  owner: string;
  keeper: string;
}

/** Identities are compared case-insensitively (addresses, handles). */
export function normalizeIdentity(identity: string): string {
  const normalized = identity.trim().toLowerCase();
  if (!normalized) throw new LedgerError("INVALID_IDENTITY", "identity must not be empty");
  return normalized;
}

export function isOwner(roles: RoleHolders, caller: string): boolean {
  return normalizeIdentity(caller) === roles.owner;
}

/** Settlement is open to the keeper and, implicitly, the owner. */
export function isSettler(roles: RoleHolders, caller: string): boolean {
  const id = normalizeIdentity(caller);
  return id === roles.keeper || id === roles.owner;
}

export function requireOwner(roles: RoleHolders, caller: string): void {
  if (!isOwner(roles, caller)) {
    throw new LedgerError("NOT_OWNER", `${caller} is not the market owner`);
  }
}

export function requireSettler(roles: RoleHolders, caller: string): void {
  if (!isSettler(roles, caller)) {
    throw new LedgerError("NOT_KEEPER", `${caller} is neither keeper nor owner`);
  }
}
