/**
 * In-process payout rail. Every outbound transfer of the ledger (payouts, the
 * treasury fee, rescues) credits a balance here. Frozen recipients reject
 * transfers, which is how a refusing counterparty shows up to the ledger.
 */

import type { ValueTransport } from "../types/ledger.js";

export class AccountBook implements ValueTransport {
  private readonly balances = new Map<string, bigint>();
  private readonly frozen = new Set<string>();

  async send(recipient: string, amount: bigint): Promise<void> {
    const to = recipient.toLowerCase();
    if (this.frozen.has(to)) {
      throw new Error(`Account ${to} rejects transfers`);
    }
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  balanceOf(address: string): bigint {
    return this.balances.get(address.toLowerCase()) ?? 0n;
  }

  freeze(address: string): void {
    this.frozen.add(address.toLowerCase());
  }

  unfreeze(address: string): void {
    this.frozen.delete(address.toLowerCase());
  }

  isFrozen(address: string): boolean {
    return this.frozen.has(address.toLowerCase());
  }
}
