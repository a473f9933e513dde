// Asset Registry - Consistency Audit
//
// Recomputes ownership from scratch and reports every place where stored
// balances, approvals or the enumeration index disagree with it.

import { ZERO_ACCOUNT, Account, TokenId, isZeroAccount } from './types.js';
import type { AssetRegistry } from './registry.js';

export interface AuditReport {
  readonly ok: boolean;
  readonly violations: readonly string[];
}

/**
 * Audit a registry against the accounts the caller knows about.
 * Ownership is derived from ids 1..totalMinted.
 */
export function auditRegistry(registry: AssetRegistry, accounts: readonly Account[]): AuditReport {
  const violations: string[] = [];
  const holdings = new Map<Account, TokenId[]>();

  for (let id = 1; id <= registry.getTotalMinted(); id++) {
    const owner = registry.ownerOf(id);
    if (isZeroAccount(owner)) {
      continue;
    }
    const held = holdings.get(owner) ?? [];
    held.push(id);
    holdings.set(owner, held);

    const approved = registry.getApproved(id);
    if (approved === owner) {
      violations.push(`token ${id}: approved account equals owner ${owner}`);
    }
  }

  const checked = new Set<Account>([...accounts, ...holdings.keys()]);
  checked.delete(ZERO_ACCOUNT);

  for (const account of checked) {
    const held = holdings.get(account) ?? [];
    const balance = registry.balanceOf(account);
    if (balance !== held.length) {
      violations.push(`${account}: balance ${balance} but owns ${held.length}`);
    }

    const listed = registry.getTokenIdsOf(account);
    const listedSorted = [...listed].sort((a, b) => a - b);
    if (listedSorted.join(',') !== held.join(',')) {
      violations.push(`${account}: enumeration [${listed.join(', ')}] but owns [${held.join(', ')}]`);
    }
  }

  return { ok: violations.length === 0, violations };
}
