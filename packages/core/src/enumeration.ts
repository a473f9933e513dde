// Asset Registry - Enumeration Index
//
// Per-account list of currently owned ids, kept dense with swap-and-pop:
// removing an id moves the account's last id into the vacated slot.

import type { Account, TokenId } from './types.js';
import type { RegistryState } from './registry-state.js';

export function appendOwnedToken(state: RegistryState, account: Account, id: TokenId): void {
  const position = state.getOwnedCount(account);
  state.setOwnedTokenAt(account, position, id);
  state.setOwnedPosition(id, position);
  state.setOwnedCount(account, position + 1);
}

export function removeOwnedToken(state: RegistryState, account: Account, id: TokenId): void {
  const count = state.getOwnedCount(account);
  const position = state.getOwnedPosition(id);

  if (count === 0 || state.getOwnedTokenAt(account, position) !== id) {
    throw new Error(`Token ${id} is not in the enumeration index of ${account}`);
  }

  const lastPosition = count - 1;
  if (position !== lastPosition) {
    const lastId = state.getOwnedTokenAt(account, lastPosition);
    state.setOwnedTokenAt(account, position, lastId);
    state.setOwnedPosition(lastId, position);
  }

  state.setOwnedTokenAt(account, lastPosition, 0);
  state.setOwnedPosition(id, 0);
  state.setOwnedCount(account, lastPosition);
}

/**
 * Ids owned by an account, in index order. Returns a fresh array each call.
 */
export function listOwnedTokens(state: RegistryState, account: Account): TokenId[] {
  const count = state.getOwnedCount(account);
  const ids: TokenId[] = [];
  for (let position = 0; position < count; position++) {
    ids.push(state.getOwnedTokenAt(account, position));
  }
  return ids;
}
