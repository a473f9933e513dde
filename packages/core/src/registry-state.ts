// Asset Registry - Registry State
//
// Typed single-key accessors over a KeyValueStore. Every field has an explicit
// default: an absent key reads as ZERO_ACCOUNT, 0, false or "". Writing the
// default deletes the key so the store only ever holds live entries.

import { ZERO_ACCOUNT, Account, TokenId } from './types.js';
import { KeyValueStore, MemoryKeyValueStore, StoredValue } from './storage.js';

// =============================================================================
// Keys
// =============================================================================

const seg = (account: Account): string => encodeURIComponent(account);

export const StateKeys = {
  name: 'name',
  symbol: 'symbol',
  counter: 'counter',
  owner: (id: TokenId) => `owner:${id}`,
  balance: (account: Account) => `balance:${seg(account)}`,
  tokenApproval: (id: TokenId) => `approval:${id}`,
  operatorApproval: (owner: Account, operator: Account) =>
    `operator:${seg(owner)}:${seg(operator)}`,
  tokenUri: (id: TokenId) => `uri:${id}`,
  ownedCount: (account: Account) => `ownedCount:${seg(account)}`,
  ownedIndex: (account: Account, position: number) => `ownedIndex:${seg(account)}:${position}`,
  ownedPosition: (id: TokenId) => `ownedPosition:${id}`,
} as const;

export type StateValueType = 'string' | 'number' | 'boolean';

const VALUE_TYPE_BY_PREFIX: ReadonlyArray<readonly [string, StateValueType]> = [
  ['owner:', 'string'],
  ['approval:', 'string'],
  ['uri:', 'string'],
  ['balance:', 'number'],
  ['ownedCount:', 'number'],
  ['ownedIndex:', 'number'],
  ['ownedPosition:', 'number'],
  ['operator:', 'boolean'],
];

/**
 * Value type a state key must hold, or null for keys the registry never writes.
 */
export function expectedValueType(key: string): StateValueType | null {
  if (key === StateKeys.name || key === StateKeys.symbol) {
    return 'string';
  }
  if (key === StateKeys.counter) {
    return 'number';
  }
  const match = VALUE_TYPE_BY_PREFIX.find(([prefix]) => key.startsWith(prefix));
  return match ? match[1] : null;
}

// =============================================================================
// RegistryState
// =============================================================================

export class RegistryState {
  readonly store: KeyValueStore;

  constructor(store: KeyValueStore = new MemoryKeyValueStore()) {
    this.store = store;
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  getName(): string {
    return this.readString(StateKeys.name);
  }

  setName(name: string): void {
    this.writeString(StateKeys.name, name);
  }

  getSymbol(): string {
    return this.readString(StateKeys.symbol);
  }

  setSymbol(symbol: string): void {
    this.writeString(StateKeys.symbol, symbol);
  }

  getCounter(): number {
    return this.readNumber(StateKeys.counter);
  }

  setCounter(value: number): void {
    this.writeNumber(StateKeys.counter, value);
  }

  // ---------------------------------------------------------------------------
  // Ownership
  // ---------------------------------------------------------------------------

  getOwner(id: TokenId): Account {
    return this.readAccount(StateKeys.owner(id));
  }

  setOwner(id: TokenId, owner: Account): void {
    this.writeAccount(StateKeys.owner(id), owner);
  }

  getBalance(account: Account): number {
    return this.readNumber(StateKeys.balance(account));
  }

  setBalance(account: Account, balance: number): void {
    if (balance < 0) {
      throw new Error(`Balance underflow for ${account}`);
    }
    this.writeNumber(StateKeys.balance(account), balance);
  }

  getTokenUri(id: TokenId): string {
    return this.readString(StateKeys.tokenUri(id));
  }

  setTokenUri(id: TokenId, uri: string): void {
    this.writeString(StateKeys.tokenUri(id), uri);
  }

  // ---------------------------------------------------------------------------
  // Approvals
  // ---------------------------------------------------------------------------

  getTokenApproval(id: TokenId): Account {
    return this.readAccount(StateKeys.tokenApproval(id));
  }

  setTokenApproval(id: TokenId, approved: Account): void {
    this.writeAccount(StateKeys.tokenApproval(id), approved);
  }

  getOperatorApproval(owner: Account, operator: Account): boolean {
    return this.readBoolean(StateKeys.operatorApproval(owner, operator));
  }

  setOperatorApproval(owner: Account, operator: Account, approved: boolean): void {
    const key = StateKeys.operatorApproval(owner, operator);
    if (approved) {
      this.store.set(key, true);
    } else {
      this.store.delete(key);
    }
  }

  // ---------------------------------------------------------------------------
  // Enumeration storage
  // ---------------------------------------------------------------------------

  getOwnedCount(account: Account): number {
    return this.readNumber(StateKeys.ownedCount(account));
  }

  setOwnedCount(account: Account, count: number): void {
    this.writeNumber(StateKeys.ownedCount(account), count);
  }

  /** Id stored at a position of an account's list, 0 when the slot is empty */
  getOwnedTokenAt(account: Account, position: number): TokenId {
    return this.readNumber(StateKeys.ownedIndex(account, position));
  }

  setOwnedTokenAt(account: Account, position: number, id: TokenId): void {
    this.writeNumber(StateKeys.ownedIndex(account, position), id);
  }

  getOwnedPosition(id: TokenId): number {
    return this.readNumber(StateKeys.ownedPosition(id));
  }

  setOwnedPosition(id: TokenId, position: number): void {
    this.writeNumber(StateKeys.ownedPosition(id), position);
  }

  // ===========================================================================
  // Typed reads and default-deleting writes
  // ===========================================================================

  private read(key: string, expected: StateValueType): StoredValue | undefined {
    const value = this.store.get(key);
    if (value !== undefined && typeof value !== expected) {
      throw new Error(`Corrupt registry state: ${key} holds ${typeof value}, expected ${expected}`);
    }
    return value;
  }

  private readString(key: string): string {
    const value = this.read(key, 'string');
    return typeof value === 'string' ? value : '';
  }

  private readAccount(key: string): Account {
    const value = this.read(key, 'string');
    return typeof value === 'string' ? value : ZERO_ACCOUNT;
  }

  private readNumber(key: string): number {
    const value = this.read(key, 'number');
    return typeof value === 'number' ? value : 0;
  }

  private readBoolean(key: string): boolean {
    return this.read(key, 'boolean') === true;
  }

  private writeString(key: string, value: string): void {
    if (value === '') {
      this.store.delete(key);
    } else {
      this.store.set(key, value);
    }
  }

  private writeAccount(key: string, value: Account): void {
    if (value === ZERO_ACCOUNT) {
      this.store.delete(key);
    } else {
      this.store.set(key, value);
    }
  }

  private writeNumber(key: string, value: number): void {
    if (value === 0) {
      this.store.delete(key);
    } else {
      this.store.set(key, value);
    }
  }
}
