// Asset Registry - Core Types

// =============================================================================
// Constants
// =============================================================================

/** The zero/none account: owner of nothing, never a valid recipient */
export const ZERO_ACCOUNT = '0x0000000000000000000000000000000000000000';

export const SNAPSHOT_VERSION = 1;

// =============================================================================
// Core Types
// =============================================================================

/** Account identifier. `ZERO_ACCOUNT` stands for "no account". */
export type Account = string;

/** Asset id, a positive integer assigned by mint */
export type TokenId = number;

export interface RegistryConfig {
  readonly name: string;
  readonly symbol: string;
}

/** Read model of a single live asset */
export interface AssetView {
  readonly id: TokenId;
  readonly owner: Account;
  readonly uri: string;
  readonly approved: Account;
}

// =============================================================================
// Events
// =============================================================================

export interface TransferEvent {
  readonly type: 'Transfer';
  readonly from: Account;
  readonly to: Account;
  readonly tokenId: TokenId;
}

export interface ApprovalEvent {
  readonly type: 'Approval';
  readonly owner: Account;
  readonly approved: Account;
  readonly tokenId: TokenId;
}

export interface ApprovalForAllEvent {
  readonly type: 'ApprovalForAll';
  readonly owner: Account;
  readonly operator: Account;
  readonly approved: boolean;
}

export type RegistryEvent = TransferEvent | ApprovalEvent | ApprovalForAllEvent;

export type RegistryEventType = RegistryEvent['type'];

// =============================================================================
// Helper Functions
// =============================================================================

export function isZeroAccount(account: Account): boolean {
  return account === ZERO_ACCOUNT;
}

/**
 * Checks if a value is a usable asset id (positive safe integer)
 */
export function isValidTokenId(id: number): id is TokenId {
  return Number.isSafeInteger(id) && id > 0;
}

/**
 * Accounts an event touches, used to filter event feeds per account
 */
export function eventAccounts(event: RegistryEvent): Account[] {
  switch (event.type) {
    case 'Transfer':
      return [event.from, event.to].filter(a => !isZeroAccount(a));
    case 'Approval':
      return [event.owner, event.approved].filter(a => !isZeroAccount(a));
    case 'ApprovalForAll':
      return [event.owner, event.operator];
  }
}
