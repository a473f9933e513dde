// Asset Registry - Operations
//
// Mutation intents as plain data, so they can be submitted over the wire,
// logged and replayed.

import type { Account, TokenId } from './types.js';
import type { RegistryErrorCode } from './errors.js';

export interface MintOperation {
  readonly type: 'mint';
  readonly to: Account;
  readonly uri?: string;
}

export interface ApproveOperation {
  readonly type: 'approve';
  readonly caller: Account;
  readonly to: Account;
  readonly tokenId: TokenId;
}

export interface SetOperatorApprovalOperation {
  readonly type: 'setOperatorApproval';
  readonly caller: Account;
  readonly operator: Account;
  readonly approved: boolean;
}

export interface TransferOperation {
  readonly type: 'transfer';
  readonly caller: Account;
  readonly from: Account;
  readonly to: Account;
  readonly tokenId: TokenId;
}

export interface BurnOperation {
  readonly type: 'burn';
  readonly caller: Account;
  readonly tokenId: TokenId;
}

export type RegistryOperation =
  | MintOperation
  | ApproveOperation
  | SetOperatorApprovalOperation
  | TransferOperation
  | BurnOperation;

export type OperationResult =
  | { readonly ok: true; readonly tokenId?: TokenId }
  | { readonly ok: false; readonly error: { readonly code: RegistryErrorCode; readonly message: string } };
