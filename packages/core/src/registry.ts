// Asset Registry - Registry
//
// The AssetRegistry owns one RegistryState and exposes the query and mutation
// surfaces over it. Every mutation checks all of its preconditions before the
// first write, so a rejected call leaves the state exactly as it was.
// Registry state is FULLY DERIVABLE from:
// - Registry config (name, symbol)
// - The log of accepted operations
// which is what recover() relies on.

import { EventEmitter } from 'events';
import { z } from 'zod';
import {
  ZERO_ACCOUNT,
  SNAPSHOT_VERSION,
  Account,
  AssetView,
  RegistryConfig,
  RegistryEvent,
  TokenId,
  isValidTokenId,
  isZeroAccount,
} from './types.js';
import { RegistryError, isRegistryError } from './errors.js';
import { RegistryState, expectedValueType } from './registry-state.js';
import { KeyValueStore, MemoryKeyValueStore } from './storage.js';
import { appendOwnedToken, listOwnedTokens, removeOwnedToken } from './enumeration.js';
import type { OperationResult, RegistryOperation } from './operations.js';

// =============================================================================
// Snapshot format
// =============================================================================

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  config: z.object({
    name: z.string(),
    symbol: z.string(),
  }),
  entries: z.array(
    z
      .tuple([z.string(), z.union([z.string(), z.number(), z.boolean()])])
      .superRefine(([key, value], ctx) => {
        const expected = expectedValueType(key);
        if (expected === null) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown state key ${key}` });
        } else if (typeof value !== expected) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${key} holds ${typeof value}, expected ${expected}`,
          });
        }
      }),
  ),
});

export type SerializedRegistry = z.infer<typeof snapshotSchema>;

// =============================================================================
// AssetRegistry Class
// =============================================================================

export class AssetRegistry extends EventEmitter {
  private readonly config: RegistryConfig;
  private readonly state: RegistryState;

  constructor(config: RegistryConfig, store?: KeyValueStore) {
    super();
    this.config = { name: config.name, symbol: config.symbol };
    this.state = new RegistryState(store);
    this.state.setName(config.name);
    this.state.setSymbol(config.symbol);
  }

  // ===========================================================================
  // Query Surface
  // ===========================================================================

  getName(): string {
    return this.state.getName();
  }

  getSymbol(): string {
    return this.state.getSymbol();
  }

  getTokenUri(id: TokenId): string {
    this.requireExisting(id);
    return this.state.getTokenUri(id);
  }

  balanceOf(account: Account): number {
    if (isZeroAccount(account)) {
      throw new RegistryError('InvalidAccount', 'Balance query for the zero account');
    }
    return this.state.getBalance(account);
  }

  /**
   * Stored owner, or ZERO_ACCOUNT for ids never minted or already burned.
   */
  ownerOf(id: TokenId): Account {
    if (!isValidTokenId(id)) {
      return ZERO_ACCOUNT;
    }
    return this.state.getOwner(id);
  }

  getApproved(id: TokenId): Account {
    this.requireExisting(id);
    return this.state.getTokenApproval(id);
  }

  isApprovedForAll(owner: Account, operator: Account): boolean {
    return this.state.getOperatorApproval(owner, operator);
  }

  getTotalMinted(): number {
    return this.state.getCounter();
  }

  getTokenIdsOf(account: Account): TokenId[] {
    return listOwnedTokens(this.state, account);
  }

  exists(id: TokenId): boolean {
    return !isZeroAccount(this.ownerOf(id));
  }

  getAsset(id: TokenId): AssetView | null {
    if (!this.exists(id)) {
      return null;
    }
    return {
      id,
      owner: this.state.getOwner(id),
      uri: this.state.getTokenUri(id),
      approved: this.state.getTokenApproval(id),
    };
  }

  getConfig(): RegistryConfig {
    return this.config;
  }

  // ===========================================================================
  // Mutation Surface
  // ===========================================================================

  /**
   * Mint the next id to `to`. Returns the new id.
   */
  mint(to: Account, uri?: string): TokenId {
    if (isZeroAccount(to)) {
      throw new RegistryError('ZeroAddress', 'Cannot mint to the zero account');
    }

    const newId = this.state.getCounter() + 1;
    if (!isZeroAccount(this.state.getOwner(newId))) {
      throw new RegistryError('AlreadyMinted', `Token ${newId} already minted`, { tokenId: newId });
    }

    this.state.setBalance(to, this.state.getBalance(to) + 1);
    this.state.setOwner(newId, to);
    this.state.setCounter(newId);
    if (uri !== undefined) {
      this.state.setTokenUri(newId, uri);
    }
    appendOwnedToken(this.state, to, newId);

    this.emitEvent({ type: 'Transfer', from: ZERO_ACCOUNT, to, tokenId: newId });
    return newId;
  }

  approve(caller: Account, to: Account, id: TokenId): void {
    const owner = this.ownerOf(id);

    if (to === owner) {
      throw new RegistryError('SelfApproval', 'Cannot approve the current owner', { tokenId: id });
    }

    if (
      isZeroAccount(caller) ||
      isZeroAccount(owner) ||
      (caller !== owner && !this.state.getOperatorApproval(owner, caller))
    ) {
      throw new RegistryError('Unauthorized', `${caller} may not approve token ${id}`, {
        tokenId: id,
        caller,
      });
    }

    this.state.setTokenApproval(id, to);
    this.emitEvent({ type: 'Approval', owner, approved: to, tokenId: id });
  }

  setOperatorApproval(caller: Account, operator: Account, approved: boolean): void {
    if (isZeroAccount(caller)) {
      throw new RegistryError('Unauthorized', 'The zero account cannot appoint operators', { caller });
    }
    if (operator === caller) {
      throw new RegistryError('SelfApproval', 'Cannot set operator approval for yourself');
    }
    if (isZeroAccount(operator)) {
      throw new RegistryError('ZeroAddress', 'Operator cannot be the zero account');
    }

    this.state.setOperatorApproval(caller, operator, approved);
    this.emitEvent({ type: 'ApprovalForAll', owner: caller, operator, approved });
  }

  /**
   * Transfer `id` from `from` to `to` on behalf of `caller`.
   * Authorization is checked against the stored owner; `from` is checked
   * separately afterwards and must match it.
   */
  transfer(caller: Account, from: Account, to: Account, id: TokenId): void {
    const owner = this.ownerOf(id);
    if (!this.isAuthorized(caller, owner, id)) {
      throw new RegistryError('Unauthorized', `${caller} may not transfer token ${id}`, {
        tokenId: id,
        caller,
      });
    }

    this.transferUnchecked(from, to, id);
  }

  /**
   * Destroy `id`. The id is never minted again.
   */
  burn(caller: Account, id: TokenId): void {
    const owner = this.ownerOf(id);
    if (isZeroAccount(owner)) {
      throw new RegistryError('NotFound', `Token ${id} does not exist`, { tokenId: id });
    }
    if (!this.isAuthorized(caller, owner, id)) {
      throw new RegistryError('Unauthorized', `${caller} may not burn token ${id}`, {
        tokenId: id,
        caller,
      });
    }

    removeOwnedToken(this.state, owner, id);
    this.state.setTokenApproval(id, ZERO_ACCOUNT);
    this.state.setBalance(owner, this.state.getBalance(owner) - 1);
    this.state.setOwner(id, ZERO_ACCOUNT);
    this.state.setTokenUri(id, '');

    this.emitEvent({ type: 'Transfer', from: owner, to: ZERO_ACCOUNT, tokenId: id });
  }

  // ===========================================================================
  // Operation dispatch
  // ===========================================================================

  /**
   * Apply one operation, reporting a registry rejection as a failed result.
   * Errors that are not registry rejections propagate.
   */
  apply(operation: RegistryOperation): OperationResult {
    try {
      const tokenId = this.execute(operation);
      return tokenId === undefined ? { ok: true } : { ok: true, tokenId };
    } catch (error) {
      if (isRegistryError(error)) {
        return { ok: false, error: { code: error.code, message: error.message } };
      }
      throw error;
    }
  }

  private execute(operation: RegistryOperation): TokenId | undefined {
    switch (operation.type) {
      case 'mint':
        return this.mint(operation.to, operation.uri);
      case 'approve':
        this.approve(operation.caller, operation.to, operation.tokenId);
        return undefined;
      case 'setOperatorApproval':
        this.setOperatorApproval(operation.caller, operation.operator, operation.approved);
        return undefined;
      case 'transfer':
        this.transfer(operation.caller, operation.from, operation.to, operation.tokenId);
        return undefined;
      case 'burn':
        this.burn(operation.caller, operation.tokenId);
        return undefined;
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private transferUnchecked(from: Account, to: Account, id: TokenId): void {
    if (from !== this.ownerOf(id)) {
      throw new RegistryError('OwnerMismatch', `${from} does not own token ${id}`, {
        tokenId: id,
        from,
      });
    }
    if (isZeroAccount(to)) {
      throw new RegistryError('ZeroAddress', 'Cannot transfer to the zero account', { tokenId: id });
    }

    removeOwnedToken(this.state, from, id);
    appendOwnedToken(this.state, to, id);
    this.state.setTokenApproval(id, ZERO_ACCOUNT);
    this.state.setBalance(from, this.state.getBalance(from) - 1);
    this.state.setBalance(to, this.state.getBalance(to) + 1);
    this.state.setOwner(id, to);

    this.emitEvent({ type: 'Transfer', from, to, tokenId: id });
  }

  private isAuthorized(caller: Account, owner: Account, id: TokenId): boolean {
    if (isZeroAccount(caller) || isZeroAccount(owner)) {
      return false;
    }
    return (
      caller === owner ||
      this.state.getOperatorApproval(owner, caller) ||
      this.state.getTokenApproval(id) === caller
    );
  }

  private requireExisting(id: TokenId): void {
    if (!this.exists(id)) {
      throw new RegistryError('NotFound', `Token ${id} does not exist`, { tokenId: id });
    }
  }

  private emitEvent(event: RegistryEvent): void {
    this.emit(event.type, event);
    this.emit('registry_event', event);
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * Serialize the full registry state to a JSON string.
   */
  serialize(): string {
    const snapshot: SerializedRegistry = {
      version: SNAPSHOT_VERSION,
      config: { ...this.config },
      entries: Array.from(this.state.store.entries()),
    };
    return JSON.stringify(snapshot);
  }

  /**
   * Rebuild a registry from serialize() output.
   */
  static deserialize(json: string): AssetRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch {
      throw new RegistryError('InvalidSnapshot', 'Snapshot is not valid JSON');
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new RegistryError('InvalidSnapshot', `Invalid snapshot: ${reason}`);
    }

    const { config, entries } = parsed.data;
    return new AssetRegistry(config, new MemoryKeyValueStore(entries));
  }

  /**
   * Rebuild a registry by replaying an operation log.
   * Throws the first rejection met during replay.
   */
  static recover(config: RegistryConfig, operations: readonly RegistryOperation[]): AssetRegistry {
    const registry = new AssetRegistry(config);
    for (const operation of operations) {
      registry.execute(operation);
    }
    return registry;
  }
}
