import { describe, it, expect } from 'vitest';
import { AssetRegistry } from '../src/registry.js';
import { RegistryError } from '../src/errors.js';
import type { RegistryOperation } from '../src/operations.js';
import { ZERO_ACCOUNT } from '../src/types.js';

const TEST_CONFIG = { name: 'Ludo Tokens', symbol: 'LUDO' };

const ALICE = 'account-alice';
const BOB = 'account-bob';
const CAROL = 'account-carol';

const HISTORY: RegistryOperation[] = [
  { type: 'mint', to: ALICE, uri: 'ipfs://red' },
  { type: 'mint', to: ALICE },
  { type: 'mint', to: BOB },
  { type: 'setOperatorApproval', caller: BOB, operator: CAROL, approved: true },
  { type: 'transfer', caller: ALICE, from: ALICE, to: BOB, tokenId: 1 },
  { type: 'approve', caller: ALICE, to: CAROL, tokenId: 2 },
  { type: 'burn', caller: CAROL, tokenId: 3 },
];

function describeRegistry(registry: AssetRegistry) {
  return {
    name: registry.getName(),
    symbol: registry.getSymbol(),
    totalMinted: registry.getTotalMinted(),
    owners: [1, 2, 3].map(id => registry.ownerOf(id)),
    balances: [ALICE, BOB, CAROL].map(a => registry.balanceOf(a)),
    tokens: [ALICE, BOB, CAROL].map(a => registry.getTokenIdsOf(a)),
    approved2: registry.getApproved(2),
    uri1: registry.getTokenUri(1),
    bobCarol: registry.isApprovedForAll(BOB, CAROL),
  };
}

// =============================================================================
// Recovery
// =============================================================================

describe('AssetRegistry.recover', () => {
  it('replays an operation log', () => {
    const registry = AssetRegistry.recover(TEST_CONFIG, HISTORY);

    expect(describeRegistry(registry)).toEqual({
      name: 'Ludo Tokens',
      symbol: 'LUDO',
      totalMinted: 3,
      owners: [BOB, ALICE, ZERO_ACCOUNT],
      balances: [1, 1, 0],
      tokens: [[2], [1], []],
      approved2: CAROL,
      uri1: 'ipfs://red',
      bobCarol: true,
    });
  });

  it('throws the first rejection met', () => {
    const broken: RegistryOperation[] = [
      { type: 'mint', to: ALICE },
      { type: 'transfer', caller: BOB, from: ALICE, to: BOB, tokenId: 1 },
    ];
    expect(() => AssetRegistry.recover(TEST_CONFIG, broken)).toThrow(RegistryError);
  });
});

// =============================================================================
// Snapshots
// =============================================================================

describe('serialize / deserialize', () => {
  it('restores an equivalent registry', () => {
    const original = AssetRegistry.recover(TEST_CONFIG, HISTORY);
    const restored = AssetRegistry.deserialize(original.serialize());

    expect(describeRegistry(restored)).toEqual(describeRegistry(original));
    expect(restored.serialize()).toBe(original.serialize());
  });

  it('continues numbering after restore', () => {
    const restored = AssetRegistry.deserialize(AssetRegistry.recover(TEST_CONFIG, HISTORY).serialize());
    expect(restored.mint(CAROL)).toBe(4);
    expect(restored.getTokenIdsOf(CAROL)).toEqual([4]);
  });

  it('rejects invalid JSON', () => {
    expect(() => AssetRegistry.deserialize('{not json')).toThrow('Snapshot is not valid JSON');
  });

  it('rejects an unknown version', () => {
    const json = JSON.stringify({ version: 2, config: TEST_CONFIG, entries: [] });
    expect(() => AssetRegistry.deserialize(json)).toThrow(/^Invalid snapshot: version: /);
  });

  it('rejects malformed entries', () => {
    const json = JSON.stringify({ version: 1, config: TEST_CONFIG, entries: [['counter', null]] });
    try {
      AssetRegistry.deserialize(json);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryError);
      expect(error instanceof RegistryError ? error.code : null).toBe('InvalidSnapshot');
    }
  });

  it('rejects entries whose value does not fit the key', () => {
    const json = JSON.stringify({
      version: 1,
      config: TEST_CONFIG,
      entries: [['owner:1', 5], ['counter', 1]],
    });
    expect(() => AssetRegistry.deserialize(json)).toThrow(
      'Invalid snapshot: entries.0: owner:1 holds number, expected string',
    );
  });

  it('rejects keys the registry never writes', () => {
    const json = JSON.stringify({ version: 1, config: TEST_CONFIG, entries: [['owners:1', ALICE]] });
    expect(() => AssetRegistry.deserialize(json)).toThrow(
      'Invalid snapshot: entries.0: unknown state key owners:1',
    );
  });
});
