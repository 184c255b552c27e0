import { describe, it, expect } from 'vitest';
import { InMemoryClaimSource, isNoopChange, mergeLabels } from '../../src/services/claim-source.js';
import { NotFoundError, VersionConflictError } from '../../src/services/governance-errors.js';
import { claimFromPayload, ClaimPayloadSchema } from '../../src/types/claim.js';
import { makeClaim, NOW } from '../fixtures/policy.js';

describe('mergeLabels', () => {
  it('sets, overwrites and removes keys', () => {
    expect(mergeLabels({ a: '1', b: '2' }, { b: '3', a: null, c: '4' })).toEqual({ b: '3', c: '4' });
  });

  it('copies the labels when there are no changes', () => {
    const labels = { a: '1' };
    const merged = mergeLabels(labels, undefined);
    expect(merged).toEqual({ a: '1' });
    expect(merged).not.toBe(labels);
  });
});

describe('isNoopChange', () => {
  const claim = makeClaim({ labels: { owner: 'alice' } });

  it('is a no-op when status and labels already match', () => {
    expect(isNoopChange(claim, { status: 'ready', labels: { owner: 'alice', gone: null } })).toBe(true);
  });

  it('detects a status change', () => {
    expect(isNoopChange(claim, { status: 'deleted' })).toBe(false);
  });

  it('detects a label removal', () => {
    expect(isNoopChange(claim, { labels: { owner: null } })).toBe(false);
  });

  it('detects a label value change', () => {
    expect(isNoopChange(claim, { labels: { owner: 'bob' } })).toBe(false);
  });
});

describe('InMemoryClaimSource', () => {
  it('patches at the expected version and bumps it', async () => {
    const source = new InMemoryClaimSource([makeClaim()]);

    const updated = await source.patch('team-alpha/db', 1, { status: 'flagged-for-cleanup', labels: { x: 'y' } });

    expect(updated).toMatchObject({ status: 'flagged-for-cleanup', labels: { x: 'y' }, version: 2 });
    expect(await source.get('team-alpha/db')).toEqual(updated);
  });

  it('rejects a stale version without writing', async () => {
    const source = new InMemoryClaimSource([makeClaim({ version: 4 })]);

    await expect(source.patch('team-alpha/db', 3, { status: 'deleted' })).rejects.toEqual(
      new VersionConflictError('team-alpha/db', 3, 4),
    );
    expect((await source.get('team-alpha/db'))?.status).toBe('ready');
  });

  it('raises NotFoundError for an unknown claim', async () => {
    await expect(new InMemoryClaimSource().patch('x/y', 1, {})).rejects.toBeInstanceOf(NotFoundError);
  });

  it('returns null from get for an unknown claim', async () => {
    expect(await new InMemoryClaimSource().get('x/y')).toBeNull();
  });

  it('lists what was put', async () => {
    const source = new InMemoryClaimSource();
    source.put(makeClaim({ id: 'a/db' }));
    source.put(makeClaim({ id: 'b/db' }));
    expect((await source.list()).map((c) => c.id)).toEqual(['a/db', 'b/db']);
  });
});

describe('claimFromPayload', () => {
  it('builds a pending claim at version 0', () => {
    const payload = ClaimPayloadSchema.parse({
      name: 'db',
      namespace: 'staging-search',
      tier: 'staging',
      storageSizeGB: 10,
    });

    expect(claimFromPayload(payload, NOW)).toEqual({
      id: 'staging-search/db',
      namespace: 'staging-search',
      tier: 'staging',
      createdAt: '2024-06-01T12:00:00.000Z',
      labels: {},
      status: 'pending',
      version: 0,
      parameters: { storageSizeGB: 10 },
    });
  });

  it('rejects a name that is not a DNS label', () => {
    expect(ClaimPayloadSchema.safeParse({ name: 'My_DB', namespace: 'a', tier: 'staging' }).success).toBe(false);
  });
});
