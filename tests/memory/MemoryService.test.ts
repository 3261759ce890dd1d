import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../../src/core/errors';
import { InMemoryMemoryRepository } from '../../src/services/memory/InMemoryMemoryRepository';
import { MemoryService } from '../../src/services/memory/MemoryService';
import { ManualClock, silentLogger } from '../helpers';

const DAY = 24 * 60 * 60 * 1000;

describe('MemoryService', () => {
  let clock: ManualClock;
  let repository: InMemoryMemoryRepository;
  let service: MemoryService;

  beforeEach(() => {
    clock = new ManualClock();
    repository = new InMemoryMemoryRepository({ now: clock.now, language: 'english', agentIds: ['a1', 'a2'] });
    service = new MemoryService(repository, silentLogger);
  });

  describe('upsert', () => {
    it('stores a memory with defaults', async () => {
      const memory = await service.upsert({ agentId: 'a1', key: 'favorite_destination', value: 'Bali' });

      expect(memory).toMatchObject({
        agent_id: 'a1',
        lead_id: null,
        key: 'favorite_destination',
        value: 'Bali',
        relevance_score: 1,
        metadata: {},
        expires_at: null
      });
      expect(memory.created_at).toEqual(clock.now());
      expect(memory.updated_at).toEqual(clock.now());
    });

    it('keeps one record per (agent, key) and the values of the last write', async () => {
      const first = await service.upsert({ agentId: 'a1', key: 'budget', value: '1000 EUR', relevanceScore: 0.4 });
      clock.advance(1000);
      await service.upsert({ agentId: 'a1', key: 'budget', value: '1500 EUR', metadata: { source: 'agent' } });
      clock.advance(1000);
      const last = await service.upsert({ agentId: 'a1', key: 'budget', value: '2000 EUR', relevanceScore: 0.8 });

      expect(repository.size()).toBe(1);
      expect(last.id).toBe(first.id);
      expect(last.value).toBe('2000 EUR');
      expect(last.relevance_score).toBe(0.8);
      expect(last.metadata).toEqual({});
      expect(last.created_at).toEqual(first.created_at);
      expect(last.updated_at).toEqual(new Date('2024-03-01T10:00:02.000Z'));
    });

    it('is idempotent apart from updated_at', async () => {
      const input = { agentId: 'a1', key: 'party_size', value: '4', relevanceScore: 0.7, metadata: { source: 'form' } };
      const first = await service.upsert(input);
      clock.advance(5000);
      const second = await service.upsert(input);

      expect(repository.size()).toBe(1);
      expect({ ...second, updated_at: first.updated_at }).toEqual(first);
      expect(second.updated_at.getTime()).toBe(first.updated_at.getTime() + 5000);
    });

    it('keeps the lead of an existing memory when a later write omits it', async () => {
      await service.upsert({ agentId: 'a1', key: 'name', value: 'Ana', leadId: '+34600000000' });
      const updated = await service.upsert({ agentId: 'a1', key: 'name', value: 'Ana María' });

      expect(updated.lead_id).toBe('+34600000000');
    });

    it('trims identifiers and treats a blank lead as none', async () => {
      const memory = await service.upsert({ agentId: ' a1 ', key: ' budget ', value: '2000', leadId: '   ' });

      expect(memory.agent_id).toBe('a1');
      expect(memory.key).toBe('budget');
      expect(memory.lead_id).toBeNull();
    });

    it('serializes concurrent writes to one key, keeping the last one issued', async () => {
      const writes = ['1000 EUR', '1500 EUR', '2000 EUR'].map(value => {
        clock.advance(1000);
        return service.upsert({ agentId: 'a1', key: 'budget', value });
      });

      const results = await Promise.all(writes);

      expect(repository.size()).toBe(1);
      expect(new Set(results.map(result => result.id)).size).toBe(1);
      expect(results.map(result => result.created_at)).toEqual([
        new Date('2024-03-01T10:00:01.000Z'),
        new Date('2024-03-01T10:00:01.000Z'),
        new Date('2024-03-01T10:00:01.000Z')
      ]);

      const stored = await service.get('a1', 'budget');
      expect(stored?.value).toBe('2000 EUR');
      expect(stored?.updated_at).toEqual(new Date('2024-03-01T10:00:03.000Z'));
    });

    it('accepts relevance scores outside 0..1', async () => {
      const memory = await service.upsert({ agentId: 'a1', key: 'vip', value: 'yes', relevanceScore: 3.5 });
      expect(memory.relevance_score).toBe(3.5);
    });

    it.each([
      [{ agentId: '', key: 'k', value: 'v' }, 'Missing required field: agent_id'],
      [{ agentId: 'a1', key: '   ', value: 'v' }, 'Missing required field: key'],
      [{ agentId: 'a1', key: 'k', value: 'v', relevanceScore: Number.NaN }, 'Field relevance_score must be a finite number'],
      [{ agentId: 'a1', key: 'k', value: 'v', expiresAt: new Date('not a date') }, 'Field expires_at must be a valid date']
    ])('rejects invalid input %#', async (input, message) => {
      await expect(service.upsert(input)).rejects.toThrow(new ValidationError(message));
      expect(repository.size()).toBe(0);
    });

    it('rejects writes for an unknown agent', async () => {
      await expect(service.upsert({ agentId: 'ghost', key: 'k', value: 'v' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('search', () => {
    it('finds a memory by a word of its key', async () => {
      await service.upsert({ agentId: 'a1', key: 'favorite_destination', value: 'Bali', relevanceScore: 0.9 });

      const results = await service.search('a1', 'destination', { minRelevance: 0.5, limit: 5 });

      expect(results).toHaveLength(1);
      expect(results[0].key).toBe('favorite_destination');
      expect(results[0].value).toBe('Bali');
      expect(results[0].rank).toBeGreaterThan(0);
    });

    it('only returns memories of the requested agent', async () => {
      await service.upsert({ agentId: 'a1', key: 'favorite_destination', value: 'Bali' });
      await service.upsert({ agentId: 'a2', key: 'favorite_destination', value: 'Lisbon' });

      const results = await service.search('a1', 'destination');

      expect(results.map(result => result.value)).toEqual(['Bali']);
    });

    it('filters out memories below the relevance threshold', async () => {
      await service.upsert({ agentId: 'a1', key: 'hotel_low', value: 'hotel near the port', relevanceScore: 0.3 });
      await service.upsert({ agentId: 'a1', key: 'hotel_mid', value: 'hotel near the beach', relevanceScore: 0.6 });
      await service.upsert({ agentId: 'a1', key: 'hotel_high', value: 'hotel with pool', relevanceScore: 0.9 });

      const results = await service.search('a1', 'hotel', { minRelevance: 0.5 });

      expect(results.map(result => result.key).sort()).toEqual(['hotel_high', 'hotel_mid']);
      expect(results.every(result => result.relevance_score >= 0.5)).toBe(true);
    });

    it('returns at most limit results', async () => {
      for (let i = 0; i < 7; i++) {
        await service.upsert({ agentId: 'a1', key: `excursion_${i}`, value: 'boat excursion' });
      }

      expect(await service.search('a1', 'excursion', { limit: 5 })).toHaveLength(5);
      expect(await service.search('a1', 'excursion', { limit: 10 })).toHaveLength(7);
    });

    it('orders by rank, then relevance, with substring-only matches last', async () => {
      await service.upsert({ agentId: 'a1', key: 'beachfront', value: 'yes', relevanceScore: 1 });
      await service.upsert({ agentId: 'a1', key: 'note_c', value: 'beach villa', relevanceScore: 0.7 });
      await service.upsert({ agentId: 'a1', key: 'note_b', value: 'beach villa', relevanceScore: 0.9 });
      await service.upsert({ agentId: 'a1', key: 'note_a', value: 'beach beach villa', relevanceScore: 0.6 });

      const results = await service.search('a1', 'beach', { limit: 10 });

      expect(results.map(result => result.key)).toEqual(['note_a', 'note_b', 'note_c', 'beachfront']);
      expect(results[3].rank).toBe(0);
    });

    it('breaks ties by newest first, then insertion order', async () => {
      await service.upsert({ agentId: 'a1', key: 'first', value: 'museum' });
      await service.upsert({ agentId: 'a1', key: 'second', value: 'museum' });
      clock.advance(1000);
      await service.upsert({ agentId: 'a1', key: 'third', value: 'museum' });

      const results = await service.search('a1', 'museum');

      expect(results.map(result => result.key)).toEqual(['third', 'first', 'second']);
    });

    it('scopes results to agent-wide memories and one lead before applying the limit', async () => {
      await service.upsert({ agentId: 'a1', key: 'favorite_destination', value: 'Bali' });
      for (let i = 0; i < 6; i++) {
        await service.upsert({ agentId: 'a1', leadId: `lead-${i}`, key: `lead-${i}:destination`, value: 'destination Lisbon' });
      }
      await service.upsert({ agentId: 'a1', leadId: 'lead-x', key: 'lead-x:destination', value: 'destination Kyoto', relevanceScore: 0.6 });

      const scoped = await service.search('a1', 'destination', { leadScope: 'lead-x', limit: 5 });
      const agentWide = await service.search('a1', 'destination', { leadScope: null });
      const unscoped = await service.search('a1', 'destination', { limit: 10 });

      expect(scoped.map(result => result.key).sort()).toEqual(['favorite_destination', 'lead-x:destination']);
      expect(agentWide.map(result => result.key)).toEqual(['favorite_destination']);
      expect(unscoped).toHaveLength(8);
    });

    it('matches accented text without accents in the query', async () => {
      await service.upsert({ agentId: 'a1', key: 'destino', value: 'Cancún' });

      const results = await service.search('a1', 'cancun');

      expect(results.map(result => result.key)).toEqual(['destino']);
    });

    it('returns an empty list when nothing matches', async () => {
      await service.upsert({ agentId: 'a1', key: 'favorite_destination', value: 'Bali' });

      expect(await service.search('a1', 'skiing')).toEqual([]);
    });

    it.each([
      [{ limit: 0 }, 'limit must be an integer greater than or equal to 1'],
      [{ limit: 2.5 }, 'limit must be an integer greater than or equal to 1'],
      [{ minRelevance: Number.POSITIVE_INFINITY }, 'min_relevance must be a finite number']
    ])('rejects invalid options %#', async (options, message) => {
      await expect(service.search('a1', 'beach', options)).rejects.toThrow(new ValidationError(message));
    });
  });

  describe('purgeExpired', () => {
    it('removes expired memories and is idempotent', async () => {
      await service.upsert({ agentId: 'a1', key: 'trip_date', value: 'March', expiresAt: new Date(clock.now().getTime() - DAY) });
      await service.upsert({ agentId: 'a1', key: 'next_trip', value: 'April', expiresAt: new Date(clock.now().getTime() + DAY) });
      await service.upsert({ agentId: 'a1', key: 'favorite_destination', value: 'Bali' });

      expect(await service.purgeExpired()).toBe(1);
      expect(await service.purgeExpired()).toBe(0);

      expect(await service.get('a1', 'trip_date')).toBeNull();
      expect(await service.search('a1', 'march')).toEqual([]);
      expect(repository.size()).toBe(2);
    });

    it('keeps a memory that expires exactly now', async () => {
      await service.upsert({ agentId: 'a1', key: 'offer', value: 'Promo', expiresAt: clock.now() });

      expect(await service.purgeExpired()).toBe(0);
      clock.advance(1);
      expect(await service.purgeExpired()).toBe(1);
    });

    it('leaves expired memories searchable until the purge runs', async () => {
      await service.upsert({ agentId: 'a1', key: 'trip_date', value: 'March', expiresAt: new Date(clock.now().getTime() - DAY) });

      expect(await service.search('a1', 'trip')).toHaveLength(1);
    });
  });

  describe('get, list and delete', () => {
    it('lists an agent\'s memories, most recently updated first', async () => {
      await service.upsert({ agentId: 'a1', key: 'one', value: '1' });
      clock.advance(1000);
      await service.upsert({ agentId: 'a1', key: 'two', value: '2' });
      clock.advance(1000);
      await service.upsert({ agentId: 'a1', key: 'one', value: '1b' });
      await service.upsert({ agentId: 'a2', key: 'three', value: '3' });

      const memories = await service.list('a1');

      expect(memories.map(memory => memory.key)).toEqual(['one', 'two']);
      expect(await service.list('a1', 1)).toHaveLength(1);
    });

    it('deletes a memory once', async () => {
      await service.upsert({ agentId: 'a1', key: 'budget', value: '2000' });

      expect(await service.delete('a1', 'budget')).toBe(true);
      expect(await service.delete('a1', 'budget')).toBe(false);
      expect(await service.get('a1', 'budget')).toBeNull();
    });

    it('drops an agent\'s memories when the agent is removed', async () => {
      await service.upsert({ agentId: 'a1', key: 'budget', value: '2000' });
      await service.upsert({ agentId: 'a1', key: 'party_size', value: '2' });
      await service.upsert({ agentId: 'a2', key: 'budget', value: '900' });

      expect(repository.removeAgent('a1')).toBe(2);
      expect(await service.list('a1')).toEqual([]);
      expect(await service.list('a2')).toHaveLength(1);
      await expect(service.upsert({ agentId: 'a1', key: 'budget', value: '1' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
