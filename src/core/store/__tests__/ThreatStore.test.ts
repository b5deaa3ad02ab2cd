import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { sql } from 'drizzle-orm';
import { DrizzleThreatStore } from '../ThreatStore.js';
import type { DatabaseHandle } from '../../../db/client.js';
import { ConstraintViolationError } from '../../../utils/errors.js';
import { createTestDatabase, resetThreats } from '../../../../tests/fixtures/database.js';
import {
  edrHash,
  firewallIp,
  numberedIps,
  phishingUrl,
  sinkholeDomain,
  statisticsMix,
} from '../../../../tests/fixtures/threats.js';

describe('DrizzleThreatStore', () => {
  let database: DatabaseHandle;
  let store: DrizzleThreatStore;

  beforeAll(async () => {
    database = await createTestDatabase();
    store = new DrizzleThreatStore(database.db);
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await resetThreats(database.db);
  });

  describe('insert', () => {
    it('should assign increasing ids and a detection timestamp', async () => {
      const before = Date.now();
      const first = await store.insert(firewallIp);
      const second = await store.insert(edrHash);

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.dateDetected).toBeInstanceOf(Date);
      expect(first.dateDetected.getTime()).toBeGreaterThanOrEqual(before - 1000);
      expect(second.dateDetected.getTime()).toBeGreaterThanOrEqual(first.dateDetected.getTime());
    });

    it('should persist every field', async () => {
      const created = await store.insert(firewallIp);

      expect(created).toMatchObject({
        type: 'IP',
        value: '203.0.113.5',
        severity: 'High',
        source: 'Firewall-01',
      });
    });

    it('should store a missing source as null', async () => {
      const created = await store.insert(phishingUrl);
      expect(created.source).toBeNull();
    });

    it('should raise ConstraintViolationError for a duplicate value', async () => {
      await store.insert(firewallIp);

      await expect(
        store.insert({ ...firewallIp, type: 'Domain', severity: 'Low', source: 'Other' }),
      ).rejects.toBeInstanceOf(ConstraintViolationError);
      expect(await store.count({})).toBe(1);
    });

    it('should treat values differing in case as distinct', async () => {
      await store.insert({ ...sinkholeDomain, value: 'c2.example.org' });
      const upper = await store.insert({ ...sinkholeDomain, value: 'C2.EXAMPLE.ORG' });
      expect(upper.id).toBe(2);
    });

    it('should never reuse an id after deletion', async () => {
      await store.insert(firewallIp);
      const second = await store.insert(edrHash);
      await store.delete(second.id);

      const third = await store.insert(phishingUrl);
      expect(third.id).toBe(3);
    });

    it('should reject types outside the closed set at the table level', async () => {
      await expect(
        database.db.execute(
          sql`INSERT INTO threats (type, value, severity) VALUES ('Email', 'x@example.com', 'High')`,
        ),
      ).rejects.toThrow();
    });
  });

  describe('findById', () => {
    it('should return the stored record', async () => {
      const created = await store.insert(edrHash);
      expect(await store.findById(created.id)).toEqual(created);
    });

    it('should return undefined for an unknown id', async () => {
      expect(await store.findById(42)).toBeUndefined();
    });

    it('should return undefined for ids outside the column range', async () => {
      expect(await store.findById(3_000_000_000)).toBeUndefined();
      expect(await store.findById(0)).toBeUndefined();
    });
  });

  describe('findByValue', () => {
    it('should match the exact value', async () => {
      const created = await store.insert(sinkholeDomain);

      expect((await store.findByValue('c2.example.org'))?.id).toBe(created.id);
      expect(await store.findByValue('c2.example.org ')).toBeUndefined();
    });
  });

  describe('delete', () => {
    it('should report true once and false afterwards', async () => {
      const created = await store.insert(firewallIp);

      expect(await store.delete(created.id)).toBe(true);
      expect(await store.delete(created.id)).toBe(false);
      expect(await store.findById(created.id)).toBeUndefined();
    });
  });

  describe('list', () => {
    it('should return most recent first', async () => {
      await store.insert(firewallIp);
      await store.insert(edrHash);
      await store.insert(phishingUrl);

      const listed = await store.list({}, { offset: 0, limit: 100 });
      expect(listed.map((t) => t.id)).toEqual([3, 2, 1]);
    });

    it('should filter by type', async () => {
      for (const record of statisticsMix) await store.insert(record);

      const ips = await store.list({ type: 'IP' }, { offset: 0, limit: 100 });
      expect(ips).toHaveLength(3);
      expect(ips.every((t) => t.type === 'IP')).toBe(true);
    });

    it('should combine type and severity filters', async () => {
      await store.insert(firewallIp);
      await store.insert(sinkholeDomain);
      await store.insert(edrHash);

      const highIps = await store.list({ type: 'IP', severity: 'High' }, { offset: 0, limit: 100 });
      expect(highIps.map((t) => t.value)).toEqual(['203.0.113.5']);

      const highs = await store.list({ severity: 'High' }, { offset: 0, limit: 100 });
      expect(highs.map((t) => t.value)).toEqual(['c2.example.org', '203.0.113.5']);
    });

    it('should return an empty array when nothing matches', async () => {
      await store.insert(firewallIp);
      expect(await store.list({ type: 'URL' }, { offset: 0, limit: 10 })).toEqual([]);
    });

    it('should apply offset and limit after ordering', async () => {
      for (const record of numberedIps(150)) await store.insert(record);

      const everything = await store.list({}, { offset: 0, limit: 1000 });
      const tail = await store.list({}, { offset: 100, limit: 100 });

      expect(everything).toHaveLength(150);
      expect(tail).toHaveLength(50);
      expect(tail.map((t) => t.id)).toEqual(everything.slice(100).map((t) => t.id));
      expect(tail[0]?.id).toBe(50);
      expect(tail[49]?.id).toBe(1);
    });
  });

  describe('count', () => {
    it('should count with and without filters', async () => {
      for (const record of statisticsMix) await store.insert(record);

      expect(await store.count({})).toBe(5);
      expect(await store.count({ type: 'Hash' })).toBe(2);
      expect(await store.count({ type: 'IP', severity: 'Low' })).toBe(0);
    });
  });

  describe('countGroupedBy', () => {
    it('should include every member of the closed set', async () => {
      for (const record of statisticsMix) await store.insert(record);

      expect(await store.countGroupedBy('type')).toEqual({ IP: 3, Hash: 2, URL: 0, Domain: 0 });
      expect(await store.countGroupedBy('severity')).toEqual({ High: 3, Medium: 0, Low: 2 });
    });

    it('should report zeros on an empty table', async () => {
      expect(await store.countGroupedBy('severity')).toEqual({ High: 0, Medium: 0, Low: 0 });
    });
  });

  describe('ping', () => {
    it('should resolve while the database is open', async () => {
      await expect(store.ping()).resolves.toBeUndefined();
    });
  });
});
