import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type IncidentDatabase } from '../../src/services/db.js';
import { IncidentStore, parseBreadcrumbs } from '../../src/services/incident-store.js';

function createTicker(startIso: string) {
  let current = new Date(startIso).getTime();
  return () => {
    const value = new Date(current);
    current += 60_000;
    return value;
  };
}

describe('IncidentStore', () => {
  let db: IncidentDatabase;
  let store: IncidentStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new IncidentStore(db, { now: createTicker('2026-02-01T12:00:00.000Z') });
  });

  afterEach(() => {
    db.close();
  });

  it('creates an incident with defaults and encoded breadcrumbs', () => {
    const incident = store.create({
      errorCode: 'FAULT_DB_TIMEOUT',
      symptoms: 'DB timeout or pool exhaustion on /test-fault/db-timeout',
      breadcrumbs: ['pg_sleep_executed', 'queue_pool_limit'],
    });

    expect(incident).toEqual({
      id: 1,
      detectedAt: '2026-02-01T12:00:00.000Z',
      errorCode: 'FAULT_DB_TIMEOUT',
      symptoms: 'DB timeout or pool exhaustion on /test-fault/db-timeout',
      breadcrumbs: '["pg_sleep_executed","queue_pool_limit"]',
      rootCause: null,
      remediation: null,
      verification: null,
      resolved: false,
      ragQuery: null,
      ragResponse: null,
      ragConfidence: null,
      evidenceDocId: null,
      updatedAt: '2026-02-01T12:00:00.000Z',
    });
  });

  it('stores no breadcrumbs as null', () => {
    expect(store.create({ errorCode: 'UNKNOWN', symptoms: '' }).breadcrumbs).toBeNull();
  });

  it('returns null for a missing id', () => {
    expect(store.get(42)).toBeNull();
  });

  it('applies patches in place and bumps updatedAt only', () => {
    const created = store.create({ errorCode: 'FAULT_SQL_INJECTION_TEST', symptoms: 's' });

    const updated = store.update(created.id, { rootCause: 'bad query', resolved: true, ragConfidence: null });

    expect(updated.rootCause).toBe('bad query');
    expect(updated.resolved).toBe(true);
    expect(updated.remediation).toBeNull();
    expect(updated.errorCode).toBe('FAULT_SQL_INJECTION_TEST');
    expect(updated.detectedAt).toBe('2026-02-01T12:00:00.000Z');
    expect(updated.updatedAt).toBe('2026-02-01T12:01:00.000Z');
    expect(store.get(created.id)).toEqual(updated);
  });

  it('throws when updating an unknown incident', () => {
    expect(() => store.update(7, { remediation: 'x' })).toThrow('Incident 7 not found.');
  });

  it('lists newest first within the limit and counts everything', () => {
    store.create({ errorCode: 'A', symptoms: '' });
    store.create({ errorCode: 'B', symptoms: '' });
    store.create({ errorCode: 'C', symptoms: '' });

    expect(store.listRecent(2).map((incident) => incident.errorCode)).toEqual(['C', 'B']);
    expect(store.listRecent().map((incident) => incident.errorCode)).toEqual(['C', 'B', 'A']);
    expect(store.count()).toBe(3);
  });
});

describe('parseBreadcrumbs', () => {
  it('decodes the stored list in order', () => {
    expect(parseBreadcrumbs({ breadcrumbs: '["b","a"]' })).toEqual(['b', 'a']);
  });

  it('yields an empty list for missing or malformed values', () => {
    expect(parseBreadcrumbs({ breadcrumbs: null })).toEqual([]);
    expect(parseBreadcrumbs({ breadcrumbs: '{not json' })).toEqual([]);
    expect(parseBreadcrumbs({ breadcrumbs: '{"a":1}' })).toEqual([]);
  });
});
