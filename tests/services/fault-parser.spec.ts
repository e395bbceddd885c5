import { describe, expect, it } from 'vitest';
import { buildAutofixInputs, parseFaultLog } from '../../src/services/fault-parser.js';

describe('parseFaultLog', () => {
  it('parses code, route, reason and latency', () => {
    expect(parseFaultLog('FAULT_DB_TIMEOUT route=/x reason=r latency=5.01')).toEqual({
      errorCode: 'FAULT_DB_TIMEOUT',
      route: '/x',
      reason: 'r',
      latency: '5.01',
    });
  });

  it('returns null for lines without a fault code', () => {
    expect(parseFaultLog('no fault here')).toBeNull();
  });

  it('returns null when the fault code is not the first token', () => {
    expect(parseFaultLog('ERROR FAULT_DB_TIMEOUT route=/x')).toBeNull();
  });

  it('returns null without a non-empty route', () => {
    expect(parseFaultLog('FAULT_DB_TIMEOUT reason=r')).toBeNull();
    expect(parseFaultLog('FAULT_DB_TIMEOUT route= reason=r')).toBeNull();
  });

  it('defaults reason to empty and omits an absent latency', () => {
    const event = parseFaultLog('  FAULT_SQL_INJECTION_TEST   route=/test-fault/run  ');

    expect(event).toEqual({ errorCode: 'FAULT_SQL_INJECTION_TEST', route: '/test-fault/run', reason: '' });
    expect(event && 'latency' in event).toBe(false);
  });

  it('splits fields on the first equals sign only', () => {
    expect(parseFaultLog('FAULT_X route=/q?a=b reason=k=v')).toEqual({
      errorCode: 'FAULT_X',
      route: '/q?a=b',
      reason: 'k=v',
    });
  });
});

describe('buildAutofixInputs', () => {
  it('maps the SQL fault to its fixed symptoms and breadcrumbs', () => {
    expect(buildAutofixInputs({ errorCode: 'FAULT_SQL_INJECTION_TEST', route: '/test-fault/run', reason: 'bad_sql' })).toEqual({
      symptoms: 'Invalid SQL executed on /test-fault/run',
      breadcrumbs: ['invalid_sql_executed', 'test_fault_endpoint'],
      metrics: { route: '/test-fault/run', reason: 'bad_sql' },
    });
  });

  it('translates known external API reasons into breadcrumb details', () => {
    const inputs = buildAutofixInputs({
      errorCode: 'FAULT_EXTERNAL_API_LATENCY',
      route: '/test-fault/external-api',
      reason: 'upstream_failure',
      latency: '3.20',
    });

    expect(inputs).toEqual({
      symptoms: 'External API failure on /test-fault/external-api',
      breadcrumbs: ['external_api_call', 'upstream_500'],
      metrics: { route: '/test-fault/external-api', reason: 'upstream_failure', latency: '3.20' },
    });
  });

  it('keeps unknown external API reasons and defaults an empty one', () => {
    expect(
      buildAutofixInputs({ errorCode: 'FAULT_EXTERNAL_API_LATENCY', route: '/e', reason: 'dns_failure' }).breadcrumbs,
    ).toEqual(['external_api_call', 'dns_failure']);

    const defaulted = buildAutofixInputs({ errorCode: 'FAULT_EXTERNAL_API_LATENCY', route: '/e', reason: '' });
    expect(defaulted.breadcrumbs).toEqual(['external_api_call', 'external_failure']);
    expect(defaulted.metrics).toEqual({ route: '/e', reason: 'external_failure' });
  });

  it('maps the DB timeout fault', () => {
    expect(buildAutofixInputs({ errorCode: 'FAULT_DB_TIMEOUT', route: '/test-fault/db-timeout', reason: 'db_timeout', latency: '5.01' })).toEqual({
      symptoms: 'DB timeout or pool exhaustion on /test-fault/db-timeout',
      breadcrumbs: ['pg_sleep_executed', 'queue_pool_limit'],
      metrics: { route: '/test-fault/db-timeout', reason: 'db_timeout', latency: '5.01' },
    });
  });

  it('falls back to an unknown fault', () => {
    expect(buildAutofixInputs({ errorCode: 'FAULT_DISK_FULL', route: '/d', reason: 'enospc', latency: '1.0' })).toEqual({
      symptoms: 'Unknown fault',
      breadcrumbs: [],
      metrics: { route: '/d', reason: 'enospc' },
    });
  });
});
