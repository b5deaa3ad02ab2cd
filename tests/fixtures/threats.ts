import type { NewThreatRecord } from '../../src/types/threat.types.js';

export const firewallIp: NewThreatRecord = {
  type: 'IP',
  value: '203.0.113.5',
  severity: 'High',
  source: 'Firewall-01',
};

export const edrHash: NewThreatRecord = {
  type: 'Hash',
  value: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
  severity: 'Low',
  source: 'EDR',
};

export const phishingUrl: NewThreatRecord = {
  type: 'URL',
  value: 'http://login.example.com/verify',
  severity: 'Medium',
  source: null,
};

export const sinkholeDomain: NewThreatRecord = {
  type: 'Domain',
  value: 'c2.example.org',
  severity: 'High',
  source: 'DNS-Sinkhole',
};

/** Three IP/High and two Hash/Low records with distinct values. */
export const statisticsMix: NewThreatRecord[] = [
  { type: 'IP', value: '198.51.100.1', severity: 'High', source: 'IDS' },
  { type: 'IP', value: '198.51.100.2', severity: 'High', source: 'IDS' },
  { type: 'IP', value: '198.51.100.3', severity: 'High', source: null },
  { type: 'Hash', value: 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa', severity: 'Low', source: 'EDR' },
  { type: 'Hash', value: 'bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb', severity: 'Low', source: 'EDR' },
];

export function numberedIps(count: number): NewThreatRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    type: 'IP' as const,
    value: `192.0.2.${i}`,
    severity: 'Medium' as const,
    source: 'Bulk',
  }));
}
