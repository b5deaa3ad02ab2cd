import type { ThreatService } from '../../services/ThreatService.js';
import type { CreateThreatInput } from '../../types/threat.types.js';
import { ConflictError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

// Documentation address ranges and reserved domains only.
export const SAMPLE_THREATS: readonly CreateThreatInput[] = [
  { type: 'IP', value: '203.0.113.5', severity: 'High', source: 'Firewall-01' },
  { type: 'IP', value: '198.51.100.23', severity: 'Medium', source: 'IDS-Perimeter' },
  { type: 'Domain', value: 'malware-drop.example.net', severity: 'High', source: 'DNS-Sinkhole' },
  { type: 'URL', value: 'http://phish.example.com/login.php', severity: 'Medium', source: 'Mail-Gateway' },
  {
    type: 'Hash',
    value: '44d88612fea8a8f36de82e1278abb02f',
    severity: 'Low',
    source: 'EDR',
  },
];

export interface SeedResult {
  created: number;
  skipped: number;
}

/** Registers each sample through the service; values already present are skipped. */
export async function seedThreats(
  service: ThreatService,
  logger: Logger,
  samples: readonly CreateThreatInput[] = SAMPLE_THREATS,
): Promise<SeedResult> {
  const result: SeedResult = { created: 0, skipped: 0 };

  for (const sample of samples) {
    try {
      const threat = await service.create(sample);
      result.created++;
      logger.debug({ threatId: threat.id, value: threat.value }, 'Seeded threat');
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      result.skipped++;
      logger.info({ existingId: error.existingId }, 'Sample already registered, skipping');
    }
  }

  return result;
}
