/**
 * Test Fixture Factories
 *
 * Deterministic survey records and per-test scratch directories.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { SurveyRecord } from '../../core/types.js';

// ============================================================================
// Records
// ============================================================================

/**
 * Wi-Fi search result with trilateration fields
 */
export function wifiRecord(netid: string, overrides: Record<string, SurveyRecord[string]> = {}): SurveyRecord {
  return {
    netid,
    ssid: `net-${netid.slice(-2)}`,
    trilat: 41.8781,
    trilong: -87.6298,
    lastupdt: '2024-05-01T12:00:00.000Z',
    ...overrides,
  };
}

/**
 * Detail result carrying a location history
 */
export function detailRecord(netid: string, points: readonly (readonly [number, number])[]): SurveyRecord {
  return {
    netid,
    name: `device ${netid}`,
    locationData: points.map(([lat, lon], index) => ({
      latitude: lat,
      longitude: lon,
      time: `2024-05-0${index + 1}T00:00:00.000Z`,
    })),
  };
}

// ============================================================================
// Scratch Directories
// ============================================================================

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'survey-export-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
