/**
 * GeoExporter
 *
 * KML 2.2 document with one Placemark per GeoPoint. Every column of the
 * source row travels along as `ExtendedData/Data[@name]/value`, so the
 * placemark carries the same fields as the CSV row it came from.
 *
 * Rows without a coordinate pair never reach this module; they are dropped
 * by the FlattenEngine.
 */

import { basename, extname } from 'node:path';
import { XMLBuilder } from 'fast-xml-parser';
import type { ArtifactOutcome, FlattenResult, GeoPoint } from '../core/types.js';
import { ExportIOError, toError } from '../core/errors.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type { ArtifactExporter } from './types.js';

const log = createLogger({ module: 'geo-exporter' });

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

function placemark(point: GeoPoint): Record<string, unknown> {
  return {
    name: point.name,
    ExtendedData: {
      Data: point.attributes.map(([key, value]) => ({ '@_name': key, value })),
    },
    Point: {
      coordinates: `${point.longitude},${point.latitude},0`,
    },
  };
}

/**
 * Full KML document text
 */
export function renderKML(points: readonly GeoPoint[], documentName: string): string {
  return builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    kml: {
      '@_xmlns': KML_NAMESPACE,
      Document: {
        name: documentName,
        Placemark: points.map(placemark),
      },
    },
  });
}

export class GeoExporter implements ArtifactExporter {
  readonly format = 'kml' as const;
  readonly extension = '.kml';

  async write(result: FlattenResult, path: string): Promise<ArtifactOutcome> {
    if (result.points.length === 0) {
      return { format: this.format, status: 'skipped', reason: 'no points with latitude/longitude' };
    }

    try {
      await atomicWriteFile(path, renderKML(result.points, basename(path, extname(path))));
    } catch (error) {
      throw new ExportIOError(this.format, path, toError(error));
    }

    log.info('KML exported', {
      path,
      placemarks: result.points.length,
      skippedRows: result.rows.length - result.points.length,
    });
    return { format: this.format, status: 'written', path, count: result.points.length };
  }
}
