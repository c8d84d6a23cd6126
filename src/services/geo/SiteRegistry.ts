/**
 * SiteRegistry
 *
 * Holds published geofence versions. A published version is never modified:
 * publishing an edited site produces the next version, so records keep pointing
 * at the exact boundary they were verified against.
 */

import { ValidationError } from '../../lib/errors/index.js';
import { siteSchema } from '../../lib/validators.js';
import type { Site } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('SiteRegistry');

export type SiteDraft = Omit<Site, 'version'>;

export class SiteRegistry {
  private readonly versions = new Map<string, Site[]>();

  /**
   * Publish a site definition. Returns the stored, versioned site.
   */
  publish(draft: SiteDraft): Site {
    const history = this.versions.get(draft.id) ?? [];
    const version = history.length + 1;

    const parsed = siteSchema.safeParse({ ...draft, version });
    if (!parsed.success) {
      throw new ValidationError(`Invalid site '${draft.id}'`, { issues: parsed.error.issues });
    }

    const site: Site = Object.freeze({
      ...parsed.data,
      polygon: parsed.data.polygon.map((vertex) => Object.freeze({ ...vertex })),
    });
    this.versions.set(draft.id, [...history, site]);

    logger.info({ siteId: site.id, version }, 'Site version published');
    return site;
  }

  /** Latest version */
  get(siteId: string): Site | undefined {
    const history = this.versions.get(siteId);
    return history?.[history.length - 1];
  }

  getVersion(siteId: string, version: number): Site | undefined {
    return this.versions.get(siteId)?.find((site) => site.version === version);
  }

  /** Latest versions of the given ids; unknown ids are skipped */
  resolve(siteIds: readonly string[]): Site[] {
    return siteIds.flatMap((siteId) => {
      const site = this.get(siteId);
      return site ? [site] : [];
    });
  }
}
