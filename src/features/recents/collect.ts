/**
 * Retrieval fan-out
 *
 * Membership sets are built first; then every enabled group is fetched
 * concurrently and joined. A failing group resolves to an empty list and
 * a warning, never to a rejected run.
 */

import type {
  Catalog,
  MembershipSets,
  RawChangeGroups,
  SectionFilter,
  SectionId,
  SectionKey,
} from '../../core/models/index.js';
import { CATALOG_SOURCES, getEnabledSections, toSectionId } from '../../core/report/index.js';
import type { PackageSource } from '../../infra/homebrew/index.js';
import { warn } from '../../shared/ui/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('collect');

export interface RetrievalFailure {
  key: SectionKey;
  message: string;
}

export interface CollectedChanges {
  groups: RawChangeGroups;
  failures: RetrievalFailure[];
}

function describeSection(key: SectionKey): string {
  return `${key.category} ${CATALOG_SOURCES[key.catalog].label}`;
}

export async function loadMembershipSets(source: PackageSource, historyFile: string): Promise<MembershipSets> {
  const done = log.time('load membership sets');
  const [installed, inspected] = await Promise.allSettled([
    source.getInstalledSet(),
    source.getInspectedSet(historyFile),
  ]);
  done();

  if (installed.status === 'rejected') {
    warn(`Could not list installed packages: ${getErrorMessage(installed.reason)}`);
  }
  if (inspected.status === 'rejected') {
    warn(`Could not read lookup history ${historyFile}: ${getErrorMessage(inspected.reason)}`);
  }

  const membership: MembershipSets = {
    installed: installed.status === 'fulfilled' ? installed.value : new Set<string>(),
    inspected: inspected.status === 'fulfilled' ? inspected.value : new Set<string>(),
  };
  log.debug('Membership sets loaded', {
    installed: membership.installed.size,
    inspected: membership.inspected.size,
  });
  return membership;
}

export async function collectRawChanges(
  source: PackageSource,
  days: number,
  filter: SectionFilter,
): Promise<CollectedChanges> {
  const sections = getEnabledSections(filter);
  const repoDirs = new Map<Catalog, Promise<string>>();
  const repoDirFor = (catalog: Catalog): Promise<string> => {
    let repoDir = repoDirs.get(catalog);
    if (!repoDir) {
      repoDir = source.getRepoDir(CATALOG_SOURCES[catalog]);
      repoDirs.set(catalog, repoDir);
    }
    return repoDir;
  };

  const done = log.time('gather change lists');
  const settled = await Promise.allSettled(
    sections.map(async (key) => {
      const repoDir = await repoDirFor(key.catalog);
      const filterFlag = key.category === 'new' ? 'A' : 'M';
      return source.getRawChanges(repoDir, days, filterFlag, CATALOG_SOURCES[key.catalog].pathPrefix);
    }),
  );
  done();

  const groups: Partial<Record<SectionId, readonly string[]>> = {};
  const failures: RetrievalFailure[] = [];
  settled.forEach((result, index) => {
    const key = sections[index];
    if (!key) return;
    const id = toSectionId(key);
    if (result.status === 'fulfilled') {
      groups[id] = result.value;
      log.debug(`Retrieved ${id}`, { count: result.value.length });
    } else {
      const message = getErrorMessage(result.reason);
      groups[id] = [];
      failures.push({ key, message });
      log.error(`Retrieval failed for ${id}`, { error: message });
      warn(`Could not retrieve ${describeSection(key)}: ${message}`);
    }
  });

  return { groups, failures };
}
