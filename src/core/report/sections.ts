/**
 * Report section catalog: which groups exist, their order and titles.
 */

import type { Catalog, CatalogSource, SectionFilter, SectionId, SectionKey } from '../models/index.js';

export const CATALOG_SOURCES: Readonly<Record<Catalog, CatalogSource>> = {
  formula: { catalog: 'formula', tap: 'homebrew/core', pathPrefix: 'Formula/', label: 'formulae' },
  cask: { catalog: 'cask', tap: 'homebrew/cask', pathPrefix: 'Casks/', label: 'casks' },
};

/** Print order of the report */
export const SECTION_ORDER: readonly SectionKey[] = [
  { catalog: 'formula', category: 'new' },
  { catalog: 'formula', category: 'updated' },
  { catalog: 'cask', category: 'new' },
  { catalog: 'cask', category: 'updated' },
];

export const NEW_MARKER = '🆕';
export const UPDATED_MARKER = '✏️';

export function toSectionId(key: SectionKey): SectionId {
  return `${key.catalog}:${key.category}`;
}

/** Catalog flag AND category flag; each is independent of the other pair */
export function isSectionEnabled(key: SectionKey, filter: SectionFilter): boolean {
  const catalogShown = key.catalog === 'formula' ? filter.formulae : filter.casks;
  const categoryShown = key.category === 'new' ? filter.new : filter.updated;
  return catalogShown && categoryShown;
}

export function getEnabledSections(filter: SectionFilter): SectionKey[] {
  return SECTION_ORDER.filter((key) => isSectionEnabled(key, filter));
}

export function sectionTitle(key: SectionKey): string {
  const { label } = CATALOG_SOURCES[key.catalog];
  return key.category === 'new'
    ? `${NEW_MARKER} New ${label}:`
    : `${UPDATED_MARKER} Updated ${label}:`;
}
