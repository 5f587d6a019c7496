/**
 * Report domain types
 */

/** Package repository: core formulae or casks */
export type Catalog = 'formula' | 'cask';

/** Change type within a catalog */
export type Category = 'new' | 'updated';

/** Styling status derived from membership; installed wins over inspected */
export type Classification = 'installed' | 'inspected' | 'plain';

/** One (catalog, category) group of the report */
export interface SectionKey {
  catalog: Catalog;
  category: Category;
}

/** Where a catalog's definitions live */
export interface CatalogSource {
  catalog: Catalog;
  /** Tap passed to `brew --repo` */
  tap: string;
  /** Repository-relative directory holding the definitions */
  pathPrefix: string;
  /** Plural noun used in section titles */
  label: string;
}

/** Installed and previously inspected package names, built once per run */
export interface MembershipSets {
  readonly installed: ReadonlySet<string>;
  readonly inspected: ReadonlySet<string>;
}

/** Membership of a single name */
export interface PackageStatus {
  installed: boolean;
  inspected: boolean;
}

export interface StyleOptions {
  dimInspected: boolean;
  hideInspected: boolean;
  /** No glyphs, no styling */
  plainOutput: boolean;
  /** Styling sequences allowed; the installed glyph is kept either way */
  color: boolean;
  truncateAt: number;
}

export interface StyledEntry {
  readonly displayText: string;
  readonly visibleLength: number;
  readonly suppressed: boolean;
}

export interface ReportSection {
  key: SectionKey;
  title: string;
  entries: StyledEntry[];
}

export interface LayoutConfiguration {
  outputWidth: number;
  truncateAt: number;
  /** Shared by every section of one report */
  globalMaxVisibleLength: number;
}

/** Which catalogs and categories are shown */
export interface SectionFilter {
  formulae: boolean;
  casks: boolean;
  new: boolean;
  updated: boolean;
}

/** Stable identifier of a (catalog, category) group, e.g. `formula:new` */
export type SectionId = `${Catalog}:${Category}`;

/** Raw identifiers per group, as returned by change retrieval; absent groups are empty */
export type RawChangeGroups = Partial<Record<SectionId, readonly string[]>>;
