// Core data models

export type {
  Catalog,
  Category,
  Classification,
  SectionKey,
  CatalogSource,
  MembershipSets,
  PackageStatus,
  StyleOptions,
  StyledEntry,
  ReportSection,
  LayoutConfiguration,
  SectionFilter,
  SectionId,
  RawChangeGroups,
} from './report.js';

export type {
  DebugConfig,
  GlobalConfig,
  RecentsOptions,
} from './config.js';

export {
  LogLevelSchema,
  SectionFilterSchema,
  DebugConfigSchema,
  GlobalConfigSchema,
  type RawGlobalConfig,
} from './schemas.js';
