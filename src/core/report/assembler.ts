/**
 * Report assembler
 *
 * normalize → classify → style → lay out, per enabled section, with one
 * column width shared by the whole report.
 */

import type { ColorSupportLevel } from 'chalk';
import type {
  LayoutConfiguration,
  MembershipSets,
  RawChangeGroups,
  ReportSection,
  SectionFilter,
  StyleOptions,
} from '../models/index.js';
import { getPackageStatus } from './classify.js';
import { layoutColumns } from './layout.js';
import { normalizePackageList } from './normalize.js';
import { CATALOG_SOURCES, getEnabledSections, sectionTitle, toSectionId } from './sections.js';
import { EntryStyler } from './style.js';

export interface ReportOptions {
  filter: SectionFilter;
  style: StyleOptions;
  outputWidth: number;
  colorLevel?: ColorSupportLevel;
}

export interface AssembledReport {
  /** Enabled sections in print order; may contain empty ones */
  sections: ReportSection[];
  layout: LayoutConfiguration;
}

export const EMPTY_REPORT_MESSAGE = 'No recent packages found.';

export function computeGlobalMaxVisibleLength(sections: readonly ReportSection[]): number {
  let max = 0;
  for (const section of sections) {
    for (const entry of section.entries) {
      if (entry.visibleLength > max) max = entry.visibleLength;
    }
  }
  return max;
}

export function buildReport(
  groups: RawChangeGroups,
  membership: MembershipSets,
  options: ReportOptions,
): AssembledReport {
  const styler = new EntryStyler(options.style, options.colorLevel);

  const sections = getEnabledSections(options.filter).map((key): ReportSection => {
    const raw = groups[toSectionId(key)] ?? [];
    const names = normalizePackageList(raw, { pathPrefix: CATALOG_SOURCES[key.catalog].pathPrefix });
    const entries = names
      .map((name) => styler.style(name, getPackageStatus(name, membership)))
      .filter((entry) => !entry.suppressed);
    return { key, title: sectionTitle(key), entries };
  });

  return {
    sections,
    layout: {
      outputWidth: options.outputWidth,
      truncateAt: options.style.truncateAt,
      globalMaxVisibleLength: computeGlobalMaxVisibleLength(sections),
    },
  };
}

/** Non-empty sections, each as a blank line, its title and its rows. */
export function renderSections(report: AssembledReport): string {
  const { globalMaxVisibleLength, outputWidth } = report.layout;
  return report.sections
    .filter((section) => section.entries.length > 0)
    .map((section) => `\n${section.title}\n${layoutColumns(section.entries, globalMaxVisibleLength, outputWidth)}`)
    .join('');
}

export function renderReport(report: AssembledReport, days: number): string {
  const body = renderSections(report);
  const heading = `Recent Homebrew packages (last ${days} ${days === 1 ? 'day' : 'days'}):\n`;
  return heading + (body.length > 0 ? body : `\n${EMPTY_REPORT_MESSAGE}\n`) + '\n';
}
