/**
 * Entry styling
 *
 * Turns a package name and its membership into the text printed in a
 * report cell. The order of the checks matters: hiding inspected
 * packages wins over highlighting installed ones.
 */

import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { PackageStatus, StyleOptions, StyledEntry } from '../models/index.js';
import { getVisibleLength, truncateText } from '../../shared/utils/text.js';
import { classify } from './classify.js';

export const INSTALLED_INDICATOR = '•';

const SUPPRESSED_ENTRY: StyledEntry = Object.freeze({
  displayText: '',
  visibleLength: 0,
  suppressed: true,
});

export class EntryStyler {
  private readonly chalk: ChalkInstance;

  /**
   * @param colorLevel - chalk color level used when `options.color` is set;
   *   forced to 0 otherwise
   */
  constructor(
    private readonly options: StyleOptions,
    colorLevel: ColorSupportLevel = 1,
  ) {
    this.chalk = new Chalk({ level: options.color ? colorLevel : 0 });
  }

  style(name: string, status: PackageStatus): StyledEntry {
    if (status.inspected && this.options.hideInspected) {
      return SUPPRESSED_ENTRY;
    }

    const label = truncateText(name, this.options.truncateAt);
    const displayText = this.decorate(label, status);

    return {
      displayText,
      visibleLength: getVisibleLength(displayText),
      suppressed: false,
    };
  }

  private decorate(label: string, status: PackageStatus): string {
    if (this.options.plainOutput) {
      return label;
    }

    const classification = classify(status);
    if (classification === 'installed') {
      return this.chalk.bold.italic.green(`${INSTALLED_INDICATOR}${label}`);
    }
    if (classification === 'inspected' && this.options.dimInspected) {
      return this.chalk.dim(label);
    }
    return label;
  }
}
