#!/usr/bin/env node

/**
 * brew-recents CLI entry point
 */

import { error } from '../../shared/ui/index.js';
import { getErrorMessage } from '../../shared/utils/index.js';
import { exitCodeForError } from './helpers.js';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    error(getErrorMessage(err));
    process.exit(exitCodeForError(err));
  });
