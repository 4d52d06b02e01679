#!/usr/bin/env node
/**
 * continuum executable
 */

import { createProgram } from './index.js';
import { reportError } from './session.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    reportError(err);
  });
