#!/usr/bin/env node
import { createProgram } from './cli.js';
import { handleError } from './utils/error-handler.js';

createProgram()
  .parseAsync(process.argv)
  .catch(error => handleError(error));
