#!/usr/bin/env node
/**
 * Tailwise CLI entry point
 */

import { createProgram } from './program.js';

createProgram().parse();
