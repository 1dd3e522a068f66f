#!/usr/bin/env node

/**
 * CLI entry point for the jobsub command
 *
 * This is a thin wrapper around start.ts that can be invoked
 * as a binary from the command line
 */

import './start.js';
