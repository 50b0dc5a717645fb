#!/usr/bin/env node
/**
 * CLI for finding data files in the catalog
 *
 * Usage:
 *   finddata ARCS 12345                 # Location of the data file for one run
 *   finddata arcs 12345-12350,12360     # Several runs, one location per line
 *   finddata ARCS 12345 --getproposal   # Proposal for each run
 *   finddata ARCS --listruns IPTS-1234  # Run range of a proposal
 *   finddata --filename ARCS_12345_event.nxs
 *   finddata --complete instruments     # Words for shell completion
 */

import 'dotenv/config';
import { findData } from '../finddata.js';

findData(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
