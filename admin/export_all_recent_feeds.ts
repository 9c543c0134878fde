#!/usr/bin/env node
// Prints every feed that published a post within the last <days> days.
import { exportAllRecentFeeds, processIO } from './cli';
import * as D from './log';

// exitCode rather than process.exit(): stdout may still be draining into a pipe
(async function() {
  process.exitCode = await exportAllRecentFeeds(process.argv.slice(2), processIO());
})().catch((e) => {
  D.error(e);
  process.exitCode = 1;
});
