#!/usr/bin/env node
// Shows what is stored for a user and, once confirmed, deletes all of it for
// good. Only for users who asked to be purged from the system.
import { hardDeleteAllDataForUsername, processIO } from './cli';
import * as D from './log';

(async function() {
  process.exitCode = await hardDeleteAllDataForUsername(process.argv.slice(2), processIO());
})().catch((e) => {
  D.error(e);
  process.exitCode = 1;
});
