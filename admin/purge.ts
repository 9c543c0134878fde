import type Db from "./db";
import * as T from "./types";
import * as D from "./log";
import { UserNotFoundError } from "./errors";

export interface PurgeIO {
  out(line: string): void;
  // resolves undefined when input ends before an answer
  ask(question: string): Promise<string | undefined>;
}

export type PurgeOutcome =
  | { deleted: false; user: T.User; counts: T.UserDataCounts }
  | { deleted: true; user: T.User; counts: T.UserDataCounts; rows: T.DeletedRows };

export function isConfirmed(answer: string | undefined): boolean {
  return answer !== undefined && answer.toLowerCase() === "yes";
}

/**
 * Shows what is stored for a user and, after an explicit "yes", removes
 * the user together with subscriptions, read markers and preferences.
 * There is no way back once this commits.
 */
export async function purgeUser(db: Db, username: string, io: PurgeIO): Promise<PurgeOutcome> {
  io.out(`User: ${username}`);

  let user = await db.getUser(username);
  if (!user) throw new UserNotFoundError();
  io.out(`User ID: ${user.id}`);

  let counts = await db.countUserData(user.id);
  io.out("");
  io.out(`Found ${counts.subscriptions} subscriptions for user ${username}`);
  io.out("");
  io.out(`Found ${counts.postReads} post reads for user ${username}`);
  if (counts.preferences !== undefined) {
    io.out("");
    io.out(`Found ${counts.preferences} preferences for user ${username}`);
  }

  io.out("");
  io.out("Do you want to delete all data for this user?");
  let answer = await io.ask("yes/[no]: ");

  if (!isConfirmed(answer)) {
    D.xdebug(6,`purge of ${username} declined: ${JSON.stringify(answer)}`);
    io.out("Data not deleted");
    return { deleted: false, user, counts };
  }

  let rows = await db.delUserData(user.id);
  io.out("Data deleted");
  return { deleted: true, user, counts, rows };
}
