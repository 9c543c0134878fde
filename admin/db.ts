import sqlite3 from "sqlite3";
import * as R from 'runtypes';
import * as D from "./log";
import * as T from './types';

sqlite3.verbose();

export type OpenMode = 'readonly' | 'readwrite' | 'create';

const openFlags: Record<OpenMode, number> = {
  readonly: sqlite3.OPEN_READONLY,
  readwrite: sqlite3.OPEN_READWRITE,
  create: sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE,
};

export default class Db {
  private db: sqlite3.Database;

  private constructor(db: sqlite3.Database) {
    this.db = db;
    this.db.on('trace', sql => { D.xdebug(9,`SQL: ${sql}`)})
  }

  // The scripts work on an existing store, so 'create' is only for tests
  // and fresh in-memory databases.
  static open(file: string, mode: OpenMode = 'readwrite'): Promise<Db> {
    return new Promise((resolve, reject) => {
      D.xdebug(7,`open ${file} (${mode})`);
      let db = new sqlite3.Database(file, openFlags[mode], (err) => {
        if (err) reject(err);
        else resolve(new Db(db));
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // Generic access

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  run(sql: string, params: unknown[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (err) {
        if (err) {
          reject(err);
        } else {
          resolve(this.changes);
        }
      });
    });
  }

  get<A>(sql: string, params: unknown[], rt: R.Runtype<A>): Promise<A | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: unknown) => {
        if (err) {
          reject(err);
        } else if (row === undefined) {
          resolve(undefined);
        } else {
          try {
            resolve(rt.check(row));
          } catch (e) {
            reject(e);
          }
        }
      });
    });
  }

  all<A>(sql: string, params: unknown[], rt: R.Runtype<A>): Promise<A[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(err);
        } else if (!rows) {
          resolve([]);
        } else {
          try {
            resolve(rows.map((row) => rt.check(row)));
          } catch (e) {
            reject(e);
          }
        }
      });
    });
  }

  // Runs fn inside one write transaction: either everything fn did is
  // committed or nothing is.
  async transaction<A>(fn: () => Promise<A>): Promise<A> {
    await this.run("begin immediate");
    let result: A;
    try {
      result = await fn();
    } catch (e) {
      D.xdebug(4,`transaction failed, rolling back: ${e}`);
      await this.run("rollback");
      throw e;
    }
    await this.run("commit");
    return result;
  }

  async hasTable(name: string): Promise<boolean> {
    let row = await this.get(
      "select count(*) as n from sqlite_master where type='table' and name=?",
      [name],
      T.Count
    );
    return !!row && row.n > 0;
  }

  // Feed

  getFeedsWithPostsAfter(cutoff: string): Promise<T.Feed[]> {
    return this.all(
      "select distinct f.id, f.url from feed f join post p on f.id = p.feed_id where p.published_at > ?",
      [cutoff],
      T.Feed
    );
  }

  // User

  async getUser(username: string): Promise<T.User | undefined> {
    let user = await this.get("select id, username from user where username=?", [username], T.User);
    D.xdebug(8, user ? `found user ${username} [${user.id}]` : `no user ${username}`);
    return user;
  }

  async countUserData(userId: number): Promise<T.UserDataCounts> {
    let count = async (table: string) => {
      let row = await this.get(`select count(*) as n from ${table} where user_id=?`, [userId], T.Count);
      return row ? row.n : 0;
    };
    let counts: T.UserDataCounts = {
      subscriptions: await count("subscribe"),
      postReads: await count("post_read"),
    };
    if (await this.hasTable("user_preferences")) {
      counts.preferences = await count("user_preferences");
    }
    return counts;
  }

  async delUserData(userId: number): Promise<T.DeletedRows> {
    let withPreferences = await this.hasTable("user_preferences");
    return this.transaction(async () => {
      let deleted: T.DeletedRows = {
        users: await this.run("delete from user where id=?", [userId]),
        postReads: await this.run("delete from post_read where user_id=?", [userId]),
        subscriptions: await this.run("delete from subscribe where user_id=?", [userId]),
        preferences: 0,
      };
      if (withPreferences) {
        deleted.preferences = await this.run("delete from user_preferences where user_id=?", [userId]);
      }
      D.xdebug(6,`deleted data for user ${userId}`, deleted);
      return deleted;
    });
  }
}
